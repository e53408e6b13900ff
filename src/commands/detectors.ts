/**
 * mailguard detectors — List the PII detectors
 */

import chalk from 'chalk';
import { listDetectors } from '../pii/detectors.js';
import { showDetectorTable } from '../cli/report.js';

interface DetectorsOptions {
  json?: boolean;
}

export async function detectorsCommand(options: DetectorsOptions): Promise<void> {
  console.log();

  const detectors = listDetectors();

  if (options.json) {
    console.log(JSON.stringify(detectors, null, 2));
    return;
  }

  console.log(chalk.bold('🧩 PII Detectors'));
  console.log(chalk.dim('   Applied in this order. Matching is case-insensitive.'));
  console.log();

  showDetectorTable(detectors);
}
