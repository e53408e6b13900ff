/**
 * mailguard scan [files...] — Detect PII in text
 */

import chalk from 'chalk';
import ora from 'ora';
import { createCliEngine, type CliEngine, type EngineFlags } from '../cli/engine.js';
import { inputLabel, readInput } from '../cli/input.js';
import { showDetectionReport } from '../cli/report.js';
import type { DetectionResult } from '../pii/types.js';

interface ScanOptions extends EngineFlags {
  json?: boolean;
}

export interface ScanEntry {
  source: string;
  result: DetectionResult;
}

export async function scanCommand(files: string[], options: ScanOptions): Promise<void> {
  console.log();

  let cli: CliEngine;
  try {
    cli = await createCliEngine(options);
  } catch (err) {
    console.log(chalk.red(`✗ ${err instanceof Error ? err.message : String(err)}`));
    process.exit(1);
  }

  const inputs = files.length > 0 ? files : ['-'];
  const spinner =
    !options.json && inputs.length > 1 ? ora(`Scanning ${inputs.length} inputs...`).start() : null;

  const entries: ScanEntry[] = [];
  for (const file of inputs) {
    let content: string;
    try {
      content = await readInput(file);
    } catch (err) {
      spinner?.fail('Scan failed');
      console.log(chalk.red(`✗ Cannot read ${inputLabel(file)}: ${err instanceof Error ? err.message : String(err)}`));
      process.exit(1);
    }
    entries.push({ source: inputLabel(file), result: cli.engine.validate(content) });
  }

  const unsafe = entries.filter((entry) => !entry.result.safeToSend).length;
  if (unsafe > 0) {
    process.exitCode = 1;
  }

  if (options.json) {
    console.log(JSON.stringify(entries, null, 2));
    return;
  }

  spinner?.succeed(`Scanned ${inputs.length} inputs`);

  console.log(chalk.bold('🔍 PII Scan'));
  if (!cli.engine.enabled) {
    console.log(chalk.yellow('   PII validation is disabled; every input is reported safe.'));
  }
  console.log();

  for (const entry of entries) {
    showDetectionReport(entry.source, entry.result);
  }

  if (unsafe > 0) {
    console.log(chalk.red(`  ${unsafe} of ${entries.length} input(s) not safe to send.`));
  } else {
    console.log(chalk.green(`  ✓ All ${entries.length} input(s) safe to send.`));
  }
  console.log();
}
