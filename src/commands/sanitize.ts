/**
 * mailguard sanitize [file] — Redact PII from text
 */

import chalk from 'chalk';
import { inputLabel, readInput, writeOutput } from '../cli/input.js';
import { PIIEngine } from '../pii/engine.js';

interface SanitizeOptions {
  output?: string;
}

export async function sanitizeCommand(file: string | undefined, options: SanitizeOptions): Promise<void> {
  // sanitize ignores enabled/threshold; config is not read
  const engine = new PIIEngine();

  try {
    const content = await readInput(file);
    await writeOutput(engine.sanitize(content), options.output);
  } catch (err) {
    console.log(chalk.red(`✗ Cannot sanitize ${inputLabel(file)}: ${err instanceof Error ? err.message : String(err)}`));
    process.exit(1);
  }

  if (options.output && options.output !== '-') {
    console.log(chalk.green(`✓ Sanitized text written to ${options.output}`));
  }
}
