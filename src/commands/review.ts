/**
 * mailguard review [file] — Check a finished draft before it is sent
 */

import chalk from 'chalk';
import { createCliEngine, type CliEngine, type EngineFlags } from '../cli/engine.js';
import { inputLabel, readInput } from '../cli/input.js';
import { showReviewSummary } from '../cli/report.js';
import { DraftGuard } from '../drafting/guard.js';

interface ReviewOptions extends EngineFlags {
  subject?: string;
  json?: boolean;
}

export async function reviewCommand(file: string | undefined, options: ReviewOptions): Promise<void> {
  console.log();

  let cli: CliEngine;
  let body: string;
  try {
    cli = await createCliEngine(options);
    body = await readInput(file);
  } catch (err) {
    console.log(chalk.red(`✗ ${err instanceof Error ? err.message : String(err)}`));
    process.exit(1);
  }

  const reviewed = new DraftGuard(cli.engine).review({ subject: options.subject ?? '', body });

  if (!reviewed.isSafe) {
    process.exitCode = 1;
  }

  if (options.json) {
    console.log(JSON.stringify(reviewed, null, 2));
    return;
  }

  showReviewSummary(inputLabel(file), reviewed);
}
