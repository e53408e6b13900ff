/**
 * mailguard config — View the effective configuration
 */

import chalk from 'chalk';
import { loadConfig } from '../config.js';
import type { ResolvedConfig } from '../types.js';

interface ConfigOptions {
  json?: boolean;
}

export async function configCommand(options: ConfigOptions): Promise<void> {
  console.log();

  let resolved: ResolvedConfig;
  try {
    resolved = await loadConfig();
  } catch (err) {
    console.log(chalk.red(`✗ ${err instanceof Error ? err.message : String(err)}`));
    process.exit(1);
  }

  if (options.json) {
    console.log(JSON.stringify(resolved, null, 2));
    return;
  }

  const { config } = resolved;

  console.log(chalk.bold('⚙️  MailGuard Configuration'));
  console.log(chalk.dim(`   ${resolved.file ?? '(defaults, no config file)'}`));
  console.log();

  console.log(`  ${chalk.dim('Version:')}        ${config.version}`);
  console.log(`  ${chalk.dim('PII validation:')} ${config.pii.enabled ? chalk.green('enabled') : chalk.red('disabled')}`);
  console.log(`  ${chalk.dim('Threshold:')}      ${config.pii.threshold}`);

  if (resolved.envOverrides.length > 0) {
    console.log(`  ${chalk.dim('From env:')}       ${resolved.envOverrides.join(', ')}`);
  }

  console.log();
}
