/**
 * mailguard init — Initialize MailGuard in the current directory
 */

import chalk from 'chalk';
import { isInitialized, initializeProject, localConfigPath } from '../config.js';

export async function initCommand(): Promise<void> {
  console.log();
  console.log(chalk.bold('🛡  MailGuard — PII guard for email drafts'));
  console.log();

  if (isInitialized()) {
    console.log(chalk.yellow('⚠  MailGuard is already initialized in this directory.'));
    console.log(chalk.dim(`   Config: ${localConfigPath()}`));
    return;
  }

  const config = await initializeProject();

  console.log(chalk.green(`  ✓ Created ${localConfigPath()}`));
  console.log(chalk.dim(`    PII validation ${config.pii.enabled ? 'enabled' : 'disabled'}, threshold ${config.pii.threshold}`));
  console.log();
}
