#!/usr/bin/env node

/**
 * MailGuard CLI
 *
 * Find and redact PII in email text before it leaves the assistant.
 *
 * Usage:
 *   mailguard init                 Write .mailguard/config.json
 *   mailguard scan [files...]      Report PII in files (or stdin)
 *   mailguard sanitize [file]      Print the text with PII redacted
 *   mailguard review [file]        Check a draft body before sending
 *   mailguard detectors            List detectors and redaction tokens
 *   mailguard config               Show the effective configuration
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import {
  initCommand,
  scanCommand,
  sanitizeCommand,
  reviewCommand,
  detectorsCommand,
  configCommand,
} from './commands/index.js';

// Get version from package.json
const require = createRequire(import.meta.url);
const { version } = require('../package.json');

const program = new Command();

program
  .name('mailguard')
  .description('Find and redact PII in email text before it leaves the assistant.')
  .version(version);

// ─── mailguard init ──────────────────────────────────────────

program
  .command('init')
  .description('Initialize MailGuard in the current directory')
  .action(initCommand);

// ─── mailguard scan ──────────────────────────────────────────

program
  .command('scan [files...]')
  .description('Detect PII in files, or stdin when none are given')
  .option('--json', 'Output as JSON')
  .option('--threshold <n>', 'Confidence threshold (0-1) for blocking a send')
  .option('--disable', 'Skip detection and report every input as safe')
  .action(scanCommand);

// ─── mailguard sanitize ──────────────────────────────────────

program
  .command('sanitize [file]')
  .description('Redact PII from a file, or stdin')
  .option('-o, --output <file>', 'Write to a file instead of stdout')
  .action(sanitizeCommand);

// ─── mailguard review ────────────────────────────────────────

program
  .command('review [file]')
  .description('Review a draft body before sending; redacts it if PII is found')
  .option('-s, --subject <subject>', 'Draft subject line')
  .option('--json', 'Output as JSON')
  .option('--threshold <n>', 'Confidence threshold (0-1) for blocking a send')
  .option('--disable', 'Skip detection and report the draft as safe')
  .action(reviewCommand);

// ─── mailguard detectors ─────────────────────────────────────

program
  .command('detectors')
  .description('List PII detectors in the order they are applied')
  .option('--json', 'Output as JSON')
  .action(detectorsCommand);

// ─── mailguard config ────────────────────────────────────────

program
  .command('config')
  .description('View the effective MailGuard configuration')
  .option('--json', 'Output as JSON')
  .action(configCommand);

// ─── Parse & run ─────────────────────────────────────────────

await program.parseAsync();
