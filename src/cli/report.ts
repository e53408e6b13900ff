/**
 * Report Display
 *
 * Formats detection results and draft reviews for the terminal.
 */

import chalk from 'chalk';
import { countByCategory } from '../pii/engine.js';
import { PII_CATEGORIES } from '../pii/types.js';
import type { DetectionResult, PIICategory } from '../pii/types.js';
import type { ReviewedDraft } from '../drafting/types.js';

// ─── Category Names ──────────────────────────────────────────

const CATEGORY_NAMES: Record<PIICategory, string> = {
  email: 'Email address',
  phone: 'Phone number',
  ssn: 'Social Security number',
  credit_card: 'Card number',
  ip_address: 'IP address',
  address: 'Street address',
};

function safeLabel(safe: boolean): string {
  return safe ? chalk.green('✅ Yes') : chalk.red('⚠️  No (PII detected)');
}

function showFindings(result: DetectionResult): void {
  const counts = countByCategory(result);

  for (const category of PII_CATEGORIES) {
    const count = counts[category];
    if (count) {
      console.log(`    ${chalk.yellow('•')} ${CATEGORY_NAMES[category]} × ${count}`);
    }
  }

  for (const detail of result.details) {
    console.log(`      ${chalk.dim(detail)}`);
  }
}

// ─── Detection Report ────────────────────────────────────────

/**
 * Display the scan result for one input.
 */
export function showDetectionReport(source: string, result: DetectionResult): void {
  console.log(chalk.bold(`  ${source}`));

  if (result.hasPii) {
    console.log(`    ${chalk.yellow('⚠')} ${result.details.length} finding(s)`);
    showFindings(result);
  } else {
    console.log(`    ${chalk.green('✓')} No PII detected`);
  }

  console.log(`    ${chalk.white('Confidence:')}   ${result.confidence.toFixed(1)}`);
  console.log(`    ${chalk.white('Safe to send:')} ${safeLabel(result.safeToSend)}`);
  console.log();
}

// ─── Draft Review ────────────────────────────────────────────

/**
 * Display a reviewed draft, followed by the body as it would be sent.
 */
export function showReviewSummary(source: string, reviewed: ReviewedDraft): void {
  console.log(chalk.bold(`📝 Draft review: ${source}`));
  console.log();

  if (reviewed.subject) {
    console.log(`  ${chalk.white('Subject:')}      ${reviewed.subject}`);
  }
  console.log(`  ${chalk.white('Safe to send:')} ${safeLabel(reviewed.isSafe)}`);

  if (reviewed.hasPii) {
    console.log();
    console.log(chalk.yellow('  ⚠️  WARNING: PII detected and sanitized'));
    showFindings(reviewed.detection);
  }

  console.log();
  console.log(chalk.dim('  ─── Body ───'));
  console.log(reviewed.body);
  console.log();
}

// ─── Detector Table ──────────────────────────────────────────

export function showDetectorTable(
  detectors: Array<{ category: PIICategory; token: string; pattern: string }>,
): void {
  const categoryWidth = Math.max(8, ...detectors.map((d) => d.category.length));
  const tokenWidth = Math.max(5, ...detectors.map((d) => d.token.length));

  console.log(chalk.bold(`  ${'Category'.padEnd(categoryWidth)}  ${'Token'.padEnd(tokenWidth)}  Pattern`));

  for (const detector of detectors) {
    console.log(
      `  ${chalk.cyan(detector.category.padEnd(categoryWidth))}  ${detector.token.padEnd(tokenWidth)}  ${chalk.dim(detector.pattern)}`,
    );
  }

  console.log();
}
