/**
 * MailGuard Detector Registry
 *
 * Fixed, ordered set of pattern detectors. The patterns are best-effort:
 * they catch common US formats and nothing more.
 */

import type { Detector, PIICategory } from './types.js';

// ─── Redaction Tokens ────────────────────────────────────────

export const REDACTION_TOKENS: Record<PIICategory, string> = {
  email: '[EMAIL_REDACTED]',
  phone: '[PHONE_REDACTED]',
  ssn: '[SSN_REDACTED]',
  credit_card: '[CARD_REDACTED]',
  ip_address: '[IP_ADDRESS_REDACTED]',
  address: '[ADDRESS_REDACTED]',
};

// ─── Patterns ────────────────────────────────────────────────

const PATTERNS: Record<PIICategory, RegExp> = {
  // local@domain.tld, final label at least two letters
  email: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/gi,

  // Area code, prefix and line number are captured separately.
  // Separators are '-', '.' or a plain space; line breaks end a number.
  phone: /\b(?:\+?1[-. ]?)?\(?(\d{3})\)?[-. ]?(\d{3})[-. ]?(\d{4})\b/gi,

  ssn: /\b\d{3}-\d{2}-\d{4}\b/gi,

  credit_card: /\b\d{4}[-\s]?\d{4}[-\s]?\d{4}[-\s]?\d{4}\b/gi,

  // No octet range check: 999.999.999.999 matches
  ip_address: /\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/gi,

  address: /\b\d+\s+[A-Za-z]+\s+(?:Street|St|Avenue|Ave|Road|Rd|Boulevard|Blvd|Lane|Ln|Drive|Dr)\b/gi,
};

// ─── Registry ────────────────────────────────────────────────

/**
 * Keep the domain, replace the local part.
 */
function redactEmail(match: string): string {
  return `${REDACTION_TOKENS.email}@${match.slice(match.indexOf('@') + 1)}`;
}

function tokenDetector(category: Exclude<PIICategory, 'email'>): Detector {
  const token = REDACTION_TOKENS[category];
  return Object.freeze({
    category,
    pattern: PATTERNS[category],
    token,
    redact: () => token,
  });
}

export const DETECTORS: readonly Detector[] = Object.freeze([
  Object.freeze({
    category: 'email',
    pattern: PATTERNS.email,
    token: REDACTION_TOKENS.email,
    redact: redactEmail,
  } satisfies Detector),
  tokenDetector('phone'),
  tokenDetector('ssn'),
  tokenDetector('credit_card'),
  tokenDetector('ip_address'),
  tokenDetector('address'),
]);

/**
 * Fresh copy of a detector's pattern, so `lastIndex` is never shared
 * between callers.
 */
export function freshPattern(detector: Detector): RegExp {
  return new RegExp(detector.pattern.source, detector.pattern.flags);
}

/**
 * Read-only view of the registry for display.
 */
export function listDetectors(): Array<{ category: PIICategory; token: string; pattern: string }> {
  return DETECTORS.map((detector) => ({
    category: detector.category,
    token: detector.token,
    pattern: detector.pattern.source,
  }));
}
