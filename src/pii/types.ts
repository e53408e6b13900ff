/**
 * MailGuard PII Types
 *
 * Type definitions for the PII detector registry and detection results.
 */

// ─── Categories ──────────────────────────────────────────────

/**
 * PII categories in registry order. Detection and redaction
 * always walk the categories in this order.
 */
export const PII_CATEGORIES = [
  'email',
  'phone',
  'ssn',
  'credit_card',
  'ip_address',
  'address',
] as const;

export type PIICategory = (typeof PII_CATEGORIES)[number];

// ─── Detectors ───────────────────────────────────────────────

/**
 * A named category's matching rule plus its redaction rule.
 */
export interface Detector {
  readonly category: PIICategory;
  /** Global, case-insensitive pattern */
  readonly pattern: RegExp;
  /** Fixed placeholder substituted for a detected span */
  readonly token: string;
  /** Rewrite a single matched span */
  redact(match: string): string;
}

// ─── Results ─────────────────────────────────────────────────

/**
 * Result of running every detector over a piece of text.
 */
export interface DetectionResult {
  /** Whether any detector matched */
  hasPii: boolean;
  /** One entry per match, registry order then match order */
  piiTypes: PIICategory[];
  /** 1 when anything matched, 0 otherwise */
  confidence: number;
  /** One masked, human-readable entry per match */
  details: string[];
  /** Whether the content may be released */
  safeToSend: boolean;
}

/**
 * Construction-time settings. Both are fixed for the engine's lifetime.
 */
export interface PIIEngineOptions {
  enabled: boolean;
  /** Confidence at or above which detected PII is unsafe */
  threshold: number;
}

/**
 * The surface collaborators depend on. Drafting code takes this
 * rather than the concrete engine so tests can hand in a fake.
 */
export interface PIIGuard {
  readonly enabled: boolean;
  validate(content: string): DetectionResult;
  sanitize(content: string): string;
}
