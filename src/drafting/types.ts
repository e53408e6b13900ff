/**
 * Draft Guard Types
 *
 * The drafting side of the email assistant hands requests to a language
 * model and finished drafts to the user. These types describe what the
 * guard sees of that exchange.
 */

import type { DetectionResult } from '../pii/types.js';

export interface DraftRequest {
  /** What the user asked for, in their own words */
  userRequest: string;
  /** Points the draft must cover */
  keyPoints: string[];
  /** Retrieved thread context shown to the model */
  context?: string;
  /** Address the draft will go to. Never scrubbed: the send needs it */
  recipient?: string;
}

export interface GeneratedDraft {
  subject: string;
  body: string;
}

/**
 * Produces a draft from a (scrubbed) request. Implemented by the
 * model-calling code outside this package.
 */
export interface DraftGenerator {
  generate(request: DraftRequest): Promise<GeneratedDraft>;
}

export interface ReviewedDraft extends GeneratedDraft {
  /** PII was found in the generated body */
  hasPii: boolean;
  /** Verdict computed before any auto-redaction */
  isSafe: boolean;
  /** The body was rewritten by the guard */
  redacted: boolean;
  detection: DetectionResult;
}
