/**
 * MailGuard PII Engine
 *
 * Deterministic PII detection and redaction over the fixed detector
 * registry. Construct once from configuration and hand the instance to
 * whatever needs it; the engine holds no state beyond its two settings.
 */

import { DETECTORS, freshPattern } from './detectors.js';
import { maskValue } from './mask.js';
import type {
  DetectionResult,
  PIICategory,
  PIIEngineOptions,
  PIIGuard,
} from './types.js';

export const DEFAULT_ENGINE_OPTIONS: PIIEngineOptions = {
  enabled: true,
  threshold: 0.8,
};

/**
 * Report line for one match. Matches with sub-captures (phone) show the
 * captures joined by `-`; everything else is masked.
 */
function describeMatch(category: PIICategory, match: RegExpExecArray): string {
  const captures = match.slice(1);
  const value = captures.length > 0 ? captures.join('-') : maskValue(match[0]);
  return `Found ${category}: ${value}`;
}

export class PIIEngine implements PIIGuard {
  readonly enabled: boolean;
  readonly threshold: number;

  constructor(options: Partial<PIIEngineOptions> = {}) {
    this.enabled = options.enabled ?? DEFAULT_ENGINE_OPTIONS.enabled;
    this.threshold = options.threshold ?? DEFAULT_ENGINE_OPTIONS.threshold;
  }

  /**
   * Classify content. A disabled engine reports everything as safe.
   */
  validate(content: string): DetectionResult {
    if (!this.enabled) {
      return {
        hasPii: false,
        piiTypes: [],
        confidence: 1.0,
        details: [],
        safeToSend: true,
      };
    }

    const piiTypes: PIICategory[] = [];
    const details: string[] = [];

    for (const detector of DETECTORS) {
      const regex = freshPattern(detector);
      let match: RegExpExecArray | null;

      while ((match = regex.exec(content)) !== null) {
        piiTypes.push(detector.category);
        details.push(describeMatch(detector.category, match));
      }
    }

    const hasPii = details.length > 0;
    const confidence = hasPii ? 1.0 : 0.0;

    return {
      hasPii,
      piiTypes,
      confidence,
      details,
      safeToSend: !hasPii || confidence < this.threshold,
    };
  }

  /**
   * Redact every detected span. Each category runs over the output of the
   * previous one, so a later pattern sees earlier replacements.
   */
  sanitize(content: string): string {
    let sanitized = content;

    for (const detector of DETECTORS) {
      sanitized = sanitized.replace(freshPattern(detector), (match) => detector.redact(match));
    }

    return sanitized;
  }
}

/**
 * Per-category match counts, in registry order.
 */
export function countByCategory(result: DetectionResult): Partial<Record<PIICategory, number>> {
  const counts: Partial<Record<PIICategory, number>> = {};

  for (const category of result.piiTypes) {
    counts[category] = (counts[category] ?? 0) + 1;
  }

  return counts;
}
