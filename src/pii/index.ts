/**
 * MailGuard PII Engine
 *
 * @module pii
 */

export type {
  PIICategory,
  Detector,
  DetectionResult,
  PIIEngineOptions,
  PIIGuard,
} from './types.js';

export { PII_CATEGORIES } from './types.js';
export { DETECTORS, REDACTION_TOKENS, listDetectors } from './detectors.js';
export { MASK_PLACEHOLDER, maskValue } from './mask.js';
export { PIIEngine, DEFAULT_ENGINE_OPTIONS, countByCategory } from './engine.js';
