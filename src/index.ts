/**
 * MailGuard — PII guard for email drafts
 *
 * Public API for programmatic usage.
 *
 * @example
 * ```ts
 * import { PIIEngine, DraftGuard } from 'mailguard';
 *
 * const engine = new PIIEngine({ enabled: true, threshold: 0.8 });
 * engine.validate('Contact me at test@example.com').safeToSend; // false
 * engine.sanitize('Contact me at test@example.com');
 * // 'Contact me at [EMAIL_REDACTED]@example.com'
 *
 * const guard = new DraftGuard(engine);
 * const reviewed = await guard.draft(request, generator);
 * ```
 */

// Configuration
export type { MailGuardConfig, PIIConfig, ResolvedConfig } from './types.js';
export {
  loadConfig,
  saveConfig,
  readConfigFile,
  applyEnvOverrides,
  parseThreshold,
  initializeProject,
  isInitialized,
  defaultConfig,
  MAILGUARD_DIR,
  GLOBAL_MAILGUARD_DIR,
  ENV_ENABLED,
  ENV_THRESHOLD,
} from './config.js';
export type { LoadConfigOptions } from './config.js';

// PII engine
export * from './pii/index.js';

// Drafting
export * from './drafting/index.js';

import type { MailGuardConfig } from './types.js';
import { PIIEngine } from './pii/engine.js';

/**
 * Build the engine described by a loaded configuration.
 */
export function createPIIEngine(config: MailGuardConfig): PIIEngine {
  return new PIIEngine(config.pii);
}
