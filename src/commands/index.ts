/**
 * Command re-exports
 */

export { initCommand } from './init.js';
export { scanCommand } from './scan.js';
export { sanitizeCommand } from './sanitize.js';
export { reviewCommand } from './review.js';
export { detectorsCommand } from './detectors.js';
export { configCommand } from './config.js';
