export { DraftGuard } from './guard.js';

export type {
  DraftRequest,
  GeneratedDraft,
  DraftGenerator,
  ReviewedDraft,
} from './types.js';
