/**
 * Draft Guard
 *
 * Wraps draft generation with PII handling on both sides: request text is
 * scrubbed before it reaches the model, and the generated body is
 * validated (and redacted if needed) before it reaches the user.
 */

import type { PIIGuard } from '../pii/types.js';
import type {
  DraftGenerator,
  DraftRequest,
  GeneratedDraft,
  ReviewedDraft,
} from './types.js';

export class DraftGuard {
  constructor(private readonly guard: PIIGuard) {}

  /**
   * Sanitize the free-text parts of a request. A disabled guard passes the
   * request through untouched; the recipient is always kept.
   */
  scrubRequest(request: DraftRequest): DraftRequest {
    if (!this.guard.enabled) return request;

    return {
      ...request,
      userRequest: this.guard.sanitize(request.userRequest),
      keyPoints: request.keyPoints.map((point) => this.guard.sanitize(point)),
      context: request.context === undefined ? undefined : this.guard.sanitize(request.context),
    };
  }

  /**
   * Validate a generated draft. Bodies with PII come back redacted, with
   * `isSafe` reflecting the draft as generated.
   */
  review(draft: GeneratedDraft): ReviewedDraft {
    const detection = this.guard.validate(draft.body);

    return {
      subject: draft.subject,
      body: detection.hasPii ? this.guard.sanitize(draft.body) : draft.body,
      hasPii: detection.hasPii,
      isSafe: detection.safeToSend,
      redacted: detection.hasPii,
      detection,
    };
  }

  async draft(request: DraftRequest, generator: DraftGenerator): Promise<ReviewedDraft> {
    const generated = await generator.generate(this.scrubRequest(request));
    return this.review(generated);
  }
}
