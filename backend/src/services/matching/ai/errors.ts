import type { FallbackReason } from '../types.js';

/**
 * Failures inside the AI ranking boundary. The orchestrator turns every one
 * of these into the rule-based result; none reaches the caller.
 */
export class AiRankerError extends Error {
  reason: FallbackReason;
  constructor(message: string, reason: FallbackReason, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AiRankerError';
    this.reason = reason;
  }
}

export class AiProviderUnavailableError extends AiRankerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'provider_unavailable', options);
    this.name = 'AiProviderUnavailableError';
  }
}

export class AiResponseInvalidError extends AiRankerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'response_invalid', options);
    this.name = 'AiResponseInvalidError';
  }
}

export class AiTimeoutError extends AiRankerError {
  constructor(timeoutMs: number) {
    super(`AI ranking exceeded ${timeoutMs}ms`, 'timeout');
    this.name = 'AiTimeoutError';
  }
}
