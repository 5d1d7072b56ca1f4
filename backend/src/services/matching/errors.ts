import type { MatchingErrorCode } from '@tutor-match/shared';

export class MatchingError extends Error {
  code: MatchingErrorCode;
  status: number;
  constructor(code: MatchingErrorCode, message: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MatchingError';
    this.code = code;
    this.status = status;
  }
}

export class MissingAssessmentError extends MatchingError {
  constructor() {
    super('ASSESSMENT_REQUIRED', 'Cognitive assessment required', 400);
    this.name = 'MissingAssessmentError';
  }
}

export class NoQualifiedTutorsError extends MatchingError {
  constructor() {
    super('NO_QUALIFIED_TUTORS', 'No qualified tutors available', 404);
    this.name = 'NoQualifiedTutorsError';
  }
}

export class LearnerNotFoundError extends MatchingError {
  constructor() {
    super('LEARNER_NOT_FOUND', 'Learner profile not found', 404);
    this.name = 'LearnerNotFoundError';
  }
}

export class RateLimitedError extends MatchingError {
  retryAfterSeconds: number;
  constructor(retryAfterSeconds: number) {
    super('RATE_LIMITED', 'Too many matching requests. Please wait before trying again.', 429);
    this.name = 'RateLimitedError';
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

// Carries no internal detail; the cause stays server-side.
export class MatchingFailedError extends MatchingError {
  constructor(cause: unknown) {
    super('MATCHING_FAILED', 'Unable to compute tutor matches right now', 500, { cause });
    this.name = 'MatchingFailedError';
  }
}
