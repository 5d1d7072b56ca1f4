import type { MatchDto, MatchTutorsResponse, MatchingErrorBody } from '@tutor-match/shared';
import type { MatchOutcome, MatchResult } from '../../../services/matching/index.js';
import { MatchingError, RateLimitedError } from '../../../services/matching/index.js';

export function toMatchDto(result: MatchResult): MatchDto {
  return {
    tutor: {
      id: result.tutor.id,
      name: result.tutor.name,
      price: result.tutor.price,
      subjects: [...result.tutor.subjects]
    },
    matchDetails: {
      compatibilityScore: result.compatibilityScore,
      cognitiveMatchCount: result.cognitiveMatchCount,
      subjectOverlapRatio: result.subjectOverlapRatio,
      reasoning: result.reasoning,
      subjectExplanation: result.subjectExplanation
    }
  };
}

export function toMatchTutorsResponse(outcome: MatchOutcome): MatchTutorsResponse {
  return {
    success: true,
    matches: outcome.matches.map(toMatchDto),
    processingTimeMs: outcome.processingTimeMs,
    cacheHit: outcome.cacheHit,
    source: outcome.source
  };
}

export function toErrorBody(err: MatchingError): MatchingErrorBody {
  if (err instanceof RateLimitedError) {
    return { error: err.code, message: err.message, retryAfter: err.retryAfterSeconds };
  }
  return { error: err.code, message: err.message };
}
