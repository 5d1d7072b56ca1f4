import type { Clock, FallbackReason, FindMatchesInput, MatchOutcome, MatchResult, ScoredCandidate } from './types.js';
import type { MatchingConfig } from './config.js';
import type { RateLimiter } from './rateLimit/rateLimiter.js';
import type { ResultCache } from './cache/resultCache.js';
import type { AiRanker, AiRankerStatus } from './ai/aiRanker.js';
import type { Logger } from '../../lib/logger/logger.js';
import { systemClock } from './types.js';
import { computeFingerprint } from './cache/fingerprint.js';
import { fallbackResults, rankCandidates, scoreCandidates } from './scoring/candidates.js';
import { AiRankerError } from './ai/errors.js';
import {
  MatchingError,
  MatchingFailedError,
  MissingAssessmentError,
  NoQualifiedTutorsError,
  RateLimitedError
} from './errors.js';
import { logger as defaultLogger } from '../../lib/logger/logger.js';

export type MatchState =
  | 'RATE_CHECK'
  | 'PRECONDITIONS'
  | 'CACHE_LOOKUP'
  | 'CACHE_HIT'
  | 'SCORE_CANDIDATES'
  | 'AI_RANK'
  | 'AI_OK'
  | 'AI_FALLBACK'
  | 'CACHE_STORE'
  | 'DONE'
  | 'REJECTED';

export type MatchEngineDeps = {
  config: MatchingConfig;
  rateLimiter: RateLimiter;
  cache: ResultCache;
  ranker: AiRanker;
  clock?: Clock;
  logger?: Logger;
};

export type MatchEngineStatus = {
  ai: AiRankerStatus;
  remainingRequests: number;
  windowSeconds: number;
};

type RankedOutcome = {
  matches: MatchResult[];
  source: 'ai' | 'fallback';
  fallbackReason?: FallbackReason;
};

/**
 * End-to-end matching for one request:
 * rate check -> preconditions -> cache -> scoring -> AI refinement (or fallback) -> cache store.
 *
 * Rate-limit and precondition failures are thrown as MatchingError before any scoring.
 * AI failures never escape; the rule-based ranking is returned instead.
 * Anything else fails closed as MatchingFailedError.
 */
export class MatchEngine {
  private config: MatchingConfig;
  private rateLimiter: RateLimiter;
  private cache: ResultCache;
  private ranker: AiRanker;
  private clock: Clock;
  private logger: Logger;

  constructor(deps: MatchEngineDeps) {
    this.config = deps.config;
    this.rateLimiter = deps.rateLimiter;
    this.cache = deps.cache;
    this.ranker = deps.ranker;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? defaultLogger;
  }

  status(learnerId: string): MatchEngineStatus {
    return {
      ai: this.ranker.status(),
      remainingRequests: this.rateLimiter.remaining(learnerId),
      windowSeconds: this.rateLimiter.windowSeconds()
    };
  }

  async findMatches(input: FindMatchesInput): Promise<MatchOutcome> {
    const started = this.clock.now();
    const { learner, cognitiveProfile, tutorPool } = input;
    const trace = (state: MatchState) => this.logger.debug('Matching state', { learnerId: learner.id, state });

    trace('RATE_CHECK');
    const decision = this.rateLimiter.allow(learner.id);
    if (!decision.allowed) {
      trace('REJECTED');
      this.logger.warn('Matching rate limit exceeded', {
        learnerId: learner.id,
        retryAfterSeconds: decision.retryAfterSeconds
      });
      throw new RateLimitedError(decision.retryAfterSeconds);
    }

    trace('PRECONDITIONS');
    if (!cognitiveProfile) {
      trace('REJECTED');
      throw new MissingAssessmentError();
    }
    if (!tutorPool.length) {
      trace('REJECTED');
      throw new NoQualifiedTutorsError();
    }

    try {
      trace('CACHE_LOOKUP');
      const fingerprint = computeFingerprint(learner, tutorPool, cognitiveProfile);
      const cached = this.cache.get(fingerprint);
      if (cached) {
        trace('CACHE_HIT');
        this.logger.info('Matching cache hit', { learnerId: learner.id, fingerprint });
        trace('DONE');
        return {
          matches: [...cached],
          processingTimeMs: this.clock.now() - started,
          cacheHit: true,
          source: 'cache'
        };
      }

      trace('SCORE_CANDIDATES');
      const ranked = rankCandidates(
        scoreCandidates(learner, cognitiveProfile, tutorPool, this.config.scoring)
      );
      const shortlistSize = Math.max(this.config.ai.shortlistSize, this.config.resultSize);
      const shortlist = ranked.slice(0, shortlistSize);

      trace('AI_RANK');
      const outcome = await this.refine(learner.id, learner.subjects, shortlist);
      trace(outcome.source === 'ai' ? 'AI_OK' : 'AI_FALLBACK');

      trace('CACHE_STORE');
      this.cache.put(fingerprint, outcome.matches, this.config.cache.ttlMs);

      trace('DONE');
      return {
        matches: outcome.matches,
        processingTimeMs: this.clock.now() - started,
        cacheHit: false,
        source: outcome.source,
        ...(outcome.fallbackReason ? { fallbackReason: outcome.fallbackReason } : {})
      };
    } catch (error) {
      if (error instanceof MatchingError) throw error;
      this.logger.error('Matching failed unexpectedly', { learnerId: learner.id, error });
      throw new MatchingFailedError(error);
    }
  }

  private async refine(
    learnerId: string,
    requestedSubjects: string[],
    shortlist: readonly ScoredCandidate[]
  ): Promise<RankedOutcome> {
    const fallback = fallbackResults(shortlist, this.config.resultSize);
    try {
      const matches = await this.ranker.refine(shortlist, {
        requestedSubjects,
        resultSize: this.config.resultSize
      });
      return { matches, source: 'ai' };
    } catch (error) {
      if (!(error instanceof AiRankerError)) throw error;
      this.logger.warn('AI ranking unavailable, using rule-based ranking', {
        learnerId,
        reason: error.reason,
        error
      });
      return { matches: fallback, source: 'fallback', fallbackReason: error.reason };
    }
  }
}
