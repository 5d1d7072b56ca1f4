import { test } from 'node:test';
import assert from 'node:assert';
import { createMatchEngine, MatchEngine } from '../index.js';
import {
  MatchingFailedError,
  MissingAssessmentError,
  NoQualifiedTutorsError,
  RateLimitedError
} from '../errors.js';
import { DEFAULT_MATCHING_CONFIG } from '../config.js';
import { fallbackResults, rankCandidates, scoreCandidates } from '../scoring/candidates.js';
import { SlidingWindowRateLimiter } from '../rateLimit/rateLimiter.js';
import { AiRanker } from '../ai/aiRanker.js';
import type { ResultCache } from '../cache/resultCache.js';
import type { FindMatchesInput } from '../types.js';
import {
  ALL_HIGH_NEEDS,
  FakeClock,
  ScriptedLlmClient,
  hangUntilAborted,
  pedagogy,
  rankingReply,
  scenarioPool,
  silentLogger,
  tutor
} from './fixtures.js';

const learner = { id: 'learner-1', subjects: ['Mathematics'] };

function input(overrides: Partial<FindMatchesInput> = {}): FindMatchesInput {
  return { learner, cognitiveProfile: ALL_HIGH_NEEDS, tutorPool: scenarioPool(), ...overrides };
}

function engine(options: { llm?: ScriptedLlmClient; clock?: FakeClock; timeoutMs?: number } = {}) {
  return createMatchEngine({
    config: {
      ...DEFAULT_MATCHING_CONFIG,
      ai: { ...DEFAULT_MATCHING_CONFIG.ai, timeoutMs: options.timeoutMs ?? DEFAULT_MATCHING_CONFIG.ai.timeoutMs }
    },
    llmClient: options.llm ?? null,
    clock: options.clock ?? new FakeClock(),
    logger: silentLogger
  });
}

test('perfect, good and poor fits come back in order with decreasing scores', async () => {
  const outcome = await engine().findMatches(input());

  assert.deepStrictEqual(outcome.matches.map((m) => m.tutor.id), ['tutor-a', 'tutor-b', 'tutor-c']);
  assert.deepStrictEqual(outcome.matches.map((m) => m.compatibilityScore), [100, 60, 20]);
  assert.strictEqual(outcome.source, 'fallback');
  assert.strictEqual(outcome.fallbackReason, 'provider_unavailable');
  assert.strictEqual(outcome.cacheHit, false);
});

test('fallback equals the rule-based top three exactly', async () => {
  const pool = [
    ...scenarioPool(),
    tutor('tutor-d', 300, ['History']),
    tutor('tutor-e', 200, ['Maths'], pedagogy('LOW'))
  ];
  const llm = new ScriptedLlmClient(async () => 'not json at all');
  const outcome = await engine({ llm }).findMatches(input({ tutorPool: pool }));

  const expected = fallbackResults(
    rankCandidates(scoreCandidates(learner, ALL_HIGH_NEEDS, pool, DEFAULT_MATCHING_CONFIG.scoring)),
    3
  );
  assert.strictEqual(outcome.source, 'fallback');
  assert.strictEqual(outcome.fallbackReason, 'response_invalid');
  assert.deepStrictEqual(outcome.matches, expected);
  assert.deepStrictEqual(outcome.matches.map((m) => m.tutor.id), ['tutor-a', 'tutor-d', 'tutor-b']);
});

function ruleBasedTopThree(pool = scenarioPool()) {
  return fallbackResults(
    rankCandidates(scoreCandidates(learner, ALL_HIGH_NEEDS, pool, DEFAULT_MATCHING_CONFIG.scoring)),
    3
  );
}

test('a provider timeout falls back to the rule-based top three', async () => {
  const llm = new ScriptedLlmClient(hangUntilAborted);
  const outcome = await engine({ llm, timeoutMs: 20 }).findMatches(input());

  assert.strictEqual(outcome.source, 'fallback');
  assert.strictEqual(outcome.fallbackReason, 'timeout');
  assert.deepStrictEqual(outcome.matches, ruleBasedTopThree());
});

test('a provider error falls back to the rule-based top three', async () => {
  const llm = new ScriptedLlmClient(async () => {
    throw new Error('connection refused');
  });
  const outcome = await engine({ llm }).findMatches(input());

  assert.strictEqual(outcome.source, 'fallback');
  assert.strictEqual(outcome.fallbackReason, 'provider_unavailable');
  assert.deepStrictEqual(outcome.matches, ruleBasedTopThree());
});

test('a valid AI ranking is returned as the result', async () => {
  const llm = new ScriptedLlmClient(async () => rankingReply(['tutor-b', 'tutor-a', 'tutor-c']));
  const outcome = await engine({ llm }).findMatches(input());

  assert.strictEqual(outcome.source, 'ai');
  assert.strictEqual(outcome.fallbackReason, undefined);
  assert.deepStrictEqual(outcome.matches.map((m) => m.tutor.id), ['tutor-b', 'tutor-a', 'tutor-c']);
  assert.strictEqual(outcome.matches[0]?.compatibilityScore, 60);
});

test('repeat requests are served from cache until the TTL passes', async () => {
  const clock = new FakeClock();
  const llm = new ScriptedLlmClient(async () => rankingReply(['tutor-a', 'tutor-b', 'tutor-c']));
  const matcher = engine({ llm, clock });

  const first = await matcher.findMatches(input());
  const second = await matcher.findMatches(input());
  assert.strictEqual(second.cacheHit, true);
  assert.strictEqual(second.source, 'cache');
  assert.deepStrictEqual(second.matches, first.matches);
  assert.strictEqual(llm.calls.length, 1);

  clock.advance(DEFAULT_MATCHING_CONFIG.cache.ttlMs);
  const third = await matcher.findMatches(input());
  assert.strictEqual(third.cacheHit, false);
  assert.strictEqual(llm.calls.length, 2);
});

test('a changed tutor pool misses the cache', async () => {
  const matcher = engine();
  await matcher.findMatches(input());
  const outcome = await matcher.findMatches(
    input({ tutorPool: [...scenarioPool(), tutor('tutor-d', 300, ['Mathematics'])] })
  );
  assert.strictEqual(outcome.cacheHit, false);
  assert.deepStrictEqual(outcome.matches.map((m) => m.tutor.id), ['tutor-d', 'tutor-a', 'tutor-b']);
});

test('the sixth request in five minutes is rate limited', async () => {
  const matcher = engine();
  for (let i = 0; i < 5; i += 1) {
    await matcher.findMatches(input());
  }
  await assert.rejects(matcher.findMatches(input()), (err: unknown) => {
    return err instanceof RateLimitedError && err.status === 429 && err.retryAfterSeconds === 300;
  });
  assert.strictEqual(matcher.status(learner.id).remainingRequests, 0);
});

test('a missing assessment is rejected before scoring', async () => {
  await assert.rejects(
    engine().findMatches(input({ cognitiveProfile: null })),
    (err: unknown) => err instanceof MissingAssessmentError && err.message === 'Cognitive assessment required'
  );
});

test('an empty pool is rejected', async () => {
  await assert.rejects(
    engine().findMatches(input({ tutorPool: [] })),
    (err: unknown) => err instanceof NoQualifiedTutorsError && err.message === 'No qualified tutors available'
  );
});

test('a pool smaller than the result size returns every tutor', async () => {
  const outcome = await engine().findMatches(input({ tutorPool: scenarioPool().slice(0, 2) }));
  assert.deepStrictEqual(outcome.matches.map((m) => m.tutor.id), ['tutor-a', 'tutor-c']);
});

test('concurrent submissions both complete with the same result', async () => {
  const llm = new ScriptedLlmClient(
    () => new Promise<string>((resolve) => setTimeout(() => resolve(rankingReply(['tutor-a', 'tutor-b', 'tutor-c'])), 10))
  );
  const matcher = engine({ llm });
  const [one, two] = await Promise.all([matcher.findMatches(input()), matcher.findMatches(input())]);

  assert.deepStrictEqual(one.matches, two.matches);
  assert.strictEqual(one.source, 'ai');
  assert.strictEqual(two.source, 'ai');
  assert.strictEqual(matcher.status(learner.id).remainingRequests, 3);
});

test('unexpected failures surface as MatchingFailedError', async () => {
  const clock = new FakeClock();
  const brokenCache: ResultCache = {
    get: () => {
      throw new Error('cache offline');
    },
    put: () => {}
  };
  const matcher = new MatchEngine({
    config: DEFAULT_MATCHING_CONFIG,
    rateLimiter: new SlidingWindowRateLimiter({ maxRequests: 5, windowMs: 300_000, clock }),
    cache: brokenCache,
    ranker: new AiRanker(null, { timeoutMs: 1000, maxTokens: 800, logger: silentLogger }),
    clock,
    logger: silentLogger
  });

  await assert.rejects(matcher.findMatches(input()), (err: unknown) => {
    return err instanceof MatchingFailedError && err.status === 500 && err.code === 'MATCHING_FAILED';
  });
});

test('status reports AI availability and remaining quota', async () => {
  const llm = new ScriptedLlmClient(async () => rankingReply(['tutor-a', 'tutor-b', 'tutor-c']));
  const matcher = engine({ llm });
  await matcher.findMatches(input());

  assert.deepStrictEqual(matcher.status(learner.id), {
    ai: { enabled: true, provider: 'scripted', model: 'scripted-1' },
    remainingRequests: 4,
    windowSeconds: 300
  });
});
