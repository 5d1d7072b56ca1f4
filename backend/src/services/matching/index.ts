import type { Clock } from './types.js';
import type { LlmClient } from './ai/llmClient.js';
import type { Logger } from '../../lib/logger/logger.js';
import type { Env } from '../../config/env.js';
import { DEFAULT_MATCHING_CONFIG, matchingConfigFromEnv, type MatchingConfig } from './config.js';
import { MatchEngine } from './engine.js';
import { MemoryResultCache } from './cache/resultCache.js';
import { SlidingWindowRateLimiter } from './rateLimit/rateLimiter.js';
import { AiRanker } from './ai/aiRanker.js';
import { OpenAiClient } from './ai/openaiClient.js';
import { GeminiClient } from './ai/geminiClient.js';

export type CreateMatchEngineOptions = {
  config?: MatchingConfig;
  llmClient?: LlmClient | null;
  clock?: Clock;
  logger?: Logger;
};

export function createMatchEngine(options: CreateMatchEngineOptions = {}): MatchEngine {
  const config = options.config ?? DEFAULT_MATCHING_CONFIG;
  return new MatchEngine({
    config,
    rateLimiter: new SlidingWindowRateLimiter({
      maxRequests: config.rateLimit.maxRequests,
      windowMs: config.rateLimit.windowMs,
      clock: options.clock
    }),
    cache: new MemoryResultCache({ clock: options.clock, maxEntries: config.cache.maxEntries }),
    ranker: new AiRanker(options.llmClient ?? null, {
      timeoutMs: config.ai.timeoutMs,
      maxTokens: config.ai.maxTokens,
      logger: options.logger
    }),
    clock: options.clock,
    logger: options.logger
  });
}

/**
 * Provider chosen by GEN_AI. A missing key for that provider disables AI ranking.
 */
export function createLlmClientFromEnv(env: Env): LlmClient | null {
  switch (env.GEN_AI) {
    case 'gemini':
      if (!env.GEMINI_API_KEY) return null;
      return new GeminiClient({ apiKey: env.GEMINI_API_KEY, model: env.GEMINI_MODEL });
    case 'openai':
      if (!env.OPENAI_API_KEY) return null;
      return new OpenAiClient({ apiKey: env.OPENAI_API_KEY, model: env.OPENAI_MODEL });
  }
}

export function createMatchEngineFromEnv(env: Env, logger?: Logger): MatchEngine {
  return createMatchEngine({
    config: matchingConfigFromEnv(env),
    llmClient: createLlmClientFromEnv(env),
    logger
  });
}

export { MatchEngine } from './engine.js';
export type { MatchEngineStatus, MatchState } from './engine.js';
export { DEFAULT_MATCHING_CONFIG, matchingConfigFromEnv } from './config.js';
export type { MatchingConfig } from './config.js';
export * from './errors.js';
export type * from './types.js';
