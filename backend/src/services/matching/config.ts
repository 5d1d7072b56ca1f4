// Matching configuration. Weights affect the blended score only; the
// rule-based order is count -> overlap -> price and never reads them.

export type MatchingConfig = {
  // Number of results returned to the caller.
  resultSize: number;
  scoring: {
    weights: {
      // Cognitive compatibility is the primary signal.
      cognitive: number;
      subject: number;
    };
    // Overlap ratio at or above which the explanation reads as strong.
    strongOverlapRatio: number;
  };
  cache: {
    ttlMs: number;
    maxEntries: number;
  };
  rateLimit: {
    maxRequests: number;
    windowMs: number;
  };
  ai: {
    // Candidates sent to the provider (cost control).
    shortlistSize: number;
    timeoutMs: number;
    maxTokens: number;
  };
};

export const DEFAULT_MATCHING_CONFIG = {
  resultSize: 3,
  scoring: {
    weights: {
      cognitive: 0.8,
      subject: 0.2
    },
    strongOverlapRatio: 0.75
  },
  cache: {
    ttlMs: 60 * 60 * 1000,
    maxEntries: 1000
  },
  rateLimit: {
    maxRequests: 5,
    windowMs: 5 * 60 * 1000
  },
  ai: {
    shortlistSize: 5,
    timeoutMs: 30_000,
    maxTokens: 800
  }
} as const satisfies MatchingConfig;

export type MatchingEnv = {
  GEN_AI: 'openai' | 'gemini';
  MATCH_COGNITIVE_WEIGHT: number;
  MATCH_SUBJECT_WEIGHT: number;
  MATCH_CACHE_TTL_SECONDS: number;
  MATCH_CACHE_MAX_ENTRIES: number;
  MATCH_RATE_LIMIT: number;
  MATCH_RATE_WINDOW_SECONDS: number;
  AI_SHORTLIST_SIZE: number;
  AI_TIMEOUT_MS: number;
  OPENAI_MAX_TOKENS: number;
  GEMINI_TIMEOUT_MS: number;
  GEMINI_MAX_TOKENS: number;
};

export function matchingConfigFromEnv(env: MatchingEnv): MatchingConfig {
  const gemini = env.GEN_AI === 'gemini';
  return {
    resultSize: DEFAULT_MATCHING_CONFIG.resultSize,
    scoring: {
      weights: {
        cognitive: env.MATCH_COGNITIVE_WEIGHT,
        subject: env.MATCH_SUBJECT_WEIGHT
      },
      strongOverlapRatio: DEFAULT_MATCHING_CONFIG.scoring.strongOverlapRatio
    },
    cache: {
      ttlMs: env.MATCH_CACHE_TTL_SECONDS * 1000,
      maxEntries: env.MATCH_CACHE_MAX_ENTRIES
    },
    rateLimit: {
      maxRequests: env.MATCH_RATE_LIMIT,
      windowMs: env.MATCH_RATE_WINDOW_SECONDS * 1000
    },
    ai: {
      shortlistSize: env.AI_SHORTLIST_SIZE,
      timeoutMs: gemini ? env.GEMINI_TIMEOUT_MS : env.AI_TIMEOUT_MS,
      maxTokens: gemini ? env.GEMINI_MAX_TOKENS : env.OPENAI_MAX_TOKENS
    }
  };
}
