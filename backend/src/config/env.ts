import 'dotenv/config';
import { z } from 'zod';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  CORS_ORIGIN: optionalString,
  DIRECTORY_SEED_PATH: optionalString,
  GEN_AI: z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.enum(['openai', 'gemini']).default('openai')
  ),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  OPENAI_MAX_TOKENS: z.coerce.number().int().positive().default(800),
  AI_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  GEMINI_API_KEY: optionalString,
  GEMINI_MODEL: z.string().min(1).default('gemini-2.0-flash'),
  GEMINI_MAX_TOKENS: z.coerce.number().int().positive().default(800),
  GEMINI_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  AI_SHORTLIST_SIZE: z.coerce.number().int().positive().default(5),
  MATCH_COGNITIVE_WEIGHT: z.coerce.number().min(0).default(0.8),
  MATCH_SUBJECT_WEIGHT: z.coerce.number().min(0).default(0.2),
  MATCH_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
  MATCH_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(1000),
  MATCH_RATE_LIMIT: z.coerce.number().int().positive().default(5),
  MATCH_RATE_WINDOW_SECONDS: z.coerce.number().int().positive().default(300)
}).refine((value) => value.MATCH_COGNITIVE_WEIGHT + value.MATCH_SUBJECT_WEIGHT > 0, {
  message: 'MATCH_COGNITIVE_WEIGHT and MATCH_SUBJECT_WEIGHT cannot both be 0',
  path: ['MATCH_COGNITIVE_WEIGHT']
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return EnvSchema.parse(source);
}
