// Typed environment configuration
import { z } from 'zod';

const LOG_LEVELS = ['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevelName = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),

  OPENAI_API_KEY: z.string().optional(),
  OPENAI_SMALL_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_MAIN_MODEL: z.string().default('gpt-4.1-mini'),
  OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  EMBEDDER: z.enum(['simple', 'openai']).default('simple'),

  DATA_DIR: z.string().optional(),
  SESSION_STORE: z.enum(['memory', 'redis']).default('memory'),
  REDIS_URL: z.string().default('redis://localhost:6379'),
  SESSION_TTL_MINUTES: z.coerce.number().positive().default(24 * 60),
  SESSION_MAX_ENTRIES: z.coerce.number().int().positive().default(1000),

  STAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  LLM_RETRY_ATTEMPTS: z.coerce.number().int().min(0).default(5),
  LLM_RETRY_INITIAL_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  LLM_RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(60_000),
  DEFAULT_NUM_MEALS: z.coerce.number().int().positive().default(5),
  PROFILE_RECALL_MIN_SCORE: z.coerce.number().min(0).max(1).default(0.75),
});

export type EnvInput = Record<string, string | undefined>;

function blankToUndefined(env: EnvInput): EnvInput {
  const out: EnvInput = {};
  for (const [key, value] of Object.entries(env)) {
    out[key] = value === undefined || value.trim() === '' ? undefined : value;
  }
  return out;
}

export function loadConfig(env: EnvInput = process.env) {
  const parsed = envSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    const details = parsed.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  const e = parsed.data;
  return Object.freeze({
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    corsOrigins: e.CORS_ORIGIN.split(',').map((o) => o.trim()).filter(Boolean),
    openai: {
      apiKey: e.OPENAI_API_KEY,
      smallModel: e.OPENAI_SMALL_MODEL,
      mainModel: e.OPENAI_MAIN_MODEL,
      embeddingModel: e.OPENAI_EMBEDDING_MODEL,
    },
    embedder: e.EMBEDDER,
    dataDir: e.DATA_DIR ?? process.cwd(),
    sessions: {
      store: e.SESSION_STORE,
      redisUrl: e.REDIS_URL,
      ttlMinutes: e.SESSION_TTL_MINUTES,
      maxEntries: e.SESSION_MAX_ENTRIES,
    },
    pipeline: {
      stageTimeoutMs: e.STAGE_TIMEOUT_MS,
      defaultNumMeals: e.DEFAULT_NUM_MEALS,
    },
    llmRetry: {
      maxRetries: e.LLM_RETRY_ATTEMPTS,
      initialDelay: e.LLM_RETRY_INITIAL_DELAY_MS,
      maxDelay: e.LLM_RETRY_MAX_DELAY_MS,
    },
    profileRecallMinScore: e.PROFILE_RECALL_MIN_SCORE,
  });
}

export type AppConfig = ReturnType<typeof loadConfig>;

/** App configuration, read once from the process environment. */
export const appConfig: AppConfig = loadConfig();
