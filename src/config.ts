import { z } from 'zod';
import { ConfigError } from './domain/index.js';

const csv = z.string().transform((value) =>
  value.split(',').map((item) => item.trim()).filter((item) => item.length > 0));

const flag = z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65_535).default(3000),

  DATABASE_URL: z.string().url().optional(),
  DB_POOL_MAX: z.coerce.number().int().min(1).default(10),
  REDIS_URL: z.string().url().optional(),

  HISTORY_CAP: z.coerce.number().int().min(1).default(20),
  TURN_TIMEOUT_MS: z.coerce.number().int().min(1).default(10_000),
  INTENT_MIN_CONFIDENCE: z.coerce.number().min(0).max(1).optional(),

  INPUT_MAX_LENGTH: z.coerce.number().int().min(1).default(500),
  OUTPUT_MAX_LENGTH: z.coerce.number().int().min(1).default(500),
  RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(30),
  RATE_LIMIT_WINDOW_SECONDS: z.coerce.number().int().min(1).default(60),
  POLICY_STRICT_CHARSET: flag.default('false'),
  BLOCKED_TERMS: csv.optional(),

  INTENTS_PATH: z.string().min(1).default('config/intents.json'),
  RESPONSES_PATH: z.string().min(1).default('config/responses.json'),

  GENERATION_BACKEND: z.enum(['none', 'ollama']).default('none'),
  BACKEND_INTENTS: csv.default('fallback'),
  OLLAMA_URL: z.string().url().default('http://localhost:11434'),
  OLLAMA_MODEL: z.string().min(1).default('llama3.2'),

  PERSIST_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  PERSIST_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(200),
  SESSION_IDLE_TIMEOUT_SECONDS: z.coerce.number().int().min(0).default(1800),
});

export interface AppConfig {
  logLevel: z.output<typeof envSchema>['LOG_LEVEL'];
  host: string;
  port: number;
  databaseUrl: string | undefined;
  dbPoolMax: number;
  redisUrl: string | undefined;
  historyCap: number;
  turnTimeoutMs: number;
  intentMinConfidence: number | undefined;
  policy: {
    inputMaxLength: number;
    outputMaxLength: number;
    rateLimitMax: number;
    rateLimitWindowSeconds: number;
    strictCharset: boolean;
    blockedTerms: string[] | undefined;
  };
  intentsPath: string;
  responsesPath: string;
  generation: {
    backend: 'none' | 'ollama';
    intents: string[];
    ollamaUrl: string;
    ollamaModel: string;
  };
  persistMaxAttempts: number;
  persistRetryDelayMs: number;
  /** 0 disables the idle-session sweep. */
  sessionIdleTimeoutSeconds: number;
}

/**
 * Reads configuration from environment variables.
 * Empty strings count as unset.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }

  const e = parsed.data;
  return {
    logLevel: e.LOG_LEVEL,
    host: e.HOST,
    port: e.PORT,
    databaseUrl: e.DATABASE_URL,
    dbPoolMax: e.DB_POOL_MAX,
    redisUrl: e.REDIS_URL,
    historyCap: e.HISTORY_CAP,
    turnTimeoutMs: e.TURN_TIMEOUT_MS,
    intentMinConfidence: e.INTENT_MIN_CONFIDENCE,
    policy: {
      inputMaxLength: e.INPUT_MAX_LENGTH,
      outputMaxLength: e.OUTPUT_MAX_LENGTH,
      rateLimitMax: e.RATE_LIMIT_MAX,
      rateLimitWindowSeconds: e.RATE_LIMIT_WINDOW_SECONDS,
      strictCharset: e.POLICY_STRICT_CHARSET,
      blockedTerms: e.BLOCKED_TERMS,
    },
    intentsPath: e.INTENTS_PATH,
    responsesPath: e.RESPONSES_PATH,
    generation: {
      backend: e.GENERATION_BACKEND,
      intents: e.BACKEND_INTENTS,
      ollamaUrl: e.OLLAMA_URL,
      ollamaModel: e.OLLAMA_MODEL,
    },
    persistMaxAttempts: e.PERSIST_MAX_ATTEMPTS,
    persistRetryDelayMs: e.PERSIST_RETRY_DELAY_MS,
    sessionIdleTimeoutSeconds: e.SESSION_IDLE_TIMEOUT_SECONDS,
  };
}
