import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform(v => (v ? v : undefined));

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  NODE_ENV: z.enum(['development', 'production', 'staging', 'test']).default('development'),
  LOG_LEVEL: z.preprocess(
    v => (typeof v === 'string' && v.trim() ? v.trim().toLowerCase() : undefined),
    z.enum(LOG_LEVELS).optional()
  ),
  DATABASE_URL: z.string().min(1).default('postgresql://localhost:5432/restaurant_ai'),
  DB_POOL_MIN: z.coerce.number().int().min(0).default(2),
  DB_POOL_MAX: z.coerce.number().int().positive().default(20),
  REDIS_URL: optionalString,
  CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
  CACHE_TIMEOUT_MS: z.coerce.number().int().positive().default(250),
  LLM_PROVIDER: z.enum(['auto', 'openai', 'groq', 'none']).default('auto'),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  GROQ_API_KEY: optionalString,
  GROQ_MODEL: z.string().min(1).default('llama-3.1-8b-instant'),
  BACKEND_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  BACKEND_MAX_TOKENS: z.coerce.number().int().positive().default(80),
  BACKEND_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.8),
  RULE_ENGINE_SEED: optionalString,
  ADMIN_API_KEY: optionalString
});

export type AppConfig = {
  port: number;
  env: 'development' | 'production' | 'staging' | 'test';
  /** LOG_LEVEL, else silent under test and info otherwise. */
  logLevel: LogLevel;
  database: { url: string; poolMin: number; poolMax: number };
  cache: { redisUrl: string | undefined; ttlSeconds: number; timeoutMs: number };
  llm: {
    provider: 'auto' | 'openai' | 'groq' | 'none';
    openaiApiKey: string | undefined;
    openaiModel: string;
    groqApiKey: string | undefined;
    groqModel: string;
    timeoutMs: number;
    maxTokens: number;
    temperature: number;
  };
  ruleEngineSeed: string | undefined;
  adminApiKey: string | undefined;
};

/**
 * Parse and validate environment variables. Throws ConfigError listing every bad key.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration - ${problems.join('; ')}`);
  }

  const e = parsed.data;
  if (e.DB_POOL_MIN > e.DB_POOL_MAX) {
    throw new ConfigError('Invalid configuration - DB_POOL_MIN must not exceed DB_POOL_MAX');
  }

  return {
    port: e.PORT,
    env: e.NODE_ENV,
    logLevel: e.LOG_LEVEL ?? (e.NODE_ENV === 'test' ? 'silent' : 'info'),
    database: { url: e.DATABASE_URL, poolMin: e.DB_POOL_MIN, poolMax: e.DB_POOL_MAX },
    cache: { redisUrl: e.REDIS_URL, ttlSeconds: e.CACHE_TTL_SECONDS, timeoutMs: e.CACHE_TIMEOUT_MS },
    llm: {
      provider: e.LLM_PROVIDER,
      openaiApiKey: e.OPENAI_API_KEY,
      openaiModel: e.OPENAI_MODEL,
      groqApiKey: e.GROQ_API_KEY,
      groqModel: e.GROQ_MODEL,
      timeoutMs: e.BACKEND_TIMEOUT_MS,
      maxTokens: e.BACKEND_MAX_TOKENS,
      temperature: e.BACKEND_TEMPERATURE
    },
    ruleEngineSeed: e.RULE_ENGINE_SEED,
    adminApiKey: e.ADMIN_API_KEY
  };
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) cached = loadConfig();
  return cached;
}
