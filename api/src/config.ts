/**
 * Application Configuration
 *
 * Parsed from environment variables once per process. `loadConfig` is pure
 * so tests can build a config from a plain object.
 */

import { z } from 'zod';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: positiveInt(3000),

    STORAGE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),
    DATABASE_URL: optionalString,
    DB_POOL_SIZE: positiveInt(10),

    OPENAI_API_KEY: optionalString,
    OPENAI_BASE_URL: z.string().url().default('https://api.openai.com'),
    OPENAI_CHAT_MODEL: z.string().min(1).default('gpt-4o-mini'),
    OPENAI_EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
    LLM_TIMEOUT_MS: positiveInt(60_000),
    EMBEDDING_BATCH_SIZE: positiveInt(64),

    CHUNK_MAX_LENGTH: positiveInt(800),
    RETRIEVAL_TOP_K: positiveInt(4),
    HISTORY_LIMIT: positiveInt(20),

    API_KEY: optionalString,
    CORS_ORIGIN: optionalString,
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_DRIVER === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when STORAGE_DRIVER is postgres',
      });
    }
  });

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  storage: {
    driver: 'postgres' | 'memory';
    databaseUrl?: string;
    poolSize: number;
  };
  llm: {
    apiKey?: string;
    baseUrl: string;
    chatModel: string;
    embeddingModel: string;
    timeoutMs: number;
    embeddingBatchSize: number;
  };
  rag: {
    chunkMaxLength: number;
    topK: number;
    historyLimit: number;
  };
  security: {
    apiKey?: string;
    corsOrigin?: string;
  };
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    env: values.NODE_ENV,
    port: values.PORT,
    storage: {
      driver: values.STORAGE_DRIVER,
      databaseUrl: values.DATABASE_URL,
      poolSize: values.DB_POOL_SIZE,
    },
    llm: {
      apiKey: values.OPENAI_API_KEY,
      baseUrl: values.OPENAI_BASE_URL.replace(/\/+$/, ''),
      chatModel: values.OPENAI_CHAT_MODEL,
      embeddingModel: values.OPENAI_EMBEDDING_MODEL,
      timeoutMs: values.LLM_TIMEOUT_MS,
      embeddingBatchSize: values.EMBEDDING_BATCH_SIZE,
    },
    rag: {
      chunkMaxLength: values.CHUNK_MAX_LENGTH,
      topK: values.RETRIEVAL_TOP_K,
      historyLimit: values.HISTORY_LIMIT,
    },
    security: {
      apiKey: values.API_KEY,
      corsOrigin: values.CORS_ORIGIN,
    },
  };
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
