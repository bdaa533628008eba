import { join } from 'node:path';
import { z } from 'zod';

const port = z.coerce.number().int().min(0).max(65535);
const millis = z.coerce.number().int().min(0);
const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  PORT: port.default(8000),
  HOST: z.string().default('0.0.0.0'),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
  STORAGE_BACKEND: z.enum(['json', 'redis']).default('json'),
  DATA_DIR: z.string().optional(),
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: port.default(6379),
  REDIS_PASSWORD: optionalSecret,
  ANTHROPIC_API_KEY: optionalSecret,
  AGENT_MODEL: optionalSecret,
  OPENAI_API_KEY: optionalSecret,
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  STRATEGY_TIMEOUT_MS: millis.default(120_000),
  RUN_GRACE_MS: millis.default(60_000),
  REVEAL_DELAY_MS: millis.default(400),
  MOCK_TURN_DELAY_MS: millis.default(150),
});

export interface AppConfig {
  port: number;
  host: string;
  corsOrigin: string;
  storage: {
    backend: 'json' | 'redis';
    dataDir: string;
  };
  redis: {
    host: string;
    port: number;
    password?: string;
  };
  generation: {
    anthropicApiKey?: string;
    agentModel?: string;
    openaiApiKey?: string;
    openaiModel: string;
    strategyTimeoutMs: number;
    mockTurnDelayMs: number;
  };
  run: {
    graceMs: number;
    revealDelayMs: number;
  };
}

/**
 * Read and validate the process environment. Throws with the offending
 * variable names when anything is malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration (${problems})`);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    host: e.HOST,
    corsOrigin: e.CORS_ORIGIN,
    storage: {
      backend: e.STORAGE_BACKEND,
      dataDir: e.DATA_DIR ?? join(env.HOME ?? '/tmp', '.discussion-forge'),
    },
    redis: {
      host: e.REDIS_HOST,
      port: e.REDIS_PORT,
      password: e.REDIS_PASSWORD,
    },
    generation: {
      anthropicApiKey: e.ANTHROPIC_API_KEY,
      agentModel: e.AGENT_MODEL,
      openaiApiKey: e.OPENAI_API_KEY,
      openaiModel: e.OPENAI_MODEL,
      strategyTimeoutMs: e.STRATEGY_TIMEOUT_MS,
      mockTurnDelayMs: e.MOCK_TURN_DELAY_MS,
    },
    run: {
      graceMs: e.RUN_GRACE_MS,
      revealDelayMs: e.REVEAL_DELAY_MS,
    },
  };
}
