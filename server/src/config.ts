/**
 * Server configuration, validated with zod.
 *
 * Estimator credentials (API_USERNAME / API_PASSWORD) are deliberately not part
 * of the loaded config: they are read from the environment on every call.
 */
import { z } from 'zod';
import type { AuthCredentials } from './types.js';
import { formatValidationErrors } from './validators.js';

export const DEFAULT_ESTIMATOR_BASE_URL = 'https://estimation-immo.ams-investissements.fr';

const envSchema = z.object({
  /** HTTP port for the MCP + REST server */
  PORT: z
    .string()
    .regex(/^\d+$/, 'PORT must be a number')
    .transform(Number)
    .refine((n) => n > 0 && n < 65536, 'PORT must be between 1 and 65535')
    .default('8000'),

  /** Base URL of the estimation API; `/api/estimate` is appended per call */
  ESTIMATOR_API_BASE_URL: z.string().url().default(DEFAULT_ESTIMATOR_BASE_URL),

  /** Client-side timeout for the estimation call */
  ESTIMATOR_TIMEOUT_MS: z
    .string()
    .regex(/^\d+$/, 'ESTIMATOR_TIMEOUT_MS must be a positive integer')
    .transform(Number)
    .refine((n) => n > 0, 'ESTIMATOR_TIMEOUT_MS must be a positive integer')
    .default('30000'),

  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export interface ServerConfig {
  port: number;
  estimatorBaseUrl: string;
  estimatorTimeoutMs: number;
  env: 'development' | 'production' | 'test';
}

export class ConfigError extends Error {
  constructor(readonly details: string) {
    super(`Invalid configuration:\n${details}`);
    this.name = 'ConfigError';
  }
}

/** Empty strings count as unset so `.env` placeholders like `PORT=` fall back to defaults. */
function dropEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') out[key] = value;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(dropEmpty(env));
  if (!parsed.success) {
    throw new ConfigError(formatValidationErrors(parsed.error));
  }
  return {
    port: parsed.data.PORT,
    estimatorBaseUrl: parsed.data.ESTIMATOR_API_BASE_URL,
    estimatorTimeoutMs: parsed.data.ESTIMATOR_TIMEOUT_MS,
    env: parsed.data.NODE_ENV,
  };
}

/** Read the estimator's Basic-Auth credentials. Called once per estimation, never cached. */
export function readCredentials(env: NodeJS.ProcessEnv = process.env): AuthCredentials {
  return {
    username: env.API_USERNAME,
    password: env.API_PASSWORD,
  };
}
