import { z } from 'zod';

const optionalMs = z.coerce.number().positive().max(300_000).optional();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  AXTREE_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  AXTREE_SEARCH_TIMEOUT_MS: optionalMs,
  AXTREE_PATH_TIMEOUT_MS: optionalMs,
  AXTREE_ACTION_TIMEOUT_MS: optionalMs,
  AXTREE_LOADER_STRATEGY_TIMEOUT_MS: optionalMs,
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function getEnv(): Env {
  if (!_env) {
    _env = envSchema.parse(process.env);
  }
  return _env;
}

/** Parse an explicit environment record without touching the cached process env. */
export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}

/** Drop the cached env so the next getEnv() re-reads process.env. */
export function resetEnv(): void {
  _env = null;
}
