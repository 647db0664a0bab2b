/**
 * Timing configuration for the element tree engine.
 *
 * Every provider call is bounded by one of these budgets. By default a
 * search gets 10s overall, a path walk 5s, an action 5s, and flaky actions
 * (press) get two 3s attempts.
 *
 * Precedence: defaults < AXTREE_* environment < explicit overrides.
 */

import { z } from 'zod';
import { ValidationError } from '../errors';
import { DelayMsSchema, MaxAttemptsSchema, TimeoutMsSchema } from '../validation';
import { getEnv, type Env } from './env';

export const EngineConfigSchema = z.object({
  search: z.object({
    timeoutMs: TimeoutMsSchema,
  }),
  path: z.object({
    timeoutMs: TimeoutMsSchema,
  }),
  loader: z.object({
    strategyTimeoutMs: TimeoutMsSchema,
  }),
  attribute: z.object({
    timeoutMs: TimeoutMsSchema,
  }),
  action: z.object({
    timeoutMs: TimeoutMsSchema,
    flakyTimeoutMs: TimeoutMsSchema,
    flakyMaxAttempts: MaxAttemptsSchema,
    flakyDelayMs: DelayMsSchema,
    flakyActions: z.array(z.string().min(1)),
  }),
  focus: z.object({
    timeoutMs: TimeoutMsSchema,
    maxAttempts: MaxAttemptsSchema,
    delayMs: DelayMsSchema,
  }),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export type EngineConfigOverrides = {
  [K in keyof EngineConfig]?: Partial<EngineConfig[K]>;
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  search: { timeoutMs: 10_000 },
  path: { timeoutMs: 5_000 },
  loader: { strategyTimeoutMs: 2_000 },
  attribute: { timeoutMs: 2_000 },
  action: {
    timeoutMs: 5_000,
    flakyTimeoutMs: 3_000,
    flakyMaxAttempts: 2,
    flakyDelayMs: 1_000,
    flakyActions: ['press', 'AXPress'],
  },
  focus: { timeoutMs: 2_000, maxAttempts: 3, delayMs: 500 },
};

function fromEnv(env: Env): EngineConfigOverrides {
  const overrides: EngineConfigOverrides = {};
  if (env.AXTREE_SEARCH_TIMEOUT_MS !== undefined) {
    overrides.search = { timeoutMs: env.AXTREE_SEARCH_TIMEOUT_MS };
  }
  if (env.AXTREE_PATH_TIMEOUT_MS !== undefined) {
    overrides.path = { timeoutMs: env.AXTREE_PATH_TIMEOUT_MS };
  }
  if (env.AXTREE_ACTION_TIMEOUT_MS !== undefined) {
    overrides.action = { timeoutMs: env.AXTREE_ACTION_TIMEOUT_MS };
  }
  if (env.AXTREE_LOADER_STRATEGY_TIMEOUT_MS !== undefined) {
    overrides.loader = { strategyTimeoutMs: env.AXTREE_LOADER_STRATEGY_TIMEOUT_MS };
  }
  return overrides;
}

/**
 * Build the effective configuration and validate it.
 * Throws ValidationError naming the first offending field.
 */
export function resolveEngineConfig(
  overrides: EngineConfigOverrides = {},
  env: Env = getEnv(),
): EngineConfig {
  const envLayer = fromEnv(env);
  const merged: EngineConfig = {
    search: { ...DEFAULT_ENGINE_CONFIG.search, ...envLayer.search, ...overrides.search },
    path: { ...DEFAULT_ENGINE_CONFIG.path, ...envLayer.path, ...overrides.path },
    loader: { ...DEFAULT_ENGINE_CONFIG.loader, ...envLayer.loader, ...overrides.loader },
    attribute: { ...DEFAULT_ENGINE_CONFIG.attribute, ...envLayer.attribute, ...overrides.attribute },
    action: { ...DEFAULT_ENGINE_CONFIG.action, ...envLayer.action, ...overrides.action },
    focus: { ...DEFAULT_ENGINE_CONFIG.focus, ...envLayer.focus, ...overrides.focus },
  };

  const result = EngineConfigSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    const argument = issue ? issue.path.join('.') : 'config';
    throw new ValidationError(argument, issue?.message ?? 'Invalid engine configuration');
  }
  return result.data;
}
