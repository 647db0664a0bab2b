export { getEnv, parseEnv, resetEnv, type Env } from './env';
export {
  DEFAULT_ENGINE_CONFIG,
  EngineConfigSchema,
  resolveEngineConfig,
  type EngineConfig,
  type EngineConfigOverrides,
} from './engine';
