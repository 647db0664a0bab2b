// ── Engine ──────────────────────────────────────────────────────────────
export * from './engine';
export * from './tree';

// ── Resilience & validation ─────────────────────────────────────────────
export * from './resilience';
export {
  MAX_TIMEOUT_MS,
  MAX_RETRY_ATTEMPTS,
  MAX_RETRY_DELAY_MS,
  validateTimeout,
  validateRetryCount,
  validateRetryDelay,
  validateElementRole,
  validateElementTitle,
  validateActionName,
  validatePathExpression,
  isStandardRole,
} from './validation';

// ── Provider boundary ───────────────────────────────────────────────────
export * from './provider';

// ── Errors ──────────────────────────────────────────────────────────────
export * from './errors';
export { settle, attempt, type Result } from './errors/result';

// ── Ambient ─────────────────────────────────────────────────────────────
export * from './config';
export * from './monitoring';
