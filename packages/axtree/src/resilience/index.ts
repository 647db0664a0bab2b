export { withTimeout, sleep, throwIfAborted, type AbortableOperation } from './timeout';
export {
  withRetry,
  withTimeoutAndRetry,
  type RetryOptions,
  type TimeoutRetryOptions,
  type RetryEvent,
} from './retry';
