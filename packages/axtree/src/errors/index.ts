/**
 * Error taxonomy for the element tree engine.
 *
 * Every failure that leaves the engine is an AxTreeError carrying a string
 * code, a numeric code from the registry below, and a recovery suggestion
 * the CLI layer prints next to the message.
 */

// --------------------------------------------------------------------------
// Numeric registry
// --------------------------------------------------------------------------

export const ErrorCode = {
  // General (1-99)
  unknown: 1,
  invalidArgument: 2,
  internalError: 3,

  // Elements (200-299)
  elementNotFound: 200,
  invalidElementState: 203,
  elementDoesNotSupportAction: 204,

  // Operations (300-399)
  operationTimeout: 300,
  operationFailed: 301,
  operationNotSupported: 302,
  retryExhausted: 304,

  // Applications and windows
  applicationNotFound: 400,
  windowNotFound: 500,
} as const;

export type ErrorCodeName = keyof typeof ErrorCode;

// --------------------------------------------------------------------------
// Error types
// --------------------------------------------------------------------------

export class AxTreeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly errorCode: number,
    public readonly recoverySuggestion: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'AxTreeError';
  }
}

export class TimeoutError extends AxTreeError {
  constructor(
    public readonly operation: string,
    public readonly durationMs: number,
  ) {
    super(
      `Operation '${operation}' timed out after ${durationMs}ms`,
      'operation_timeout',
      ErrorCode.operationTimeout,
      'Try increasing the timeout duration or check if the application is responding correctly.',
      { operation, durationMs },
    );
    this.name = 'TimeoutError';
  }
}

export class RetryExhaustedError extends AxTreeError {
  constructor(
    public readonly operation: string,
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    super(
      `Operation '${operation}' failed after ${attempts} attempts: ${errorMessage(lastError)}`,
      'retry_exhausted',
      ErrorCode.retryExhausted,
      'The application kept failing to respond. Wait for it to become idle and try again.',
      { operation, attempts },
    );
    this.name = 'RetryExhaustedError';
  }
}

export class ElementNotFoundError extends AxTreeError {
  constructor(description: string, details?: Record<string, unknown>) {
    super(
      `UI Element not found: ${description}`,
      'element_not_found',
      ErrorCode.elementNotFound,
      'Make sure the element exists and is correctly identified. Try using a different identifier or accessibility role.',
      details,
    );
    this.name = 'ElementNotFoundError';
  }
}

export class InvalidElementStateError extends AxTreeError {
  constructor(
    public readonly element: string,
    public readonly state: string,
  ) {
    super(
      `UI Element '${element}' in invalid state: ${state}`,
      'invalid_element_state',
      ErrorCode.invalidElementState,
      "The element is in a state that prevents the requested operation. Check the application's current state.",
      { element, state },
    );
    this.name = 'InvalidElementStateError';
  }
}

export class UnsupportedActionError extends AxTreeError {
  constructor(
    public readonly element: string,
    public readonly action: string,
    public readonly availableActions: readonly string[],
  ) {
    super(
      `UI Element '${element}' does not support action: ${action}`,
      'unsupported_action',
      ErrorCode.elementDoesNotSupportAction,
      `This type of element does not support the requested action. Available actions: ${availableActions.join(', ')}.`,
      { element, action, availableActions: [...availableActions] },
    );
    this.name = 'UnsupportedActionError';
  }
}

export class ValidationError extends AxTreeError {
  constructor(
    public readonly argument: string,
    public readonly reason: string,
  ) {
    super(
      `Invalid argument '${argument}': ${reason}`,
      'invalid_argument',
      ErrorCode.invalidArgument,
      'Check the command usage and provide a valid value for this argument.',
      { argument, reason },
    );
    this.name = 'ValidationError';
  }
}

export class OperationFailedError extends AxTreeError {
  constructor(
    public readonly operation: string,
    reason: string,
    public readonly underlying?: unknown,
  ) {
    super(
      `Operation '${operation}' failed: ${reason}`,
      'operation_failed',
      ErrorCode.operationFailed,
      'Check the error details for specific issues that caused the failure.',
      { operation },
    );
    this.name = 'OperationFailedError';
  }
}

export class OperationNotSupportedError extends AxTreeError {
  constructor(operation: string) {
    super(
      `Operation '${operation}' is not supported`,
      'operation_not_supported',
      ErrorCode.operationNotSupported,
      'This operation is not supported for this type of element or application.',
      { operation },
    );
    this.name = 'OperationNotSupportedError';
  }
}

export class ApplicationNotFoundError extends AxTreeError {
  constructor(description: string) {
    super(
      `Application not found: ${description}`,
      'application_not_found',
      ErrorCode.applicationNotFound,
      'Make sure the application is running and the name or PID is correct.',
    );
    this.name = 'ApplicationNotFoundError';
  }
}

export class WindowNotFoundError extends AxTreeError {
  constructor(description: string) {
    super(
      `Window not found: ${description}`,
      'window_not_found',
      ErrorCode.windowNotFound,
      'Make sure the window exists and is correctly identified. The window might be closed or in a different state.',
    );
    this.name = 'WindowNotFoundError';
  }
}

// --------------------------------------------------------------------------
// Helpers
// --------------------------------------------------------------------------

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Wrap anything thrown by a provider or caller code into the taxonomy. */
export function toAxTreeError(err: unknown, operation = 'operation'): AxTreeError {
  if (err instanceof AxTreeError) return err;
  return new OperationFailedError(operation, errorMessage(err), err);
}

/** Argument errors are caller bugs; everything else may succeed on another try. */
export function isRecoverable(err: unknown): boolean {
  return !(err instanceof ValidationError);
}

/**
 * Render an error the way the CLI prints it:
 *
 *   Error: <message>
 *   Code: <numeric code>
 *   Recovery: <suggestion>
 */
export function formatError(err: unknown): string {
  const error = toAxTreeError(err);
  return [
    `Error: ${error.message}`,
    `Code: ${error.errorCode}`,
    `Recovery: ${error.recoverySuggestion}`,
  ].join('\n');
}
