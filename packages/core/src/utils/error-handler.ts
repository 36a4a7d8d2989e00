/**
 * Error handling utilities for harness collaborators
 *
 * @module error-handler
 *
 * @remarks
 * Failures of the chain itself are values (see `Result`). These handlers cover errors
 * raised around the chain: a throwing outcome reporter, or cleanup of an abandoned
 * session failing.
 *
 * @example
 * ```typescript
 * // Fail fast - the scenario run rejects
 * const strictHandler = createErrorHandler('throw');
 *
 * // Log and continue
 * const lenientHandler = createErrorHandler('log');
 *
 * // Silent
 * const silentHandler = createErrorHandler('ignore');
 * ```
 */

/**
 * Error handling strategy
 * - `throw`: Re-throw error
 * - `log`: Log error and continue
 * - `ignore`: Silent
 */
export type ErrorStrategy = 'throw' | 'log' | 'ignore';

export type ErrorHandler = (error: Error, context: string) => void;

/**
 * Safely executes a custom error handler
 *
 * @remarks
 * Wraps handler in try-catch to prevent handler errors from propagating
 */
const executeCustomHandler = (customHandler: ErrorHandler, error: Error, context: string): void => {
  try {
    customHandler(error, context);
  } catch (handlerError) {
    console.error(
      '[cache-chain] Error in custom error handler:',
      handlerError instanceof Error ? handlerError.message : String(handlerError),
    );
  }
};

const logErrorToConsole = (error: Error, context: string): void => {
  console.error(`[cache-chain] Error in ${context}:`, error.message);
  if (error.stack) {
    console.error(error.stack);
  }
};

/**
 * Creates an error handler with the specified strategy
 *
 * @param strategy - Error handling strategy (default: 'log')
 * @param customHandler - Optional custom handler to execute before applying strategy
 */
export const createErrorHandler = (strategy: ErrorStrategy = 'log', customHandler?: ErrorHandler): ErrorHandler => {
  return (error: Error, context: string): void => {
    if (customHandler) {
      executeCustomHandler(customHandler, error, context);
    }

    switch (strategy) {
      case 'throw':
        throw error;

      case 'log':
        logErrorToConsole(error, context);
        break;

      case 'ignore':
        break;

      default: {
        const exhaustiveCheck: never = strategy;
        console.error(`[cache-chain] Unknown error strategy: ${exhaustiveCheck}`);
      }
    }
  };
};

/**
 * Wraps a synchronous function with error handling
 *
 * @returns Function result or undefined if error occurred
 *
 * @example
 * ```typescript
 * withErrorHandlingSync(() => transaction.close(), handler, 'session cleanup');
 * ```
 */
export const withErrorHandlingSync = <T>(fn: () => T, errorHandler: ErrorHandler, context: string): T | undefined => {
  try {
    return fn();
  } catch (thrownValue: unknown) {
    errorHandler(normalizeError(thrownValue), context);
    return undefined;
  }
};

/**
 * Normalizes any thrown value to an Error instance
 *
 * @remarks
 * Handles cases where non-Error values are thrown (strings, objects, etc.)
 */
export const normalizeError = (thrownValue: unknown): Error => {
  if (thrownValue instanceof Error) {
    return thrownValue;
  }
  return new Error(String(thrownValue));
};

/**
 * Describes a thrown value for a failure message: `<name>: <message>` for errors
 * with a specific name, the bare message otherwise
 */
export const describeError = (thrownValue: unknown): string => {
  const error = normalizeError(thrownValue);
  return error.name && error.name !== 'Error' ? `${error.name}: ${error.message}` : error.message;
};
