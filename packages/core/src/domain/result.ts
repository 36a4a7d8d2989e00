/**
 * Result Module - Failure-as-value plumbing for the action chain
 *
 * Resolution, operation and check steps return `Result` values instead of throwing,
 * so a failing step never escapes the chain driver.
 */

/**
 * Failure category
 * - `resolution`: session or parameters could not be resolved, nothing was called
 * - `operation`: the capability call failed
 * - `check`: an assertion over the operation result did not hold
 * - `timeout`: the harness gave up waiting for the action
 * - `aborted`: the harness cancelled the chain before the action ran
 */
export type FailureKind = 'resolution' | 'operation' | 'check' | 'timeout' | 'aborted';

/** A single reason an action failed */
export interface FailureReason {
  kind: FailureKind;
  message: string;
}

/**
 * Result type for steps that can fail
 *
 * @template T - Type of the successful value
 * @template E - Type of error (defaults to FailureReason)
 *
 * @example
 * ```typescript
 * const resolved = resolveClientParameters(session);
 * if (!resolved.success) {
 *   return resolved;
 * }
 * resolved.value.client.beginTransaction();
 * ```
 */
export type Result<T, E = FailureReason> = { success: true; value: T } | { success: false; errors: E[] };

/** Creates a successful Result */
export const success = <T>(value: T): Result<T, never> => ({
  success: true,
  value,
});

/** Creates a failed Result */
export const failure = <E = FailureReason>(errors: E[]): Result<never, E> => ({
  success: false,
  errors,
});

/** Creates a failed Result carrying one reason */
export const fail = (kind: FailureKind, message: string): Result<never> => failure([{ kind, message }]);

/** Applies `fn` to a successful value, passing failures through */
export const mapSuccess = <T, U>(result: Result<T>, fn: (value: T) => U): Result<U> =>
  result.success ? success(fn(result.value)) : result;

/** Chains a step that can itself fail */
export const flatMapSuccess = <T, U>(result: Result<T>, fn: (value: T) => Result<U>): Result<U> =>
  result.success ? fn(result.value) : result;

/**
 * Failure of one action, as surfaced to the chain and the harness
 */
export interface ActionFailure {
  /** Request name the harness attributes the failure to */
  request: string;
  /** Action type, e.g. `get` or `txClose` */
  actionType: string;
  /** Cache or resource the action addressed; empty for transaction actions */
  resource: string;
  reasons: readonly FailureReason[];
}

/**
 * Renders a failure as `<actionType> <resource>: <reason>; <reason>`
 *
 * @example
 * ```typescript
 * formatActionFailure({
 *   request: 'get C',
 *   actionType: 'get',
 *   resource: 'C',
 *   reasons: [{ kind: 'resolution', message: 'no active client' }],
 * });
 * // => 'get C: no active client'
 * ```
 */
export const formatActionFailure = (failed: ActionFailure): string => {
  const messages = failed.reasons.map((reason) => reason.message).join('; ');
  return failed.resource ? `${failed.actionType} ${failed.resource}: ${messages}` : `${failed.actionType}: ${messages}`;
};
