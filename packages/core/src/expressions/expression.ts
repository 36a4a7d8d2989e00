/**
 * Session Expressions
 *
 * Keys and values of cache actions are fixed when the chain is built, but may depend
 * on the session they run in. An `Expression<T>` is either a literal `T` or a
 * `SessionExpression<T>` evaluated against the session at execution time.
 *
 * @module expressions
 */

import { inspect } from 'node:util';
import { fail, type Result, success } from '../domain/result.js';
import type { Session } from '../session/session.js';
import { describeError } from '../utils/error-handler.js';

/** Value computed from the session when the action runs */
export class SessionExpression<T> {
  constructor(
    private readonly resolver: (session: Session) => Result<T>,
    readonly description: string,
  ) {}

  resolve(session: Session): Result<T> {
    try {
      return this.resolver(session);
    } catch (error) {
      return fail('resolution', `${this.description} failed: ${describeError(error)}`);
    }
  }
}

/** Literal value or session-computed value */
export type Expression<T> = T | SessionExpression<T>;

export const isSessionExpression = <T>(value: Expression<T>): value is SessionExpression<T> =>
  value instanceof SessionExpression;

/** Evaluates an expression against `session`; literals resolve to themselves */
export const resolveExpression = <T>(expression: Expression<T>, session: Session): Result<T> =>
  isSessionExpression(expression) ? expression.resolve(session) : success(expression);

/** Formats a value for failure messages */
export const formatValue = (value: unknown): string => inspect(value, { depth: 4, breakLength: Number.POSITIVE_INFINITY });

export const describeExpression = <T>(expression: Expression<T>): string =>
  isSessionExpression(expression) ? expression.description : formatValue(expression);

/**
 * Wraps a session function
 *
 * @example
 * ```typescript
 * put<number, number>('C', fromSession((session) => success(session.userId)), 1);
 * ```
 */
export const fromSession = <T>(fn: (session: Session) => Result<T>, description = 'session function'): SessionExpression<T> =>
  new SessionExpression(fn, description);

const PLACEHOLDER = /#\{([^}]+)\}/g;

/**
 * String template interpolating `#{name}` placeholders with session attributes
 *
 * @example
 * ```typescript
 * template('user-#{userName}').resolve(session.set('userName', 'ann'));
 * // => { success: true, value: 'user-ann' }
 * ```
 */
export const template = (pattern: string): SessionExpression<string> =>
  new SessionExpression((session) => {
    const missing: string[] = [];
    const value = pattern.replace(PLACEHOLDER, (_match, name: string) => {
      if (!session.has(name)) {
        missing.push(name);
        return '';
      }
      return String(session.get(name));
    });
    if (missing.length > 0) {
      return fail('resolution', missing.map((name) => `No attribute named '${name}' is defined`).join('; '));
    }
    return success(value);
  }, pattern);
