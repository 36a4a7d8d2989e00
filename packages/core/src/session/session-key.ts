/**
 * Typed session attribute keys
 *
 * A `SessionKey<T>` names an attribute and carries the guard that proves its type,
 * so reading it yields `Result<T>` rather than `unknown`. Keys are expressions, so
 * they can stand anywhere a cache key or value is expected.
 *
 * @example
 * ```typescript
 * const key = numberKey('key');
 * const value = numberKey('value');
 *
 * chain(put<number, number>('C', key, value), get<number, number>('C', key));
 * ```
 */

import { fail, type Result, success } from '../domain/result.js';
import { formatValue, SessionExpression } from '../expressions/expression.js';
import type { Session } from './session.js';

type Guard<T> = (value: unknown) => value is T;

const readAttribute = <T>(session: Session, name: string, guard: Guard<T>, typeName: string): Result<T> => {
  if (!session.has(name)) {
    return fail('resolution', `No attribute named '${name}' is defined`);
  }
  const value = session.get(name);
  if (!guard(value)) {
    return fail('resolution', `Attribute '${name}' is not a ${typeName}: ${formatValue(value)}`);
  }
  return success(value);
};

export class SessionKey<T> extends SessionExpression<T> {
  constructor(
    readonly name: string,
    readonly guard: Guard<T>,
    readonly typeName: string,
  ) {
    super((session) => readAttribute(session, name, guard, typeName), `#{${name}}`);
  }
}

export const sessionKey = <T>(name: string, guard: Guard<T>, typeName = 'value'): SessionKey<T> =>
  new SessionKey(name, guard, typeName);

const isNumber = (value: unknown): value is number => typeof value === 'number';
const isString = (value: unknown): value is string => typeof value === 'string';
const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean';
const isAnything = (_value: unknown): _value is unknown => true;

export const numberKey = (name: string): SessionKey<number> => sessionKey(name, isNumber, 'number');

export const stringKey = (name: string): SessionKey<string> => sessionKey(name, isString, 'string');

export const booleanKey = (name: string): SessionKey<boolean> => sessionKey(name, isBoolean, 'boolean');

/** Key accepting any value that is present */
export const anyKey = (name: string): SessionKey<unknown> => sessionKey(name, isAnything, 'value');
