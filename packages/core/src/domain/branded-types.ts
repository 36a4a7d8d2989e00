/**
 * Branded Types Module - Type-safe session identifiers
 */

import { createId } from '@paralleldrive/cuid2';

/**
 * Branded type utility
 *
 * @template T - Underlying primitive type (e.g., string, number)
 * @template TBrand - Brand identifier (e.g., 'SessionId')
 */
type Brand<T, TBrand> = T & { readonly __brand: TBrand };

/** Identifier of one simulated user's session */
export type SessionId = Brand<string, 'SessionId'>;

/** Validation error thrown when ID creation fails */
export class IdValidationError extends Error {
  constructor(
    public readonly idType: string,
    public readonly value: string,
    message: string,
  ) {
    super(`[${idType}] ${message}: received "${value}"`);
    this.name = 'IdValidationError';
  }
}

/** @internal */
const isNonEmptyString = (value: string): boolean => {
  return value.trim() !== '';
};

/**
 * Creates a validated SessionId
 *
 * @throws {IdValidationError} If id is empty or contains only whitespace
 *
 * @example
 * ```typescript
 * const sessionId = createSessionId('user-1');
 * createSessionId(''); // ❌ Throws IdValidationError
 * ```
 */
export const createSessionId = (id: string): SessionId => {
  if (!id || !isNonEmptyString(id)) {
    throw new IdValidationError('SessionId', id, 'SessionId cannot be empty or whitespace-only');
  }
  return id as SessionId;
};

/** Generates a fresh SessionId (CUID v2) */
export const generateSessionId = (): SessionId => createSessionId(createId());

/** Type guard for SessionId */
export const isSessionId = (value: unknown): value is SessionId => {
  return typeof value === 'string' && isNonEmptyString(value);
};
