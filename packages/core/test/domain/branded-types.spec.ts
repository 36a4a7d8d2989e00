/**
 * Branded Types Tests
 */

import { createSessionId, generateSessionId, IdValidationError, isSessionId } from '@cache-chain/core';
import { describe, expect, it } from 'vitest';

describe('Branded Types', () => {
  describe('createSessionId', () => {
    it('should create a valid SessionId', () => {
      const id = createSessionId('user-123');
      expect(id).toBe('user-123');
      expect(typeof id).toBe('string');
    });

    it('should throw IdValidationError for empty string', () => {
      expect(() => createSessionId('')).toThrow(IdValidationError);
      expect(() => createSessionId('')).toThrow(/SessionId cannot be empty/);
    });

    it('should throw IdValidationError for whitespace-only string', () => {
      expect(() => createSessionId('   ')).toThrow(IdValidationError);
    });

    it('should preserve the error type and fields', () => {
      try {
        createSessionId('');
      } catch (error) {
        expect(error).toBeInstanceOf(IdValidationError);
        if (error instanceof IdValidationError) {
          expect(error.idType).toBe('SessionId');
          expect(error.value).toBe('');
          expect(error.name).toBe('IdValidationError');
        }
      }
    });
  });

  describe('generateSessionId', () => {
    it('should generate distinct ids', () => {
      const first = generateSessionId();
      const second = generateSessionId();

      expect(first).not.toBe(second);
      expect(isSessionId(first)).toBe(true);
    });
  });

  describe('isSessionId', () => {
    it('should reject non-strings and blank strings', () => {
      expect(isSessionId(42)).toBe(false);
      expect(isSessionId(' ')).toBe(false);
      expect(isSessionId('session-1')).toBe(true);
    });
  });
});
