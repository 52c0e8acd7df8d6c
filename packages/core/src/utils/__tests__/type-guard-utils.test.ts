import { describe, expect, it } from 'vitest';

import { getErrorMessage, isErrorWithMessage, isRecord, wrapError } from '../type-guard-utils.js';

describe('Type Guard Utilities', () => {
  describe('isErrorWithMessage', () => {
    it('should return true for Error instances and subclasses', () => {
      expect(isErrorWithMessage(new Error('Test error'))).toBe(true);
      expect(isErrorWithMessage(new TypeError('Type error'))).toBe(true);
    });

    it('should return false for objects that only look like errors', () => {
      expect(isErrorWithMessage({ message: 'not an error' })).toBe(false);
      expect(isErrorWithMessage('error string')).toBe(false);
    });
  });

  describe('getErrorMessage', () => {
    it('should extract message from Error instances', () => {
      expect(getErrorMessage(new Error('Test error message'))).toBe('Test error message');
    });

    it('should fall back to the default message or string conversion', () => {
      expect(getErrorMessage(42, 'Unknown')).toBe('Unknown');
      expect(getErrorMessage(42)).toBe('42');
    });
  });

  describe('wrapError', () => {
    it('should prefix the message with context', () => {
      const result = wrapError(new Error('disk full'), 'Failed to save rate');

      expect(result.isErr()).toBe(true);
      expect(result._unsafeUnwrapErr().message).toBe('Failed to save rate: disk full');
    });
  });

  describe('isRecord', () => {
    it('should accept plain objects only', () => {
      expect(isRecord({ a: 1 })).toBe(true);
      expect(isRecord([])).toBe(false);
      expect(isRecord(null)).toBe(false);
    });
  });
});
