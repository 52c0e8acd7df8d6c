import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createErrorResponse, createSuccessResponse } from '../cli-response.js';
import { ExitCodes, exitCodeToErrorCode } from '../exit-codes.js';

describe('cli-response', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2025-11-22T06:30:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllEnvs();
  });

  describe('createSuccessResponse', () => {
    it('wraps data with the command and a timestamp', () => {
      const response = createSuccessResponse('rate', { buyRate: '304.2758' });

      expect(response).toEqual({
        command: 'rate',
        data: { buyRate: '304.2758' },
        success: true,
        timestamp: '2025-11-22T06:30:00.000Z',
      });
    });

    it('attaches metadata only when given', () => {
      expect(createSuccessResponse('rate', 1, { duration_ms: 12 }).metadata).toEqual({ duration_ms: 12 });
      expect(createSuccessResponse('rate', 1).metadata).toBeUndefined();
    });
  });

  describe('createErrorResponse', () => {
    it('carries the code and message', () => {
      vi.stubEnv('NODE_ENV', 'test');

      const response = createErrorResponse('rate', new Error('No cbsl rate'), 'NOT_FOUND');

      expect(response).toEqual({
        command: 'rate',
        error: { code: 'NOT_FOUND', message: 'No cbsl rate' },
        success: false,
        timestamp: '2025-11-22T06:30:00.000Z',
      });
    });

    it('includes details when provided', () => {
      const response = createErrorResponse('import-csv', new Error('bad'), 'VALIDATION_ERROR', { row: 3 });

      expect(response.error?.details).toEqual({ row: 3 });
    });

    it('includes the stack only in development', () => {
      const error = new Error('boom');

      vi.stubEnv('NODE_ENV', 'development');
      expect(createErrorResponse('rate', error, 'GENERAL_ERROR').error?.stack).toBe(error.stack);

      vi.stubEnv('NODE_ENV', 'production');
      expect(createErrorResponse('rate', error, 'GENERAL_ERROR').error?.stack).toBeUndefined();
    });
  });

  describe('exitCodeToErrorCode', () => {
    it('maps exit codes to names', () => {
      expect(exitCodeToErrorCode(ExitCodes.INVALID_ARGS)).toBe('INVALID_ARGS');
      expect(exitCodeToErrorCode(ExitCodes.NOT_FOUND)).toBe('NOT_FOUND');
      expect(exitCodeToErrorCode(ExitCodes.NETWORK_ERROR)).toBe('NETWORK_ERROR');
    });
  });
});
