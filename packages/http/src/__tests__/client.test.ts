import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';

import { HttpClient } from '../client.js';
import type { HttpEffects } from '../core/types.js';
import { HttpError, ResponseParseError, ResponseValidationError, TimeoutError } from '../types.js';

function createMockEffects(fetchImpl: HttpEffects['fetch']): HttpEffects {
  return {
    fetch: fetchImpl,
    log: vi.fn(),
    now: () => 1000,
  };
}

function textResponse(body: string, status = 200) {
  return {
    headers: new Headers(),
    ok: status >= 200 && status < 300,
    status,
    text: () => Promise.resolve(body),
  };
}

describe('HttpClient', () => {
  it('should return ok result for successful GET request', async () => {
    const mockFetch = vi.fn().mockResolvedValue(textResponse('{"success":true}'));
    const client = new HttpClient(
      { baseUrl: 'https://api.example.com', providerName: 'test-provider' },
      createMockEffects(mockFetch)
    );

    const result = await client.get('/test');

    expect(result.isOk()).toBe(true);
    expect(result._unsafeUnwrap()).toEqual({ success: true });
    expect(mockFetch).toHaveBeenCalledWith(
      'https://api.example.com/test',
      expect.objectContaining({
        method: 'GET',
      })
    );
  });

  it('should validate the body against a schema', async () => {
    const mockFetch = vi.fn().mockResolvedValue(textResponse('{"rate":"310.50"}'));
    const client = new HttpClient(
      { baseUrl: 'https://api.example.com', providerName: 'test-provider' },
      createMockEffects(mockFetch)
    );

    const result = await client.get('/rates', { schema: z.object({ rate: z.string() }) });

    expect(result._unsafeUnwrap()).toEqual({ rate: '310.50' });
  });

  it('should return ResponseValidationError when the schema does not match', async () => {
    const mockFetch = vi.fn().mockResolvedValue(textResponse('{"rate":310.5}'));
    const client = new HttpClient(
      { baseUrl: 'https://api.example.com', providerName: 'test-provider' },
      createMockEffects(mockFetch)
    );

    const result = await client.get('/rates', { schema: z.object({ rate: z.string() }) });

    expect(result.isErr()).toBe(true);
    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(ResponseValidationError);
    expect(error.message).toBe('Response validation failed: rate: Expected string, received number');
  });

  it('should return ResponseParseError for a body that is not JSON', async () => {
    const mockFetch = vi.fn().mockResolvedValue(textResponse('<html>maintenance</html>'));
    const client = new HttpClient(
      { baseUrl: 'https://api.example.com', providerName: 'test-provider' },
      createMockEffects(mockFetch)
    );

    const result = await client.get('/rates');

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(ResponseParseError);
    if (error instanceof ResponseParseError) {
      expect(error.truncatedPayload).toBe('<html>maintenance</html>');
    }
  });

  it('should return HttpError for a non-2xx status', async () => {
    const mockFetch = vi.fn().mockResolvedValue(textResponse('Internal Server Error', 500));
    const client = new HttpClient(
      { baseUrl: 'https://api.example.com', providerName: 'test-provider' },
      createMockEffects(mockFetch)
    );

    const result = await client.get('/test');

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(HttpError);
    expect(error.message).toBe('HTTP 500: Internal Server Error');
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('should make a single attempt on network failure', async () => {
    const mockFetch = vi.fn().mockRejectedValue(new Error('getaddrinfo ENOTFOUND api.example.com'));
    const client = new HttpClient(
      { baseUrl: 'https://api.example.com', providerName: 'test-provider' },
      createMockEffects(mockFetch)
    );

    const result = await client.get('/test');

    expect(result._unsafeUnwrapErr().message).toBe('getaddrinfo ENOTFOUND api.example.com');
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('should convert aborts into TimeoutError', async () => {
    const abortError = new Error('This operation was aborted');
    abortError.name = 'AbortError';
    const mockFetch = vi.fn().mockRejectedValue(abortError);
    const client = new HttpClient(
      { baseUrl: 'https://api.example.com', providerName: 'test-provider', timeout: 15000 },
      createMockEffects(mockFetch)
    );

    const result = await client.getText('/page');

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(TimeoutError);
    expect(error.message).toBe('Request timeout after 15000ms');
  });

  it('should return text bodies untouched', async () => {
    const mockFetch = vi.fn().mockResolvedValue(textResponse('<table></table>'));
    const client = new HttpClient(
      { baseUrl: 'https://bank.example.com', providerName: 'test-provider' },
      createMockEffects(mockFetch)
    );

    const result = await client.getText('/exchange-rates/');

    expect(result._unsafeUnwrap()).toBe('<table></table>');
    expect(mockFetch).toHaveBeenCalledWith('https://bank.example.com/exchange-rates/', expect.anything());
  });

  it('should url-encode form posts and repeat array fields', async () => {
    const mockFetch = vi.fn().mockResolvedValue(textResponse('<html></html>'));
    const client = new HttpClient(
      { baseUrl: 'https://cb.example.com/form.php', providerName: 'test-provider' },
      createMockEffects(mockFetch)
    );

    await client.postForm('', { 'chk_cur[]': ['USD~United States Dollar'], txtStart: '2025-11-14' });

    expect(mockFetch).toHaveBeenCalledWith(
      'https://cb.example.com/form.php',
      expect.objectContaining({
        body: 'chk_cur%5B%5D=USD%7EUnited+States+Dollar&txtStart=2025-11-14',
        headers: expect.objectContaining({ 'Content-Type': 'application/x-www-form-urlencoded' }),
        method: 'POST',
      })
    );
  });

  it('should close the agent idempotently', async () => {
    const client = new HttpClient({ baseUrl: 'https://api.example.com', providerName: 'test-provider' });

    await client.close();
    await expect(client.close()).resolves.toBeUndefined();
  });
});
