import { HttpClient, type HttpEffects } from '@lkr-rates/http';

import type { Clock } from './types.js';

/**
 * Headers sent to upstreams that reject non-browser clients
 */
export const BROWSER_HEADERS: Record<string, string> = {
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
};

/**
 * Options shared by every provider factory
 */
export interface ProviderOptions {
  clock: Clock;
  /** Overrides for the HTTP client's side effects (tests stub `fetch` here) */
  httpEffects?: Partial<HttpEffects> | undefined;
}

/**
 * HTTP client configured for a single upstream
 */
export function createProviderHttpClient(config: {
  baseUrl: string;
  defaultHeaders?: Record<string, string> | undefined;
  effects?: Partial<HttpEffects> | undefined;
  providerName: string;
  timeout: number;
}): HttpClient {
  return new HttpClient(
    {
      baseUrl: config.baseUrl,
      defaultHeaders: config.defaultHeaders,
      providerName: config.providerName,
      timeout: config.timeout,
    },
    config.effects
  );
}
