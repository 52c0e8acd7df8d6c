// Pure HTTP utility functions

import type { FormFields } from '../types.js';

/**
 * Build URL from base URL and endpoint
 */
export const buildUrl = (baseUrl: string, endpoint: string): string => {
  const cleanBaseUrl = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;

  if (!endpoint || endpoint === '/') {
    return cleanBaseUrl;
  }

  const cleanEndpoint = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
  return `${cleanBaseUrl}${cleanEndpoint}`;
};

/**
 * Sanitize URL for logging (remove sensitive query parameters)
 */
export const sanitizeUrl = (url: string): string => {
  try {
    const urlObj = new URL(url);
    const sensitiveParams = ['token', 'key', 'apikey', 'api_key', 'secret', 'password'];

    for (const param of sensitiveParams) {
      if (urlObj.searchParams.has(param)) {
        urlObj.searchParams.set(param, '***');
      }
    }

    return urlObj.toString();
  } catch {
    return url;
  }
};

/**
 * Encode form fields as application/x-www-form-urlencoded.
 * Array values repeat the key (e.g. `chk_cur[]`).
 */
export const encodeFormFields = (fields: FormFields): string => {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(fields)) {
    if (typeof value === 'string') {
      params.append(key, value);
    } else {
      for (const item of value) {
        params.append(key, item);
      }
    }
  }
  return params.toString();
};

/**
 * First characters of a payload for error context
 */
export const truncatePayload = (payload: string, maxLength = 500): string => {
  return payload.length <= maxLength ? payload : `${payload.slice(0, maxLength)}…`;
};
