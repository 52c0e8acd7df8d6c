/**
 * Errors that can occur during rate provider operations
 */

import { HttpError, ResponseParseError, ResponseValidationError } from '@lkr-rates/http';

/**
 * - transport: DNS, connection or timeout failure
 * - http: upstream answered with a non-2xx status
 * - parse: upstream markup or JSON no longer has the expected shape
 * - validation: rate missing or not positive
 * - not-found: no USD entry, or no row for the requested date
 */
export type RateSourceErrorKind = 'transport' | 'http' | 'parse' | 'validation' | 'not-found';

/**
 * Failure returned by a rate provider. Recoverable by the resolution fallback chain.
 */
export class RateSourceError extends Error {
  constructor(
    message: string,
    public readonly kind: RateSourceErrorKind,
    public readonly provider: string,
    public readonly details?: {
      cause?: Error | undefined;
      expected?: string | undefined;
      received?: string | undefined;
    }
  ) {
    super(message);
    this.name = 'RateSourceError';
  }
}

/**
 * Map an HTTP client error onto the provider error taxonomy
 */
export function toRateSourceError(error: Error, provider: string, context: string): RateSourceError {
  if (error instanceof RateSourceError) {
    return error;
  }

  const message = `${context}: ${error.message}`;

  if (error instanceof HttpError) {
    return new RateSourceError(message, 'http', provider, { cause: error });
  }

  if (error instanceof ResponseValidationError) {
    return new RateSourceError(message, 'parse', provider, {
      cause: error,
      received: error.truncatedPayload,
    });
  }

  if (error instanceof ResponseParseError) {
    return new RateSourceError(message, 'parse', provider, { cause: error, received: error.truncatedPayload });
  }

  return new RateSourceError(message, 'transport', provider, { cause: error });
}
