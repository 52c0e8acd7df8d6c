/**
 * Base provider class with common functionality
 */

import type { HttpClient } from '@lkr-rates/http';
import { getLogger, type Logger } from '@lkr-rates/logger';
import type { Result } from 'neverthrow';
import { err } from 'neverthrow';

import { RateSourceError, toRateSourceError } from './errors.js';
import { validateCandidate } from './rate-validation.js';
import type { IRateProvider, RateCandidate, RateProviderMetadata } from './types.js';

/**
 * Base class providing common provider functionality
 *
 * Subclasses implement the actual fetching logic. Anything they throw is
 * converted to a RateSourceError, and every candidate they return is
 * validated before it leaves the provider.
 */
export abstract class BaseRateProvider implements IRateProvider {
  protected abstract readonly metadata: RateProviderMetadata;
  protected readonly logger: Logger;

  constructor(
    protected readonly httpClient: HttpClient,
    loggerCategory: string
  ) {
    this.logger = getLogger(loggerCategory);
  }

  protected abstract fetchCurrentInternal(): Promise<Result<RateCandidate, RateSourceError>>;

  async fetchCurrent(): Promise<Result<RateCandidate, RateSourceError>> {
    return this.runGuarded('fetchCurrent', () => this.fetchCurrentInternal());
  }

  getMetadata(): RateProviderMetadata {
    return this.metadata;
  }

  async destroy(): Promise<void> {
    await this.httpClient.close();
  }

  /**
   * Run a single-candidate operation: thrown errors become transport failures,
   * returned candidates are validated, failures are logged at warn level.
   */
  protected async runGuarded(
    operation: string,
    fn: () => Promise<Result<RateCandidate, RateSourceError>>
  ): Promise<Result<RateCandidate, RateSourceError>> {
    let result: Result<RateCandidate, RateSourceError>;
    try {
      result = await fn();
    } catch (error) {
      result = err(this.toSourceError(error, operation));
    }

    const validated = result.andThen((candidate) => validateCandidate(candidate, this.metadata.name));
    if (validated.isErr()) {
      this.logFailure(operation, validated.error);
    }
    return validated;
  }

  /**
   * Convert any HTTP client failure into this provider's error taxonomy
   */
  protected toSourceError(error: unknown, context: string): RateSourceError {
    const cause = error instanceof Error ? error : new Error(String(error));
    return toRateSourceError(cause, this.metadata.name, `${this.metadata.displayName} ${context} failed`);
  }

  protected logFailure(operation: string, error: RateSourceError): void {
    this.logger.warn(
      {
        expected: error.details?.expected,
        kind: error.kind,
        operation,
        provider: error.provider,
        received: error.details?.received,
      },
      error.message
    );
  }
}
