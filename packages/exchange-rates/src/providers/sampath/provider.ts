/**
 * Sampath Bank rate provider
 */

import type { HttpClient } from '@lkr-rates/http';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { BaseRateProvider } from '../../core/base-rate-provider.js';
import type { RateSourceError } from '../../core/errors.js';
import { BROWSER_HEADERS, createProviderHttpClient, type ProviderOptions } from '../../core/provider-utils.js';
import type { Clock, RateCandidate, RateProviderMetadata } from '../../core/types.js';

import { findSampathUsdEntry, transformSampathResponse } from './sampath-utils.js';
import { SampathResponseSchema } from './schemas.js';

const SAMPATH_BASE_URL = 'https://www.sampath.lk/api';
const TIMEOUT_MS = 10_000;

export function createSampathProvider(options: ProviderOptions): Result<SampathProvider, Error> {
  try {
    const httpClient = createProviderHttpClient({
      baseUrl: SAMPATH_BASE_URL,
      defaultHeaders: { ...BROWSER_HEADERS, Accept: 'application/json' },
      effects: options.httpEffects,
      providerName: 'Sampath',
      timeout: TIMEOUT_MS,
    });
    return ok(new SampathProvider(httpClient, options.clock));
  } catch (error) {
    return err(
      new Error(`Failed to create Sampath provider: ${error instanceof Error ? error.message : String(error)}`)
    );
  }
}

export class SampathProvider extends BaseRateProvider {
  protected override readonly metadata: RateProviderMetadata = {
    displayName: 'Sampath Bank',
    name: 'sampath',
    source: 'SAMPATH',
    trustedSources: ['SAMPATH'],
  };

  constructor(
    httpClient: HttpClient,
    private readonly clock: Clock
  ) {
    super(httpClient, 'SampathProvider');
  }

  protected override async fetchCurrentInternal(): Promise<Result<RateCandidate, RateSourceError>> {
    const response = await this.httpClient.get('/exchange-rates', { schema: SampathResponseSchema });
    if (response.isErr()) {
      return err(this.toSourceError(response.error, 'fetchCurrent'));
    }

    const rateWef = findSampathUsdEntry(response.value)?.RateWEF;
    if (rateWef) {
      this.logger.debug(`Sampath rates effective from ${rateWef}`);
    }

    return transformSampathResponse(response.value, this.clock.today());
  }
}
