/**
 * Hatton National Bank rate provider
 *
 * Reads the bank's public rates JSON. Only today's rate is available.
 */

import type { HttpClient } from '@lkr-rates/http';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { BaseRateProvider } from '../../core/base-rate-provider.js';
import type { RateSourceError } from '../../core/errors.js';
import { createProviderHttpClient, type ProviderOptions } from '../../core/provider-utils.js';
import type { Clock, RateCandidate, RateProviderMetadata } from '../../core/types.js';

import { findHnbUsdEntry, transformHnbResponse } from './hnb-utils.js';
import { HnbResponseSchema } from './schemas.js';

const HNB_BASE_URL = 'https://venus.hnb.lk/api';
const TIMEOUT_MS = 10_000;

export function createHnbProvider(options: ProviderOptions): Result<HnbProvider, Error> {
  try {
    const httpClient = createProviderHttpClient({
      baseUrl: HNB_BASE_URL,
      effects: options.httpEffects,
      providerName: 'HNB',
      timeout: TIMEOUT_MS,
    });
    return ok(new HnbProvider(httpClient, options.clock));
  } catch (error) {
    return err(new Error(`Failed to create HNB provider: ${error instanceof Error ? error.message : String(error)}`));
  }
}

export class HnbProvider extends BaseRateProvider {
  protected override readonly metadata: RateProviderMetadata = {
    displayName: 'Hatton National Bank',
    name: 'hnb',
    source: 'HNB',
    trustedSources: ['HNB'],
  };

  constructor(
    httpClient: HttpClient,
    private readonly clock: Clock
  ) {
    super(httpClient, 'HnbProvider');
  }

  protected override async fetchCurrentInternal(): Promise<Result<RateCandidate, RateSourceError>> {
    const response = await this.httpClient.get('/get_rates_contents_web', { schema: HnbResponseSchema });
    if (response.isErr()) {
      return err(this.toSourceError(response.error, 'fetchCurrent'));
    }

    const usd = findHnbUsdEntry(response.value);
    if (usd?.updated_on) {
      this.logger.debug(`HNB rates updated on ${usd.updated_on}`);
    }

    return transformHnbResponse(response.value, this.clock.today());
  }
}
