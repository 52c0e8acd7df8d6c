/**
 * People's Bank rate provider
 *
 * Scrapes the public exchange rates page. Only today's rate is available.
 */

import type { HttpClient } from '@lkr-rates/http';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { BaseRateProvider } from '../../core/base-rate-provider.js';
import type { RateSourceError } from '../../core/errors.js';
import { BROWSER_HEADERS, createProviderHttpClient, type ProviderOptions } from '../../core/provider-utils.js';
import type { Clock, RateCandidate, RateProviderMetadata } from '../../core/types.js';

import { parsePeoplesBankPage } from './peoples-bank-utils.js';

const PEOPLES_BANK_BASE_URL = 'https://www.peoplesbank.lk';
const TIMEOUT_MS = 15_000;

export function createPeoplesBankProvider(options: ProviderOptions): Result<PeoplesBankProvider, Error> {
  try {
    const httpClient = createProviderHttpClient({
      baseUrl: PEOPLES_BANK_BASE_URL,
      defaultHeaders: BROWSER_HEADERS,
      effects: options.httpEffects,
      providerName: 'PeoplesBank',
      timeout: TIMEOUT_MS,
    });
    return ok(new PeoplesBankProvider(httpClient, options.clock));
  } catch (error) {
    return err(
      new Error(`Failed to create People's Bank provider: ${error instanceof Error ? error.message : String(error)}`)
    );
  }
}

export class PeoplesBankProvider extends BaseRateProvider {
  protected override readonly metadata: RateProviderMetadata = {
    displayName: "People's Bank",
    name: 'pb',
    source: 'PB',
    trustedSources: ['PB'],
  };

  constructor(
    httpClient: HttpClient,
    private readonly clock: Clock
  ) {
    super(httpClient, 'PeoplesBankProvider');
  }

  protected override async fetchCurrentInternal(): Promise<Result<RateCandidate, RateSourceError>> {
    const html = await this.httpClient.getText('/exchange-rates/');
    if (html.isErr()) {
      return err(this.toSourceError(html.error, 'fetchCurrent'));
    }

    return parsePeoplesBankPage(html.value, this.clock.today());
  }
}
