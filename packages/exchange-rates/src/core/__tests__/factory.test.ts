import { describe, expect, it, vi } from 'vitest';

import { createFixedClock, createMockHttpEffects, day, textResponse } from '../../__tests__/test-helpers.js';
import { createExchangeRateService, createRateProviders } from '../factory.js';

describe('createRateProviders', () => {
  it('builds providers in the requested order', async () => {
    const providers = (
      await createRateProviders(['sampath', 'cbsl'], { clock: createFixedClock('2025-11-22') })
    )._unsafeUnwrap();

    expect([...providers.keys()]).toEqual(['sampath', 'cbsl']);
    expect(providers.get('cbsl')?.getMetadata().displayName).toBe('Central Bank of Sri Lanka');

    for (const provider of providers.values()) {
      await provider.destroy();
    }
  });

  it('rejects a negative CBSL lookback', async () => {
    const result = await createRateProviders(['hnb', 'cbsl'], {
      clock: createFixedClock('2025-11-22'),
      lookbackDays: -1,
    });

    expect(result._unsafeUnwrapErr().message).toBe('CBSL lookback must be a non-negative whole number of days, got -1');
  });
});

describe('createExchangeRateService', () => {
  it('wires a migrated database and the selected providers', async () => {
    const body = JSON.stringify({ ex: [{ buyingRate: '302.50', currency: 'US Dollars', sellingRate: '310.00' }] });
    const mockFetch = vi.fn().mockResolvedValue(textResponse(body));
    const service = (
      await createExchangeRateService({
        bulkWindowDays: 30,
        cbslLookbackDays: 7,
        clock: createFixedClock('2025-11-22'),
        databasePath: ':memory:',
        httpEffects: createMockHttpEffects(mockFetch),
        providers: ['hnb'],
      })
    )._unsafeUnwrap();

    expect(service.getProviderNames()).toEqual(['hnb']);

    const outcomes = (await service.refreshAll())._unsafeUnwrap();
    expect(outcomes[0]).toMatchObject({ date: '2025-11-22', provider: 'hnb', status: 'success' });

    const resolution = (await service.resolve('hnb', day('2025-11-22')))._unsafeUnwrap();
    expect(resolution).toMatchObject({ kind: 'exact', rate: { origin: 'cache', source: 'HNB' } });
    expect(mockFetch).toHaveBeenCalledTimes(1);

    await service.destroy();
  });
});
