import { describe, expect, it } from 'vitest';

import { createZonedClock } from '../clock.js';

describe('createZonedClock', () => {
  it('reports the date in the configured zone rather than UTC', () => {
    // 20:00 UTC is already 01:30 the next day in Colombo
    const now = () => new Date('2025-11-21T20:00:00.000Z');

    expect(createZonedClock('Asia/Colombo', now).today()).toBe('2025-11-22');
    expect(createZonedClock('UTC', now).today()).toBe('2025-11-21');
  });

  it('passes now() through', () => {
    const instant = new Date('2025-11-21T08:15:00.000Z');

    expect(createZonedClock('Asia/Colombo', () => instant).now()).toBe(instant);
  });
});
