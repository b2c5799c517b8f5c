import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { emptyCounters } from '../src/engine/aggregator.js';
import type { Counters } from '../src/types.js';
import { availability, band, percentage, statusLabel } from '../src/utils/scoring.js';

const counters = (partial: Partial<Counters>): Counters => {
  const c = { ...emptyCounters(), ...partial };
  c.total = c.passed + c.failed + c.warning + c.info + c.accessDenied;
  return c;
};

const countersArb = fc
  .record({
    passed: fc.nat(500),
    failed: fc.nat(500),
    warning: fc.nat(500),
    info: fc.nat(500),
    accessDenied: fc.nat(500),
  })
  .map(counters);

describe('percentage', () => {
  it('excludes warnings from the denominator', () => {
    expect(percentage(counters({ passed: 3, failed: 1, warning: 1 }))).toBe(75);
  });

  it('excludes access-denied checks from the denominator', () => {
    expect(percentage(counters({ passed: 2, failed: 2, accessDenied: 6 }))).toBe(50);
  });

  it('keeps info items in the denominator', () => {
    expect(percentage(counters({ passed: 1, info: 1 }))).toBe(50);
  });

  it('rounds down', () => {
    expect(percentage(counters({ passed: 2, failed: 1 }))).toBe(66);
  });

  it('is 0 when nothing is left in the denominator', () => {
    expect(percentage(emptyCounters())).toBe(0);
    expect(percentage(counters({ warning: 4, accessDenied: 2 }))).toBe(0);
  });

  it('stays within 0..100', () => {
    fc.assert(
      fc.property(countersArb, (c) => {
        const pct = percentage(c);
        expect(pct).toBeGreaterThanOrEqual(0);
        expect(pct).toBeLessThanOrEqual(100);
      }),
    );
  });

  it('never drops when another check passes', () => {
    fc.assert(
      fc.property(countersArb, (c) => {
        const more = { ...c, passed: c.passed + 1, total: c.total + 1 };
        expect(percentage(more)).toBeGreaterThanOrEqual(percentage(c));
      }),
    );
  });
});

describe('availability', () => {
  it('excludes only access-denied probes', () => {
    expect(availability(counters({ passed: 10, accessDenied: 2 }))).toBe(100);
    expect(availability(counters({ passed: 3, failed: 3, accessDenied: 6 }))).toBe(50);
    expect(availability(counters({ passed: 3, warning: 1 }))).toBe(75);
    expect(availability(counters({ accessDenied: 12 }))).toBe(0);
  });
});

describe('band and statusLabel', () => {
  it.each([
    [0, 'red', 'Non-Compliant'],
    [69, 'red', 'Non-Compliant'],
    [70, 'amber', 'Partially Compliant'],
    [89, 'amber', 'Partially Compliant'],
    [90, 'green', 'Compliant'],
    [100, 'green', 'Compliant'],
  ])('%i%% is %s / %s', (pct, expectedBand, label) => {
    expect(band(pct)).toBe(expectedBand);
    expect(statusLabel(pct)).toBe(label);
  });
});
