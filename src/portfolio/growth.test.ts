import { describe, it, expect } from 'vitest';
import { Decimal } from '../decimal.js';
import { FixedClock } from '../clock.js';
import { RateMap } from '../fx/rate-map.js';
import { Id } from '../models/id.js';
import { Snapshot } from '../models/snapshot.js';
import type { CurrencyCode } from '../models/currency.js';
import { BaselineNotFoundError, GrowthNormalizer } from './growth.js';
import type { SeriesPoint } from './time-series.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function point(
  period: string,
  amounts: Record<string, string>,
): SeriesPoint<Map<CurrencyCode, Decimal>> {
  return {
    period,
    value: new Map(Object.entries(amounts).map(([code, v]) => [code, new Decimal(v)])),
  };
}

function asStrings(
  points: readonly SeriesPoint<ReadonlyMap<CurrencyCode, Decimal>>[],
): [string, Record<string, string>][] {
  return points.map((p) => [
    p.period,
    Object.fromEntries([...p.value].map(([code, v]) => [code, v.toString()])),
  ]);
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('GrowthNormalizer', () => {
  describe('normalize', () => {
    it('rebases to 100 at the baseline', () => {
      const series = [
        point('2024-01-01', { CAD: '1000' }),
        point('2024-02-01', { CAD: '1100' }),
        point('2024-03-01', { CAD: '900' }),
      ];

      expect(asStrings(GrowthNormalizer.normalize(series, '2024-01-01'))).toEqual([
        ['2024-01-01', { CAD: '100' }],
        ['2024-02-01', { CAD: '110' }],
        ['2024-03-01', { CAD: '90' }],
      ]);
    });

    it('normalizes each currency against its own baseline', () => {
      const series = [
        point('2024-01-01', { CAD: '2000', USD: '400' }),
        point('2024-02-01', { CAD: '3000', USD: '100' }),
      ];
      expect(asStrings(GrowthNormalizer.normalize(series, '2024-01-01'))).toEqual([
        ['2024-01-01', { CAD: '100', USD: '100' }],
        ['2024-02-01', { CAD: '150', USD: '25' }],
      ]);
    });

    it('drops periods before the baseline', () => {
      const series = [
        point('2024-01-01', { CAD: '500' }),
        point('2024-02-01', { CAD: '1000' }),
        point('2024-03-01', { CAD: '1200' }),
      ];
      expect(asStrings(GrowthNormalizer.normalize(series, '2024-02-01'))).toEqual([
        ['2024-02-01', { CAD: '100' }],
        ['2024-03-01', { CAD: '120' }],
      ]);
    });

    it('sorts its input', () => {
      const series = [point('2024-02-01', { CAD: '50' }), point('2024-01-01', { CAD: '100' })];
      expect(asStrings(GrowthNormalizer.normalize(series, '2024-01-01'))).toEqual([
        ['2024-01-01', { CAD: '100' }],
        ['2024-02-01', { CAD: '50' }],
      ]);
    });

    it('treats a currency missing from a period as zero', () => {
      const series = [
        point('2024-01-01', { CAD: '100', USD: '200' }),
        point('2024-02-01', { CAD: '100' }),
      ];
      const [, feb] = GrowthNormalizer.normalize(series, '2024-01-01');
      expect(feb.value.get('USD')?.toString()).toBe('0');
    });

    it('substitutes 1 for a zero baseline', () => {
      const series = [
        point('2024-01-01', { CAD: '1000', USD: '0' }),
        point('2024-02-01', { CAD: '1000', USD: '50' }),
      ];

      expect(asStrings(GrowthNormalizer.normalize(series, '2024-01-01'))).toEqual([
        ['2024-01-01', { CAD: '100', USD: '0' }],
        ['2024-02-01', { CAD: '100', USD: '5000' }],
      ]);
      expect(GrowthNormalizer.zeroBaselines(series, '2024-01-01')).toEqual(['USD']);
    });

    it('uses an explicit currency list in its order', () => {
      const series = [
        point('2024-01-01', { USD: '10', CAD: '20', EUR: '5' }),
        point('2024-02-01', { USD: '20', CAD: '20', EUR: '5' }),
      ];
      const [, feb] = GrowthNormalizer.normalize(series, '2024-01-01', ['CAD', 'USD', 'INR']);
      expect([...feb.value.keys()]).toEqual(['CAD', 'USD', 'INR']);
      expect(feb.value.get('USD')?.toString()).toBe('200');
      expect(feb.value.get('INR')?.toString()).toBe('0');
    });

    it('throws when the baseline is not in the series', () => {
      const series = [point('2024-01-01', { CAD: '1' })];
      expect(() => GrowthNormalizer.normalize(series, '2023-12-01')).toThrow(BaselineNotFoundError);
      expect(() => GrowthNormalizer.normalize(series, '2023-12-01')).toThrow(
        'Baseline period 2023-12-01 has no data',
      );
    });
  });

  describe('holdingsByCurrency', () => {
    const clock = new FixedClock(new Date('2024-03-05T00:00:00Z'));
    const rates = RateMap.create('2024-01-01', [{ from: 'USD', to: 'CAD', rate: '1.35' }]);
    const snapshots = [
      Snapshot.new(
        '2024-02',
        [
          { account_id: Id.fromString('a'), currency: 'CAD', amount: '100' },
          { account_id: Id.fromString('b'), currency: 'CAD', amount: '50.5' },
          { account_id: Id.fromString('c'), currency: 'EUR', amount: '7' },
        ],
        rates,
        clock,
      ),
      Snapshot.new(
        '2024-01',
        [{ account_id: Id.fromString('a'), currency: 'USD', amount: '10' }],
        rates,
        clock,
      ),
    ];

    it('sums raw amounts per currency without converting', () => {
      const series = GrowthNormalizer.holdingsByCurrency(snapshots);
      expect(asStrings(series)).toEqual([
        ['2024-01-01', { USD: '10' }],
        ['2024-02-01', { CAD: '150.5', EUR: '7' }],
      ]);
    });

    it('restricts to the given currencies and fills in zeros', () => {
      const series = GrowthNormalizer.holdingsByCurrency(snapshots, ['CAD', 'USD']);
      expect(asStrings(series)).toEqual([
        ['2024-01-01', { CAD: '0', USD: '10' }],
        ['2024-02-01', { CAD: '150.5', USD: '0' }],
      ]);
    });
  });
});
