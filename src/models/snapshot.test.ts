import { describe, it, expect } from 'vitest';
import { FixedClock } from '../clock.js';
import { RateMap } from '../fx/rate-map.js';
import { MalformedRateMapError } from '../fx/errors.js';
import { Id } from './id.js';
import { BalanceError } from './balance.js';
import { Snapshot } from './snapshot.js';

const clock = new FixedClock(new Date('2024-03-05T09:00:00Z'));
const usd = Id.fromString('acct-usd');
const cad = Id.fromString('acct-cad');

const RATES = RateMap.create('2024-03-01', [
  { from: 'USD', to: 'CAD', rate: '1.35' },
  { from: 'CAD', to: 'USD', rate: '0.74' },
]);

describe('Snapshot', () => {
  describe('new', () => {
    it('normalizes the date to the first of the month', () => {
      const snapshot = Snapshot.new(
        '2024-03-17',
        [{ account_id: usd, currency: 'USD', amount: '500' }],
        RATES,
        clock,
      );
      expect(snapshot.snapshot_date).toBe('2024-03-01');
      expect(snapshot.balances[0].snapshot_date).toBe('2024-03-01');
      expect(snapshot.created_at.toISOString()).toBe('2024-03-05T09:00:00.000Z');
    });

    it('pins the given rate map', () => {
      const snapshot = Snapshot.new('2024-03', [], RATES, clock);
      expect(snapshot.rates).toBe(RATES);
    });

    it('is frozen', () => {
      const snapshot = Snapshot.new(
        '2024-03',
        [{ account_id: usd, currency: 'USD', amount: '500' }],
        RATES,
        clock,
      );
      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(Object.isFrozen(snapshot.balances)).toBe(true);
      expect(Object.isFrozen(snapshot.balances[0])).toBe(true);
    });

    it('rejects an account listed twice', () => {
      expect(() =>
        Snapshot.new(
          '2024-03',
          [
            { account_id: usd, currency: 'USD', amount: '1' },
            { account_id: Id.fromString('acct-usd'), currency: 'USD', amount: '2' },
          ],
          RATES,
          clock,
        ),
      ).toThrow(BalanceError);
    });

    it('rejects a stored snapshot whose rate map lacks self pairs', () => {
      expect(() =>
        Snapshot.fromJSON({
          snapshot_date: '2024-03-01',
          created_at: '2024-03-05T09:00:00.000Z',
          balances: [],
          exchange_rates: { as_of_date: '2024-03-01', rates: { USD_CAD: '1.35' } },
        }),
      ).toThrow(MalformedRateMapError);
    });
  });

  describe('JSON', () => {
    it('stores balances and pinned rates together', () => {
      const snapshot = Snapshot.new(
        '2024-03-01',
        [
          { account_id: usd, currency: 'USD', amount: '500' },
          { account_id: cad, currency: 'CAD', amount: '1000.25' },
        ],
        RATES,
        clock,
      );
      const json = Snapshot.toJSON(snapshot);

      expect(json).toEqual({
        snapshot_date: '2024-03-01',
        created_at: '2024-03-05T09:00:00.000Z',
        balances: [
          { account_id: 'acct-usd', currency: 'USD', amount: '500' },
          { account_id: 'acct-cad', currency: 'CAD', amount: '1000.25' },
        ],
        exchange_rates: {
          as_of_date: '2024-03-01',
          rates: { USD_CAD: '1.35', CAD_USD: '0.74', USD_USD: '1', CAD_CAD: '1' },
        },
      });

      const restored = Snapshot.fromJSON(json);
      expect(restored.snapshot_date).toBe('2024-03-01');
      expect(restored.balances.map((b) => b.amount.toString())).toEqual(['500', '1000.25']);
      expect(restored.rates.get('USD', 'CAD')?.toString()).toBe('1.35');
      expect(restored.created_at.getTime()).toBe(snapshot.created_at.getTime());
    });
  });
});
