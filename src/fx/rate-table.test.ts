import { describe, it, expect } from 'vitest';
import { Decimal } from '../decimal.js';
import { FixedClock } from '../clock.js';
import type { CurrencyCode } from '../models/currency.js';
import { RateTableBuilder } from './rate-table.js';
import type { RateQuote, RateSource } from './sources.js';
import { RateSourceUnavailableError } from './errors.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

type Answer = Record<string, string> | null | Error;

interface Call {
  base: CurrencyCode;
  targets: readonly CurrencyCode[];
  date: string | undefined;
}

class FakeRateSource implements RateSource {
  readonly calls: Call[] = [];

  constructor(
    private readonly answers: Record<string, Answer>,
    private readonly reportedDate = '2024-03-01',
  ) {}

  name(): string {
    return 'fake';
  }

  async fetchRates(
    base: CurrencyCode,
    targets: readonly CurrencyCode[],
    date?: string,
  ): Promise<RateQuote | null> {
    this.calls.push({ base, targets, date });
    const answer = this.answers[base] ?? null;
    if (answer instanceof Error) {
      throw answer;
    }
    if (answer === null) {
      return null;
    }
    const rates = new Map<CurrencyCode, Decimal>();
    for (const [code, rate] of Object.entries(answer)) {
      rates.set(code, new Decimal(rate));
    }
    return { base, as_of_date: date ?? this.reportedDate, rates, source: 'fake' };
  }
}

const FULL: Record<string, Answer> = {
  USD: { CAD: '1.35', INR: '83' },
  CAD: { USD: '0.74', INR: '61.5' },
  INR: { USD: '0.012', CAD: '0.0163' },
};

const clock = new FixedClock(new Date('2024-06-15T12:00:00Z'));

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('RateTableBuilder', () => {
  it('queries every code as base against the others', async () => {
    const source = new FakeRateSource(FULL);
    const builder = new RateTableBuilder(source, { clock });

    await builder.build(['CAD', 'USD', 'INR'], '2024-03-01');

    expect(source.calls).toEqual([
      { base: 'CAD', targets: ['USD', 'INR'], date: '2024-03-01' },
      { base: 'USD', targets: ['CAD', 'INR'], date: '2024-03-01' },
      { base: 'INR', targets: ['CAD', 'USD'], date: '2024-03-01' },
    ]);
  });

  it('builds the complete pairwise table', async () => {
    const builder = new RateTableBuilder(new FakeRateSource(FULL), { clock });
    const result = await builder.build(['CAD', 'USD', 'INR'], '2024-03-01');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.failures).toEqual([]);
    expect(result.rates.as_of_date).toBe('2024-03-01');
    expect(result.rates.size).toBe(9);
    expect(result.rates.get('USD', 'CAD')?.toString()).toBe('1.35');
    expect(result.rates.get('CAD', 'INR')?.toString()).toBe('61.5');
    expect(result.rates.get('INR', 'CAD')?.toString()).toBe('0.0163');
    for (const code of ['CAD', 'USD', 'INR']) {
      expect(result.rates.get(code, code)?.toString()).toBe('1');
    }
  });

  it('does not depend on the order of the codes', async () => {
    const a = await new RateTableBuilder(new FakeRateSource(FULL), { clock }).build(
      ['CAD', 'USD', 'INR'],
      '2024-03-01',
    );
    const b = await new RateTableBuilder(new FakeRateSource(FULL), { clock }).build(
      ['INR', 'USD', 'CAD'],
      '2024-03-01',
    );
    expect(a.ok && b.ok).toBe(true);
    if (!a.ok || !b.ok) return;
    expect(b.rates.toJSON().rates).toEqual(a.rates.toJSON().rates);
  });

  it('returns the partial table and the failed bases', async () => {
    const source = new FakeRateSource({ ...FULL, INR: new Error('connection reset') });
    const result = await new RateTableBuilder(source, { clock }).build(
      ['CAD', 'USD', 'INR'],
      '2024-03-01',
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.failures).toEqual([{ base: 'INR', reason: 'connection reset' }]);
    expect(result.rates.has('INR', 'USD')).toBe(false);
    expect(result.rates.get('INR', 'INR')?.toString()).toBe('1');
    expect(result.rates.get('USD', 'INR')?.toString()).toBe('83');
  });

  it('counts a quote with a non-positive rate as a failed base', async () => {
    const source = new FakeRateSource({ USD: { CAD: '1.35' }, CAD: { USD: '0' } });
    const result = await new RateTableBuilder(source, { clock }).build(['USD', 'CAD'], '2024-03-01');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.failures).toEqual([{ base: 'CAD', reason: 'invalid rate 0 for CAD->USD' }]);
    expect(result.rates.has('CAD', 'USD')).toBe(false);
    expect(result.rates.get('USD', 'CAD')?.toString()).toBe('1.35');
  });

  it('fails when every quote carries an unusable rate', async () => {
    const source = new FakeRateSource({ USD: { CAD: 'NaN' }, CAD: { USD: '-0.74' } });
    const result = await new RateTableBuilder(source, { clock }).build(['USD', 'CAD'], '2024-03-01');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe(
      'Exchange rates unavailable for 2024-03-01: USD: invalid rate NaN for USD->CAD; CAD: invalid rate -0.74 for CAD->USD',
    );
  });

  it('fails when every base fails', async () => {
    const source = new FakeRateSource({ USD: new Error('down'), CAD: null });
    const result = await new RateTableBuilder(source, { clock }).build(['USD', 'CAD'], '2024-03-01');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(RateSourceUnavailableError);
    expect(result.error.message).toBe(
      'Exchange rates unavailable for 2024-03-01: USD: down; CAD: no rates returned',
    );
    expect(result.error.bases).toEqual(['USD', 'CAD']);
  });

  it('ignores quotes for codes that were not requested', async () => {
    const source = new FakeRateSource({
      USD: { CAD: '1.35', EUR: '0.92' },
      CAD: { USD: '0.74' },
    });
    const result = await new RateTableBuilder(source, { clock }).build(['USD', 'CAD'], '2024-03-01');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.rates.has('USD', 'EUR')).toBe(false);
    expect(result.rates.codes()).toEqual(['USD', 'CAD']);
  });

  it('collapses duplicate codes', async () => {
    const source = new FakeRateSource(FULL);
    await new RateTableBuilder(source, { clock }).build(['usd', 'USD', 'cad'], '2024-03-01');
    expect(source.calls.map((c) => c.base)).toEqual(['USD', 'CAD']);
  });

  it('needs no source call for a single currency', async () => {
    const source = new FakeRateSource(FULL);
    const result = await new RateTableBuilder(source, { clock }).build(['CAD'], '2024-03-01');

    expect(source.calls).toEqual([]);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.rates.size).toBe(1);
    expect(result.rates.get('CAD', 'CAD')?.toString()).toBe('1');
  });

  it('fails for an empty currency set', async () => {
    const result = await new RateTableBuilder(new FakeRateSource(FULL), { clock }).build([]);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.reasons).toEqual(['no currencies requested']);
  });

  describe('latest rates', () => {
    it('dates the table with the date the source reports', async () => {
      const source = new FakeRateSource(FULL, '2024-06-14');
      const result = await new RateTableBuilder(source, { clock }).build(['USD', 'CAD']);

      expect(source.calls[0].date).toBeUndefined();
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.rates.as_of_date).toBe('2024-06-14');
    });

    it('falls back to the clock for a single currency', async () => {
      const result = await new RateTableBuilder(new FakeRateSource(FULL), { clock }).build(['USD']);
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.rates.as_of_date).toBe('2024-06-15');
    });
  });
});
