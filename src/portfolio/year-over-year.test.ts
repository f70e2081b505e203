import { describe, it, expect } from 'vitest';
import { MONTH_LABELS, YearOverYearGrouper } from './year-over-year.js';
import type { SeriesPoint } from './time-series.js';

function monthly(start: number, count: number, year = 2023): SeriesPoint<number>[] {
  const out: SeriesPoint<number>[] = [];
  for (let i = 0; i < count; i++) {
    const m = start + i;
    const y = year + Math.floor((m - 1) / 12);
    const month = ((m - 1) % 12) + 1;
    out.push({ period: `${y}-${String(month).padStart(2, '0')}-01`, value: m });
  }
  return out;
}

describe('YearOverYearGrouper', () => {
  it('groups by year with ascending months', () => {
    const series: SeriesPoint<number>[] = [
      { period: '2024-02-01', value: 3 },
      { period: '2023-11-01', value: 1 },
      { period: '2024-01-01', value: 2 },
    ];

    const grouped = YearOverYearGrouper.groupByYear(series);

    expect([...grouped.keys()]).toEqual([2023, 2024]);
    expect(grouped.get(2023)).toEqual([{ month: 11, label: 'NOV', period: '2023-11-01', value: 1 }]);
    expect(grouped.get(2024)?.map((m) => [m.month, m.label, m.value])).toEqual([
      [1, 'JAN', 2],
      [2, 'FEB', 3],
    ]);
  });

  it('leaves gaps empty', () => {
    const grouped = YearOverYearGrouper.groupByYear([
      { period: '2024-01-01', value: 'a' },
      { period: '2024-06-01', value: 'b' },
    ]);
    expect(grouped.get(2024)?.map((m) => m.month)).toEqual([1, 6]);
  });

  it('keeps the later point when two fall in the same month', () => {
    const grouped = YearOverYearGrouper.groupByYear([
      { period: '2024-03-01', value: 'first' },
      { period: '2024-03-15', value: 'second' },
    ]);
    expect(grouped.get(2024)).toEqual([
      { month: 3, label: 'MAR', period: '2024-03-15', value: 'second' },
    ]);
  });

  it('is empty for an empty series', () => {
    expect(YearOverYearGrouper.groupByYear([]).size).toBe(0);
  });

  it('hasYearOverYearHistory needs twelve periods', () => {
    expect(YearOverYearGrouper.hasYearOverYearHistory(monthly(1, 11))).toBe(false);
    expect(YearOverYearGrouper.hasYearOverYearHistory(monthly(1, 12))).toBe(true);
  });

  it('labels months JAN to DEC', () => {
    expect(MONTH_LABELS).toHaveLength(12);
    expect(MONTH_LABELS[0]).toBe('JAN');
    expect(MONTH_LABELS[11]).toBe('DEC');
  });

  it('spreads a long series over its years', () => {
    const grouped = YearOverYearGrouper.groupByYear(monthly(6, 14));
    expect(grouped.get(2023)?.map((m) => m.month)).toEqual([6, 7, 8, 9, 10, 11, 12]);
    expect(grouped.get(2024)?.map((m) => m.month)).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });
});
