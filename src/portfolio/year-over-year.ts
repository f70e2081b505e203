/**
 * YearOverYearGrouper.
 *
 * Splits a chronological series into one sub-series per calendar year, each
 * indexed by month (1-12), so years can be overlaid on a shared JAN..DEC axis.
 * Months without data are left out, never zero-filled.
 */

import { parsePeriod } from '../period.js';
import { sortSeries, type TimeSeries } from './time-series.js';

export const MONTH_LABELS = [
  'JAN',
  'FEB',
  'MAR',
  'APR',
  'MAY',
  'JUN',
  'JUL',
  'AUG',
  'SEP',
  'OCT',
  'NOV',
  'DEC',
] as const;

export type MonthLabel = (typeof MONTH_LABELS)[number];

/** Minimum number of periods before a year-over-year view is worth showing. */
export const YOY_MIN_PERIODS = 12;

export interface MonthValue<T> {
  /** 1-12 */
  readonly month: number;
  readonly label: MonthLabel;
  /** Source period the value came from. */
  readonly period: string;
  readonly value: T;
}

export type YearSeries<T> = readonly MonthValue<T>[];

export const YearOverYearGrouper = {
  /**
   * Group by calendar year. Years iterate in ascending order and each year's
   * months are ascending. If two periods fall in the same month, the later
   * one wins.
   */
  groupByYear<T>(series: TimeSeries<T>): Map<number, YearSeries<T>> {
    const byYear = new Map<number, Map<number, MonthValue<T>>>();

    for (const point of sortSeries(series)) {
      const { year, month } = parsePeriod(point.period);
      let months = byYear.get(year);
      if (months === undefined) {
        months = new Map();
        byYear.set(year, months);
      }
      months.set(month, {
        month,
        label: MONTH_LABELS[month - 1],
        period: point.period,
        value: point.value,
      });
    }

    const out = new Map<number, YearSeries<T>>();
    for (const year of [...byYear.keys()].sort((a, b) => a - b)) {
      const months = byYear.get(year) ?? new Map<number, MonthValue<T>>();
      out.set(
        year,
        [...months.values()].sort((a, b) => a.month - b.month),
      );
    }
    return out;
  },

  /** True once the series has at least {@link YOY_MIN_PERIODS} points. */
  hasYearOverYearHistory<T>(series: TimeSeries<T>): boolean {
    return series.length >= YOY_MIN_PERIODS;
  },
} as const;
