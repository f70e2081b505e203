/**
 * Time series keyed by period date.
 *
 * Periods are "YYYY-MM-DD" strings (snapshot dates, normally "YYYY-MM-01"),
 * kept in ascending order. Gaps are allowed and are never filled in.
 */

export interface SeriesPoint<T> {
  readonly period: string;
  readonly value: T;
}

export type TimeSeries<T> = readonly SeriesPoint<T>[];

/**
 * Order points by period. When two points share a period the later one in
 * the input wins.
 */
export function sortSeries<T>(points: Iterable<SeriesPoint<T>>): SeriesPoint<T>[] {
  const byPeriod = new Map<string, SeriesPoint<T>>();
  for (const point of points) {
    byPeriod.set(point.period, point);
  }
  return [...byPeriod.values()].sort((a, b) => a.period.localeCompare(b.period));
}

