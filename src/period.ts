/**
 * Month-granularity date helpers.
 *
 * Snapshots are keyed by the first day of their month ("YYYY-MM-01"). Users
 * may refer to a month as "YYYY-MM" or by any "YYYY-MM-DD" date inside it.
 */

const PERIOD_PATTERN = /^(\d{4})-(\d{2})(?:-(\d{2}))?$/;

const MONTH_NAMES = [
  'Jan',
  'Feb',
  'Mar',
  'Apr',
  'May',
  'Jun',
  'Jul',
  'Aug',
  'Sep',
  'Oct',
  'Nov',
  'Dec',
] as const;

export class PeriodError extends Error {
  public readonly value: string;

  constructor(value: string) {
    super(`Invalid period ${JSON.stringify(value)}: expected YYYY-MM or YYYY-MM-DD`);
    this.name = 'PeriodError';
    this.value = value;
  }
}

export interface YearMonth {
  year: number;
  /** 1-12 */
  month: number;
}

export function parsePeriod(value: string): YearMonth {
  const match = PERIOD_PATTERN.exec(value.trim());
  if (match === null) {
    throw new PeriodError(value);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  if (month < 1 || month > 12) {
    throw new PeriodError(value);
  }
  if (match[3] !== undefined) {
    const day = Number(match[3]);
    const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
    if (day < 1 || day > daysInMonth) {
      throw new PeriodError(value);
    }
  }
  return { year, month };
}

/** "YYYY-MM" for a period. */
export function monthKey(value: string): string {
  const { year, month } = parsePeriod(value);
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}`;
}

/** First day of the period's month, "YYYY-MM-01". */
export function monthStart(value: string): string {
  return `${monthKey(value)}-01`;
}

/** Human label such as "Mar 2024". */
export function periodLabel(value: string): string {
  const { year, month } = parsePeriod(value);
  return `${MONTH_NAMES[month - 1]} ${year}`;
}
