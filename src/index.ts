/**
 * worthline: multi-currency net worth tracking.
 *
 * Re-exports all public API surface from a single entry point.
 */

// ---------------------------------------------------------------------------
// Core utilities
// ---------------------------------------------------------------------------

export { Decimal } from './decimal.js';
export { type Clock, SystemClock, FixedClock } from './clock.js';
export { logger, childLogger, setLogLevel, type LogLevel } from './logger.js';
export { PeriodError, parsePeriod, monthKey, monthStart, periodLabel } from './period.js';
export {
  type Config,
  type ResolvedConfig,
  type RateSourceConfig,
  type DisplayConfig,
  ConfigError,
  parseConfig,
  resolveConfig,
  resolveDataDir,
  DEFAULT_CONFIG,
  DEFAULT_CURRENCIES,
} from './config.js';

// ---------------------------------------------------------------------------
// Models
// ---------------------------------------------------------------------------

export { Id, IdError } from './models/id.js';
export { Currency, CurrencyCodeError, type CurrencyCode } from './models/currency.js';
export { Account, type AccountType, type NewAccount } from './models/account.js';
export { Balance, BalanceError, type BalanceType } from './models/balance.js';
export { Snapshot, type SnapshotType, type SnapshotBalanceInput } from './models/snapshot.js';

// ---------------------------------------------------------------------------
// FX
// ---------------------------------------------------------------------------

export { RateMap, pairKey, type RateEntry, type RateMapJSON } from './fx/rate-map.js';
export { type RateSource, type RateQuote, RateSourceRouter } from './fx/sources.js';
export { FrankfurterRateSource, type FetchFn } from './fx/frankfurter.js';
export { RateTableBuilder, type RateTableResult, type BaseFailure } from './fx/rate-table.js';
export {
  ConversionEngine,
  type ConversionResult,
  type ConversionMiss,
  type ConversionRoute,
} from './fx/convert.js';
export {
  RateSourceUnavailableError,
  RateSourceResponseError,
  MalformedRateMapError,
} from './fx/errors.js';

// ---------------------------------------------------------------------------
// Portfolio
// ---------------------------------------------------------------------------

export { type TimeSeries, type SeriesPoint, sortSeries } from './portfolio/time-series.js';
export {
  NetWorthAggregator,
  type NetWorthTotal,
  type NetWorthSeries,
  type Breakdown,
  type BreakdownRow,
} from './portfolio/net-worth.js';
export { GrowthNormalizer, BaselineNotFoundError } from './portfolio/growth.js';
export {
  YearOverYearGrouper,
  MONTH_LABELS,
  type MonthValue,
  type YearSeries,
} from './portfolio/year-over-year.js';

// ---------------------------------------------------------------------------
// Storage
// ---------------------------------------------------------------------------

export { type SnapshotStore } from './storage/storage.js';
export { MemorySnapshotStore } from './storage/memory.js';
export { JsonFileSnapshotStore, StorageFormatError } from './storage/json-file.js';

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

export { decStr, decStrRounded, formatCurrencyDisplay, currencySymbol } from './format/decimal.js';
