/**
 * Configuration module for worthline.
 *
 * Parses TOML configuration and provides sensible defaults. Unknown keys are
 * ignored and values of the wrong type fall back to their default; a currency
 * code that does not parse is an error.
 */

import path from 'node:path';
import toml from 'toml';
import { Currency, type CurrencyCode } from './models/currency.js';
import { DEFAULT_INTERMEDIARY } from './fx/convert.js';
import { DEFAULT_FRANKFURTER_URL, DEFAULT_TIMEOUT_MS } from './fx/frankfurter.js';
import { isLogLevel, type LogLevel } from './logger.js';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface RateSourceConfig {
  /** Base URL of the frankfurter-compatible rate API. */
  base_url: string;
  /** Per-request timeout (ms). */
  timeout_ms: number;
}

export interface DisplayConfig {
  /**
   * If set, values in the reporting currency are rounded to this many
   * decimal places before being rendered. Presentation only.
   */
  currency_decimals?: number;

  /** When true, render values with thousands separators. */
  currency_grouping?: boolean;

  /**
   * Symbol to prefix values with. `"auto"` picks the symbol of the currency
   * being displayed (e.g. "CA$" for CAD).
   */
  currency_symbol?: string;

  /**
   * When true and `currency_decimals` is set, display values with exactly that
   * many decimal places (padding with trailing zeros).
   */
  currency_fixed_decimals?: boolean;
}

export interface Config {
  /** Optional path to the data directory. */
  data_dir?: string;
  /** Active currencies in display order. */
  currencies: CurrencyCode[];
  /** Default currency for reports; always one of `currencies`. */
  reporting_currency: CurrencyCode;
  /** Currency conversions triangulate through. */
  intermediary_currency: CurrencyCode;
  log_level: LogLevel;
  rate_source: RateSourceConfig;
  display: DisplayConfig;
}

export interface ResolvedConfig extends Omit<Config, 'data_dir'> {
  /** Resolved (absolute) path to the data directory. */
  data_dir: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CURRENCIES: readonly CurrencyCode[] = ['CAD', 'USD', 'INR'];

export const DEFAULT_RATE_SOURCE_CONFIG: RateSourceConfig = {
  base_url: DEFAULT_FRANKFURTER_URL,
  timeout_ms: DEFAULT_TIMEOUT_MS,
};

/** Amounts display with two fractional digits unless `[display]` says otherwise. */
export const DEFAULT_DISPLAY_CONFIG: DisplayConfig = {
  currency_decimals: 2,
  currency_fixed_decimals: true,
};

export const DEFAULT_CONFIG: Config = {
  data_dir: undefined,
  currencies: [...DEFAULT_CURRENCIES],
  reporting_currency: DEFAULT_CURRENCIES[0],
  intermediary_currency: DEFAULT_INTERMEDIARY,
  log_level: 'info',
  rate_source: { ...DEFAULT_RATE_SOURCE_CONFIG },
  display: { ...DEFAULT_DISPLAY_CONFIG },
};

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

function parseCurrencies(value: unknown): CurrencyCode[] {
  if (!Array.isArray(value)) {
    return [...DEFAULT_CURRENCIES];
  }
  const codes = Currency.parseList(value.filter((v): v is string => typeof v === 'string'));
  return codes.length > 0 ? codes : [...DEFAULT_CURRENCIES];
}

function parseDisplay(displayRaw: Record<string, unknown>): DisplayConfig {
  const display: DisplayConfig = { ...DEFAULT_DISPLAY_CONFIG };

  const currencyDecimals = displayRaw.currency_decimals;
  if (
    typeof currencyDecimals === 'number' &&
    Number.isInteger(currencyDecimals) &&
    currencyDecimals >= 0
  ) {
    display.currency_decimals = currencyDecimals;
  }

  if (typeof displayRaw.currency_grouping === 'boolean') {
    display.currency_grouping = displayRaw.currency_grouping;
  }

  if (typeof displayRaw.currency_symbol === 'string') {
    const trimmed = displayRaw.currency_symbol.trim();
    if (trimmed.length > 0) {
      display.currency_symbol = trimmed;
    }
  }

  if (typeof displayRaw.currency_fixed_decimals === 'boolean') {
    display.currency_fixed_decimals = displayRaw.currency_fixed_decimals;
  }

  return display;
}

/**
 * Parse a TOML configuration string into a `Config`.
 *
 * Throws CurrencyCodeError for a malformed currency code and ConfigError when
 * `reporting_currency` is not one of `currencies`.
 */
export function parseConfig(tomlStr: string): Config {
  // toml.parse throws on invalid TOML; an empty string yields an empty object.
  const parsed: unknown = tomlStr.trim().length === 0 ? {} : toml.parse(tomlStr);
  const raw = isRecord(parsed) ? parsed : {};
  const rateRaw = section(raw, 'rate_source');

  const currencies = parseCurrencies(raw.currencies);

  const reporting =
    typeof raw.reporting_currency === 'string'
      ? Currency.parse(raw.reporting_currency)
      : currencies[0];
  if (!currencies.includes(reporting)) {
    throw new ConfigError(
      `reporting_currency ${reporting} is not one of the configured currencies (${currencies.join(', ')})`,
    );
  }

  const timeout = rateRaw.timeout_ms;

  const config: Config = {
    currencies,
    reporting_currency: reporting,
    intermediary_currency:
      typeof raw.intermediary_currency === 'string'
        ? Currency.parse(raw.intermediary_currency)
        : DEFAULT_CONFIG.intermediary_currency,
    log_level: isLogLevel(raw.log_level) ? raw.log_level : DEFAULT_CONFIG.log_level,
    rate_source: {
      base_url:
        typeof rateRaw.base_url === 'string' && rateRaw.base_url.trim().length > 0
          ? rateRaw.base_url.trim()
          : DEFAULT_RATE_SOURCE_CONFIG.base_url,
      timeout_ms:
        typeof timeout === 'number' && Number.isInteger(timeout) && timeout > 0
          ? timeout
          : DEFAULT_RATE_SOURCE_CONFIG.timeout_ms,
    },
    display: parseDisplay(section(raw, 'display')),
  };

  if (typeof raw.data_dir === 'string') {
    config.data_dir = raw.data_dir;
  }

  return config;
}

// ---------------------------------------------------------------------------
// Path resolution
// ---------------------------------------------------------------------------

/**
 * Resolve the data directory for a config.
 *
 * - If `config.data_dir` is set and absolute, return it directly.
 * - If `config.data_dir` is set and relative, resolve it against `configDir`.
 * - If `config.data_dir` is not set, return `configDir`.
 */
export function resolveDataDir(config: Config, configDir: string): string {
  if (config.data_dir == null) {
    return configDir;
  }
  if (path.isAbsolute(config.data_dir)) {
    return config.data_dir;
  }
  return path.join(configDir, config.data_dir);
}

/** Attach a resolved data directory to a parsed config. */
export function resolveConfig(config: Config, configDir: string): ResolvedConfig {
  return {
    data_dir: resolveDataDir(config, configDir),
    currencies: [...config.currencies],
    reporting_currency: config.reporting_currency,
    intermediary_currency: config.intermediary_currency,
    log_level: config.log_level,
    rate_source: { ...config.rate_source },
    display: { ...config.display },
  };
}
