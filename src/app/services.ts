/**
 * Wiring of the engine for the app layer: store, rate source, rate table
 * builder, conversion engine and aggregator, built from a resolved config.
 */

import type { ResolvedConfig } from '../config.js';
import { type Clock, SystemClock } from '../clock.js';
import { ConversionEngine } from '../fx/convert.js';
import { FrankfurterRateSource, type FetchFn } from '../fx/frankfurter.js';
import { RateTableBuilder } from '../fx/rate-table.js';
import { RateSourceRouter, type RateSource } from '../fx/sources.js';
import { NetWorthAggregator } from '../portfolio/net-worth.js';
import { JsonFileSnapshotStore } from '../storage/json-file.js';
import type { SnapshotStore } from '../storage/storage.js';

export interface AppServices {
  readonly config: ResolvedConfig;
  readonly store: SnapshotStore;
  readonly rateTables: RateTableBuilder;
  readonly engine: ConversionEngine;
  readonly aggregator: NetWorthAggregator;
  readonly clock: Clock;
}

export interface ServiceOverrides {
  store?: SnapshotStore;
  /** Rate sources tried in order. Defaults to frankfurter.app. */
  sources?: RateSource[];
  /** fetch used by the default frankfurter source. */
  fetch?: FetchFn;
  clock?: Clock;
}

export function createServices(config: ResolvedConfig, overrides: ServiceOverrides = {}): AppServices {
  const clock = overrides.clock ?? new SystemClock();
  const sources = overrides.sources ?? [
    new FrankfurterRateSource({
      baseUrl: config.rate_source.base_url,
      timeoutMs: config.rate_source.timeout_ms,
      fetch: overrides.fetch,
    }),
  ];
  const engine = new ConversionEngine({ intermediary: config.intermediary_currency });

  return {
    config,
    store: overrides.store ?? new JsonFileSnapshotStore(config.data_dir),
    rateTables: new RateTableBuilder(new RateSourceRouter(sources), { clock }),
    engine,
    aggregator: new NetWorthAggregator(engine),
    clock,
  };
}
