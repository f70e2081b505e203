#!/usr/bin/env node
import { Command } from 'commander';

// App layer
import { loadConfig, configOutput } from '../app/config.js';
import { createServices, type AppServices } from '../app/services.js';
import { addAccount, listAccounts, removeAccount } from '../app/accounts.js';
import {
  deleteSnapshot,
  listSnapshots,
  parseBalanceArgs,
  recordSnapshot,
} from '../app/snapshots.js';
import {
  growth,
  history,
  listCurrencies,
  netWorth,
  rateTable,
  yearOverYear,
} from '../app/reports.js';

// Library
import { logger, setLogLevel } from '../logger.js';

// ---------------------------------------------------------------------------
// Helper
// ---------------------------------------------------------------------------

function isFailure(result: unknown): boolean {
  return (
    typeof result === 'object' && result !== null && 'success' in result && result.success === false
  );
}

async function run(fn: () => Promise<unknown>): Promise<void> {
  try {
    const result = await fn();
    console.log(JSON.stringify(result, null, 2));
    if (isFailure(result)) {
      process.exitCode = 1;
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.debug({ err }, 'command failed');
    console.log(JSON.stringify({ success: false, error: message }, null, 2));
    process.exitCode = 1;
  }
}

type LoadedConfig = Awaited<ReturnType<typeof loadConfig>>;

async function runWithConfig(fn: (cfg: LoadedConfig) => Promise<unknown>): Promise<void> {
  await run(async () => {
    const opts = program.opts<{ config?: string }>();
    const cfg = await loadConfig(opts.config);
    if (process.env.LOG_LEVEL === undefined) {
      setLogLevel(cfg.config.log_level);
    }
    return fn(cfg);
  });
}

async function runWithServices(fn: (services: AppServices) => Promise<unknown>): Promise<void> {
  await runWithConfig(async (cfg) => fn(createServices(cfg.config)));
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name('worthline')
  .description('Multi-currency net worth tracking CLI')
  .version('0.1.0')
  .option('-c, --config <path>', 'path to config file');

// ---------------------------------------------------------------------------
// config / currencies
// ---------------------------------------------------------------------------

program
  .command('config')
  .description('Print configuration as JSON')
  .action(async () => {
    await runWithConfig(async (cfg) => configOutput(cfg.configPath, cfg.config));
  });

program
  .command('currencies')
  .description('List active currencies with their symbols')
  .action(async () => {
    await runWithConfig(async (cfg) => listCurrencies(cfg.config));
  });

// ---------------------------------------------------------------------------
// account
// ---------------------------------------------------------------------------

const account = program.command('account').description('Manage accounts');

account
  .command('add <name>')
  .description('Add an account')
  .requiredOption('--owner <name>', 'account owner')
  .requiredOption('--type <type>', 'account type, e.g. Checking or TFSA')
  .requiredOption('--currency <code>', 'native currency of the account')
  .action(async (name: string, opts: { owner: string; type: string; currency: string }) => {
    await runWithServices(async (services) =>
      addAccount(
        services.store,
        { name, owner: opts.owner, account_type: opts.type, currency: opts.currency },
        services.config.currencies,
        services.clock,
      ),
    );
  });

account
  .command('list')
  .description('List accounts')
  .action(async () => {
    await runWithServices(async (services) => listAccounts(services.store));
  });

account
  .command('remove <id>')
  .description('Remove an account that no snapshot references')
  .action(async (id: string) => {
    await runWithServices(async (services) => removeAccount(services.store, id));
  });

// ---------------------------------------------------------------------------
// rates
// ---------------------------------------------------------------------------

program
  .command('rates')
  .description('Fetch the pairwise rate table for the active currencies')
  .option('--date <YYYY-MM-DD>', 'rates effective on this date (default: latest)')
  .action(async (opts: { date?: string }) => {
    await runWithServices(async (services) => rateTable(services, opts.date));
  });

// ---------------------------------------------------------------------------
// snapshot
// ---------------------------------------------------------------------------

const snapshot = program.command('snapshot').description('Record and manage monthly snapshots');

snapshot
  .command('record')
  .description('Record the balances of a month, pinning that month\'s exchange rates')
  .requiredOption('--date <YYYY-MM>', 'month of the snapshot')
  .requiredOption(
    '--balance <accountId=amount>',
    'balance of one account (repeatable)',
    (val: string, arr: string[]) => [...arr, val],
    [] as string[],
  )
  .action(async (opts: { date: string; balance: string[] }) => {
    await runWithServices(async (services) =>
      recordSnapshot(services, opts.date, parseBalanceArgs(opts.balance)),
    );
  });

snapshot
  .command('list')
  .description('List recorded snapshots')
  .action(async () => {
    await runWithServices(async (services) => listSnapshots(services.store));
  });

snapshot
  .command('delete <month>')
  .description('Delete the snapshot of a month (YYYY-MM)')
  .action(async (month: string) => {
    await runWithServices(async (services) => deleteSnapshot(services.store, month));
  });

// ---------------------------------------------------------------------------
// reports
// ---------------------------------------------------------------------------

program
  .command('networth')
  .description('Net worth in every active currency with a per-account breakdown')
  .option('--currency <code>', 'currency of the breakdown (default: reporting currency)')
  .option('--date <YYYY-MM>', 'month to report (default: latest snapshot)')
  .action(async (opts: { currency?: string; date?: string }) => {
    await runWithServices(async (services) => netWorth(services, opts));
  });

program
  .command('history')
  .description('Net worth at every snapshot date')
  .option('--currency <code>', 'reporting currency override')
  .action(async (opts: { currency?: string }) => {
    await runWithServices(async (services) => history(services, opts.currency));
  });

program
  .command('growth')
  .description('Holdings per currency normalized to a baseline month (baseline = 100)')
  .option('--baseline <YYYY-MM>', 'baseline month (default: first snapshot)')
  .action(async (opts: { baseline?: string }) => {
    await runWithServices(async (services) => growth(services, opts.baseline));
  });

program
  .command('yoy')
  .description('Net worth grouped by year and month')
  .option('--currency <code>', 'reporting currency override')
  .action(async (opts: { currency?: string }) => {
    await runWithServices(async (services) => yearOverYear(services, opts.currency));
  });

await program.parseAsync(process.argv);
