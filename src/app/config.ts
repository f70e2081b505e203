/**
 * CLI-specific config loading utilities.
 *
 * Wraps the library-level config parsing (`../config.js`) with file-system
 * awareness: locating the config file, reading TOML, resolving paths, and
 * producing the JSON output of the `config` command.
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

import { type ResolvedConfig, DEFAULT_CONFIG, parseConfig, resolveConfig } from '../config.js';

// ---------------------------------------------------------------------------
// Default config path discovery
// ---------------------------------------------------------------------------

/**
 * Determine the default configuration file path.
 *
 * Resolution order:
 * 1. `./worthline.toml` if it exists in the current working directory.
 * 2. `$XDG_DATA_HOME/worthline/worthline.toml` (or
 *    `~/.local/share/worthline/worthline.toml` when `XDG_DATA_HOME` is unset),
 *    whether or not it exists yet.
 */
export function defaultConfigPath(): string {
  const localConfig = path.resolve('worthline.toml');
  if (fs.existsSync(localConfig)) {
    return localConfig;
  }

  const xdgDataHome = process.env.XDG_DATA_HOME || path.join(os.homedir(), '.local', 'share');
  return path.join(xdgDataHome, 'worthline', 'worthline.toml');
}

// ---------------------------------------------------------------------------
// Config loading
// ---------------------------------------------------------------------------

/**
 * Load and resolve the configuration.
 *
 * A missing file yields the defaults, with the directory the file would live
 * in as the data directory.
 */
export async function loadConfig(
  configPath?: string,
): Promise<{ configPath: string; config: ResolvedConfig }> {
  const resolvedPath = configPath ? path.resolve(configPath) : defaultConfigPath();
  const configDir = path.dirname(resolvedPath);

  if (fs.existsSync(resolvedPath)) {
    const tomlStr = await fs.promises.readFile(resolvedPath, 'utf-8');
    return { configPath: resolvedPath, config: resolveConfig(parseConfig(tomlStr), configDir) };
  }

  return { configPath: resolvedPath, config: resolveConfig(DEFAULT_CONFIG, configDir) };
}

// ---------------------------------------------------------------------------
// CLI output
// ---------------------------------------------------------------------------

/** JSON output of the `config` command. */
export function configOutput(configPath: string, config: ResolvedConfig): object {
  return {
    config_file: configPath,
    data_directory: config.data_dir,
    currencies: config.currencies,
    reporting_currency: config.reporting_currency,
    intermediary_currency: config.intermediary_currency,
    log_level: config.log_level,
    rate_source: config.rate_source,
    display: config.display,
  };
}
