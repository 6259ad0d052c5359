/**
 * Shared command setup: configuration, logger and store
 */

import { dirname } from "node:path";
import chalk from "chalk";
import { ConfigurationError, errorMessage } from "../../errors";
import { MetadataStore } from "../../modules/store";
import type { HarvestConfig } from "../../types";
import { Logger, loadConfig } from "../../utils";

export interface Runtime {
  config: HarvestConfig;
  logger: Logger;
}

/**
 * Load configuration and build the root logger
 * Invalid config files are reported but do not stop the command
 */
export async function loadRuntime(
  options: { config?: string; verbose?: boolean } = {},
): Promise<Runtime> {
  const { config, errors } = await loadConfig(options.config);
  const level = options.verbose ? "debug" : config.logging.level;
  const logger = new Logger(level, { file: config.logging.file });

  for (const { path, error } of errors) {
    logger.warn(`Ignoring invalid config ${path}: ${errorMessage(error)}`);
  }

  return { config, logger };
}

export function openStore(config: HarvestConfig): MetadataStore {
  return new MetadataStore(config.store.path);
}

/**
 * Directory holding the database, where run summaries are exported
 */
export function dataDirectory(config: HarvestConfig): string {
  return dirname(config.store.path);
}

/**
 * Run a command body against an open store, closing it afterwards
 */
export async function withStore(
  options: { config?: string; verbose?: boolean },
  body: (store: MetadataStore, runtime: Runtime) => Promise<void> | void,
): Promise<void> {
  try {
    const runtime = await loadRuntime(options);
    const store = openStore(runtime.config);
    try {
      await body(store, runtime);
    } finally {
      store.close();
    }
  } catch (error) {
    fail(error);
  }
}

export function fail(error: unknown): never {
  if (error instanceof ConfigurationError) {
    console.error(chalk.red(`  ✖ ${error.message}`));
  } else {
    console.error(chalk.red(`  ✖ ${errorMessage(error)}`));
    console.error(error);
  }
  process.exit(1);
}
