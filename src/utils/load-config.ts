/**
 * Configuration Loader
 * Loads and merges configuration from defaults, user config, custom config
 * and the environment
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import dotenv from "dotenv";
import envPaths from "env-paths";
import { ConfigurationError } from "../errors";
import {
  HarvestConfigSchema,
  PartialHarvestConfigSchema,
  type ConfigError,
  type HarvestConfig,
  type PartialHarvestConfig,
} from "../types/config";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("photo-harvest", { suffix: "" });

/**
 * Get the path where user config should be stored
 * - Linux: $XDG_CONFIG_HOME/photo-harvest/config.json
 * - macOS: ~/Library/Preferences/photo-harvest/config.json
 * - Windows: %APPDATA%\photo-harvest\Config\config.json
 */
export function getUserConfigPath(): string {
  return join(paths.config, "config.json");
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<HarvestConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return HarvestConfigSchema.parse(JSON.parse(content));
}

async function loadPartialConfig(
  configPath: string,
): Promise<PartialHarvestConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialHarvestConfigSchema.parse(JSON.parse(content));
}

export function mergeConfig(
  base: HarvestConfig,
  override: PartialHarvestConfig,
): HarvestConfig {
  return {
    api: { ...base.api, ...override.api },
    retry: { ...base.retry, ...override.retry },
    download: { ...base.download, ...override.download },
    store: { ...base.store, ...override.store },
    run: { ...base.run, ...override.run },
    categories: { ...base.categories, ...override.categories },
    logging: { ...base.logging, ...override.logging },
  };
}

// Variables read by envOverrides
export const ENV_VARIABLES = [
  "UNSPLASH_ACCESS_KEY",
  "PHOTO_HARVEST_QUERY",
  "PHOTO_HARVEST_ORIENTATION",
  "PHOTO_HARVEST_PER_PAGE",
  "PHOTO_HARVEST_REQUESTS_PER_HOUR",
  "PHOTO_HARVEST_DOWNLOAD_DIR",
  "PHOTO_HARVEST_DB",
  "PHOTO_HARVEST_LOG_LEVEL",
  "PHOTO_HARVEST_LOG_FILE",
] as const;

/**
 * Read overrides from environment variables
 * Values are validated together with the rest of the config
 */
export function envOverrides(env: NodeJS.ProcessEnv): PartialHarvestConfig {
  const int = (value: string | undefined): number | undefined =>
    value === undefined || value === "" ? undefined : Number(value);

  const override = {
    api: {
      accessKey: env.UNSPLASH_ACCESS_KEY,
      query: env.PHOTO_HARVEST_QUERY,
      orientation: env.PHOTO_HARVEST_ORIENTATION,
      perPage: int(env.PHOTO_HARVEST_PER_PAGE),
      requestsPerHour: int(env.PHOTO_HARVEST_REQUESTS_PER_HOUR),
    },
    download: { directory: env.PHOTO_HARVEST_DOWNLOAD_DIR },
    store: { path: env.PHOTO_HARVEST_DB },
    logging: {
      level: env.PHOTO_HARVEST_LOG_LEVEL,
      file: env.PHOTO_HARVEST_LOG_FILE,
    },
  };

  return PartialHarvestConfigSchema.parse(stripUndefined(override));
}

function stripUndefined(
  sections: Record<string, Record<string, unknown>>,
): Record<string, Record<string, unknown>> {
  const result: Record<string, Record<string, unknown>> = {};
  for (const [section, values] of Object.entries(sections)) {
    const defined = Object.entries(values).filter(([, v]) => v !== undefined);
    if (defined.length > 0) {
      result[section] = Object.fromEntries(defined);
    }
  }
  return result;
}

export interface ConfigSource {
  kind: "default" | "user" | "custom" | "environment";
  // File path, or the variable names for the environment
  location: string;
}

interface LoadConfigResult {
  config: HarvestConfig;
  // Layers that were applied, lowest priority first
  sources: ConfigSource[];
  errors: ConfigError[];
}

/**
 * Copy of the config that is safe to print
 */
export function redactConfig(config: HarvestConfig): HarvestConfig {
  const { accessKey } = config.api;
  return {
    ...config,
    api: { ...config.api, accessKey: accessKey ? "(set)" : "" },
  };
}

/**
 * Load and merge configuration
 * Priority: environment > custom path > user config > default config
 */
export async function loadConfig(
  custom?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<LoadConfigResult> {
  dotenv.config();

  let config = await loadDefaultConfig();
  const sources: ConfigSource[] = [
    { kind: "default", location: join(__dirname, "..", "config", "default.json") },
  ];
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (existsSync(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
      sources.push({ kind: "user", location: userConfigPath });
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
      sources.push({ kind: "custom", location: custom });
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  try {
    config = mergeConfig(config, envOverrides(env));
    const used = ENV_VARIABLES.filter((name) => env[name]);
    if (used.length > 0) {
      sources.push({ kind: "environment", location: used.join(", ") });
    }
  } catch (error) {
    errors.push({ path: "environment", error });
  }

  return { config: HarvestConfigSchema.parse(config), sources, errors };
}

/**
 * The access key is checked once at startup, before any network call
 */
export function requireAccessKey(config: HarvestConfig): string {
  const key = config.api.accessKey.trim();
  if (!key) {
    throw new ConfigurationError(
      "Missing API access key: set UNSPLASH_ACCESS_KEY or api.accessKey",
    );
  }
  return key;
}
