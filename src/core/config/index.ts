/**
 * Config system entry point
 */

import { resolve } from "node:path";
import type { ArchiveLedgerConfig, LoadConfigOptions, UserConfig } from "../../types/config.js";
import { loadEnvFiles, readEnvOverrides } from "./env-loader.js";
import { discoverAndLoadConfig, loadConfigFile } from "./loader.js";
import { mergeConfigs } from "./merger.js";
import { validateConfig } from "./schema.js";

/**
 * Loaded configuration and where it came from
 */
export interface LoadedConfig {
  config: ArchiveLedgerConfig;
  configPath: string | null;
  envFiles: string[];
}

/**
 * Load and validate archive-ledger configuration
 *
 * Layers, lowest priority first: built-in defaults, config file,
 * environment variables.
 *
 * @example
 * ```ts
 * // Discover archive-ledger.config.ts from the working directory
 * const { config } = await loadConfig();
 *
 * // Load with custom path
 * const { config } = await loadConfig({ configPath: './custom.config.ts' });
 * ```
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const { configPath, cwd = process.cwd(), skipEnvFiles = false } = options;

  // .env must be loaded before the config file so it can read process.env
  const envFiles = skipEnvFiles ? [] : loadEnvFiles(cwd);

  let fileConfig: UserConfig = {};
  let resolvedConfigPath: string | null = null;

  if (configPath) {
    resolvedConfigPath = resolve(cwd, configPath);
    fileConfig = loadConfigFile(resolvedConfigPath);
  } else {
    const discovered = discoverAndLoadConfig(cwd);
    if (discovered) {
      fileConfig = discovered.config;
      resolvedConfigPath = discovered.configPath;
    }
  }

  const merged = mergeConfigs({ workDir: cwd }, fileConfig, readEnvOverrides());
  const config = validateConfig({
    ...merged,
    workDir: resolve(cwd, merged.workDir ?? "."),
  });

  return { config, configPath: resolvedConfigPath, envFiles };
}

export {
  validateConfig,
  validateConfigSafe,
  validateUserConfig,
  configSchema,
  userConfigSchema,
} from "./schema.js";
export { findConfigFile, loadConfigFile, discoverAndLoadConfig, CONFIG_FILE_NAMES } from "./loader.js";
export { loadEnvFiles, readEnvOverrides } from "./env-loader.js";
export { mergeConfigs } from "./merger.js";
export { defineConfig, generateExampleConfig, resolveFilePaths } from "./utils.js";

export type { ArchiveLedgerConfig, LoadConfigOptions, UserConfig } from "../../types/config.js";
