/**
 * Config file loader using jiti for TypeScript runtime execution
 */

import jiti from "jiti";
import { existsSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import type { UserConfig } from "../../types/config.js";
import { ConfigError } from "../errors.js";
import { validateUserConfig } from "./schema.js";

/**
 * Config file names to search for (in order of priority)
 */
export const CONFIG_FILE_NAMES = [
  "archive-ledger.config.ts",
  "archive-ledger.config.js",
  "archive-ledger.config.mjs",
  "archive-ledger.config.cjs",
] as const;

/**
 * Find config file in directory and parent directories
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = join(currentDir, fileName);
      if (existsSync(configPath)) {
        return configPath;
      }
    }

    // Move up to parent directory
    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Unwrap the supported export shapes: object, function, or a default export of either
 */
function unwrapConfigExport(configModule: unknown): unknown {
  let config = configModule;

  if (isRecord(config) && "default" in config) {
    config = config.default;
  }
  if (typeof config === "function") {
    config = config();
  }

  return config;
}

/**
 * Load config file using jiti
 */
export function loadConfigFile(configPath: string): UserConfig {
  if (!existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  let config: unknown;
  try {
    const jitiInstance = jiti(__filename, {
      interopDefault: true,
      requireCache: false,
      esmResolve: true,
    });

    config = unwrapConfigExport(jitiInstance(resolve(configPath)));
  } catch (error) {
    throw new ConfigError(
      `Failed to load config file: ${configPath}\n${
        error instanceof Error ? error.message : String(error)
      }`,
      { cause: error }
    );
  }

  if (!isRecord(config)) {
    throw new ConfigError(`Config file must export an object: ${configPath}`);
  }

  return validateUserConfig(config, configPath);
}

/**
 * Discover and load config file; null when there is none
 */
export function discoverAndLoadConfig(
  startDir?: string
): { config: UserConfig; configPath: string } | null {
  const configPath = findConfigFile(startDir);

  if (!configPath) {
    return null;
  }

  return {
    config: loadConfigFile(configPath),
    configPath,
  };
}
