/**
 * Environment variables loader
 */

import { config as dotenvConfig } from "dotenv";
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import type { UserConfig } from "../../types/config.js";

/**
 * .env files in priority order (highest first)
 */
const ENV_FILES = [".env.local", ".env"];

/**
 * Load .env files from a directory.
 * Lower-priority files load first so higher-priority ones override them.
 *
 * @returns The files that were loaded, highest priority first
 */
export function loadEnvFiles(configDir: string = process.cwd()): string[] {
  const loadedFiles: string[] = [];

  for (const file of [...ENV_FILES].reverse()) {
    const filePath = resolve(configDir, file);

    if (existsSync(filePath)) {
      dotenvConfig({ path: filePath, override: true });
      loadedFiles.push(file);
    }
  }

  return loadedFiles.reverse();
}

/**
 * Numeric upload settings that can be set from the environment
 */
const NUMERIC_UPLOAD_VARIABLES = [
  ["rateLimitMs", "ARCHIVE_LEDGER_RATE_LIMIT_MS"],
  ["retryDelayMs", "ARCHIVE_LEDGER_RETRY_DELAY_MS"],
  ["uploadRetries", "ARCHIVE_LEDGER_UPLOAD_RETRIES"],
  ["maxFileSizeMB", "ARCHIVE_LEDGER_MAX_FILE_SIZE_MB"],
] as const;

function readNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key]?.trim();
  return raw ? Number(raw) : undefined;
}

function readString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

/**
 * Config values supplied through environment variables
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): UserConfig {
  const overrides: UserConfig = {};

  const accessKey = readString(env, "IA_ACCESS_KEY");
  const secretKey = readString(env, "IA_SECRET_KEY");
  if (accessKey || secretKey) {
    overrides.credentials = {
      ...(accessKey ? { accessKey } : {}),
      ...(secretKey ? { secretKey } : {}),
    };
  }

  const upload: NonNullable<UserConfig["upload"]> = {};
  for (const [key, variable] of NUMERIC_UPLOAD_VARIABLES) {
    const value = readNumber(env, variable);
    if (value !== undefined) {
      upload[key] = value;
    }
  }
  if (Object.keys(upload).length > 0) {
    overrides.upload = upload;
  }

  return overrides;
}
