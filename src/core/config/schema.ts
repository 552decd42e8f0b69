/**
 * Zod schemas for archive-ledger configuration validation
 */

import { z } from "zod";
import type { ArchiveLedgerConfig, UserConfig } from "../../types/config.js";
import { ConfigError } from "../errors.js";

/**
 * Archive credentials schema
 */
const credentialsFields = z.object({
  accessKey: z.string().min(1).optional(),
  secretKey: z.string().min(1).optional(),
});

/**
 * Remote archive schema
 */
const archiveFields = z.object({
  endpoint: z.string().url("Archive endpoint must be a URL").default("https://s3.us.archive.org"),
  downloadBaseUrl: z
    .string()
    .url("Download base URL must be a URL")
    .default("https://archive.org/download"),
  collection: z.string().min(1).default("opensource"),
  mediatype: z.string().min(1).default("data"),
  subject: z.string().min(1).default("user-upload"),
  licenseUrl: z.string().default("http://creativecommons.org/publicdomain/zero/1.0/"),
});

/**
 * Upload behaviour schema
 */
const uploadFields = z.object({
  maxFileSizeMB: z.number().positive("Size ceiling must be positive").default(500),
  uploadRetries: z.number().int().min(0).max(20).default(2),
  rateLimitMs: z.number().int().min(0).default(10000),
  retryDelayMs: z.number().int().min(0).default(5000),
  uploadSpeedMBps: z.number().positive().default(5),
  hashAlgorithm: z.enum(["md5", "sha1", "sha256"]).default("md5"),
  exclude: z.array(z.string()).default([]),
});

/**
 * Bookkeeping files schema
 */
const filesFields = z.object({
  ledger: z.string().min(1).default("uploaded.log"),
  failureLog: z.string().min(1).default("Failed.log"),
  pendingPublish: z.string().min(1).default(".push_state"),
  site: z.string().min(1).default("index.html"),
});

/**
 * Publishing schema
 */
const publishFields = z.object({
  remote: z.string().min(1).default("origin"),
  pagesBranch: z.string().min(1).default("gh-pages"),
  fallbackBranch: z.string().min(1).default("main"),
  commitMessage: z.string().min(1).default("Update GitHub Pages"),
});

/**
 * Main configuration schema
 */
export const configSchema = z.object({
  workDir: z.string().min(1, "workDir cannot be empty"),
  credentials: credentialsFields.default({}),
  archive: archiveFields.default({}),
  upload: uploadFields.default({}),
  files: filesFields.default({}),
  publish: publishFields.default({}),
});

/**
 * Schema for a user config file: every field optional, no defaults applied
 */
export const userConfigSchema = z.object({
  workDir: z.string().min(1).optional(),
  credentials: credentialsFields.partial().optional(),
  archive: archiveFields.partial().optional(),
  upload: uploadFields.partial().optional(),
  files: filesFields.partial().optional(),
  publish: publishFields.partial().optional(),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("\n");
}

/**
 * Validate config and return the fully defaulted result
 */
export function validateConfig(config: unknown): ArchiveLedgerConfig {
  const result = configSchema.safeParse(config);

  if (!result.success) {
    throw new ConfigError(`Config validation failed:\n${formatIssues(result.error)}`);
  }

  return result.data;
}

/**
 * Validate the contents of a user config file
 */
export function validateUserConfig(config: unknown, source: string): UserConfig {
  const result = userConfigSchema.safeParse(config);

  if (!result.success) {
    throw new ConfigError(`Invalid config file ${source}:\n${formatIssues(result.error)}`);
  }

  return result.data;
}

/**
 * Validate config with safe parsing (returns result object)
 */
export function validateConfigSafe(config: unknown) {
  return configSchema.safeParse(config);
}
