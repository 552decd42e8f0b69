/**
 * CLI configuration
 */

import { Command } from "commander";
import { createInitCommand } from "./commands/init.js";
import { createUploadCommand } from "./commands/upload.js";
import { createPublishCommand } from "./commands/publish.js";
import { createStatusCommand } from "./commands/status.js";
import { readFileSync } from "node:fs";
import { join } from "node:path";

/**
 * Get package version
 */
export function getVersion(): string {
  try {
    const packageJsonPath = join(__dirname, "../../package.json");
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, "utf-8"));
    if (
      typeof packageJson === "object" &&
      packageJson !== null &&
      "version" in packageJson &&
      typeof packageJson.version === "string"
    ) {
      return packageJson.version;
    }
    return "0.0.0";
  } catch {
    return "0.0.0";
  }
}

/**
 * Create CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("archive-ledger")
    .description("Upload directories to the Internet Archive and publish an index on GitHub Pages")
    .version(getVersion());

  // Add commands
  program.addCommand(createUploadCommand(), { isDefault: true });
  program.addCommand(createPublishCommand());
  program.addCommand(createStatusCommand());
  program.addCommand(createInitCommand());

  return program;
}
