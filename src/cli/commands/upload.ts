/**
 * Upload command
 */

import { Command } from "commander";
import chalk from "chalk";
import { relative } from "node:path";
import * as logger from "../utils/logger.js";
import { ConsoleReporter } from "../utils/reporter.js";
import { InquirerPrompter } from "../utils/prompter.js";
import { loadConfig, resolveFilePaths } from "../../core/config/index.js";
import { getArchiveCredentials, S3ArchiveClient } from "../../core/archive/index.js";
import { FilePublishStateStore, SimpleGitClient } from "../../core/publisher/index.js";
import { runWorkflow } from "../../core/workflow/orchestrator.js";
import { ensureGitignoreEntries } from "../../core/utils/gitignore.js";
import { errorMessage } from "../../core/errors.js";
import type { ArchiveLedgerConfig } from "../../types/config.js";
import type { WorkflowResult } from "../../types/workflow.js";

/**
 * Upload command options
 */
interface UploadOptions {
  config?: string;
  yes?: boolean;
  uploader?: string;
  publish: boolean;
}

/**
 * Process exit code for a finished run
 */
export function exitCodeFor(result: WorkflowResult): number {
  switch (result.outcome) {
    case "completed":
      return result.upload && result.upload.failed > 0 ? 1 : 0;
    case "nothing-to-upload":
    case "cancelled":
      return 0;
    default:
      return 1;
  }
}

/**
 * Bookkeeping files to keep out of git, relative to the work directory
 */
function localStateEntries(config: ArchiveLedgerConfig): string[] {
  const paths = resolveFilePaths(config);
  return [paths.pendingPublish, paths.failureLog]
    .map((file) => relative(config.workDir, file).split("\\").join("/"))
    .filter((file) => file !== "" && !file.startsWith(".."));
}

/**
 * Create upload command
 */
export function createUploadCommand(): Command {
  const command = new Command("upload");

  command
    .description("Upload a directory to the Internet Archive and update the site")
    .argument("[path]", "Directory to upload (prompted for when omitted)")
    .option("-c, --config <path>", "Config file path")
    .option("-y, --yes", "Answer yes to every confirmation")
    .option("-u, --uploader <name>", "Uploader name (prompted for when omitted)")
    .option("--no-publish", "Do not offer to push the site")
    .action(async (sourceDir: string | undefined, options: UploadOptions) => {
      try {
        const result = await uploadCommand(sourceDir, options);
        process.exitCode = exitCodeFor(result);
      } catch (error: unknown) {
        logger.error(errorMessage(error));
        process.exit(1);
      }
    });

  return command;
}

/**
 * Upload command handler
 */
async function uploadCommand(
  sourceDir: string | undefined,
  options: UploadOptions
): Promise<WorkflowResult> {
  console.log();
  console.log(chalk.bold.blue("📦 Archive Upload"));
  console.log();

  const { config, configPath, envFiles } = await loadConfig({ configPath: options.config });
  logger.debug(`Config file: ${configPath ?? "(defaults)"}`);
  logger.debug(`Env files: ${envFiles.length > 0 ? envFiles.join(", ") : "(none)"}`);

  ensureGitignoreEntries(localStateEntries(config), config.workDir, true);

  const paths = resolveFilePaths(config);
  const reporter = new ConsoleReporter();

  try {
    return await runWorkflow({
      config,
      prompter: new InquirerPrompter(),
      createArchiveClient: () =>
        S3ArchiveClient.fromConfig(config.archive, getArchiveCredentials(config)),
      vcs: new SimpleGitClient(config.workDir),
      stateStore: new FilePublishStateStore(paths.pendingPublish),
      sourceDir,
      uploader: options.uploader,
      autoConfirm: options.yes === true,
      publish: options.publish,
      onEvent: reporter.onEvent,
    });
  } finally {
    reporter.dispose();
  }
}
