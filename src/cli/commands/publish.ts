/**
 * Publish command
 */

import { Command } from "commander";
import chalk from "chalk";
import { existsSync } from "node:fs";
import * as logger from "../utils/logger.js";
import { ConsoleReporter } from "../utils/reporter.js";
import { InquirerPrompter } from "../utils/prompter.js";
import { loadConfig, resolveFilePaths } from "../../core/config/index.js";
import {
  FilePublishStateStore,
  SimpleGitClient,
  generateSite,
  publishSite,
} from "../../core/publisher/index.js";
import { PublishConfigError, PublishError, errorMessage } from "../../core/errors.js";

/**
 * Publish command options
 */
interface PublishOptions {
  config?: string;
  yes?: boolean;
  render?: boolean;
}

/**
 * Create publish command
 */
export function createPublishCommand(): Command {
  const command = new Command("publish");

  command
    .description("Push the generated site to GitHub Pages")
    .option("-c, --config <path>", "Config file path")
    .option("-y, --yes", "Switch branches without asking")
    .option("-r, --render", "Regenerate the site from the ledger first")
    .action(async (options: PublishOptions) => {
      try {
        process.exitCode = await publishCommand(options);
      } catch (error: unknown) {
        logger.error(errorMessage(error));
        process.exit(1);
      }
    });

  return command;
}

/**
 * Publish command handler
 */
async function publishCommand(options: PublishOptions): Promise<number> {
  const { config } = await loadConfig({ configPath: options.config });
  const paths = resolveFilePaths(config);
  const stateStore = new FilePublishStateStore(paths.pendingPublish);

  console.log();
  console.log(chalk.bold.blue("🌐 GitHub Pages"));
  console.log();

  if (options.render) {
    const generated = await generateSite({
      ledgerPath: paths.ledger,
      sitePath: paths.site,
      downloadBaseUrl: config.archive.downloadBaseUrl,
      stateStore,
    });
    if (generated) {
      logger.success(`Generated ${chalk.cyan(paths.site)}`);
    }
  }

  if (!existsSync(paths.site)) {
    logger.warn(`No site found at ${chalk.cyan(paths.site)}`);
    logger.info(`Run ${chalk.cyan("archive-ledger upload")} first`);
    return 1;
  }

  if ((await stateStore.read()) === "clean") {
    logger.info("No unpublished changes recorded, pushing anyway");
  }

  const prompter = new InquirerPrompter();
  const reporter = new ConsoleReporter();

  try {
    const result = await publishSite({
      vcs: new SimpleGitClient(config.workDir),
      stateStore,
      sitePath: paths.site,
      settings: config.publish,
      confirmSwitch: (current, target) =>
        options.yes
          ? Promise.resolve(true)
          : prompter.confirm(`You're on '${current}' but GitHub Pages might need '${target}'. Switch to '${target}'?`),
      onEvent: (event) => reporter.onEvent({ type: "publish", event }),
    });
    reporter.onEvent({ type: "published", result });
    return 0;
  } catch (error) {
    if (error instanceof PublishConfigError || error instanceof PublishError) {
      reporter.onEvent({ type: "publish-failed", error });
      return 1;
    }
    throw error;
  } finally {
    reporter.dispose();
  }
}
