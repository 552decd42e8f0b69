/**
 * Status command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync } from 'node:fs';
import * as logger from '../utils/logger.js';
import { loadConfig, resolveFilePaths } from '../../core/config/index.js';
import { countFailureRecords, readLedger, summarizeLedger } from '../../core/ledger/index.js';
import { FilePublishStateStore } from '../../core/publisher/index.js';
import { errorMessage } from '../../core/errors.js';

/**
 * Status command options
 */
interface StatusOptions {
  config?: string;
  detailed?: boolean;
  json?: boolean;
}

/**
 * Create status command
 */
export function createStatusCommand(): Command {
  const command = new Command('status');

  command
    .description('Show ledger, failure log and publish state')
    .option('-c, --config <path>', 'Config file path')
    .option('-d, --detailed', 'List the most recent uploads')
    .option('--json', 'Output as JSON')
    .action(async (options: StatusOptions) => {
      try {
        await statusCommand(options);
      } catch (error: unknown) {
        logger.error(errorMessage(error));
        process.exit(1);
      }
    });

  return command;
}

/**
 * Status command handler
 */
async function statusCommand(options: StatusOptions): Promise<void> {
  const { config: configPath, detailed = false, json = false } = options;

  const { config } = await loadConfig({ configPath });
  const paths = resolveFilePaths(config);

  const entries = readLedger(paths.ledger);
  const summary = summarizeLedger(entries);
  const failures = countFailureRecords(paths.failureLog);
  const publishState = await new FilePublishStateStore(paths.pendingPublish).read();
  const siteExists = existsSync(paths.site);

  // JSON output
  if (json) {
    const output: Record<string, unknown> = {
      ledger: paths.ledger,
      ...summary,
      failures,
      publishState,
      site: siteExists ? paths.site : null,
    };

    if (detailed) {
      output.files = entries;
    }

    console.log(JSON.stringify(output, null, 2));
    return;
  }

  // Pretty output
  console.log();
  console.log(chalk.bold.blue('📊 Upload Status'));
  console.log();

  if (entries.length === 0) {
    logger.warn(`No uploads recorded in ${chalk.cyan(paths.ledger)}`);
    logger.info(`Run ${chalk.cyan('archive-ledger upload <path>')} to start`);
    console.log();
    return;
  }

  logger.keyValue('Ledger', paths.ledger);
  logger.keyValue('Files Uploaded', summary.entries.toString());
  logger.keyValue('Archive Items', summary.items.toString());
  logger.keyValue(
    'Failures Logged',
    failures > 0 ? chalk.yellow(failures.toString()) : '0'
  );
  logger.keyValue(
    'Site',
    siteExists
      ? publishState === 'pending-publish'
        ? chalk.yellow('not pushed yet')
        : chalk.green('published')
      : chalk.gray('not generated')
  );

  console.log();
  console.log(chalk.bold('Uploaders:'));
  for (const [uploader, count] of Object.entries(summary.uploaders)) {
    console.log(`  ${chalk.cyan(uploader)} (${count} files)`);
  }

  // Detailed output
  if (detailed) {
    console.log();
    console.log(chalk.bold('Recent Uploads:'));

    const maxFiles = 20;
    const recent = entries.slice(-maxFiles).reverse();
    for (const entry of recent) {
      console.log(chalk.gray(`  ${entry.timestamp} ${entry.itemId}/${entry.relativePath}`));
    }

    if (entries.length > maxFiles) {
      console.log(chalk.gray(`  ... and ${entries.length - maxFiles} more files`));
    }
  }

  console.log();
}
