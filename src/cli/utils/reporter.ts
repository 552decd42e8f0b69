/**
 * Console rendering of workflow events
 */

import chalk from "chalk";
import ora, { type Ora } from "ora";
import cliProgress from "cli-progress";
import type { PublishEvent } from "../../types/publish.js";
import type { UploadEvent } from "../../types/uploader.js";
import type { WorkflowEvent } from "../../types/workflow.js";
import { PublishConfigError } from "../../core/errors.js";
import { formatBytes } from "../../core/scanner/file-scanner.js";
import * as logger from "./logger.js";

/**
 * Human-readable duration, e.g. `1h 2m 5s`
 */
export function formatDuration(seconds: number): string {
  if (!Number.isFinite(seconds)) {
    return "unknown";
  }

  const total = Math.ceil(seconds);
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;

  if (h > 0) return `${h}h ${m}m ${s}s`;
  if (m > 0) return `${m}m ${s}s`;
  return `${s}s`;
}

/**
 * Reporter that prints workflow progress to the terminal.
 * Spinners and the progress bar are only used when `interactive` is set.
 */
export class ConsoleReporter {
  private spinner: Ora | null = null;
  private progressBar: cliProgress.SingleBar | null = null;

  /** Messages held back while the progress bar owns the terminal */
  private deferred: string[] = [];

  constructor(private readonly interactive: boolean = process.stdout.isTTY === true) {}

  readonly onEvent = (event: WorkflowEvent): void => {
    switch (event.type) {
      case "state":
        logger.debug(`state → ${event.state}`);
        if (event.state === "scanning" && this.interactive) {
          this.spinner = ora("Scanning files...").start();
        }
        break;

      case "invalid-source":
        logger.error(`Invalid directory: ${event.sourceDir || "(empty)"}`);
        break;

      case "scan-skip":
        this.spinner?.stop();
        if (event.file.reason === "too-large") {
          logger.warn(`Skipped ${event.file.relativePath} (${event.file.sizeMB.toFixed(2)} MB, too large)`);
        } else if (event.file.reason === "unrecordable-path") {
          logger.warn(`Skipped ${JSON.stringify(event.file.relativePath)} (name contains "|" or a line break)`);
        } else {
          logger.debug(`Already uploaded: ${event.file.relativePath}`);
        }
        this.spinner?.start();
        break;

      case "scan-complete": {
        const { result, estimatedSeconds } = event;
        const alreadyUploaded = result.skipped.filter((f) => f.reason === "already-uploaded").length;
        this.succeed(
          `Found ${chalk.cyan(result.worklist.length)} files to upload (${formatBytes(result.totalBytes)})`
        );
        if (alreadyUploaded > 0) {
          logger.info(`${alreadyUploaded} files already uploaded`);
        }
        if (result.worklist.length > 0) {
          logger.keyValue("Estimated time", formatDuration(estimatedSeconds));
        }
        break;
      }

      case "nothing-to-upload":
        logger.success("All files already uploaded!");
        break;

      case "cancelled":
        logger.warn("Upload cancelled");
        break;

      case "invalid-uploader":
        logger.error(event.message);
        break;

      case "upload-started":
        logger.section("Upload");
        logger.keyValue("Item", chalk.cyan(event.itemId));
        logger.newline();
        this.startProgress(event.total);
        break;

      case "upload":
        this.onUploadEvent(event.event);
        break;

      case "upload-complete": {
        this.stopProgress();
        const { stats } = event;
        logger.section("Upload Summary");
        logger.keyValue("Uploaded", `${stats.succeeded}/${stats.total}`);
        logger.keyValue("Duration", formatDuration(stats.duration / 1000));
        if (stats.failed > 0) {
          logger.warn(`${stats.failed} files failed. See ${chalk.cyan(event.failureLogPath)}`);
        }
        break;
      }

      case "site-generated":
        logger.success(`Generated ${chalk.cyan(event.sitePath)}`);
        break;

      case "site-skipped":
        logger.info("Ledger is empty, site not generated");
        break;

      case "pending-publish-detected":
        logger.warn(`${chalk.cyan(event.sitePath)} has changes that were never pushed`);
        break;

      case "publish":
        this.onPublishEvent(event.event);
        break;

      case "published":
        this.succeed("Pushed to GitHub");
        logger.keyValue("Site", chalk.cyan(event.result.pagesUrl));
        break;

      case "publish-failed":
        this.fail(event.error.message);
        if (event.error instanceof PublishConfigError && event.error.hint.length > 0) {
          logger.hints(event.error.hint);
        } else {
          logger.info("The site will be offered for publishing on the next run");
        }
        break;
    }
  };

  /**
   * Stop whatever an aborted run left spinning
   */
  dispose(): void {
    this.spinner?.stop();
    this.spinner = null;
    this.stopProgress();
  }

  private onUploadEvent(event: UploadEvent): void {
    switch (event.type) {
      case "start":
        if (this.progressBar) {
          this.progressBar.update(event.index - 1, { current: event.item.relativePath });
        } else {
          logger.info(`Uploading (${event.index}/${event.total}): ${event.item.relativePath}`);
        }
        break;

      case "attempt-failed":
        this.report(
          "warn",
          `Attempt ${event.attempt} failed for ${event.item.relativePath}: ${event.error.message}. ` +
            `Retrying in ${formatDuration(event.delayMs / 1000)}`
        );
        break;

      case "succeeded":
        if (this.progressBar) {
          this.progressBar.update(event.index, { current: event.item.relativePath });
        } else {
          logger.success(`Uploaded ${event.item.relativePath}`);
        }
        break;

      case "failed":
        this.progressBar?.increment();
        this.report("error", `Final upload failure for ${event.item.relativePath}: ${event.error.message}`);
        break;
    }
  }

  private onPublishEvent(event: PublishEvent): void {
    switch (event.type) {
      case "remote-resolved":
        logger.keyValue("Repository", `${event.remote.owner}/${event.remote.repo}`);
        break;
      case "branch-selected":
        logger.keyValue("Branch", event.branch);
        break;
      case "branch-switched":
        logger.success(`Switched to ${chalk.cyan(event.branch)}`);
        break;
      case "pushing":
        if (this.interactive) {
          this.spinner = ora(`Pushing to ${event.branch}...`).start();
        } else {
          logger.info(`Pushing to ${event.branch}...`);
        }
        break;
    }
  }

  private startProgress(total: number): void {
    if (!this.interactive) {
      return;
    }

    this.progressBar = new cliProgress.SingleBar(
      {
        format:
          "Progress |" +
          chalk.cyan("{bar}") +
          "| {percentage}% | {value}/{total} files | {current}",
        barCompleteChar: "█",
        barIncompleteChar: "░",
        hideCursor: true,
      },
      cliProgress.Presets.shades_classic
    );
    this.progressBar.start(total, 0, { current: "" });
  }

  private stopProgress(): void {
    if (this.progressBar) {
      this.progressBar.stop();
      this.progressBar = null;
    }
    for (const line of this.deferred) {
      console.log(line);
    }
    this.deferred = [];
  }

  private report(level: "warn" | "error", message: string): void {
    if (this.progressBar) {
      const icon = level === "warn" ? chalk.yellow("⚠") : chalk.red("✗");
      this.deferred.push(`${icon} ${message}`);
      return;
    }
    logger[level](message);
  }

  private succeed(message: string): void {
    if (this.spinner) {
      this.spinner.succeed(message);
      this.spinner = null;
    } else {
      logger.success(message);
    }
  }

  private fail(message: string): void {
    if (this.spinner) {
      this.spinner.fail(message);
      this.spinner = null;
    } else {
      logger.error(message);
    }
  }
}
