/**
 * Upload workflow
 *
 * One interactive run: pick a directory, scan it against the ledger,
 * confirm, upload, regenerate the site and offer to publish it. A site
 * left unpublished by an earlier run is offered for publishing even when
 * there is nothing new to upload.
 */

import { statSync } from "node:fs";
import { resolve } from "node:path";
import type { ArchiveLedgerConfig } from "../../types/config.js";
import type { PublishResult, PublishStateStore, VcsClient } from "../../types/publish.js";
import type { ArchiveClient, UploadStats } from "../../types/uploader.js";
import type { ScanResult } from "../../types/scanner.js";
import type {
  Prompter,
  WorkflowEvent,
  WorkflowOutcome,
  WorkflowResult,
  WorkflowState,
} from "../../types/workflow.js";
import { resolveFilePaths } from "../config/utils.js";
import { PublishConfigError, PublishError } from "../errors.js";
import { LEDGER_SEPARATOR, readLedgerHashes } from "../ledger/ledger.js";
import { generateSite, hasPendingPublish, publishSite } from "../publisher/publisher.js";
import { estimateUploadSeconds, scanDirectory } from "../scanner/file-scanner.js";
import { buildUploadMetadata, createItemId, sourceName } from "../uploader/item-id.js";
import { uploadWorklist } from "../uploader/uploader.js";

/**
 * Collaborators of a workflow run
 */
export interface WorkflowDeps {
  config: ArchiveLedgerConfig;
  prompter: Prompter;

  /** Called once, right before the first upload */
  createArchiveClient: () => ArchiveClient;
  vcs: VcsClient;
  stateStore: PublishStateStore;

  /** Directory to upload; prompted for when absent */
  sourceDir?: string;

  /** Uploader name; prompted for when absent */
  uploader?: string;

  /** Answer yes to every confirmation */
  autoConfirm?: boolean;

  /** Set to false to never offer publishing */
  publish?: boolean;

  onEvent?: (event: WorkflowEvent) => void;
  now?: () => Date;
}

/**
 * Why an uploader name cannot be used, or null when it is fine
 */
export function validateUploaderName(name: string): string | null {
  if (!name) {
    return "Uploader name required!";
  }
  if (name.includes(LEDGER_SEPARATOR) || /[\r\n]/.test(name)) {
    return `Uploader name cannot contain "${LEDGER_SEPARATOR}" or line breaks`;
  }
  return null;
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Run the workflow to completion
 */
export async function runWorkflow(deps: WorkflowDeps): Promise<WorkflowResult> {
  const { config, prompter, autoConfirm = false, onEvent, now = () => new Date() } = deps;
  const paths = resolveFilePaths(config);

  const states: WorkflowState[] = [];
  const enter = (state: WorkflowState): void => {
    states.push(state);
    onEvent?.({ type: "state", state });
  };

  const confirm = (message: string): Promise<boolean> =>
    autoConfirm ? Promise.resolve(true) : prompter.confirm(message);

  let scan: ScanResult | undefined;
  let upload: UploadStats | undefined;
  let itemId: string | undefined;
  let siteGenerated = false;

  const finish = (
    outcome: WorkflowOutcome,
    extra: { published?: PublishResult; error?: Error } = {}
  ): WorkflowResult => {
    enter("done");
    return { outcome, states, scan, upload, itemId, siteGenerated, ...extra };
  };

  // Offer publishing when this run rendered the site or an earlier one left it unpushed
  const offerPublish = async (defaultOutcome: WorkflowOutcome): Promise<WorkflowResult> => {
    if (deps.publish === false) {
      return finish(defaultOutcome);
    }

    if (!siteGenerated) {
      if (!(await hasPendingPublish(deps.stateStore, paths.site))) {
        return finish(defaultOutcome);
      }
      onEvent?.({ type: "pending-publish-detected", sitePath: paths.site });
    }

    enter("await-publish");
    if (!(await confirm("Push to GitHub Pages?"))) {
      return finish(defaultOutcome);
    }

    enter("publishing");
    try {
      const published = await publishSite({
        vcs: deps.vcs,
        stateStore: deps.stateStore,
        sitePath: paths.site,
        settings: config.publish,
        confirmSwitch: (current, target) =>
          confirm(`You're on '${current}' but GitHub Pages might need '${target}'. Switch to '${target}'?`),
        onEvent: (event) => onEvent?.({ type: "publish", event }),
      });
      onEvent?.({ type: "published", result: published });
      return finish(defaultOutcome, { published });
    } catch (error) {
      if (error instanceof PublishConfigError) {
        onEvent?.({ type: "publish-failed", error });
        return finish("publish-misconfigured", { error });
      }
      if (error instanceof PublishError) {
        onEvent?.({ type: "publish-failed", error });
        return finish("publish-failed", { error });
      }
      throw error;
    }
  };

  enter("idle");

  // Source directory
  const rawSource = deps.sourceDir ?? (await prompter.input("Enter path to upload:"));
  const sourceDir = resolve(config.workDir, rawSource.trim());
  if (!rawSource.trim() || !isDirectory(sourceDir)) {
    onEvent?.({ type: "invalid-source", sourceDir: rawSource.trim() });
    return finish("invalid-source");
  }

  // Scan
  enter("scanning");
  scan = await scanDirectory({
    sourceDir,
    maxFileSizeMB: config.upload.maxFileSizeMB,
    knownHashes: readLedgerHashes(paths.ledger),
    hashAlgorithm: config.upload.hashAlgorithm,
    exclude: config.upload.exclude,
    onSkip: (file) => onEvent?.({ type: "scan-skip", file }),
  });
  onEvent?.({
    type: "scan-complete",
    result: scan,
    estimatedSeconds: estimateUploadSeconds(scan.totalBytes, config.upload.uploadSpeedMBps),
  });

  if (scan.worklist.length === 0) {
    onEvent?.({ type: "nothing-to-upload" });
    return offerPublish("nothing-to-upload");
  }

  // Confirmation
  enter("await-confirm");
  if (!(await confirm("Start upload?"))) {
    onEvent?.({ type: "cancelled" });
    return finish("cancelled");
  }

  enter("await-uploader");
  const uploader = (deps.uploader ?? (await prompter.input("Enter uploader name:"))).trim();
  const uploaderProblem = validateUploaderName(uploader);
  if (uploaderProblem) {
    onEvent?.({ type: "invalid-uploader", message: uploaderProblem });
    return finish("invalid-uploader");
  }

  // Upload
  enter("uploading");
  const source = sourceName(sourceDir);
  itemId = createItemId(uploader, sourceDir, now());
  onEvent?.({ type: "upload-started", itemId, total: scan.worklist.length });

  upload = await uploadWorklist({
    client: deps.createArchiveClient(),
    worklist: scan.worklist,
    uploader,
    itemId,
    metadata: buildUploadMetadata(uploader, source, config.archive),
    settings: config.upload,
    ledgerPath: paths.ledger,
    failureLogPath: paths.failureLog,
    onEvent: (event) => onEvent?.({ type: "upload", event }),
    now,
  });
  onEvent?.({ type: "upload-complete", stats: upload, failureLogPath: paths.failureLog });

  // Render
  enter("rendering");
  siteGenerated = await generateSite({
    ledgerPath: paths.ledger,
    sitePath: paths.site,
    downloadBaseUrl: config.archive.downloadBaseUrl,
    stateStore: deps.stateStore,
  });
  onEvent?.(
    siteGenerated
      ? { type: "site-generated", sitePath: paths.site }
      : { type: "site-skipped" }
  );

  return offerPublish("completed");
}
