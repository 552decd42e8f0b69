/**
 * Site generation and publishing
 */

import fs from "node:fs";
import path from "node:path";
import type { PublishConfig } from "../../types/config.js";
import type {
  PublishEvent,
  PublishResult,
  PublishStateStore,
  VcsClient,
} from "../../types/publish.js";
import { PublishConfigError, PublishError, errorMessage } from "../errors.js";
import { readLedger } from "../ledger/ledger.js";
import { renderSiteHtml } from "./html-renderer.js";
import { GITHUB_REMOTE_EXAMPLES, parseGitHubRemote } from "./remote-url.js";
import { buildSiteTree } from "./site-tree.js";

/**
 * Site generation options
 */
export interface GenerateSiteOptions {
  ledgerPath: string;
  sitePath: string;
  downloadBaseUrl: string;
  stateStore: PublishStateStore;
}

/**
 * Regenerate the site document from the whole ledger.
 *
 * Returns false without touching anything when the ledger has no entries,
 * so an existing page is never replaced by an empty one. On success the
 * publish state becomes `pending-publish`.
 */
export async function generateSite(options: GenerateSiteOptions): Promise<boolean> {
  const { ledgerPath, sitePath, downloadBaseUrl, stateStore } = options;

  const entries = readLedger(ledgerPath);
  if (entries.length === 0) {
    return false;
  }

  const html = renderSiteHtml(buildSiteTree(entries, downloadBaseUrl));
  fs.mkdirSync(path.dirname(sitePath), { recursive: true });
  fs.writeFileSync(sitePath, html, "utf-8");

  await stateStore.write("pending-publish");
  return true;
}

/**
 * Whether a previous run left a rendered site unpublished
 */
export async function hasPendingPublish(
  stateStore: PublishStateStore,
  sitePath: string
): Promise<boolean> {
  return (await stateStore.read()) === "pending-publish" && fs.existsSync(sitePath);
}

/**
 * Publish options
 */
export interface PublishSiteOptions {
  vcs: VcsClient;
  stateStore: PublishStateStore;
  sitePath: string;
  settings: PublishConfig;

  /** Asked when the current branch is not the publish branch */
  confirmSwitch: (current: string, target: string) => Promise<boolean>;

  onEvent?: (event: PublishEvent) => void;
}

/**
 * Branch the site should be pushed to: the pages branch when it exists,
 * else the remote's default branch, else the configured fallback
 */
export async function resolvePublishBranch(
  vcs: VcsClient,
  settings: Pick<PublishConfig, "remote" | "pagesBranch" | "fallbackBranch">
): Promise<string> {
  const branches = await vcs.listBranches();
  if (branches.includes(settings.pagesBranch)) {
    return settings.pagesBranch;
  }

  return (await vcs.getDefaultBranch(settings.remote)) ?? settings.fallbackBranch;
}

/**
 * Commit and push the site document.
 *
 * A missing or non-GitHub remote raises PublishConfigError and leaves the
 * state alone. Any failure after that marks the state `pending-publish`
 * and raises PublishError. Success marks it `clean`.
 */
export async function publishSite(options: PublishSiteOptions): Promise<PublishResult> {
  const { vcs, stateStore, sitePath, settings, confirmSwitch, onEvent } = options;

  const remoteUrl = await vcs.getRemoteUrl(settings.remote);
  if (!remoteUrl) {
    throw new PublishConfigError(`No Git remote named '${settings.remote}' found`, [
      "git init",
      `git remote add ${settings.remote} https://github.com/<username>/<repo>.git`,
    ]);
  }

  const remote = parseGitHubRemote(remoteUrl);
  if (!remote) {
    throw new PublishConfigError(
      `Could not parse GitHub URL: ${remoteUrl}`,
      GITHUB_REMOTE_EXAMPLES
    );
  }
  onEvent?.({ type: "remote-resolved", remote });

  try {
    const branch = await resolvePublishBranch(vcs, settings);
    const current = await vcs.getCurrentBranch();
    onEvent?.({ type: "branch-selected", branch, current });

    if (current !== branch && (await confirmSwitch(current, branch))) {
      await vcs.checkout(branch);
      onEvent?.({ type: "branch-switched", branch });
    }

    onEvent?.({ type: "pushing", branch });
    await vcs.commitAndPush(settings.remote, branch, [sitePath], settings.commitMessage);

    await stateStore.write("clean");
    return { ...remote, branch };
  } catch (error) {
    await stateStore.write("pending-publish");
    throw new PublishError(`Publishing failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
