/**
 * GitHub remote URL parsing
 */

import type { GitHubRemote } from "../../types/publish.js";

const GITHUB_REMOTE_PATTERN =
  /^(?:https:\/\/(?:[^@/]+@)?github\.com\/|ssh:\/\/git@github\.com\/|git@github\.com:)([^/]+)\/([^/]+?)(?:\.git)?\/?$/;

/**
 * Owner and repository of an HTTPS or SSH GitHub remote; null for anything else
 */
export function parseGitHubRemote(url: string): GitHubRemote | null {
  const match = GITHUB_REMOTE_PATTERN.exec(url.trim());
  if (!match) {
    return null;
  }

  const [, owner, repo] = match;
  if (!owner || !repo) {
    return null;
  }

  return {
    owner,
    repo,
    pagesUrl: `https://${owner}.github.io/${repo}/`,
  };
}

/**
 * Accepted remote formats, for error messages
 */
export const GITHUB_REMOTE_EXAMPLES = [
  "HTTPS: https://github.com/username/repo-name",
  "SSH: git@github.com:username/repo-name.git",
];
