/**
 * Gitignore utility
 * Keeps local bookkeeping files (publish sentinel, failure log) out of the
 * published repository
 */

import { existsSync, readFileSync, appendFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import chalk from "chalk";

const HEADER = "# archive-ledger local state";

/**
 * Spellings of an entry that already cover it
 */
function entryVariants(entry: string): string[] {
  return [entry, `/${entry}`];
}

/**
 * Entries not yet listed in .gitignore
 */
export function missingGitignoreEntries(gitignorePath: string, entries: string[]): string[] {
  if (!existsSync(gitignorePath)) {
    return entries;
  }

  const lines = new Set(
    readFileSync(gitignorePath, "utf-8")
      .split("\n")
      .map((line) => line.trim())
  );

  return entries.filter((entry) => !entryVariants(entry).some((v) => lines.has(v)));
}

/**
 * Ensure bookkeeping files are in .gitignore
 *
 * @param entries - Paths relative to `cwd`
 * @param cwd - Repository root
 * @param silent - Don't show success message
 * @returns Entries that were added
 */
export function ensureGitignoreEntries(
  entries: string[],
  cwd: string = process.cwd(),
  silent: boolean = false
): string[] {
  const gitignorePath = join(cwd, ".gitignore");

  // Skip if not a git repository
  if (!existsSync(join(cwd, ".git"))) {
    return [];
  }

  const missing = missingGitignoreEntries(gitignorePath, entries);
  if (missing.length === 0) {
    return [];
  }

  const block = `${HEADER}\n${missing.join("\n")}\n`;
  if (existsSync(gitignorePath)) {
    const content = readFileSync(gitignorePath, "utf-8");
    appendFileSync(gitignorePath, `${content.endsWith("\n") ? "" : "\n"}\n${block}`, "utf-8");
  } else {
    writeFileSync(gitignorePath, block, "utf-8");
  }

  if (!silent) {
    console.log(chalk.green(`✓ Added ${missing.join(", ")} to .gitignore`));
  }

  return missing;
}
