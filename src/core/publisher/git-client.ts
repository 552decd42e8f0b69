/**
 * Git operations on simple-git
 */

import { simpleGit, type SimpleGit } from "simple-git";
import type { VcsClient } from "../../types/publish.js";

export class SimpleGitClient implements VcsClient {
  private readonly git: SimpleGit;

  constructor(baseDir: string) {
    this.git = simpleGit(baseDir);
  }

  async getRemoteUrl(remote: string): Promise<string | null> {
    try {
      const remotes = await this.git.getRemotes(true);
      const match = remotes.find((r) => r.name === remote);
      return match?.refs.push || match?.refs.fetch || null;
    } catch {
      // Not a repository, or git is not installed
      return null;
    }
  }

  async getCurrentBranch(): Promise<string> {
    const branches = await this.git.branchLocal();
    return branches.current;
  }

  async listBranches(): Promise<string[]> {
    const branches = await this.git.branchLocal();
    return branches.all;
  }

  async getDefaultBranch(remote: string): Promise<string | null> {
    try {
      const ref = await this.git.revparse(["--abbrev-ref", `${remote}/HEAD`]);
      const prefix = `${remote}/`;
      const branch = ref.trim();
      return branch.startsWith(prefix) ? branch.slice(prefix.length) : null;
    } catch {
      // No remote HEAD recorded (e.g. repository created with `git init`)
      return null;
    }
  }

  async checkout(branch: string): Promise<void> {
    await this.git.checkout(branch);
  }

  async commitAndPush(
    remote: string,
    branch: string,
    paths: string[],
    message: string
  ): Promise<void> {
    await this.git.add(paths);

    const status = await this.git.status();
    if (status.staged.length > 0) {
      await this.git.commit(message);
    }

    await this.git.push(remote, branch);
  }
}
