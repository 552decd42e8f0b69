/**
 * Publishing-related type definitions
 */

/**
 * Persisted publish state. `pending-publish` means the rendered site has
 * content that has not been confirmed pushed.
 */
export type PublishState = "clean" | "pending-publish";

/**
 * Storage for the publish state
 */
export interface PublishStateStore {
  read(): Promise<PublishState>;
  write(state: PublishState): Promise<void>;
}

/**
 * Uploader → folder/file tree. A string value is a download URL.
 */
export interface SiteFolder {
  [name: string]: SiteFolder | string;
}

/**
 * Version control operations used for publishing
 */
export interface VcsClient {
  /** URL of the named remote, or null when there is none */
  getRemoteUrl(remote: string): Promise<string | null>;
  getCurrentBranch(): Promise<string>;
  listBranches(): Promise<string[]>;

  /** Default branch of the remote, or null when it cannot be determined */
  getDefaultBranch(remote: string): Promise<string | null>;
  checkout(branch: string): Promise<void>;
  commitAndPush(
    remote: string,
    branch: string,
    paths: string[],
    message: string
  ): Promise<void>;
}

/**
 * Parsed GitHub remote
 */
export interface GitHubRemote {
  owner: string;
  repo: string;
  pagesUrl: string;
}

/**
 * Successful publish
 */
export interface PublishResult extends GitHubRemote {
  branch: string;
}

/**
 * Progress events emitted while publishing
 */
export type PublishEvent =
  | { type: "remote-resolved"; remote: GitHubRemote }
  | { type: "branch-selected"; branch: string; current: string }
  | { type: "branch-switched"; branch: string }
  | { type: "pushing"; branch: string };
