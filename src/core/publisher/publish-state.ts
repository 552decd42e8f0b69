/**
 * Publish state storage
 *
 * The file store keeps the state as a sentinel file: present means a
 * rendered site is waiting to be pushed. Its content is the time it was
 * set and is informational only.
 */

import fs from "node:fs";
import path from "node:path";
import type { PublishState, PublishStateStore } from "../../types/publish.js";

/**
 * Sentinel-file backed store
 */
export class FilePublishStateStore implements PublishStateStore {
  constructor(
    readonly filePath: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async read(): Promise<PublishState> {
    return fs.existsSync(this.filePath) ? "pending-publish" : "clean";
  }

  async write(state: PublishState): Promise<void> {
    if (state === "pending-publish") {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, this.now().toISOString(), "utf-8");
      return;
    }

    fs.rmSync(this.filePath, { force: true });
  }
}

/**
 * In-memory store
 */
export class MemoryPublishStateStore implements PublishStateStore {
  /** Every state written, in order */
  readonly history: PublishState[] = [];

  constructor(private state: PublishState = "clean") {}

  async read(): Promise<PublishState> {
    return this.state;
  }

  async write(state: PublishState): Promise<void> {
    this.state = state;
    this.history.push(state);
  }
}
