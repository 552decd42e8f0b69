/**
 * Publisher module
 *
 * Site rendering, publish state and GitHub Pages push
 */

export { buildSiteTree, downloadUrl } from "./site-tree.js";
export { renderSiteHtml, renderFolder, escapeHtml } from "./html-renderer.js";
export {
  FilePublishStateStore,
  MemoryPublishStateStore,
} from "./publish-state.js";
export { parseGitHubRemote, GITHUB_REMOTE_EXAMPLES } from "./remote-url.js";
export { SimpleGitClient } from "./git-client.js";
export {
  generateSite,
  hasPendingPublish,
  resolvePublishBranch,
  publishSite,
} from "./publisher.js";
export type { GenerateSiteOptions, PublishSiteOptions } from "./publisher.js";

export type {
  PublishState,
  PublishStateStore,
  SiteFolder,
  VcsClient,
  GitHubRemote,
  PublishResult,
  PublishEvent,
} from "../../types/publish.js";
