/**
 * Configuration merger
 */

import type { UserConfig } from "../../types/config.js";

/**
 * Merge config layers section by section, later layers winning.
 * Layers must not carry keys set to undefined.
 */
export function mergeConfigs(...layers: UserConfig[]): UserConfig {
  return layers.reduce<UserConfig>(
    (merged, layer) => ({
      workDir: layer.workDir ?? merged.workDir,
      credentials: { ...merged.credentials, ...layer.credentials },
      archive: { ...merged.archive, ...layer.archive },
      upload: { ...merged.upload, ...layer.upload },
      files: { ...merged.files, ...layer.files },
      publish: { ...merged.publish, ...layer.publish },
    }),
    {}
  );
}
