import path from "path";
import type { BundleType } from "../core/bundleSpec.js";

export interface BundlePaths {
  localPath: string;
  remoteKey: string;
}

/**
 * File names start with the revision tag so that files from older revisions
 * are found with a prefix test. Remote keys are grouped by repository name so
 * storage use per repository is easy to see.
 */
export function bundlePaths(bundleDir: string, repoName: string, tag: string, type: BundleType): BundlePaths {
  const basename = `${tag}.${type}.hg`;
  return {
    localPath: path.join(bundleDir, basename),
    remoteKey: path.posix.join(repoName.split(path.sep).join("/"), basename)
  };
}
