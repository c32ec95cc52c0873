/**
 * The three things the publisher needs from the version-control tool. Each
 * call either completes or throws; nothing is retried.
 */
export interface VcsDriver {
  /** Node of the most recent revision at the time of the call. */
  tip(repoDir: string): Promise<string>;
  /** Writes a bundle built with `args` to `outPath`. */
  createBundle(repoDir: string, args: readonly string[], outPath: string): Promise<void>;
  /** Pushes repository state, including the clonebundles manifest, to mirrors. */
  replicateSync(repoDir: string): Promise<void>;
}
