import { promises as fs } from "fs";
import path from "path";
import { selectBundleSpecs, type BundleSpec, type BundleType } from "../core/bundleSpec.js";
import { runBounded, type Task } from "../execution/pool.js";
import type { VcsDriver } from "../vcs/driver.js";
import { assertGeneralDelta } from "../vcs/requirements.js";
import { bundlePaths } from "./paths.js";

export interface GeneratedBundle {
  readonly type: BundleType;
  readonly localPath: string;
  readonly remoteKey: string;
  readonly sizeBytes: number;
}

export interface GenerateBundlesOptions {
  repoPath: string;
  repoDir: string;
  bundleRoot: string;
  useMaxCompression: boolean;
}

export interface GenerateBundlesDeps {
  driver: VcsDriver;
  specs: readonly BundleSpec[];
  concurrency: number;
  log: (message: string) => void;
}

export interface GenerateBundlesResult {
  tip: string;
  bundleDir: string;
  bundles: GeneratedBundle[];
}

async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.stat(p);
    return true;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw err;
  }
}

/** Removes files left from revisions other than `tip`. Dotfiles are kept. */
export async function pruneStaleBundles(bundleDir: string, tip: string, log: (message: string) => void): Promise<string[]> {
  const removed: string[] = [];
  for (const name of (await fs.readdir(bundleDir)).sort()) {
    if (name.startsWith(".") || name.startsWith(tip)) continue;
    const full = path.join(bundleDir, name);
    log(`removing old bundle file: ${full}`);
    await fs.rm(full, { force: true });
    removed.push(full);
  }
  return removed;
}

async function generateOne(
  driver: VcsDriver,
  repoDir: string,
  spec: BundleSpec,
  localPath: string,
  log: (message: string) => void
): Promise<void> {
  // An aborted run can leave a partial file behind, so the final name only
  // ever appears through the rename.
  const tempPath = `${localPath}.tmp`;
  log(`generating ${spec.type} bundle: ${localPath}`);
  await driver.createBundle(repoDir, spec.generationArgs, tempPath);
  await fs.rename(tempPath, localPath);
}

/**
 * Produces every bundle variant relevant to the repository at its current
 * tip. Revisions landing between the tip query and bundling may end up in the
 * bundles; that is acceptable since bundles only seed clones.
 */
export async function generateBundles(opts: GenerateBundlesOptions, deps: GenerateBundlesDeps): Promise<GenerateBundlesResult> {
  await assertGeneralDelta(opts.repoDir);

  const tip = await deps.driver.tip(opts.repoDir);
  deps.log(`tip is ${tip}`);

  const bundleDir = path.join(opts.bundleRoot, opts.repoPath);
  await fs.mkdir(bundleDir, { recursive: true, mode: 0o755 });
  await pruneStaleBundles(bundleDir, tip, deps.log);

  const relevant: Array<{ spec: BundleSpec; localPath: string; remoteKey: string }> = [];
  const tasks: Task<void>[] = [];
  for (const spec of selectBundleSpecs(deps.specs, opts.useMaxCompression)) {
    const { localPath, remoteKey } = bundlePaths(bundleDir, opts.repoPath, tip, spec.type);
    relevant.push({ spec, localPath, remoteKey });

    if (await pathExists(localPath)) {
      deps.log(`bundle already exists, skipping: ${localPath}`);
      continue;
    }
    tasks.push(() => generateOne(deps.driver, opts.repoDir, spec, localPath, deps.log));
  }

  await runBounded(tasks, deps.concurrency);

  const bundles: GeneratedBundle[] = [];
  for (const r of relevant) {
    const st = await fs.stat(r.localPath);
    bundles.push({ type: r.spec.type, localPath: r.localPath, remoteKey: r.remoteKey, sizeBytes: st.size });
  }
  return { tip, bundleDir, bundles };
}
