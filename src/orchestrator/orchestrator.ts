import { promises as fs } from "fs";
import path from "path";
import type { RunConfig } from "../config/config.js";
import type { BundleSpec, BundleType } from "../core/bundleSpec.js";
import { RepositoryTaskError } from "../core/errors.js";
import type { BundleEntry, FleetResults, RepositoryResult } from "../core/results.js";
import { generateBundles } from "../bundle/generator.js";
import { buildClonebundlesManifest } from "../manifest/clonebundles.js";
import { copyMirrorManifest, writeClonebundlesManifest } from "../publish/clonebundlesFile.js";
import type { ObjectStore } from "../storage/objectStore.js";
import { uploadBundles } from "../storage/uploader.js";
import type { VcsDriver } from "../vcs/driver.js";
import type { RepositoryTask } from "./repositoryTask.js";

export interface OrchestratorDeps {
  config: RunConfig;
  specs: readonly BundleSpec[];
  driver: VcsDriver;
  stores: readonly ObjectStore[];
  log: (message: string) => void;
  sleep?: (ms: number) => Promise<void>;
}

async function processMirror(task: RepositoryTask, copyFrom: string, deps: OrchestratorDeps): Promise<RepositoryResult> {
  const sourceRepoDir = path.join(deps.config.reposRoot, copyFrom);
  const destRepoDir = path.join(deps.config.reposRoot, task.repoPath);

  // The backup is taken before the copy is attempted, so a failed copy leaves
  // the previous backup overwritten and the stale manifest in place.
  await copyMirrorManifest(sourceRepoDir, destRepoDir, deps.log);
  await deps.driver.replicateSync(destRepoDir);
  return new Map();
}

async function processPrimary(task: RepositoryTask, deps: OrchestratorDeps): Promise<RepositoryResult> {
  const { config } = deps;
  const repoDir = path.join(config.reposRoot, task.repoPath);

  const { bundles } = await generateBundles(
    { repoPath: task.repoPath, repoDir, bundleRoot: config.bundleRoot, useMaxCompression: task.useMaxCompression },
    { driver: deps.driver, specs: deps.specs, concurrency: config.concurrency, log: deps.log }
  );

  // Each region gets its own upload rather than relying on bucket
  // replication, so a bundle is never advertised before it is everywhere.
  if (task.upload) {
    await uploadBundles(deps.stores, bundles, {
      retry: config.uploadRetry,
      concurrency: config.concurrency,
      log: deps.log,
      sleep: deps.sleep
    });
  }

  const result = new Map<BundleType, BundleEntry>();
  for (const b of bundles) result.set(b.type, { remoteKey: b.remoteKey, sizeBytes: b.sizeBytes });

  const lines = buildClonebundlesManifest(result, {
    specs: deps.specs,
    backends: config.backends,
    cdnBaseUrl: config.cdnBaseUrl
  });
  const manifestPath = await writeClonebundlesManifest(repoDir, lines, deps.log);
  deps.log(`wrote ${lines.length} entries to ${manifestPath}`);

  await deps.driver.replicateSync(repoDir);
  return result;
}

export async function processRepository(task: RepositoryTask, deps: OrchestratorDeps): Promise<RepositoryResult> {
  deps.log(`processing ${task.repoPath}`);
  if (task.copyFrom) return processMirror(task, task.copyFrom, deps);
  return processPrimary(task, deps);
}

async function isRepository(repoDir: string): Promise<boolean> {
  try {
    return (await fs.stat(path.join(repoDir, ".hg"))).isDirectory();
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw err;
  }
}

/** Fails before any work starts if a task names a repository that is not there. */
export async function assertRepositoriesExist(tasks: readonly RepositoryTask[], reposRoot: string): Promise<void> {
  for (const task of tasks) {
    for (const repoPath of task.copyFrom ? [task.repoPath, task.copyFrom] : [task.repoPath]) {
      const repoDir = path.join(reposRoot, repoPath);
      if (!(await isRepository(repoDir))) throw new RepositoryTaskError(`repository not found: ${repoDir}`);
    }
  }
}

/**
 * Processes repositories one after another. The first failure aborts the
 * run; manifests written for repositories already processed stay in place.
 */
export async function runBundleGeneration(tasks: readonly RepositoryTask[], deps: OrchestratorDeps): Promise<FleetResults> {
  await assertRepositoriesExist(tasks, deps.config.reposRoot);
  const results = new Map<string, RepositoryResult>();
  for (const task of tasks) {
    results.set(task.repoPath, await processRepository(task, deps));
  }
  return results;
}
