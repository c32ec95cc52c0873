import type { RunId } from "../core/ids.js";
import type { FleetResults } from "../core/results.js";
import { publishFleetSummary, touchLastRun, type FleetPublishResult } from "../publish/fleetPublisher.js";
import { runBundleGeneration, type OrchestratorDeps } from "./orchestrator.js";
import type { RepositoryTask } from "./repositoryTask.js";

export interface PipelineOptions {
  runId: RunId;
  upload: boolean;
  now?: () => Date;
}

export interface PipelineResult {
  results: FleetResults;
  summary: FleetPublishResult;
  lastRunPath: string;
}

/**
 * Full run: every repository, then the fleet index and JSON summary, then the
 * `lastrun` marker. Nothing fleet-wide is written when any repository fails.
 */
export async function runPipeline(
  tasks: readonly RepositoryTask[],
  opts: PipelineOptions,
  deps: OrchestratorDeps
): Promise<PipelineResult> {
  const now = opts.now ?? (() => new Date());
  const { config } = deps;

  deps.log(`${opts.runId}: ${tasks.length} repositories, upload=${opts.upload}, concurrency=${config.concurrency}`);
  const results = await runBundleGeneration(tasks, deps);

  const summary = await publishFleetSummary(
    results,
    {
      bundleRoot: config.bundleRoot,
      upload: opts.upload,
      cacheMaxAgeSeconds: config.indexCacheMaxAgeSeconds,
      generatedAt: now(),
      runId: opts.runId
    },
    { stores: deps.stores, concurrency: config.concurrency, retry: config.uploadRetry, log: deps.log, sleep: deps.sleep }
  );

  const lastRunPath = await touchLastRun(config.bundleRoot, now());
  deps.log(`${opts.runId}: completed, marker at ${lastRunPath}`);
  return { results, summary, lastRunPath };
}
