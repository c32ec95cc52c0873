import { promises as fs } from "fs";
import path from "path";
import type { FleetResults } from "../core/results.js";
import { buildFleetSummary, renderFleetSummary } from "../manifest/fleetSummary.js";
import { renderHtmlIndex } from "../manifest/htmlIndex.js";
import { runBounded, type Task } from "../execution/pool.js";
import type { ObjectStore } from "../storage/objectStore.js";
import { putContentWithRetry, type UploaderDeps } from "../storage/uploader.js";

export const INDEX_HTML = "index.html";
export const BUNDLES_JSON = "bundles.json";
export const LAST_RUN_FILE = "lastrun";

export interface FleetPublishOptions {
  bundleRoot: string;
  upload: boolean;
  cacheMaxAgeSeconds: number;
  generatedAt: Date;
  runId?: string;
}

export interface FleetPublishDeps extends UploaderDeps {
  stores: readonly ObjectStore[];
  concurrency: number;
}

export interface FleetPublishResult {
  indexPath: string;
  jsonPath: string;
  html: string;
  json: string;
}

export async function publishFleetSummary(
  results: FleetResults,
  opts: FleetPublishOptions,
  deps: FleetPublishDeps
): Promise<FleetPublishResult> {
  const html = renderHtmlIndex(results, { generatedAt: opts.generatedAt, runId: opts.runId, log: deps.log });
  const json = renderFleetSummary(buildFleetSummary(results));

  await fs.mkdir(opts.bundleRoot, { recursive: true });
  const indexPath = path.join(opts.bundleRoot, INDEX_HTML);
  const jsonPath = path.join(opts.bundleRoot, BUNDLES_JSON);
  await fs.writeFile(indexPath, html, "utf8");
  await fs.writeFile(jsonPath, json, "utf8");

  if (opts.upload) {
    // A short cache lifetime keeps the CDN copy of these documents current.
    const cacheControl = `max-age=${opts.cacheMaxAgeSeconds}`;
    const tasks: Task<void>[] = [];
    for (const store of deps.stores) {
      tasks.push(() => putContentWithRetry(store, INDEX_HTML, html, { contentType: "text/html", cacheControl }, deps));
      tasks.push(() =>
        putContentWithRetry(store, BUNDLES_JSON, json, { contentType: "application/json", cacheControl }, deps)
      );
    }
    await runBounded(tasks, deps.concurrency);
    deps.log(`uploaded ${INDEX_HTML} and ${BUNDLES_JSON} to ${deps.stores.length} backends`);
  }

  return { indexPath, jsonPath, html, json };
}

/** Monitoring alerts on the age of this file. */
export async function touchLastRun(bundleRoot: string, now: Date): Promise<string> {
  const p = path.join(bundleRoot, LAST_RUN_FILE);
  await fs.writeFile(p, `${now.toISOString()}\n`, "utf8");
  return p;
}
