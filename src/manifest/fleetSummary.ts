import type { FleetResults } from "../core/results.js";

export interface FleetBundleSummary {
  path: string;
  size: number;
}

export type FleetSummary = Record<string, Record<string, FleetBundleSummary>>;

/** Repositories and bundle types are inserted in sorted order. */
export function buildFleetSummary(results: FleetResults): FleetSummary {
  const out: FleetSummary = {};
  for (const repo of Array.from(results.keys()).sort()) {
    const bundles = results.get(repo);
    if (!bundles || bundles.size === 0) continue;
    const entry: Record<string, FleetBundleSummary> = {};
    for (const type of Array.from(bundles.keys()).sort()) {
      const b = bundles.get(type);
      if (b) entry[type] = { path: b.remoteKey, size: b.sizeBytes };
    }
    out[repo] = entry;
  }
  return out;
}

export function renderFleetSummary(summary: FleetSummary): string {
  return JSON.stringify(summary, null, 4);
}
