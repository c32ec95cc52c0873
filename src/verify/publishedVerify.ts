import { promises as fs } from "fs";
import path from "path";
import * as z from "zod/v4";
import { runBounded, type Task } from "../execution/pool.js";
import { BUNDLES_JSON } from "../publish/fleetPublisher.js";
import type { FleetSummary } from "../manifest/fleetSummary.js";
import type { ObjectStore } from "../storage/objectStore.js";

const zFleetSummary = z.record(
  z.string(),
  z.record(z.string(), z.object({ path: z.string().min(1), size: z.number().int().min(0) }))
);

export interface VerifyProblem {
  backend: string;
  key: string;
  problem: "missing" | "size_mismatch";
  expectedSize: number;
  actualSize: number | null;
}

export function parseFleetSummary(json: string): FleetSummary {
  return zFleetSummary.parse(JSON.parse(json));
}

export async function readFleetSummary(bundleRoot: string): Promise<FleetSummary> {
  return parseFleetSummary(await fs.readFile(path.join(bundleRoot, BUNDLES_JSON), "utf8"));
}

async function verifyStore(store: ObjectStore, summary: FleetSummary): Promise<VerifyProblem[]> {
  const problems: VerifyProblem[] = [];
  for (const repo of Object.keys(summary).sort()) {
    const bundles = summary[repo] ?? {};
    const listed = new Map((await store.list(`${repo}/`)).map((o): [string, number] => [o.key, o.sizeBytes]));
    for (const type of Object.keys(bundles).sort()) {
      const entry = bundles[type];
      if (!entry) continue;
      const actual = listed.get(entry.path);
      if (actual === undefined) {
        problems.push({ backend: store.describe(), key: entry.path, problem: "missing", expectedSize: entry.size, actualSize: null });
      } else if (actual !== entry.size) {
        problems.push({
          backend: store.describe(),
          key: entry.path,
          problem: "size_mismatch",
          expectedSize: entry.size,
          actualSize: actual
        });
      }
    }
  }
  return problems;
}

/** Checks that every bundle in the summary is present, at its size, on every backend. */
export async function verifyPublished(
  summary: FleetSummary,
  stores: readonly ObjectStore[],
  concurrency: number
): Promise<VerifyProblem[]> {
  const tasks: Task<VerifyProblem[]>[] = stores.map((store) => () => verifyStore(store, summary));
  return (await runBounded(tasks, concurrency)).flat();
}

export function formatProblem(p: VerifyProblem): string {
  if (p.problem === "missing") return `${p.backend}:${p.key} missing (expected ${p.expectedSize} bytes)`;
  return `${p.backend}:${p.key} size ${String(p.actualSize)} != ${p.expectedSize}`;
}
