import type { BundleType } from "./bundleSpec.js";

export interface BundleEntry {
  remoteKey: string;
  sizeBytes: number;
}

/** Empty for a mirror repository, which generates nothing of its own. */
export type RepositoryResult = ReadonlyMap<BundleType, BundleEntry>;

/** Keyed by repository path, in processing order. */
export type FleetResults = ReadonlyMap<string, RepositoryResult>;
