import type { GcsBackendConfig, S3BackendConfig, StorageBackendConfig } from "../config/config.js";
import { byPriority, type BundleSpec } from "../core/bundleSpec.js";
import type { RepositoryResult } from "../core/results.js";

export interface ClonebundlesManifestOptions {
  specs: readonly BundleSpec[];
  backends: readonly StorageBackendConfig[];
  cdnBaseUrl: string;
}

/**
 * Lines of `.hg/clonebundles.manifest`. Clients take the first line they can
 * use, so order matters: bundle types by priority, and within a type the CDN
 * first, then S3 buckets, then GCS buckets.
 */
export function buildClonebundlesManifest(result: RepositoryResult, opts: ClonebundlesManifestOptions): string[] {
  const s3 = opts.backends.filter((b): b is S3BackendConfig => b.provider === "s3");
  const gcs = opts.backends.filter((b): b is GcsBackendConfig => b.provider === "gcs");

  const lines: string[] = [];
  for (const spec of byPriority(opts.specs)) {
    const entry = result.get(spec.type);
    if (!entry) continue;

    const key = entry.remoteKey;
    const params = `BUNDLESPEC=${spec.bundlespec}`;
    lines.push(`${opts.cdnBaseUrl}/${key} ${params} REQUIRESNI=true cdn=true`);
    for (const b of s3) {
      lines.push(`https://${b.host}/${b.bucket}/${key} ${params} ec2region=${b.region}`);
    }
    for (const b of gcs) {
      lines.push(`${b.endpoint}/${b.bucket}/${key} ${params} gceregion=${b.location}`);
    }
  }
  return lines;
}

export function renderClonebundlesManifest(lines: readonly string[]): string {
  return lines.join("\n");
}
