import { describe, it, expect } from "vitest";
import type { StorageBackendConfig } from "../src/config/config.js";
import { DEFAULT_BUNDLE_SPECS, type BundleType } from "../src/core/bundleSpec.js";
import type { BundleEntry } from "../src/core/results.js";
import { buildClonebundlesManifest, renderClonebundlesManifest } from "../src/manifest/clonebundles.js";

// A GCS bucket listed between S3 buckets still sorts after them.
const backends: StorageBackendConfig[] = [
  { provider: "s3", host: "s3-us-west-2.amazonaws.com", bucket: "b-usw2", region: "us-west-2" },
  { provider: "gcs", endpoint: "https://storage.googleapis.com", bucket: "b-gcp", location: "us-central1" },
  { provider: "s3", host: "s3-eu-central-1.amazonaws.com", bucket: "b-euc1", region: "eu-central-1" }
];

const opts = {
  specs: DEFAULT_BUNDLE_SPECS,
  backends,
  cdnBaseUrl: "https://cdn.test"
};

function result(types: BundleType[]): Map<BundleType, BundleEntry> {
  return new Map(types.map((t): [BundleType, BundleEntry] => [t, { remoteKey: `mozilla-central/abc123.${t}.hg`, sizeBytes: 100 }]));
}

describe("buildClonebundlesManifest", () => {
  it("orders by priority, CDN first, then S3, then GCS", () => {
    const lines = buildClonebundlesManifest(result(["gzip-v2", "packed1", "zstd-max"]), opts);
    const packed = "BUNDLESPEC=none-packed1;requirements%3Dgeneraldelta%2Crevlogv1";

    expect(lines).toEqual([
      "https://cdn.test/mozilla-central/abc123.zstd-max.hg BUNDLESPEC=zstd-v2 REQUIRESNI=true cdn=true",
      "https://s3-us-west-2.amazonaws.com/b-usw2/mozilla-central/abc123.zstd-max.hg BUNDLESPEC=zstd-v2 ec2region=us-west-2",
      "https://s3-eu-central-1.amazonaws.com/b-euc1/mozilla-central/abc123.zstd-max.hg BUNDLESPEC=zstd-v2 ec2region=eu-central-1",
      "https://storage.googleapis.com/b-gcp/mozilla-central/abc123.zstd-max.hg BUNDLESPEC=zstd-v2 gceregion=us-central1",
      "https://cdn.test/mozilla-central/abc123.gzip-v2.hg BUNDLESPEC=gzip-v2 REQUIRESNI=true cdn=true",
      "https://s3-us-west-2.amazonaws.com/b-usw2/mozilla-central/abc123.gzip-v2.hg BUNDLESPEC=gzip-v2 ec2region=us-west-2",
      "https://s3-eu-central-1.amazonaws.com/b-euc1/mozilla-central/abc123.gzip-v2.hg BUNDLESPEC=gzip-v2 ec2region=eu-central-1",
      "https://storage.googleapis.com/b-gcp/mozilla-central/abc123.gzip-v2.hg BUNDLESPEC=gzip-v2 gceregion=us-central1",
      `https://cdn.test/mozilla-central/abc123.packed1.hg ${packed} REQUIRESNI=true cdn=true`,
      `https://s3-us-west-2.amazonaws.com/b-usw2/mozilla-central/abc123.packed1.hg ${packed} ec2region=us-west-2`,
      `https://s3-eu-central-1.amazonaws.com/b-euc1/mozilla-central/abc123.packed1.hg ${packed} ec2region=eu-central-1`,
      `https://storage.googleapis.com/b-gcp/mozilla-central/abc123.packed1.hg ${packed} gceregion=us-central1`
    ]);
  });

  it("lists only bundle types that were generated", () => {
    const lines = buildClonebundlesManifest(result(["zstd"]), opts);
    expect(lines).toHaveLength(4);
    expect(lines.every((l) => l.includes("abc123.zstd.hg BUNDLESPEC=zstd-v2"))).toBe(true);
    expect(buildClonebundlesManifest(new Map(), opts)).toEqual([]);
  });

  it("uses each GCS backend's own endpoint", () => {
    const lines = buildClonebundlesManifest(result(["gzip-v2"]), {
      ...opts,
      backends: [
        { provider: "gcs", endpoint: "https://storage.googleapis.com", bucket: "b-us", location: "us-central1" },
        { provider: "gcs", endpoint: "https://gcs.mirror.test", bucket: "b-eu", location: "europe-west1" }
      ]
    });
    expect(lines.slice(1)).toEqual([
      "https://storage.googleapis.com/b-us/mozilla-central/abc123.gzip-v2.hg BUNDLESPEC=gzip-v2 gceregion=us-central1",
      "https://gcs.mirror.test/b-eu/mozilla-central/abc123.gzip-v2.hg BUNDLESPEC=gzip-v2 gceregion=europe-west1"
    ]);
  });

  it("renders newline-separated lines without a trailing newline", () => {
    expect(renderClonebundlesManifest(["a x", "b y"])).toBe("a x\nb y");
  });
});
