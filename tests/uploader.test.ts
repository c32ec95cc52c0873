import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { UploadExhaustedError } from "../src/core/errors.js";
import type { GeneratedBundle } from "../src/bundle/generator.js";
import { publishObject, uploadBundles } from "../src/storage/uploader.js";
import { MemoryObjectStore, networkError } from "./support/fakes.js";

const s3 = { provider: "s3", host: "s3-us-west-2.amazonaws.com", bucket: "test-usw2", region: "us-west-2" } as const;
const gcs = { provider: "gcs", endpoint: "https://storage.googleapis.com", bucket: "test-gcp", location: "us-central1" } as const;

describe("publishObject", () => {
  let tmpDir = "";
  let localPath = "";
  const messages: string[] = [];
  const sleeps: number[] = [];
  const deps = {
    retry: { attempts: 3, delayMs: 15_000 },
    log: (m: string) => void messages.push(m),
    sleep: async (ms: number) => void sleeps.push(ms)
  };

  beforeEach(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "clonebundles-upload-"));
    localPath = path.join(tmpDir, "abc123.gzip-v2.hg");
    await writeFile(localPath, "bundle bytes\n", "utf8");
    messages.length = 0;
    sleeps.length = 0;
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("uploads an object that is not present", async () => {
    const store = new MemoryObjectStore(s3);
    const receipt = await publishObject(store, localPath, "repo/abc123.gzip-v2.hg", deps);

    expect(receipt).toEqual({ backend: "s3://test-usw2", key: "repo/abc123.gzip-v2.hg", action: "uploaded", attempts: 1 });
    expect(store.ops).toEqual(["exists repo/abc123.gzip-v2.hg", "upload repo/abc123.gzip-v2.hg"]);
    expect(store.objects.get("repo/abc123.gzip-v2.hg")?.body.toString("utf8")).toBe("bundle bytes\n");
    expect(messages).toContain(`uploading s3://test-usw2:repo/abc123.gzip-v2.hg from ${localPath}`);
  });

  it("only refreshes expiration when the object already exists", async () => {
    const store = new MemoryObjectStore(gcs);
    store.objects.set("repo/abc123.gzip-v2.hg", { body: Buffer.from("older upload") });

    const receipt = await publishObject(store, localPath, "repo/abc123.gzip-v2.hg", deps);

    expect(receipt.action).toBe("refreshed");
    expect(store.ops).toEqual(["exists repo/abc123.gzip-v2.hg", "refresh repo/abc123.gzip-v2.hg"]);
    expect(store.objects.get("repo/abc123.gzip-v2.hg")?.body.toString("utf8")).toBe("older upload");
    expect(messages).toContain("resetting expiration time for gs://test-gcp:repo/abc123.gzip-v2.hg");
  });

  it("succeeds after two transient failures with three attempts recorded", async () => {
    const store = new MemoryObjectStore(s3);
    store.failNext(networkError(), networkError("ETIMEDOUT"));

    const receipt = await publishObject(store, localPath, "repo/k.hg", deps);

    expect(receipt.attempts).toBe(3);
    expect(receipt.action).toBe("uploaded");
    expect(sleeps).toEqual([15_000, 15_000]);
  });

  it("gives up after three transient failures", async () => {
    const store = new MemoryObjectStore(s3);
    store.failNext(networkError(), networkError(), networkError());

    const err = await publishObject(store, localPath, "repo/k.hg", deps).catch((e: unknown) => e);

    if (!(err instanceof UploadExhaustedError)) throw new Error("expected UploadExhaustedError");
    const exhausted = err;
    expect(exhausted.attempts).toBe(3);
    expect(exhausted.backend).toBe("s3://test-usw2");
    expect(exhausted.key).toBe("repo/k.hg");
    expect(exhausted.message).toBe("upload of s3://test-usw2:repo/k.hg not successful after 3 attempts, giving up");
    expect(store.ops.filter((op) => op.startsWith("upload"))).toEqual([]);
  });

  it("propagates non-network failures without retrying", async () => {
    const store = new MemoryObjectStore(s3);
    const denied = Object.assign(new Error("Access Denied"), { name: "AccessDenied" });
    store.failNext(denied);

    await expect(publishObject(store, localPath, "repo/k.hg", deps)).rejects.toBe(denied);
    expect(store.ops).toEqual(["exists repo/k.hg"]);
    expect(sleeps).toEqual([]);
  });
});

describe("uploadBundles", () => {
  it("fans out every bundle to every backend in configured order", async () => {
    const tmpDir = await mkdtemp(path.join(os.tmpdir(), "clonebundles-fanout-"));
    try {
      const bundles: GeneratedBundle[] = [];
      for (const type of ["gzip-v2", "packed1"] as const) {
        const localPath = path.join(tmpDir, `abc.${type}.hg`);
        await writeFile(localPath, type, "utf8");
        bundles.push({ type, localPath, remoteKey: `repo/abc.${type}.hg`, sizeBytes: type.length });
      }
      const stores = [new MemoryObjectStore(s3), new MemoryObjectStore(gcs)];

      const receipts = await uploadBundles(stores, bundles, {
        retry: { attempts: 3, delayMs: 0 },
        concurrency: 4,
        log: () => {}
      });

      expect(receipts.map((r) => `${r.backend} ${r.key} ${r.action}`)).toEqual([
        "s3://test-usw2 repo/abc.gzip-v2.hg uploaded",
        "s3://test-usw2 repo/abc.packed1.hg uploaded",
        "gs://test-gcp repo/abc.gzip-v2.hg uploaded",
        "gs://test-gcp repo/abc.packed1.hg uploaded"
      ]);
      for (const store of stores) {
        expect(Array.from(store.objects.keys()).sort()).toEqual(["repo/abc.gzip-v2.hg", "repo/abc.packed1.hg"]);
      }
    } finally {
      await rm(tmpDir, { recursive: true, force: true });
    }
  });
});
