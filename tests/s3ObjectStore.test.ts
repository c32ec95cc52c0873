import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { ReadStream } from "fs";
import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { withFileStream } from "../src/storage/s3ObjectStore.js";
import { networkError } from "./support/fakes.js";

describe("withFileStream", () => {
  let tmpDir = "";
  let localPath = "";

  beforeEach(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "clonebundles-s3-"));
    localPath = path.join(tmpDir, "abc123.zstd.hg");
    await writeFile(localPath, "bundle bytes\n", "utf8");
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("closes the file when the upload fails", async () => {
    const seen: ReadStream[] = [];

    await expect(
      withFileStream(localPath, async (body) => {
        seen.push(body);
        throw networkError();
      })
    ).rejects.toThrow("socket failure (ECONNRESET)");

    expect(seen[0]?.destroyed).toBe(true);
  });

  it("closes the file after a successful upload and passes the result through", async () => {
    const seen: ReadStream[] = [];

    const result = await withFileStream(localPath, async (body) => {
      seen.push(body);
      return "uploaded";
    });

    expect(result).toBe("uploaded");
    expect(seen[0]?.destroyed).toBe(true);
  });
});
