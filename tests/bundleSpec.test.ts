import { describe, it, expect } from "vitest";
import { byPriority, DEFAULT_BUNDLE_SPECS, isBundleType, selectBundleSpecs } from "../src/core/bundleSpec.js";

describe("bundle specs", () => {
  it("generates zstd by default and zstd-max only on request", () => {
    expect(selectBundleSpecs(DEFAULT_BUNDLE_SPECS, false).map((s) => s.type)).toEqual(["gzip-v2", "zstd", "packed1"]);
    expect(selectBundleSpecs(DEFAULT_BUNDLE_SPECS, true).map((s) => s.type)).toEqual(["gzip-v2", "zstd-max", "packed1"]);
  });

  it("orders the client manifest by priority", () => {
    expect(byPriority(DEFAULT_BUNDLE_SPECS).map((s) => s.type)).toEqual(["zstd-max", "zstd", "gzip-v2", "packed1"]);
  });

  it("is frozen", () => {
    expect(Object.isFrozen(DEFAULT_BUNDLE_SPECS)).toBe(true);
    expect(Object.isFrozen(DEFAULT_BUNDLE_SPECS[0]?.generationArgs)).toBe(true);
  });

  it("recognizes bundle type names", () => {
    expect(isBundleType("zstd-max")).toBe(true);
    expect(isBundleType("bzip2")).toBe(false);
  });
});
