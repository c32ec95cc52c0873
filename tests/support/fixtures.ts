import { promises as fs } from "fs";
import path from "path";
import { parseRunConfig, type RunConfig } from "../../src/config/config.js";

export const TEST_BACKENDS = [
  { provider: "s3", host: "s3-us-west-2.amazonaws.com", bucket: "test-bundles-usw2", region: "us-west-2" },
  { provider: "s3", host: "s3-us-west-1.amazonaws.com", bucket: "test-bundles-usw1", region: "us-west-1" },
  { provider: "s3", host: "s3-us-east-2.amazonaws.com", bucket: "test-bundles-use2", region: "us-east-2" },
  { provider: "s3", host: "s3-eu-central-1.amazonaws.com", bucket: "test-bundles-euc1", region: "eu-central-1" },
  { provider: "gcs", endpoint: "https://storage.googleapis.com", bucket: "test-bundles-gcp", location: "us-central1" }
] as const;

export function makeTestConfig(root: string, overrides: Record<string, unknown> = {}): RunConfig {
  return parseRunConfig(
    {
      version: 1,
      hg: "hg",
      repos_root: path.join(root, "repos"),
      bundle_root: path.join(root, "bundles"),
      cdn: "https://cdn.test",
      concurrency: 2,
      backends: TEST_BACKENDS,
      ...overrides
    },
    {}
  );
}

export async function makeRepo(
  reposRoot: string,
  repoPath: string,
  requirements: string[] = ["dotencode", "fncache", "generaldelta", "revlogv1", "store"]
): Promise<string> {
  const repoDir = path.join(reposRoot, repoPath);
  await fs.mkdir(path.join(repoDir, ".hg"), { recursive: true });
  await fs.writeFile(path.join(repoDir, ".hg", "requires"), requirements.map((r) => `${r}\n`).join(""), "utf8");
  return repoDir;
}

export const noSleep = async (_ms: number): Promise<void> => {};
