import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";
import { ConfigError } from "../core/errors.js";

export const DEFAULT_CONFIG_PATH = "config/default.config.yaml";

const zNonEmpty = z.string().trim().min(1);

const zS3Backend = z.object({
  provider: z.literal("s3"),
  host: zNonEmpty,
  bucket: zNonEmpty,
  region: zNonEmpty
});

const zGcsBackend = z.object({
  provider: z.literal("gcs"),
  endpoint: zNonEmpty.default("https://storage.googleapis.com"),
  bucket: zNonEmpty,
  location: zNonEmpty
});

const zBackend = z.discriminatedUnion("provider", [zS3Backend, zGcsBackend]);

const zConfigFile = z.object({
  version: z.literal(1),
  hg: zNonEmpty,
  repos_root: zNonEmpty,
  bundle_root: zNonEmpty,
  cdn: zNonEmpty,
  concurrency: z.number().int().min(1).max(64).default(4),
  upload_retry: z
    .object({
      attempts: z.number().int().min(1).default(3),
      delay_seconds: z.number().min(0).default(15)
    })
    .default({ attempts: 3, delay_seconds: 15 }),
  index_cache_max_age_seconds: z.number().int().min(0).default(60),
  backends: z.array(zBackend).min(1)
});

export type S3BackendConfig = z.infer<typeof zS3Backend>;
export type GcsBackendConfig = z.infer<typeof zGcsBackend>;
export type StorageBackendConfig = S3BackendConfig | GcsBackendConfig;

export interface RetryPolicy {
  attempts: number;
  delayMs: number;
}

export interface RunConfig {
  hgExecutable: string;
  reposRoot: string;
  bundleRoot: string;
  cdnBaseUrl: string;
  concurrency: number;
  uploadRetry: RetryPolicy;
  indexCacheMaxAgeSeconds: number;
  backends: readonly StorageBackendConfig[];
}

function expandEnvToken(value: string, env: NodeJS.ProcessEnv): string {
  const trimmed = value.trim();
  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (!m) return value;
  const varName = m[1];
  if (!varName) return value;
  const v = env[varName]?.trim();
  if (!v) throw new ConfigError(`environment variable ${varName} is not set`);
  return v;
}

function expandEnvDeep(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === "string") return expandEnvToken(value, env);
  if (Array.isArray(value)) return value.map((v) => expandEnvDeep(v, env));
  if (value && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = expandEnvDeep(v, env);
    return out;
  }
  return value;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const v of Object.values(value)) deepFreeze(v);
    Object.freeze(value);
  }
  return value;
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

export function parseRunConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env, source = "<inline>"): RunConfig {
  const parsed = zConfigFile.safeParse(expandEnvDeep(raw, env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new ConfigError(`invalid config at ${source}: ${issues}`);
  }
  const file = parsed.data;

  const singleThreaded = (env.SINGLE_THREADED ?? "").length > 0;

  return deepFreeze<RunConfig>({
    hgExecutable: file.hg,
    reposRoot: file.repos_root,
    bundleRoot: file.bundle_root,
    cdnBaseUrl: stripTrailingSlash(file.cdn),
    concurrency: singleThreaded ? 1 : file.concurrency,
    uploadRetry: {
      attempts: file.upload_retry.attempts,
      delayMs: Math.round(file.upload_retry.delay_seconds * 1000)
    },
    indexCacheMaxAgeSeconds: file.index_cache_max_age_seconds,
    backends: file.backends.map((b) => (b.provider === "gcs" ? { ...b, endpoint: stripTrailingSlash(b.endpoint) } : b))
  });
}

export async function loadRunConfig(filePath: string, env: NodeJS.ProcessEnv = process.env): Promise<RunConfig> {
  const text = await fs.readFile(filePath, "utf8");
  let raw: unknown;
  try {
    raw = YAML.parse(text) as unknown;
  } catch (err) {
    throw new ConfigError(`invalid YAML at ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseRunConfig(raw, env, filePath);
}
