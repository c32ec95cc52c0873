import path from "path";
import * as z from "zod/v4";
import { RepositoryTaskError } from "../core/errors.js";

export interface RepositoryTask {
  repoPath: string;
  upload: boolean;
  copyFrom: string | null;
  useMaxCompression: boolean;
}

const zFlag = z
  .union([z.literal(true), z.enum(["true", "false", "1", "0"])])
  .transform((v) => v === true || v === "true" || v === "1");

const zTaskOptions = z.strictObject({
  copyfrom: z.string().min(1).optional(),
  zstd_max: zFlag.optional()
});

export function requireRelativePath(p: string, label: string): string {
  const trimmed = p.trim();
  if (trimmed.length === 0) throw new RepositoryTaskError(`${label} must be non-empty`);
  if (path.isAbsolute(trimmed)) throw new RepositoryTaskError(`${label} must be a relative path: ${trimmed}`);
  const normalized = path.posix.normalize(trimmed).replace(/\/+$/, "");
  if (normalized === "." || normalized === ".." || normalized.startsWith("../")) {
    throw new RepositoryTaskError(`${label} must not contain '..' segments: ${trimmed}`);
  }
  return normalized;
}

/**
 * Parses `path [key=value|key ...]`. A bare key means `true`. Recognized keys
 * are `copyfrom` and `zstd_max`; anything else is rejected.
 */
export function parseRepositoryTask(line: string, upload: boolean): RepositoryTask {
  const [first, ...fields] = line.trim().split(/\s+/);
  if (!first) throw new RepositoryTaskError("empty repository specification");
  const repoPath = requireRelativePath(first, "repository path");

  const raw: Record<string, string | true> = {};
  for (const field of fields) {
    const idx = field.indexOf("=");
    const key = idx === -1 ? field : field.slice(0, idx);
    const value = idx === -1 ? true : field.slice(idx + 1);
    if (Object.prototype.hasOwnProperty.call(raw, key)) {
      throw new RepositoryTaskError(`duplicate option ${key} for ${repoPath}`);
    }
    raw[key] = value;
  }

  const parsed = zTaskOptions.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => (i.code === "unrecognized_keys" ? `unknown option ${i.keys.join(", ")}` : `${i.path.join(".")}: ${i.message}`))
      .join("; ");
    throw new RepositoryTaskError(`invalid options for ${repoPath}: ${issues}`);
  }

  const copyFrom = parsed.data.copyfrom ? requireRelativePath(parsed.data.copyfrom, "copyfrom") : null;
  return {
    repoPath,
    upload,
    copyFrom,
    useMaxCompression: parsed.data.zstd_max ?? false
  };
}

/** One specification per line; blank lines and `#` comments are skipped. */
export function parseRepositoryList(text: string, upload: boolean): RepositoryTask[] {
  return text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0 && !l.startsWith("#"))
    .map((l) => parseRepositoryTask(l, upload));
}
