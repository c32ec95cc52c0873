import { promises as fs } from "fs";
import path from "path";
import { renderClonebundlesManifest } from "../manifest/clonebundles.js";

export const CLONEBUNDLES_FILE = "clonebundles.manifest";

export function clonebundlesPath(repoDir: string): string {
  return path.join(repoDir, ".hg", CLONEBUNDLES_FILE);
}

/** Copies content, mode and timestamps. */
export async function copyPreserving(source: string, dest: string): Promise<void> {
  await fs.copyFile(source, dest);
  const st = await fs.stat(source);
  await fs.chmod(dest, st.mode & 0o7777);
  await fs.utimes(dest, st.atime, st.mtime);
}

async function backupIfPresent(source: string, backup: string, log: (message: string) => void): Promise<boolean> {
  try {
    await copyPreserving(source, backup);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw err;
  }
  log(`copied ${source} -> ${backup}`);
  return true;
}

/**
 * Replaces the repository's manifest, keeping the previous one as
 * `clonebundles.manifest.old`.
 */
export async function writeClonebundlesManifest(
  repoDir: string,
  lines: readonly string[],
  log: (message: string) => void
): Promise<string> {
  const target = clonebundlesPath(repoDir);
  await backupIfPresent(target, `${target}.old`, log);
  await fs.writeFile(target, renderClonebundlesManifest(lines), "utf8");
  await fs.chmod(target, 0o664);
  return target;
}

/**
 * Mirror repositories advertise the source repository's bundles. The previous
 * destination manifest is kept as `clonebundles.manifest.last`.
 */
export async function copyMirrorManifest(
  sourceRepoDir: string,
  destRepoDir: string,
  log: (message: string) => void
): Promise<string> {
  const source = clonebundlesPath(sourceRepoDir);
  const dest = clonebundlesPath(destRepoDir);
  await backupIfPresent(dest, `${dest}.last`, log);
  log(`copying ${source} -> ${dest}`);
  await copyPreserving(source, dest);
  return dest;
}
