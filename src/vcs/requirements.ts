import { promises as fs } from "fs";
import path from "path";
import { UnsupportedRepositoryError } from "../core/errors.js";

export async function readRequirements(repoDir: string): Promise<Set<string>> {
  const text = await fs.readFile(path.join(repoDir, ".hg", "requires"), "latin1");
  return new Set(
    text
      .split(/\r?\n/)
      .map((l) => l.trim())
      .filter((l) => l.length > 0)
  );
}

export async function assertGeneralDelta(repoDir: string): Promise<void> {
  const requirements = await readRequirements(repoDir);
  if (!requirements.has("generaldelta")) throw new UnsupportedRepositoryError(repoDir);
}
