import { VcsCommandError } from "../core/errors.js";
import { runLocalProcess, type LocalProcessSpec, type ProcessResult } from "../execution/localProcess.js";
import type { VcsDriver } from "./driver.js";

export type ProcessRunner = (spec: LocalProcessSpec) => Promise<ProcessResult>;

export class MercurialDriver implements VcsDriver {
  private readonly run: ProcessRunner;

  constructor(
    private readonly hgExecutable: string,
    run?: ProcessRunner
  ) {
    this.run = run ?? runLocalProcess;
  }

  private async check(spec: LocalProcessSpec): Promise<ProcessResult> {
    const res = await this.run(spec);
    if (res.exitCode !== 0) throw new VcsCommandError(spec.argv, res.exitCode, res.stderr);
    return res;
  }

  async tip(repoDir: string): Promise<string> {
    const argv = [this.hgExecutable, "-R", repoDir, "log", "-r", "tip", "-T", "{node}"];
    const res = await this.check({ argv });
    const node = res.stdout.toString("latin1").trim();
    if (!node) throw new VcsCommandError(argv, res.exitCode, "empty tip node");
    return node;
  }

  async createBundle(repoDir: string, args: readonly string[], outPath: string): Promise<void> {
    // The replication extension must not observe bundle generation.
    await this.check({
      argv: [this.hgExecutable, "--config", "extensions.vcsreplicator=!", "-R", repoDir, ...args, outPath]
    });
  }

  async replicateSync(repoDir: string): Promise<void> {
    await this.check({ argv: [this.hgExecutable, "replicatesync"], cwd: repoDir });
  }
}
