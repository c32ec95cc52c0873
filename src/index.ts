#!/usr/bin/env node
import { promises as fs } from "fs";
import { DEFAULT_CONFIG_PATH, loadRunConfig } from "./config/config.js";
import { DEFAULT_BUNDLE_SPECS } from "./core/bundleSpec.js";
import { newRunId } from "./core/ids.js";
import { runPipeline } from "./orchestrator/pipeline.js";
import { parseRepositoryList, parseRepositoryTask, type RepositoryTask } from "./orchestrator/repositoryTask.js";
import { createObjectStores } from "./storage/factory.js";
import { parseArgs, type CliArgs } from "./cli.js";
import { MercurialDriver } from "./vcs/mercurialDriver.js";

function usage(): string {
  return [
    "usage:",
    "  clonebundles-publish [-f <file>] [--no-upload] [--config <path>] [\"<repo> [key=value|key ...]\"] ...",
    "",
    "repository options:",
    "  copyfrom=<path>   copy the clonebundles manifest of another repository instead of generating",
    "  zstd_max          generate zstd bundles at maximum compression",
    "",
    "env:",
    `  CLONEBUNDLES_CONFIG (optional, defaults to ${DEFAULT_CONFIG_PATH})`,
    "  SINGLE_THREADED (optional, forces one worker)",
    ""
  ].join("\n");
}

async function loadTasks(args: CliArgs): Promise<RepositoryTask[]> {
  if (args.file) {
    const text = await fs.readFile(args.file, "utf8");
    return parseRepositoryList(text, args.upload);
  }
  return args.specs.map((s) => parseRepositoryTask(s, args.upload));
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }

  const tasks = await loadTasks(args);
  if (tasks.length === 0) throw new Error(`no repositories given\n\n${usage()}`);

  const configPath = args.configPath ?? process.env.CLONEBUNDLES_CONFIG ?? DEFAULT_CONFIG_PATH;
  const config = await loadRunConfig(configPath);
  const log = (message: string): void => {
    process.stdout.write(`${message}\n`);
  };

  await runPipeline(
    tasks,
    { runId: newRunId(), upload: args.upload },
    {
      config,
      specs: DEFAULT_BUNDLE_SPECS,
      driver: new MercurialDriver(config.hgExecutable),
      stores: args.upload ? createObjectStores(config.backends) : [],
      log
    }
  );
}

main().catch((err) => {
  console.error(err instanceof Error ? `${err.name}: ${err.message}` : err);
  process.exitCode = 1;
});
