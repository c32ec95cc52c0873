import { DEFAULT_CONFIG_PATH, loadRunConfig } from "../src/config/config.js";
import { createObjectStores } from "../src/storage/factory.js";
import { formatProblem, readFleetSummary, verifyPublished } from "../src/verify/publishedVerify.js";

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/bundles_verify.ts [--config <path>]",
    "",
    "notes:",
    "  - Reads bundles.json from the configured bundle root and lists every backend",
    ""
  ].join("\n");
}

function parseArgs(argv: string[]): Record<string, string | boolean> {
  const out: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new Error(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (key === "help") {
      out[key] = true;
      continue;
    }
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) throw new Error(`missing value for --${key}`);
    out[key] = next;
    i++;
  }
  return out;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }
  const configArg = args.config;
  const configPath = typeof configArg === "string" ? configArg : (process.env.CLONEBUNDLES_CONFIG ?? DEFAULT_CONFIG_PATH);
  const config = await loadRunConfig(configPath);

  const summary = await readFleetSummary(config.bundleRoot);
  const problems = await verifyPublished(summary, createObjectStores(config.backends), config.concurrency);
  if (problems.length) {
    for (const p of problems) process.stderr.write(`${formatProblem(p)}\n`);
    process.exitCode = 1;
    return;
  }
  process.stdout.write("ok\n");
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
