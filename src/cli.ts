export interface CliArgs {
  file: string | null;
  upload: boolean;
  configPath: string | null;
  help: boolean;
  specs: string[];
}

/** Each positional argument is one complete repository spec, e.g. `"central zstd_max"`. */
export function parseArgs(argv: readonly string[]): CliArgs {
  const out: CliArgs = { file: null, upload: true, configPath: null, help: false, specs: [] };
  const positional: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (a === "--help" || a === "-h") {
      out.help = true;
    } else if (a === "--no-upload") {
      out.upload = false;
    } else if (a === "-f" || a === "--config") {
      const next = argv[i + 1];
      if (!next || next.startsWith("-")) throw new Error(`missing value for ${a}`);
      if (a === "-f") out.file = next;
      else out.configPath = next;
      i++;
    } else if (a.startsWith("-")) {
      throw new Error(`unexpected arg: ${a}`);
    } else {
      positional.push(a);
    }
  }
  out.specs = positional;
  return out;
}

