import { spawn } from "child_process";

const MAX_CAPTURE_BYTES = 1024 * 1024;

export interface LocalProcessSpec {
  argv: readonly string[];
  cwd?: string;
  env?: Record<string, string>;
}

export interface ProcessResult {
  exitCode: number;
  stdout: Buffer;
  stderr: string;
}

interface CaptureState {
  bytes: number;
  truncated: boolean;
}

function appendLimited(chunks: Buffer[], chunk: Buffer, state: CaptureState): void {
  if (state.truncated) return;
  const next = state.bytes + chunk.byteLength;
  if (next > MAX_CAPTURE_BYTES) {
    const keep = Math.max(0, MAX_CAPTURE_BYTES - state.bytes);
    if (keep > 0) chunks.push(chunk.subarray(0, keep));
    state.bytes = MAX_CAPTURE_BYTES;
    state.truncated = true;
    return;
  }
  chunks.push(chunk);
  state.bytes = next;
}

/**
 * Runs a command to completion. stdout is returned raw so callers pick the
 * decoding; stderr is decoded as utf8 and both are capped at 1 MiB.
 */
export async function runLocalProcess(spec: LocalProcessSpec): Promise<ProcessResult> {
  const [command, ...args] = spec.argv;
  if (!command) throw new Error("local process argv must be non-empty");

  const child = spawn(command, args, {
    cwd: spec.cwd,
    env: { ...process.env, ...spec.env },
    stdio: ["ignore", "pipe", "pipe"] as const
  });

  const stdoutChunks: Buffer[] = [];
  const stderrChunks: Buffer[] = [];
  const stdoutState: CaptureState = { bytes: 0, truncated: false };
  const stderrState: CaptureState = { bytes: 0, truncated: false };

  child.stdout.on("data", (chunk: Buffer) => appendLimited(stdoutChunks, chunk, stdoutState));
  child.stderr.on("data", (chunk: Buffer) => appendLimited(stderrChunks, chunk, stderrState));

  const exitCode = await new Promise<number>((resolve, reject) => {
    child.on("error", reject);
    child.on("close", (code: number | null) => resolve(code ?? 1));
  });

  const stderr = Buffer.concat(stderrChunks).toString("utf8") + (stderrState.truncated ? "\n[stderr truncated]\n" : "");

  return { exitCode, stdout: Buffer.concat(stdoutChunks), stderr };
}
