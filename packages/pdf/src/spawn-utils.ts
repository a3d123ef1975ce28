import type { SpawnOptions } from "node:child_process";
import { spawn } from "node:child_process";

export interface SpawnResult {
  stdout: string;
  stderr: string;
  code: number;
  /** Set when the process was terminated by a signal. */
  signal?: NodeJS.Signals;
}

export type SpawnFn = (command: string, args: string[]) => Promise<SpawnResult>;

/**
 * Execute a command asynchronously and collect its output.
 *
 * Resolves with the exit code even when it is non-zero; rejects only when
 * the process cannot be started (e.g. the binary is not installed). A
 * process killed by a signal resolves with code 1 and the signal name.
 *
 * @example
 * ```typescript
 * const result = await spawnAsync("pdfinfo", ["report.pdf"]);
 * if (result.code !== 0) console.error(describeFailure(result));
 * ```
 */
export function spawnAsync(
  command: string,
  args: string[],
  options: SpawnOptions = {},
): Promise<SpawnResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, options);

    // Decoded once on close so multi-byte characters split across chunks survive
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    proc.stdout?.on("data", (data: Buffer) => {
      stdout.push(data);
    });

    proc.stderr?.on("data", (data: Buffer) => {
      stderr.push(data);
    });

    proc.on("close", (code, signal) => {
      const result: SpawnResult = {
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: Buffer.concat(stderr).toString("utf8"),
        code: code ?? 1,
      };
      if (signal) result.signal = signal;
      resolve(result);
    });

    proc.on("error", reject);
  });
}

/** Human-readable reason for a failed run. */
export function describeFailure(result: SpawnResult): string {
  const stderr = result.stderr.trim();
  if (stderr) return stderr;
  if (result.signal) return `terminated by ${result.signal}`;
  return "Unknown error";
}
