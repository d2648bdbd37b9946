import { execa } from "execa";

// =============================================================================
// TYPES
// =============================================================================

export type ProcessRequest = {
  command: string;
  args: string[];
  cwd?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type ProcessResult = {
  /** Null when the process never started or was killed before exiting. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  canceled: boolean;
  /** Set when the executable could not be spawned at all. */
  spawnError?: string;
};

export interface ProcessRunner {
  run(request: ProcessRequest): Promise<ProcessResult>;
}

// =============================================================================
// EXECA RUNNER
// =============================================================================

export class ExecaProcessRunner implements ProcessRunner {
  async run(request: ProcessRequest): Promise<ProcessResult> {
    const res = await execa(request.command, request.args, {
      cwd: request.cwd,
      reject: false,
      timeout: request.timeoutMs,
      signal: request.signal,
      stdin: "ignore",
    });

    const exitCode: number | null = res.exitCode ?? null;
    const result: ProcessResult = {
      exitCode,
      stdout: res.stdout,
      stderr: res.stderr,
      timedOut: res.timedOut,
      canceled: res.isCanceled,
    };

    if (res.failed && exitCode === null && !res.timedOut && !res.isCanceled && !res.killed) {
      result.spawnError = res instanceof Error ? res.message : `Failed to start ${request.command}`;
    }

    return result;
  }
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map((part) => (/\s/.test(part) ? JSON.stringify(part) : part)).join(" ");
}
