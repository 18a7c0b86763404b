import { execFile } from "node:child_process";
import type { LabError } from "../errors/index.ts";
import { commandFailedError, commandTimeoutError } from "../errors/index.ts";

export const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;
const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

export interface ExecOptions {
  /** Kill the child and fail with ERR_TIMEOUT_COMMAND after this many ms. */
  timeoutMs?: number;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
}

export type ExecFn = (bin: string, args: string[], options?: ExecOptions) => Promise<ExecResult>;

/** Shape of the error execFile hands to its callback. */
export interface ExecFailure {
  code?: number | string | null;
  killed?: boolean;
  signal?: NodeJS.Signals | null;
}

export function formatCommand(bin: string, args: string[]): string {
  return [bin, ...args].join(" ");
}

export function toCommandError(
  failure: ExecFailure,
  command: string,
  stderr: string,
  timeoutMs: number,
): LabError {
  if (failure.killed && failure.signal === "SIGTERM" && timeoutMs > 0) {
    return commandTimeoutError(command, timeoutMs);
  }
  if (failure.code === "ENOENT") {
    return commandFailedError(command, null, `${command.split(" ")[0]}: command not found`);
  }
  return commandFailedError(command, typeof failure.code === "number" ? failure.code : null, stderr);
}

export const defaultExec: ExecFn = (bin, args, options) =>
  new Promise((resolve, reject) => {
    const timeoutMs = options?.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    execFile(
      bin,
      args,
      { timeout: timeoutMs, killSignal: "SIGTERM", maxBuffer: MAX_OUTPUT_BYTES, encoding: "utf8" },
      (error, stdout, stderr) => {
        if (error) {
          reject(toCommandError(error, formatCommand(bin, args), stderr, timeoutMs));
          return;
        }
        resolve({ stdout, stderr });
      },
    );
  });
