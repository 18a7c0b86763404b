import type { ErrorOptions } from "evlog";
import type { TimeoutErrorCode } from "./codes.ts";
import { LabError } from "./base.ts";

export class TimeoutError extends LabError {
  readonly target?: string;
  readonly timeoutMs?: number;

  constructor(
    code: TimeoutErrorCode,
    options: ErrorOptions & { target?: string; timeoutMs?: number },
  ) {
    super(code, options);
    this.name = "TimeoutError";
    this.target = options.target;
    this.timeoutMs = options.timeoutMs;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      ...(this.target !== undefined && { target: this.target }),
      ...(this.timeoutMs !== undefined && { timeoutMs: this.timeoutMs }),
    };
  }
}

export const commandTimeoutError = (command: string, timeoutMs: number): TimeoutError =>
  new TimeoutError("ERR_TIMEOUT_COMMAND", {
    target: command,
    timeoutMs,
    message: `${command} did not finish within ${timeoutMs}ms`,
    fix: "Check that libvirtd is responsive, or raise the timeout in lab.config.json.",
  });

export const lockTimeoutError = (lockName: string): TimeoutError =>
  new TimeoutError("ERR_TIMEOUT_LOCK", {
    target: lockName,
    message: `Timed out waiting for ${lockName} lock`,
    why: "Another kvmlab command is working on the same lab.",
  });
