import type { ErrorOptions } from "evlog";
import type { ControlPlaneErrorCode } from "./codes.ts";
import { LabError } from "./base.ts";

export class ControlPlaneError extends LabError {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(
    code: ControlPlaneErrorCode,
    options: ErrorOptions & { command: string; exitCode: number | null; stderr: string },
  ) {
    super(code, options);
    this.name = "ControlPlaneError";
    this.command = options.command;
    this.exitCode = options.exitCode;
    this.stderr = options.stderr;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      command: this.command,
      exitCode: this.exitCode,
      stderr: this.stderr,
    };
  }
}

export const commandFailedError = (
  command: string,
  exitCode: number | null,
  stderr: string,
): ControlPlaneError =>
  new ControlPlaneError("ERR_CONTROL_PLANE_COMMAND", {
    command,
    exitCode,
    stderr,
    message: `${command} failed (exit ${exitCode ?? "unknown"}): ${stderr.trim() || "no output"}`,
  });

export const unexpectedOutputError = (command: string, output: string): ControlPlaneError =>
  new ControlPlaneError("ERR_CONTROL_PLANE_OUTPUT", {
    command,
    exitCode: 0,
    stderr: "",
    message: `Unexpected output from ${command}: ${output.trim() || "(empty)"}`,
  });
