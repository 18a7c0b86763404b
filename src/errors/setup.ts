import type { SetupErrorCode } from "./codes.ts";
import { LabError } from "./base.ts";

export class SetupError extends LabError {
  constructor(code: SetupErrorCode, options: { message: string; fix?: string }) {
    super(code, options);
    this.name = "SetupError";
  }
}

export const privilegesRequiredError = (command: string): SetupError =>
  new SetupError("ERR_SETUP_PRIVILEGES", {
    message: `"kvmlab ${command}" must be run with sudo or as root`,
    fix: `Run with: sudo env "PATH=$PATH" kvmlab ${command}`,
  });

export const missingBinaryError = (binaries: string[], packages: string[]): SetupError =>
  new SetupError("ERR_SETUP_MISSING_BINARY", {
    message: `Missing required tools: ${binaries.join(", ")}`,
    fix: `Install with: sudo dnf install ${packages.join(" ")}`,
  });
