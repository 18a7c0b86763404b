import { EvlogError, type ErrorOptions } from "evlog";
import type { LabErrorCode } from "./codes.ts";

export class LabError extends EvlogError {
  readonly code: LabErrorCode;

  constructor(code: LabErrorCode, options: ErrorOptions) {
    super(options);
    this.name = "LabError";
    this.code = code;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), code: this.code };
  }
}
