import type { ErrorOptions } from "evlog";
import type { VmErrorCode } from "./codes.ts";
import { LabError } from "./base.ts";

export class VmError extends LabError {
  readonly vmName?: string;

  constructor(code: VmErrorCode, options: ErrorOptions & { vmName?: string }) {
    super(code, options);
    this.name = "VmError";
    this.vmName = options.vmName;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), ...(this.vmName !== undefined && { vmName: this.vmName }) };
  }
}

export const descriptorNotFoundError = (vmName: string, path: string): VmError =>
  new VmError("ERR_VM_DESCRIPTOR_NOT_FOUND", {
    vmName,
    message: `Domain descriptor not found: ${path}`,
    fix: "Run 'kvmlab create' first.",
  });
