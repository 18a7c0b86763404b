import type { HostsErrorCode } from "./codes.ts";
import { LabError } from "./base.ts";

export class HostsError extends LabError {
  constructor(code: HostsErrorCode, options: { message: string; fix?: string }) {
    super(code, options);
    this.name = "HostsError";
  }
}

export const hostsLocalNotFoundError = (path: string): HostsError =>
  new HostsError("ERR_HOSTS_LOCAL_NOT_FOUND", {
    message: `hosts.local not found: ${path}`,
    fix: "Run 'kvmlab create' first.",
  });

export const hostsEntriesPresentError = (hostsFile: string): HostsError =>
  new HostsError("ERR_HOSTS_ALREADY_PRESENT", {
    message: `Lab entries already exist in ${hostsFile}`,
    fix: "Use 'kvmlab hosts remove' first, or 'kvmlab hosts update' to refresh them.",
  });
