import type { ErrorOptions } from "evlog";
import type { NetworkErrorCode } from "./codes.ts";
import { LabError } from "./base.ts";

export class NetworkError extends LabError {
  readonly network: string;

  constructor(code: NetworkErrorCode, options: ErrorOptions & { network: string }) {
    super(code, options);
    this.name = "NetworkError";
    this.network = options.network;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), network: this.network };
  }
}

export const networkNotDefinedError = (network: string): NetworkError =>
  new NetworkError("ERR_NETWORK_NOT_DEFINED", {
    network,
    message: `Lab network '${network}' not found`,
    fix: "Run 'kvmlab create' first.",
  });

export const networkNotActiveError = (network: string, state: string): NetworkError =>
  new NetworkError("ERR_NETWORK_NOT_ACTIVE", {
    network,
    message: `Lab network '${network}' could not be activated (state: ${state})`,
    fix: `Inspect it with 'virsh net-info ${network}' and start it manually.`,
  });
