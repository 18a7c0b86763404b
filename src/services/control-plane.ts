import { ControlPlaneError, unexpectedOutputError } from "../errors/index.ts";
import { defaultExec, DEFAULT_COMMAND_TIMEOUT_MS, formatCommand, type ExecFn } from "../lib/exec.ts";
import {
  isAlreadyActive,
  isDomainNotFound,
  isNetworkNotFound,
  isNotRunning,
  parseDefinedName,
  parseDhcpLeases,
  parseDomainState,
  parseInterfaceMacs,
  parseNetworkActive,
} from "./virsh-output.ts";

export type DomainState =
  | "undefined"
  | "shut-off"
  | "paused"
  | "running"
  | "in-shutdown"
  | "crashed"
  | "pmsuspended"
  | "blocked"
  | "unknown";

export type NetworkState = "not-defined" | "inactive" | "active";

export interface DhcpLease {
  mac: string;
  ip: string;
  hostname: string | null;
  expiry: string;
}

/** Typed surface over the virtualization control plane. No lab logic lives behind it. */
export interface ControlPlaneClient {
  /** Define (or redefine) a domain from a descriptor file; resolves to the domain name */
  defineDomain(descriptorPath: string): Promise<string>;
  undefineDomain(name: string): Promise<void>;
  startDomain(name: string): Promise<void>;
  resumeDomain(name: string): Promise<void>;
  /** Hard power-off; the definition persists */
  destroyDomain(name: string): Promise<void>;
  domainState(name: string): Promise<DomainState>;
  domainMacAddresses(name: string): Promise<string[]>;

  defineNetwork(descriptorPath: string): Promise<void>;
  startNetwork(name: string): Promise<void>;
  autostartNetwork(name: string): Promise<void>;
  destroyNetwork(name: string): Promise<void>;
  undefineNetwork(name: string): Promise<void>;
  networkState(name: string): Promise<NetworkState>;
  dhcpLeases(networkName: string): Promise<DhcpLease[]>;
}

/** Operations that change control-plane state (everything except the queries). */
export const MUTATING_OPERATIONS = [
  "defineDomain",
  "undefineDomain",
  "startDomain",
  "resumeDomain",
  "destroyDomain",
  "defineNetwork",
  "startNetwork",
  "autostartNetwork",
  "destroyNetwork",
  "undefineNetwork",
] as const satisfies readonly (keyof ControlPlaneClient)[];

export type MutatingOperation = (typeof MUTATING_OPERATIONS)[number];

export interface VirshControlPlaneOptions {
  exec?: ExecFn;
  timeoutMs?: number;
  /** libvirt connection URI */
  uri?: string;
  bin?: string;
}

function isControlPlaneFailure(error: unknown): error is ControlPlaneError {
  return error instanceof ControlPlaneError;
}

export class VirshControlPlane implements ControlPlaneClient {
  private readonly exec: ExecFn;
  private readonly timeoutMs: number;
  private readonly uri: string;
  private readonly bin: string;

  constructor(options: VirshControlPlaneOptions = {}) {
    this.exec = options.exec ?? defaultExec;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.uri = options.uri ?? "qemu:///system";
    this.bin = options.bin ?? "virsh";
  }

  private async virsh(args: string[]): Promise<string> {
    const { stdout } = await this.exec(this.bin, ["-c", this.uri, ...args], {
      timeoutMs: this.timeoutMs,
    });
    return stdout;
  }

  /** Run a query whose "not found" answer is a value rather than an error. */
  private async query<T>(
    args: string[],
    notFound: (stderr: string) => boolean,
    absent: T,
    parse: (stdout: string) => T,
  ): Promise<T> {
    try {
      return parse(await this.virsh(args));
    } catch (error) {
      if (isControlPlaneFailure(error) && notFound(error.stderr)) return absent;
      throw error;
    }
  }

  private async tolerate(args: string[], benign: (stderr: string) => boolean): Promise<void> {
    try {
      await this.virsh(args);
    } catch (error) {
      if (isControlPlaneFailure(error) && benign(error.stderr)) return;
      throw error;
    }
  }

  async defineDomain(descriptorPath: string): Promise<string> {
    const args = ["define", descriptorPath];
    const stdout = await this.virsh(args);
    const name = parseDefinedName(stdout);
    if (name === null) throw unexpectedOutputError(formatCommand(this.bin, args), stdout);
    return name;
  }

  async undefineDomain(name: string): Promise<void> {
    // UEFI guests carry an NVRAM file that a plain undefine refuses to orphan;
    // older libvirt rejects --nvram for BIOS guests.
    try {
      await this.virsh(["undefine", name, "--nvram"]);
    } catch (error) {
      if (isControlPlaneFailure(error) && isDomainNotFound(error.stderr)) return;
      await this.tolerate(["undefine", name], isDomainNotFound);
    }
  }

  async startDomain(name: string): Promise<void> {
    await this.tolerate(["start", name], isAlreadyActive);
  }

  async resumeDomain(name: string): Promise<void> {
    await this.virsh(["resume", name]);
  }

  async destroyDomain(name: string): Promise<void> {
    await this.tolerate(["destroy", name], isNotRunning);
  }

  domainState(name: string): Promise<DomainState> {
    return this.query<DomainState>(["domstate", name], isDomainNotFound, "undefined", parseDomainState);
  }

  domainMacAddresses(name: string): Promise<string[]> {
    return this.query(["domiflist", name], isDomainNotFound, [], parseInterfaceMacs);
  }

  async defineNetwork(descriptorPath: string): Promise<void> {
    await this.virsh(["net-define", descriptorPath]);
  }

  async startNetwork(name: string): Promise<void> {
    await this.tolerate(["net-start", name], isAlreadyActive);
  }

  async autostartNetwork(name: string): Promise<void> {
    await this.virsh(["net-autostart", name]);
  }

  async destroyNetwork(name: string): Promise<void> {
    await this.tolerate(["net-destroy", name], isNotRunning);
  }

  async undefineNetwork(name: string): Promise<void> {
    await this.tolerate(["net-undefine", name], isNetworkNotFound);
  }

  networkState(name: string): Promise<NetworkState> {
    return this.query<NetworkState>(["net-info", name], isNetworkNotFound, "not-defined", (stdout) =>
      parseNetworkActive(stdout) ? "active" : "inactive",
    );
  }

  dhcpLeases(networkName: string): Promise<DhcpLease[]> {
    return this.query(["net-dhcp-leases", networkName], isNetworkNotFound, [], parseDhcpLeases);
  }
}
