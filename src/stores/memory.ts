import { readFileSync } from "node:fs";
import { commandFailedError } from "../errors/index.ts";
import {
  MUTATING_OPERATIONS,
  type ControlPlaneClient,
  type DhcpLease,
  type DomainState,
  type MutatingOperation,
  type NetworkState,
} from "../services/control-plane.ts";

export interface ControlPlaneCall {
  op: keyof ControlPlaneClient;
  target: string;
}

interface MemoryDomain {
  state: DomainState;
  macs: string[];
  descriptorPath: string | null;
}

interface MemoryNetwork {
  active: boolean;
  autostart: boolean;
  descriptorPath: string | null;
}

const MUTATING = new Set<string>(MUTATING_OPERATIONS);

function isMutating(op: string): op is MutatingOperation {
  return MUTATING.has(op);
}

function readDescriptor(op: string, path: string): { name: string; macs: string[] } {
  let xml: string;
  try {
    xml = readFileSync(path, "utf-8");
  } catch {
    throw commandFailedError(`virsh ${op} ${path}`, 1, `error: Failed to open file '${path}'`);
  }
  const name = /<name>([^<]+)<\/name>/.exec(xml)?.[1];
  if (!name) throw commandFailedError(`virsh ${op} ${path}`, 1, "error: missing name information");
  const macs = [...xml.matchAll(/<mac address='([^']+)'/g)].map((m) => m[1].toLowerCase());
  return { name, macs };
}

/**
 * In-process control plane. Keeps domains and networks in maps, parses the
 * descriptors it is given, and records every call in order.
 */
export class MemoryControlPlane implements ControlPlaneClient {
  readonly calls: ControlPlaneCall[] = [];
  private domains = new Map<string, MemoryDomain>();
  private networks = new Map<string, MemoryNetwork>();
  private leases = new Map<string, DhcpLease[]>();
  private failures = new Map<string, string>();
  private frozen = new Set<string>();

  // --- seeding / inspection -------------------------------------------------

  seedDomain(name: string, state: Exclude<DomainState, "undefined">, macs: string[] = []): void {
    this.domains.set(name, { state, macs, descriptorPath: null });
  }

  seedNetwork(name: string, state: Exclude<NetworkState, "not-defined">): void {
    this.networks.set(name, { active: state === "active", autostart: true, descriptorPath: null });
  }

  setLeases(network: string, leases: DhcpLease[]): void {
    this.leases.set(network, leases);
  }

  /** Make `op` on `target` fail with the given stderr until cleared. */
  failOn(op: keyof ControlPlaneClient, target: string, stderr = "error: injected failure"): void {
    this.failures.set(`${op}:${target}`, stderr);
  }

  clearFailures(): void {
    this.failures.clear();
  }

  /** Accept calls for `target` but never change its state. */
  freeze(target: string): void {
    this.frozen.add(target);
  }

  mutatingCalls(): ControlPlaneCall[] {
    return this.calls.filter((call) => isMutating(call.op));
  }

  resetCalls(): void {
    this.calls.length = 0;
  }

  hasDomain(name: string): boolean {
    return this.domains.has(name);
  }

  isAutostart(network: string): boolean {
    return this.networks.get(network)?.autostart ?? false;
  }

  // --- ControlPlaneClient ---------------------------------------------------

  private record(op: keyof ControlPlaneClient, target: string): void {
    this.calls.push({ op, target });
    const stderr = this.failures.get(`${op}:${target}`);
    if (stderr !== undefined) throw commandFailedError(`virsh ${op} ${target}`, 1, stderr);
  }

  private domain(op: keyof ControlPlaneClient, name: string): MemoryDomain {
    const domain = this.domains.get(name);
    if (!domain) {
      throw commandFailedError(`virsh ${op} ${name}`, 1, `error: failed to get domain '${name}'`);
    }
    return domain;
  }

  private network(op: keyof ControlPlaneClient, name: string): MemoryNetwork {
    const network = this.networks.get(name);
    if (!network) {
      throw commandFailedError(`virsh ${op} ${name}`, 1, `error: failed to get network '${name}'`);
    }
    return network;
  }

  private setDomainState(name: string, domain: MemoryDomain, state: DomainState): void {
    if (!this.frozen.has(name)) domain.state = state;
  }

  async defineDomain(descriptorPath: string): Promise<string> {
    this.record("defineDomain", descriptorPath);
    const { name, macs } = readDescriptor("define", descriptorPath);
    if (this.frozen.has(name)) return name;
    const existing = this.domains.get(name);
    this.domains.set(name, { state: existing?.state ?? "shut-off", macs, descriptorPath });
    return name;
  }

  async undefineDomain(name: string): Promise<void> {
    this.record("undefineDomain", name);
    if (!this.frozen.has(name)) this.domains.delete(name);
  }

  async startDomain(name: string): Promise<void> {
    this.record("startDomain", name);
    const domain = this.domain("startDomain", name);
    if (domain.state === "running") return;
    this.setDomainState(name, domain, "running");
  }

  async resumeDomain(name: string): Promise<void> {
    this.record("resumeDomain", name);
    const domain = this.domain("resumeDomain", name);
    if (domain.state !== "paused") {
      throw commandFailedError(`virsh resume ${name}`, 1, "error: Requested operation is not valid: domain is not paused");
    }
    this.setDomainState(name, domain, "running");
  }

  async destroyDomain(name: string): Promise<void> {
    this.record("destroyDomain", name);
    const domain = this.domain("destroyDomain", name);
    this.setDomainState(name, domain, "shut-off");
  }

  async domainState(name: string): Promise<DomainState> {
    this.record("domainState", name);
    return this.domains.get(name)?.state ?? "undefined";
  }

  async domainMacAddresses(name: string): Promise<string[]> {
    this.record("domainMacAddresses", name);
    return [...(this.domains.get(name)?.macs ?? [])];
  }

  async defineNetwork(descriptorPath: string): Promise<void> {
    this.record("defineNetwork", descriptorPath);
    const { name } = readDescriptor("net-define", descriptorPath);
    if (this.frozen.has(name)) return;
    const existing = this.networks.get(name);
    this.networks.set(name, {
      active: existing?.active ?? false,
      autostart: existing?.autostart ?? false,
      descriptorPath,
    });
  }

  async startNetwork(name: string): Promise<void> {
    this.record("startNetwork", name);
    const network = this.network("startNetwork", name);
    if (!this.frozen.has(name)) network.active = true;
  }

  async autostartNetwork(name: string): Promise<void> {
    this.record("autostartNetwork", name);
    this.network("autostartNetwork", name).autostart = true;
  }

  async destroyNetwork(name: string): Promise<void> {
    this.record("destroyNetwork", name);
    const network = this.network("destroyNetwork", name);
    if (!this.frozen.has(name)) network.active = false;
  }

  async undefineNetwork(name: string): Promise<void> {
    this.record("undefineNetwork", name);
    if (!this.frozen.has(name)) this.networks.delete(name);
  }

  async networkState(name: string): Promise<NetworkState> {
    this.record("networkState", name);
    const network = this.networks.get(name);
    if (!network) return "not-defined";
    return network.active ? "active" : "inactive";
  }

  async dhcpLeases(networkName: string): Promise<DhcpLease[]> {
    this.record("dhcpLeases", networkName);
    if (!this.networks.has(networkName)) return [];
    return (this.leases.get(networkName) ?? []).map((lease) => ({ ...lease }));
  }
}
