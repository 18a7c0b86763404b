import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { LabContext } from "../context.ts";
import { safeHook } from "../hooks.ts";
import { networkNotActiveError, networkNotDefinedError } from "../errors/index.ts";
import type { NetworkSpec } from "../lib/lab-spec.ts";
import type { DhcpLease, NetworkState } from "./control-plane.ts";
import { renderNetwork } from "./descriptor.ts";

export interface NetworkResult {
  name: string;
  action: "created" | "started" | "present" | "recreated" | "kept";
  state: NetworkState;
  /** False when the re-queried state is not the one the action should have produced */
  converged: boolean;
  warnings: string[];
}

export interface TeardownResult {
  name: string;
  destroyed: boolean;
  undefined: boolean;
}

/** The lab's virtual network. Never touches overlays or domains. */
export class NetworkManager {
  private readonly log: LabContext["logger"];

  constructor(private readonly ctx: LabContext) {
    this.log = ctx.logger.withTag("network");
  }

  state(name: string = this.ctx.spec.network.name): Promise<NetworkState> {
    return this.ctx.controlPlane.networkState(name);
  }

  async ensureNetwork(
    spec: NetworkSpec = this.ctx.spec.network,
    options: { recreate?: boolean } = {},
  ): Promise<NetworkResult> {
    const { controlPlane } = this.ctx;
    const current = await controlPlane.networkState(spec.name);

    let action: NetworkResult["action"];
    switch (current) {
      case "not-defined":
        await this.define(spec);
        action = "created";
        break;

      case "inactive":
        // a define whose start failed never reached autostart
        this.log.start(`Starting network ${spec.name}`);
        await controlPlane.startNetwork(spec.name);
        await controlPlane.autostartNetwork(spec.name);
        action = "started";
        break;

      case "active": {
        if (!options.recreate) {
          this.log.info(`Network ${spec.name} already active`);
          return this.ready({ name: spec.name, action: "present", state: current, converged: true, warnings: [] });
        }
        this.log.warn(`Network ${spec.name} already exists`);
        const recreate = await this.ctx.confirm({
          kind: "network-recreate",
          target: spec.name,
          message: `Recreate network ${spec.name}? Running VMs on it lose connectivity.`,
        });
        if (!recreate) {
          this.log.info(`Keeping existing network ${spec.name}`);
          return this.ready({ name: spec.name, action: "kept", state: current, converged: true, warnings: [] });
        }
        this.log.start(`Removing network ${spec.name}`);
        await controlPlane.destroyNetwork(spec.name);
        await controlPlane.undefineNetwork(spec.name);
        await this.define(spec);
        action = "recreated";
        break;
      }
    }

    return this.ready(await this.verify(spec.name, action));
  }

  /** Precondition for starting VMs: the network must exist and end up active. */
  async ensureActive(name: string = this.ctx.spec.network.name): Promise<NetworkResult> {
    const { controlPlane } = this.ctx;
    const current = await controlPlane.networkState(name);
    if (current === "not-defined") throw networkNotDefinedError(name);
    if (current === "active") {
      return { name, action: "present", state: current, converged: true, warnings: [] };
    }

    this.log.start(`Starting network ${name}`);
    await controlPlane.startNetwork(name);
    const result = await this.verify(name, "started");
    if (!result.converged) throw networkNotActiveError(name, result.state);
    return this.ready(result);
  }

  /** Best-effort removal; an already-absent network is not an error. */
  async teardown(name: string = this.ctx.spec.network.name): Promise<TeardownResult> {
    const { controlPlane } = this.ctx;
    const current = await controlPlane.networkState(name);
    const result: TeardownResult = { name, destroyed: false, undefined: false };
    if (current === "not-defined") {
      this.log.info(`Network ${name} not defined, nothing to remove`);
      return result;
    }
    if (current === "active") {
      await controlPlane.destroyNetwork(name);
      result.destroyed = true;
    }
    await controlPlane.undefineNetwork(name);
    result.undefined = true;
    this.log.success(`Network ${name} removed`);
    await safeHook(this.log, "network:teardown", this.ctx.hooks.callHook("network:teardown", { name }));
    return result;
  }

  leases(name: string = this.ctx.spec.network.name): Promise<DhcpLease[]> {
    return this.ctx.controlPlane.dhcpLeases(name);
  }

  private async define(spec: NetworkSpec): Promise<void> {
    this.log.start(`Creating network ${spec.name} (${spec.subnetCIDR}, gateway ${spec.gateway})`);
    await mkdir(dirname(spec.descriptorPath), { recursive: true });
    await writeFile(spec.descriptorPath, renderNetwork(spec));

    const { controlPlane } = this.ctx;
    await controlPlane.defineNetwork(spec.descriptorPath);
    await controlPlane.startNetwork(spec.name);
    await controlPlane.autostartNetwork(spec.name);
  }

  private async verify(name: string, action: NetworkResult["action"]): Promise<NetworkResult> {
    const state = await this.ctx.controlPlane.networkState(name);
    if (state === "active") {
      this.log.success(`Network ${name} ${action} and active`);
      return { name, action, state, converged: true, warnings: [] };
    }
    const warning = `Network ${name} is ${state} after ${action}; expected active`;
    this.log.warn(warning);
    return { name, action, state, converged: false, warnings: [warning] };
  }

  private async ready(result: NetworkResult): Promise<NetworkResult> {
    await safeHook(this.log, "network:ready", this.ctx.hooks.callHook("network:ready", result));
    return result;
  }
}
