import { existsSync, readFileSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { LabContext } from "../context.ts";
import { safeHook } from "../hooks.ts";
import { descriptorNotFoundError } from "../errors/index.ts";
import type { VMSpec } from "../lib/lab-spec.ts";
import type { DomainState } from "./control-plane.ts";
import { renderDomain } from "./descriptor.ts";

export type TransitionAction = "registered" | "started" | "resumed" | "stopped" | "undefined" | "none";

export interface VmTransition {
  vmName: string;
  action: TransitionAction;
  from: DomainState;
  /** State observed after the action (re-queried, never assumed) */
  state: DomainState;
  converged: boolean;
  warnings: string[];
}

export interface DescriptorResult {
  vmName: string;
  path: string;
  written: boolean;
}

const STOPPED_STATES: ReadonlySet<DomainState> = new Set(["shut-off", "undefined"]);

/**
 * Per-VM descriptor file and domain state machine:
 *
 *   undefined --register--> shut-off --start--> running
 *   paused --resume--> running --stop--> shut-off --undefine--> undefined
 */
export class VmController {
  private readonly log: LabContext["logger"];

  constructor(private readonly ctx: LabContext) {
    this.log = ctx.logger.withTag("vm");
  }

  state(vmName: string): Promise<DomainState> {
    return this.ctx.controlPlane.domainState(vmName);
  }

  macAddresses(vmName: string): Promise<string[]> {
    return this.ctx.controlPlane.domainMacAddresses(vmName);
  }

  /** Render the domain descriptor; the file is rewritten only when its content changes. */
  async writeDescriptor(vm: VMSpec): Promise<DescriptorResult> {
    const xml = renderDomain(vm);
    if (existsSync(vm.descriptorPath) && readFileSync(vm.descriptorPath, "utf-8") === xml) {
      return { vmName: vm.name, path: vm.descriptorPath, written: false };
    }
    await mkdir(dirname(vm.descriptorPath), { recursive: true });
    await writeFile(vm.descriptorPath, xml);
    this.log.info(`Wrote descriptor ${vm.descriptorPath} (MAC ${vm.macAddress})`);
    return { vmName: vm.name, path: vm.descriptorPath, written: true };
  }

  /** Fails with ERR_VM_DESCRIPTOR_NOT_FOUND unless the rendered descriptor is on disk. */
  requireDescriptor(vm: VMSpec): void {
    if (!existsSync(vm.descriptorPath)) throw descriptorNotFoundError(vm.name, vm.descriptorPath);
  }

  async register(vm: VMSpec): Promise<VmTransition> {
    this.requireDescriptor(vm);

    const from = await this.state(vm.name);
    if (from !== "undefined") return this.unchanged(vm.name, from);

    this.log.start(`Registering ${vm.name}`);
    const defined = await this.ctx.controlPlane.defineDomain(vm.descriptorPath);
    const warnings: string[] = [];
    if (defined !== vm.name) {
      warnings.push(`Descriptor ${vm.descriptorPath} defined domain ${defined}, expected ${vm.name}`);
    }
    const result = await this.settle(vm.name, "registered", from, (s) => s !== "undefined", warnings);
    if (result.converged) {
      await safeHook(this.log, "vm:registered", this.ctx.hooks.callHook("vm:registered", { vmName: vm.name }));
    }
    return result;
  }

  async start(vmName: string): Promise<VmTransition> {
    const { controlPlane } = this.ctx;
    const from = await this.state(vmName);

    let action: TransitionAction;
    switch (from) {
      case "running":
        this.log.info(`${vmName} is already running`);
        return this.unchanged(vmName, from);
      case "shut-off":
        this.log.start(`Starting ${vmName}`);
        await controlPlane.startDomain(vmName);
        action = "started";
        break;
      case "paused":
        this.log.start(`Resuming ${vmName}`);
        await controlPlane.resumeDomain(vmName);
        action = "resumed";
        break;
      default: {
        const warning =
          from === "undefined"
            ? `${vmName} is not defined; skipping start`
            : `${vmName} is ${from}; leaving it alone`;
        this.log.warn(warning);
        return { vmName, action: "none", from, state: from, converged: false, warnings: [warning] };
      }
    }

    const result = await this.settle(vmName, action, from, (s) => s === "running");
    if (result.converged) {
      await safeHook(this.log, "vm:started", this.ctx.hooks.callHook("vm:started", { vmName, from }));
    }
    return result;
  }

  /** Power off (destroy); the definition persists. */
  async stop(vmName: string): Promise<VmTransition> {
    const from = await this.state(vmName);
    if (STOPPED_STATES.has(from)) {
      this.log.info(`${vmName} already stopped`);
      return this.unchanged(vmName, from);
    }

    this.log.start(`Stopping ${vmName}`);
    await this.ctx.controlPlane.destroyDomain(vmName);
    const result = await this.settle(vmName, "stopped", from, (s) => STOPPED_STATES.has(s));
    if (result.converged) {
      await safeHook(this.log, "vm:stopped", this.ctx.hooks.callHook("vm:stopped", { vmName, from }));
    }
    return result;
  }

  async undefine(vmName: string): Promise<VmTransition> {
    const from = await this.state(vmName);
    if (from === "undefined") {
      this.log.info(`${vmName} not defined`);
      return this.unchanged(vmName, from);
    }

    this.log.start(`Undefining ${vmName}`);
    await this.ctx.controlPlane.undefineDomain(vmName);
    const result = await this.settle(vmName, "undefined", from, (s) => s === "undefined");
    if (result.converged) {
      await safeHook(this.log, "vm:undefined", this.ctx.hooks.callHook("vm:undefined", { vmName }));
    }
    return result;
  }

  private unchanged(vmName: string, state: DomainState): VmTransition {
    return { vmName, action: "none", from: state, state, converged: true, warnings: [] };
  }

  private async settle(
    vmName: string,
    action: TransitionAction,
    from: DomainState,
    reached: (state: DomainState) => boolean,
    warnings: string[] = [],
  ): Promise<VmTransition> {
    const state = await this.state(vmName);
    const converged = reached(state);
    if (converged) {
      this.log.success(`${vmName} ${action} (${state})`);
    } else {
      warnings.push(`${vmName} is ${state} after ${action}`);
    }
    for (const warning of warnings) this.log.warn(warning);
    return { vmName, action, from, state, converged, warnings };
  }
}
