import { existsSync, readFileSync } from "node:fs";
import type { LabContext } from "../context.ts";
import { safeHook } from "../hooks.ts";
import { FileLock } from "../lib/file-lock.ts";
import { entryLines, hasManagedSection, hostsLine, writeHostsLocal } from "../lib/hosts-file.ts";
import type { VMSpec } from "../lib/lab-spec.ts";
import { toError } from "../lib/utils.ts";
import type { DhcpLease, DomainState, NetworkState } from "./control-plane.ts";
import { ImageManager, type BaseImageResult, type OverlayResult } from "./image.ts";
import { NetworkManager, type NetworkResult } from "./network.ts";
import { VmController, type DescriptorResult, type VmTransition } from "./vm.ts";

export type Workflow = "create" | "start" | "reset" | "status";
export type ResetStepName = "stop" | "undefine" | "network" | "storage";
export type ResetScope = "full" | "vms-only";

export interface CreateOptions {
  /** Offer to destroy and redefine an existing network (still gated by confirm) */
  recreateNetwork?: boolean;
}

export interface CreateReport {
  baseImage: BaseImageResult;
  overlays: OverlayResult[];
  /** VMs whose overlay was customized this run */
  customized: string[];
  descriptors: DescriptorResult[];
  hostsLocal: { path: string; written: boolean };
  network: NetworkResult;
  vms: VmTransition[];
  warnings: string[];
}

export interface StartReport {
  network: NetworkResult;
  vms: VmTransition[];
  warnings: string[];
}

export interface ResetOptions {
  scope?: ResetScope;
  /** Tear down only; skip the create + start that normally follows */
  destroyOnly?: boolean;
}

export interface ResetStep {
  step: ResetStepName;
  target: string;
  ok: boolean;
  detail: string;
}

export interface ResetReport {
  aborted: boolean;
  scope: ResetScope;
  steps: ResetStep[];
  create: CreateReport | null;
  start: StartReport | null;
  warnings: string[];
}

export interface VmStatus {
  name: string;
  fqdn: string;
  state: DomainState;
  macAddress: string;
  expectedIp: string;
  /** IP leased to one of the domain's interface MACs, if any */
  leasedIp: string | null;
}

export interface StatusReport {
  network: { name: string; state: NetworkState; subnet: string; gateway: string };
  leases: DhcpLease[];
  vms: VmStatus[];
  hostsConfigured: boolean;
  hostsLocalPresent: boolean;
}

/**
 * Orchestrates the managers into the four lab workflows. Each workflow
 * queries live state first and can be re-run from any partial state.
 */
export class Reconciler {
  readonly images: ImageManager;
  readonly network: NetworkManager;
  readonly vms: VmController;
  private readonly log: LabContext["logger"];
  private readonly lock: FileLock;

  constructor(private readonly ctx: LabContext) {
    this.images = new ImageManager(ctx);
    this.network = new NetworkManager(ctx);
    this.vms = new VmController(ctx);
    this.log = ctx.logger.withTag("lab");
    this.lock = new FileLock(ctx.spec.paths.lockFile, "lab", {
      onWait: () => this.log.info(`Waiting for another kvmlab command holding ${ctx.spec.paths.lockFile}`),
    });
  }

  get spec(): LabContext["spec"] {
    return this.ctx.spec;
  }

  create(options: CreateOptions = {}): Promise<CreateReport> {
    return this.workflow("create", () => this.runCreate(options));
  }

  start(): Promise<StartReport> {
    return this.workflow("start", () => this.runStart());
  }

  reset(options: ResetOptions = {}): Promise<ResetReport> {
    return this.workflow("reset", () => this.runReset(options));
  }

  status(): Promise<StatusReport> {
    return this.workflow("status", () => this.runStatus());
  }

  private async workflow<T>(name: Workflow, fn: () => Promise<T>): Promise<T> {
    try {
      return await this.lock.runAsync(fn);
    } catch (error) {
      await safeHook(
        this.log,
        "workflow:error",
        this.ctx.hooks.callHook("workflow:error", { workflow: name, error: toError(error) }),
      );
      throw error;
    }
  }

  private async runCreate(options: CreateOptions): Promise<CreateReport> {
    const { spec } = this.ctx;
    const baseImage = await this.images.ensureBaseImage();

    const overlays: OverlayResult[] = [];
    const customized: string[] = [];
    const descriptors: DescriptorResult[] = [];
    const warnings: string[] = [];
    for (const vm of spec.vms) {
      const overlay = await this.images.createOverlay(vm);
      overlays.push(overlay);
      if (overlay.action === "kept" && this.images.isCustomized(vm)) {
        this.log.info(`Skipping customization of ${vm.name}: existing overlay kept`);
      } else {
        if (overlay.action === "kept") {
          const warning = `Existing overlay for ${vm.name} was never fully customized; customizing it now`;
          this.log.warn(warning);
          warnings.push(warning);
        }
        await this.images.customizeOverlay(vm);
        customized.push(vm.name);
      }
      descriptors.push(await this.vms.writeDescriptor(vm));
    }

    const hostsLocal = this.writeHostsLocal();
    const network = await this.network.ensureNetwork(spec.network, {
      recreate: options.recreateNetwork ?? false,
    });

    const vms: VmTransition[] = [];
    for (const vm of spec.vms) {
      vms.push(await this.vms.register(vm));
    }

    return {
      baseImage,
      overlays,
      customized,
      descriptors,
      hostsLocal,
      network,
      vms,
      warnings: [...warnings, ...network.warnings, ...vms.flatMap((t) => t.warnings)],
    };
  }

  private async runStart(): Promise<StartReport> {
    const network = await this.network.ensureActive();
    for (const vm of this.ctx.spec.vms) this.vms.requireDescriptor(vm);

    const vms: VmTransition[] = [];
    const warnings = [...network.warnings];
    for (const vm of this.ctx.spec.vms) {
      const registered = await this.vms.register(vm);
      warnings.push(...registered.warnings);
      const started = await this.vms.start(vm.name);
      warnings.push(...started.warnings);
      vms.push(started);
    }
    return { network, vms, warnings };
  }

  private async runReset(options: ResetOptions): Promise<ResetReport> {
    const { spec } = this.ctx;
    const scope = options.scope ?? "full";
    const report: ResetReport = { aborted: false, scope, steps: [], create: null, start: null, warnings: [] };

    const confirmed = await this.ctx.confirm({
      kind: "reset",
      target: spec.paths.labDir,
      message:
        scope === "full"
          ? `Destroy all lab VMs, the ${spec.network.name} network and ${spec.paths.labDir}?`
          : `Destroy all lab VMs and ${spec.paths.labDir}? The network is kept.`,
    });
    if (!confirmed) {
      this.log.info("Reset cancelled");
      report.aborted = true;
      return report;
    }

    for (const vm of spec.vms) {
      await this.step(report, "stop", vm.name, async () => describe(report, await this.vms.stop(vm.name)));
    }
    for (const vm of spec.vms) {
      await this.step(report, "undefine", vm.name, async () => describe(report, await this.vms.undefine(vm.name)));
    }
    if (scope === "full") {
      await this.step(report, "network", spec.network.name, async () => {
        const result = await this.network.teardown(spec.network.name);
        return result.undefined ? "removed" : "not defined";
      });
    } else {
      this.log.info(`Keeping network ${spec.network.name}`);
    }
    await this.step(report, "storage", spec.paths.labDir, async () =>
      (await this.images.removeOverlayStorage(spec.paths.labDir)) ? "removed" : "absent",
    );

    if (options.destroyOnly) return report;

    this.log.start("Recreating lab");
    report.create = await this.runCreate({ recreateNetwork: false });
    report.start = await this.runStart();
    report.warnings.push(...report.create.warnings, ...report.start.warnings);
    return report;
  }

  private async runStatus(): Promise<StatusReport> {
    const { spec } = this.ctx;
    const state = await this.network.state(spec.network.name);
    const leases = state === "active" ? await this.network.leases(spec.network.name) : [];

    const vms: VmStatus[] = [];
    for (const vm of spec.vms) {
      vms.push(await this.vmStatus(vm, leases));
    }

    const hostsFile = spec.paths.hostsFile;
    return {
      network: { name: spec.network.name, state, subnet: spec.network.subnetCIDR, gateway: spec.network.gateway },
      leases,
      vms,
      hostsConfigured: existsSync(hostsFile) && hasManagedSection(readFileSync(hostsFile, "utf-8")),
      hostsLocalPresent: existsSync(spec.paths.hostsLocal),
    };
  }

  private async vmStatus(vm: VMSpec, leases: readonly DhcpLease[]): Promise<VmStatus> {
    const state = await this.vms.state(vm.name);
    const macs = state === "undefined" ? [] : await this.vms.macAddresses(vm.name);
    const lease = leases.find((l) => macs.includes(l.mac));
    return {
      name: vm.name,
      fqdn: vm.fqdn,
      state,
      macAddress: vm.macAddress,
      expectedIp: vm.ipAddress,
      leasedIp: lease?.ip ?? null,
    };
  }

  /** hosts.local is rewritten only when its address lines change. */
  private writeHostsLocal(): { path: string; written: boolean } {
    const { spec } = this.ctx;
    const path = spec.paths.hostsLocal;
    const wanted = spec.network.reservations.map(hostsLine);
    if (existsSync(path)) {
      const current = entryLines(readFileSync(path, "utf-8"));
      if (current.join("\n") === wanted.join("\n")) return { path, written: false };
    }
    writeHostsLocal(path, spec.network.reservations);
    this.log.info(`Wrote ${path}`);
    return { path, written: true };
  }

  /** One best-effort reset step: failures are recorded and logged, never thrown. */
  private async step(
    report: ResetReport,
    step: ResetStepName,
    target: string,
    fn: () => Promise<string>,
  ): Promise<void> {
    let entry: ResetStep;
    try {
      entry = { step, target, ok: true, detail: await fn() };
    } catch (error) {
      const message = toError(error).message;
      this.log.warn(`Reset step ${step} (${target}) failed: ${message}`);
      report.warnings.push(`${step} ${target}: ${message}`);
      entry = { step, target, ok: false, detail: message };
    }
    report.steps.push(entry);
    await safeHook(
      this.log,
      "reset:step",
      this.ctx.hooks.callHook("reset:step", {
        step,
        target,
        ok: entry.ok,
        ...(entry.ok ? {} : { error: new Error(entry.detail) }),
      }),
    );
  }
}

function describe(report: ResetReport, transition: VmTransition): string {
  report.warnings.push(...transition.warnings);
  return transition.action === "none" ? `already ${transition.state}` : transition.action;
}
