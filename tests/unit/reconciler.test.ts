import { existsSync, readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import { afterEach, describe, expect, it } from "vitest";
import { ImageError, NetworkError, VmError } from "../../src/errors/index.ts";
import { createFixture, type LabFixture } from "./helpers.ts";

let fixture: LabFixture | undefined;

async function setup(options: Parameters<typeof createFixture>[0] = {}): Promise<LabFixture> {
  fixture = await createFixture(options);
  return fixture;
}

afterEach(() => {
  fixture?.cleanup();
  fixture = undefined;
});

describe("Reconciler.create", () => {
  it("builds the whole lab from an empty host in order", async () => {
    const f = await setup();
    const report = await f.lab.create();

    expect(report.baseImage.action).toBe("copied");
    expect(report.overlays.map((o) => o.action)).toEqual(["created", "created"]);
    expect(report.customized).toEqual(["FedoraLab1", "FedoraLab2"]);
    expect(report.descriptors.map((d) => d.written)).toEqual([true, true]);
    expect(report.hostsLocal.written).toBe(true);
    expect(report.network.action).toBe("created");
    expect(report.network.converged).toBe(true);
    expect(report.vms.map((t) => t.state)).toEqual(["shut-off", "shut-off"]);

    expect(f.controlPlane.mutatingCalls().map((c) => c.op)).toEqual([
      "defineNetwork",
      "startNetwork",
      "autostartNetwork",
      "defineDomain",
      "defineDomain",
    ]);
    expect(f.controlPlane.isAutostart("labnet")).toBe(true);
    expect(readFileSync(f.lab.spec.baseImagePath, "utf-8")).toBe("base-image-bytes");
  });

  it("is idempotent: a second run makes no mutating control-plane calls", async () => {
    const f = await setup();
    await f.lab.create();
    f.controlPlane.resetCalls();

    const report = await f.lab.create();

    expect(f.controlPlane.mutatingCalls()).toEqual([]);
    expect(report.baseImage.action).toBe("present");
    expect(report.overlays.map((o) => o.action)).toEqual(["kept", "kept"]);
    expect(report.customized).toEqual([]);
    expect(report.descriptors.map((d) => d.written)).toEqual([false, false]);
    expect(report.hostsLocal.written).toBe(false);
    expect(report.network.action).toBe("present");
    expect(report.vms.map((t) => t.action)).toEqual(["none", "none"]);
    expect(f.customization.calls).toHaveLength(2);
    expect(f.confirmRequests.map((r) => r.kind)).toEqual(["overlay-overwrite", "overlay-overwrite"]);
  });

  it("re-customizes a kept overlay whose customization never finished", async () => {
    const f = await setup();
    f.customization.failWith = new Error("virt-customize crashed");
    await expect(f.lab.create()).rejects.toThrow("virt-customize crashed");
    f.customization.failWith = null;

    const report = await f.lab.create();

    expect(report.overlays.map((o) => o.action)).toEqual(["kept", "created"]);
    expect(report.customized).toEqual(["FedoraLab1", "FedoraLab2"]);
    expect(report.warnings).toEqual([
      "Existing overlay for FedoraLab1 was never fully customized; customizing it now",
    ]);

    const again = await f.lab.create();
    expect(again.customized).toEqual([]);
    expect(again.warnings).toEqual([]);
  });

  it("fails on a missing base image without creating an overlay", async () => {
    const f = await setup();
    await f.lab.images.ensureBaseImage();
    rmSync(f.lab.spec.baseImagePath);

    const error = await f.lab.images.createOverlay(f.lab.spec.vms[0]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ImageError);
    expect(error).toMatchObject({ code: "ERR_IMAGE_BASE_NOT_FOUND" });
    expect(existsSync(f.paths.labDir)).toBe(false);
    expect(f.imageTool.calls).toEqual([]);
  });

  it("leaves a declined overlay's content and mtime untouched", async () => {
    const f = await setup();
    await f.lab.create();
    const overlay = f.lab.spec.vms[0].overlayPath;
    writeFileSync(overlay, "guest data");
    const before = statSync(overlay).mtimeMs;

    await f.lab.create();

    expect(readFileSync(overlay, "utf-8")).toBe("guest data");
    expect(statSync(overlay).mtimeMs).toBe(before);
    expect(f.imageTool.calls).toHaveLength(2);
  });

  it("recreates and re-customizes an overlay when overwrite is confirmed", async () => {
    const f = await setup({ confirm: (r) => r.kind === "overlay-overwrite" });
    await f.lab.create();
    writeFileSync(f.lab.spec.vms[0].overlayPath, "guest data");

    const report = await f.lab.create();

    expect(report.overlays.map((o) => o.action)).toEqual(["recreated", "recreated"]);
    expect(report.customized).toEqual(["FedoraLab1", "FedoraLab2"]);
    expect(readFileSync(f.lab.spec.vms[0].overlayPath, "utf-8")).toBe(
      `overlay backed by ${f.lab.spec.baseImagePath}\n`,
    );
  });

  it("fails on a missing source image without writing anything", async () => {
    const f = await setup({ withSourceImage: false });

    const error = await f.lab.create().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ImageError);
    expect(error).toMatchObject({ code: "ERR_IMAGE_SOURCE_NOT_FOUND" });
    expect(existsSync(f.lab.spec.baseImagePath)).toBe(false);
    expect(existsSync(f.paths.labDir)).toBe(false);
    expect(existsSync(f.paths.hostsLocal)).toBe(false);
    expect(f.controlPlane.mutatingCalls()).toEqual([]);
  });

  it("points at the configured path when the base image was never placed", async () => {
    const f = await setup({ withSourceImage: false });

    const error = await f.lab.create().catch((e: unknown) => e);

    expect(error).toMatchObject({
      path: f.lab.spec.baseImageSource,
      message: `Source base image not found: ${f.lab.spec.baseImageSource}`,
      fix: "Place the base qcow2 image at this path or set baseImage in lab.config.json.",
    });
  });

  it("marks the network autostart when a later run only has to start it", async () => {
    const f = await setup();
    f.controlPlane.failOn("startNetwork", "labnet");
    await expect(f.lab.create()).rejects.toMatchObject({ code: "ERR_CONTROL_PLANE_COMMAND" });
    expect(f.controlPlane.isAutostart("labnet")).toBe(false);
    f.controlPlane.clearFailures();

    const report = await f.lab.create();

    expect(report.network).toMatchObject({ action: "started", state: "active", converged: true });
    expect(f.controlPlane.isAutostart("labnet")).toBe(true);
  });

  it("recreates an active network only when asked and confirmed", async () => {
    const f = await setup({ confirm: (r) => r.kind === "network-recreate" });
    await f.lab.create();
    f.controlPlane.resetCalls();

    const report = await f.lab.create({ recreateNetwork: true });

    expect(report.network.action).toBe("recreated");
    expect(f.controlPlane.mutatingCalls()).toEqual([
      { op: "destroyNetwork", target: "labnet" },
      { op: "undefineNetwork", target: "labnet" },
      { op: "defineNetwork", target: f.lab.spec.network.descriptorPath },
      { op: "startNetwork", target: "labnet" },
      { op: "autostartNetwork", target: "labnet" },
    ]);
  });

  it("keeps the network when recreation is declined", async () => {
    const f = await setup();
    await f.lab.create();
    f.controlPlane.resetCalls();

    const report = await f.lab.create({ recreateNetwork: true });

    expect(report.network.action).toBe("kept");
    expect(f.controlPlane.mutatingCalls()).toEqual([]);
    expect(f.confirmRequests.at(-1)?.kind).toBe("network-recreate");
  });
});

describe("Reconciler.start", () => {
  it("starts every registered VM", async () => {
    const f = await setup();
    await f.lab.create();

    const report = await f.lab.start();

    expect(report.network.action).toBe("present");
    expect(report.vms.map((t) => [t.vmName, t.action, t.state])).toEqual([
      ["FedoraLab1", "started", "running"],
      ["FedoraLab2", "started", "running"],
    ]);
  });

  it("makes zero mutating calls on a running lab", async () => {
    const f = await setup();
    await f.lab.create();
    await f.lab.start();
    f.controlPlane.resetCalls();

    const report = await f.lab.start();

    expect(f.controlPlane.mutatingCalls()).toEqual([]);
    expect(report.vms.map((t) => t.action)).toEqual(["none", "none"]);
  });

  it("resumes a paused VM and starts a shut-off one", async () => {
    const f = await setup();
    await f.lab.create();
    f.controlPlane.seedDomain("FedoraLab1", "paused", ["52:54:00:1a:b0:aa"]);
    f.controlPlane.resetCalls();

    const report = await f.lab.start();

    expect(f.controlPlane.mutatingCalls()).toEqual([
      { op: "resumeDomain", target: "FedoraLab1" },
      { op: "startDomain", target: "FedoraLab2" },
    ]);
    expect(report.vms.map((t) => t.action)).toEqual(["resumed", "started"]);
  });

  it("starts an inactive network before the VMs", async () => {
    const f = await setup();
    await f.lab.create();
    await f.controlPlane.destroyNetwork("labnet");
    f.controlPlane.resetCalls();

    await f.lab.start();

    expect(f.controlPlane.mutatingCalls()[0]).toEqual({ op: "startNetwork", target: "labnet" });
  });

  it("registers a VM whose domain was undefined out of band", async () => {
    const f = await setup();
    await f.lab.create();
    await f.controlPlane.undefineDomain("FedoraLab2");
    f.controlPlane.resetCalls();

    const report = await f.lab.start();

    expect(f.controlPlane.mutatingCalls().map((c) => c.op)).toEqual([
      "startDomain",
      "defineDomain",
      "startDomain",
    ]);
    expect(report.vms[1].state).toBe("running");
  });

  it("fails before starting any VM when a descriptor is missing", async () => {
    const f = await setup();
    await f.lab.create();
    rmSync(f.lab.spec.vms[1].descriptorPath);
    f.controlPlane.resetCalls();

    const error = await f.lab.start().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(VmError);
    expect(error).toMatchObject({ code: "ERR_VM_DESCRIPTOR_NOT_FOUND", vmName: "FedoraLab2" });
    expect(f.controlPlane.mutatingCalls()).toEqual([]);
  });

  it("fails when the network is not defined", async () => {
    const f = await setup();

    const error = await f.lab.start().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ code: "ERR_NETWORK_NOT_DEFINED" });
    expect(f.controlPlane.mutatingCalls()).toEqual([]);
  });

  it("reports a VM that does not reach running instead of trusting the call", async () => {
    const f = await setup();
    await f.lab.create();
    f.controlPlane.freeze("FedoraLab1");

    const report = await f.lab.start();

    expect(report.vms[0]).toMatchObject({ action: "started", state: "shut-off", converged: false });
    expect(report.warnings).toEqual(["FedoraLab1 is shut-off after started"]);
  });
});

describe("Reconciler.reset", () => {
  const resetOnly = (r: { kind: string }) => r.kind === "reset";

  it("does nothing when the reset is declined", async () => {
    const f = await setup();
    await f.lab.create();
    f.controlPlane.resetCalls();

    const report = await f.lab.reset();

    expect(report.aborted).toBe(true);
    expect(report.steps).toEqual([]);
    expect(f.controlPlane.mutatingCalls()).toEqual([]);
    expect(existsSync(f.paths.labDir)).toBe(true);
  });

  it("tears down VMs, network and storage but keeps the base image", async () => {
    const f = await setup({ confirm: resetOnly });
    await f.lab.create();
    await f.lab.start();

    const report = await f.lab.reset({ destroyOnly: true });

    expect(report.steps.map((s) => [s.step, s.target, s.ok])).toEqual([
      ["stop", "FedoraLab1", true],
      ["stop", "FedoraLab2", true],
      ["undefine", "FedoraLab1", true],
      ["undefine", "FedoraLab2", true],
      ["network", "labnet", true],
      ["storage", f.paths.labDir, true],
    ]);
    expect(await f.controlPlane.networkState("labnet")).toBe("not-defined");
    expect(f.controlPlane.hasDomain("FedoraLab1")).toBe(false);
    expect(existsSync(f.paths.labDir)).toBe(false);
    expect(existsSync(f.lab.spec.baseImagePath)).toBe(true);
    expect(report.create).toBeNull();
  });

  it("continues past an already-undefined network and failing steps", async () => {
    const f = await setup({ confirm: resetOnly });
    await f.lab.create();
    await f.lab.start();
    await f.controlPlane.destroyNetwork("labnet");
    await f.controlPlane.undefineNetwork("labnet");
    f.controlPlane.failOn("destroyDomain", "FedoraLab1", "error: injected failure");

    const report = await f.lab.reset({ destroyOnly: true });

    const stop1 = report.steps[0];
    expect(stop1).toMatchObject({ step: "stop", target: "FedoraLab1", ok: false });
    expect(report.steps.find((s) => s.step === "network")).toMatchObject({ ok: true, detail: "not defined" });
    expect(report.steps.filter((s) => s.ok)).toHaveLength(5);
    expect(f.controlPlane.hasDomain("FedoraLab1")).toBe(false);
    expect(existsSync(f.paths.labDir)).toBe(false);
    expect(report.warnings).toHaveLength(1);
  });

  it("keeps the network with --vms-only", async () => {
    const f = await setup({ confirm: resetOnly });
    await f.lab.create();
    await f.lab.start();
    f.controlPlane.resetCalls();

    const report = await f.lab.reset({ scope: "vms-only", destroyOnly: true });

    const ops = f.controlPlane.mutatingCalls().map((c) => c.op);
    expect(ops).not.toContain("destroyNetwork");
    expect(ops).not.toContain("undefineNetwork");
    expect(report.steps.map((s) => s.step)).toEqual(["stop", "stop", "undefine", "undefine", "storage"]);
    expect(await f.controlPlane.networkState("labnet")).toBe("active");
    expect(existsSync(f.paths.labDir)).toBe(false);
  });

  it("rebuilds the same addresses and descriptors after a reset", async () => {
    const f = await setup({ confirm: resetOnly });
    await f.lab.create();
    const domainXml = readFileSync(f.lab.spec.vms[0].descriptorPath, "utf-8");
    const networkXml = readFileSync(f.lab.spec.network.descriptorPath, "utf-8");

    await f.lab.reset({ destroyOnly: true });
    await f.lab.create();

    expect(readFileSync(f.lab.spec.vms[0].descriptorPath, "utf-8")).toBe(domainXml);
    expect(readFileSync(f.lab.spec.network.descriptorPath, "utf-8")).toBe(networkXml);
    expect(await f.controlPlane.domainMacAddresses("FedoraLab1")).toEqual(["52:54:00:1a:b0:aa"]);
  });

  it("recreates and starts the lab unless destroy-only", async () => {
    const f = await setup({ confirm: resetOnly });
    await f.lab.create();

    const report = await f.lab.reset();

    expect(report.create?.overlays.map((o) => o.action)).toEqual(["created", "created"]);
    expect(report.start?.vms.map((t) => t.state)).toEqual(["running", "running"]);
    expect(await f.controlPlane.networkState("labnet")).toBe("active");
  });
});

describe("Reconciler.status", () => {
  it("matches leases to VMs through their interface MACs", async () => {
    const f = await setup();
    await f.lab.create();
    await f.lab.start();
    f.controlPlane.setLeases("labnet", [
      { mac: "52:54:00:1a:b0:aa", ip: "192.168.100.10", hostname: "fedoralab1", expiry: "2026-10-18 12:00:00" },
    ]);

    const report = await f.lab.status();

    expect(report.network).toEqual({
      name: "labnet",
      state: "active",
      subnet: "192.168.100.0/24",
      gateway: "192.168.100.1",
    });
    expect(report.vms).toEqual([
      {
        name: "FedoraLab1",
        fqdn: "fedoralab1.example.com",
        state: "running",
        macAddress: "52:54:00:1a:b0:aa",
        expectedIp: "192.168.100.10",
        leasedIp: "192.168.100.10",
      },
      {
        name: "FedoraLab2",
        fqdn: "fedoralab2.example.com",
        state: "running",
        macAddress: "52:54:00:1a:b0:bb",
        expectedIp: "192.168.100.11",
        leasedIp: null,
      },
    ]);
    expect(report.hostsLocalPresent).toBe(true);
    expect(report.hostsConfigured).toBe(false);
  });

  it("reports an empty lab without touching anything", async () => {
    const f = await setup();

    const report = await f.lab.status();

    expect(report.network.state).toBe("not-defined");
    expect(report.leases).toEqual([]);
    expect(report.vms.map((vm) => vm.state)).toEqual(["undefined", "undefined"]);
    expect(f.controlPlane.mutatingCalls()).toEqual([]);
  });
});
