import { describe, expect, it } from "vitest";
import { ControlPlaneError, commandFailedError } from "../../src/errors/index.ts";
import type { ExecFn } from "../../src/lib/exec.ts";
import { VirshControlPlane } from "../../src/services/control-plane.ts";

type Response = { stdout: string } | { fail: string };

function createMockExec(responses: Map<string, Response>) {
  const calls: Array<{ bin: string; args: string[]; timeoutMs?: number }> = [];

  const exec: ExecFn = async (bin, args, options) => {
    calls.push({ bin, args, timeoutMs: options?.timeoutMs });
    const key = args.slice(2).join(" ");
    const response = responses.get(key);
    if (response === undefined) throw new Error(`Mock: unexpected call: ${key}`);
    if ("fail" in response) throw commandFailedError(`virsh ${key}`, 1, response.fail);
    return { stdout: response.stdout, stderr: "" };
  };

  return { exec, calls };
}

describe("VirshControlPlane", () => {
  it("passes the connection URI and timeout on every call", async () => {
    const { exec, calls } = createMockExec(new Map([["domstate FedoraLab1", { stdout: "running\n" }]]));
    const cp = new VirshControlPlane({ exec, timeoutMs: 5_000 });

    expect(await cp.domainState("FedoraLab1")).toBe("running");
    expect(calls).toEqual([
      { bin: "virsh", args: ["-c", "qemu:///system", "domstate", "FedoraLab1"], timeoutMs: 5_000 },
    ]);
  });

  it("maps a missing domain to the undefined state", async () => {
    const { exec } = createMockExec(
      new Map([["domstate Ghost", { fail: "error: failed to get domain 'Ghost'" }]]),
    );
    expect(await new VirshControlPlane({ exec }).domainState("Ghost")).toBe("undefined");
  });

  it("propagates other query failures", async () => {
    const { exec } = createMockExec(
      new Map([["domstate FedoraLab1", { fail: "error: failed to connect to the hypervisor" }]]),
    );
    await expect(new VirshControlPlane({ exec }).domainState("FedoraLab1")).rejects.toBeInstanceOf(
      ControlPlaneError,
    );
  });

  it("maps network info to a network state", async () => {
    const { exec } = createMockExec(
      new Map<string, Response>([
        ["net-info labnet", { stdout: "Name: labnet\nActive: no\n" }],
        ["net-info other", { fail: "error: failed to get network 'other'" }],
      ]),
    );
    const cp = new VirshControlPlane({ exec });
    expect(await cp.networkState("labnet")).toBe("inactive");
    expect(await cp.networkState("other")).toBe("not-defined");
  });

  it("returns the name reported by define", async () => {
    const { exec } = createMockExec(
      new Map([["define /lab/FedoraLab1.xml", { stdout: "Domain 'FedoraLab1' defined from /lab/FedoraLab1.xml\n" }]]),
    );
    expect(await new VirshControlPlane({ exec }).defineDomain("/lab/FedoraLab1.xml")).toBe("FedoraLab1");
  });

  it("rejects define output it cannot read", async () => {
    const { exec } = createMockExec(new Map([["define /lab/x.xml", { stdout: "ok\n" }]]));
    await expect(new VirshControlPlane({ exec }).defineDomain("/lab/x.xml")).rejects.toMatchObject({
      code: "ERR_CONTROL_PLANE_OUTPUT",
    });
  });

  it("falls back to a plain undefine when --nvram is rejected", async () => {
    const { exec, calls } = createMockExec(
      new Map<string, Response>([
        ["undefine FedoraLab1 --nvram", { fail: "error: unsupported flags (0x4)" }],
        ["undefine FedoraLab1", { stdout: "Domain 'FedoraLab1' has been undefined\n" }],
      ]),
    );
    await new VirshControlPlane({ exec }).undefineDomain("FedoraLab1");
    expect(calls.map((c) => c.args.slice(2).join(" "))).toEqual([
      "undefine FedoraLab1 --nvram",
      "undefine FedoraLab1",
    ]);
  });

  it("treats destroying a stopped network as done", async () => {
    const { exec } = createMockExec(
      new Map([["net-destroy labnet", { fail: "error: Requested operation is not valid: network is not active" }]]),
    );
    await expect(new VirshControlPlane({ exec }).destroyNetwork("labnet")).resolves.toBeUndefined();
  });

  it("reads leases and interface MACs", async () => {
    const { exec } = createMockExec(
      new Map([
        [
          "net-dhcp-leases labnet",
          {
            stdout:
              " Expiry Time   MAC address   Protocol   IP address   Hostname   Client ID or DUID\n" +
              "---------------------------------------------\n" +
              " 2026-10-18 09:30:00   52:54:00:1a:b0:aa   ipv4   192.168.100.10/24   fedoralab1   -\n",
          },
        ],
        ["domiflist FedoraLab1", { stdout: " vnet0   network   labnet   virtio   52:54:00:1a:b0:aa\n" }],
      ]),
    );
    const cp = new VirshControlPlane({ exec });
    expect(await cp.dhcpLeases("labnet")).toEqual([
      { expiry: "2026-10-18 09:30:00", mac: "52:54:00:1a:b0:aa", ip: "192.168.100.10", hostname: "fedoralab1" },
    ]);
    expect(await cp.domainMacAddresses("FedoraLab1")).toEqual(["52:54:00:1a:b0:aa"]);
  });
});
