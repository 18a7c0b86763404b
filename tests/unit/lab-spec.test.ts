import { describe, expect, it } from "vitest";
import { ValidationError } from "../../src/errors/index.ts";
import { DEFAULT_LAB_CONFIG, type LabConfig } from "../../src/lib/lab-config.ts";
import { domainUuid, resolveLabSpec } from "../../src/lib/lab-spec.ts";
import { labPaths } from "../../src/paths.ts";
import { renderNetwork } from "../../src/services/descriptor.ts";

const paths = labPaths({
  configFile: "/srv/lab/lab.config.json",
  imagesDir: "/var/lib/libvirt/images",
  labDirName: "fedora-lab",
});

function config(overrides: Partial<LabConfig> = {}): LabConfig {
  return { ...structuredClone(DEFAULT_LAB_CONFIG), ...overrides };
}

function network(overrides: Partial<LabConfig["network"]>): LabConfig["network"] {
  return { ...structuredClone(DEFAULT_LAB_CONFIG.network), ...overrides };
}

describe("resolveLabSpec", () => {
  it("expands the default lab into VM and network specs", () => {
    const spec = resolveLabSpec(config(), paths);

    expect(spec.vms[0]).toMatchObject({
      name: "FedoraLab1",
      hostname: "fedoralab1",
      fqdn: "fedoralab1.example.com",
      macAddress: "52:54:00:1a:b0:aa",
      ipAddress: "192.168.100.10",
      memoryMB: 1024,
      vcpuCount: 2,
      overlayPath: "/var/lib/libvirt/images/fedora-lab/FedoraLab1.qcow2",
      descriptorPath: "/var/lib/libvirt/images/fedora-lab/FedoraLab1.xml",
      baseImagePath: "/var/lib/libvirt/images/Fedora43Lab.qcow2",
      networkName: "labnet",
    });
    expect(spec.baseImageSource).toBe("/srv/lab/Fedora43Lab.qcow2");
    expect(spec.network).toMatchObject({
      subnetCIDR: "192.168.100.0/24",
      netmask: "255.255.255.0",
      gateway: "192.168.100.1",
      domainSuffix: "example.com",
      descriptorPath: "/var/lib/libvirt/images/fedora-lab/labnet.xml",
    });
    expect(spec.network.reservations).toEqual([
      { vmName: "FedoraLab1", hostname: "fedoralab1", fqdn: "fedoralab1.example.com", mac: "52:54:00:1a:b0:aa", ip: "192.168.100.10" },
      { vmName: "FedoraLab2", hostname: "fedoralab2", fqdn: "fedoralab2.example.com", mac: "52:54:00:1a:b0:bb", ip: "192.168.100.11" },
    ]);
  });

  it("freezes the result", () => {
    const spec = resolveLabSpec(config(), paths);
    expect(Object.isFrozen(spec)).toBe(true);
    expect(Object.isFrozen(spec.vms[0])).toBe(true);
    expect(Object.isFrozen(spec.network.reservations)).toBe(true);
  });

  it("honors per-VM resource overrides", () => {
    const spec = resolveLabSpec(
      config({ vms: [{ name: "Big", ipSuffix: 20, macSuffix: "cc", memoryMB: 4096, vcpus: 4 }] }),
      paths,
    );
    expect(spec.vms[0]).toMatchObject({ memoryMB: 4096, vcpuCount: 4, ipAddress: "192.168.100.20" });
  });

  it("rejects a gateway inside the DHCP pool", () => {
    expect(() => resolveLabSpec(config({ network: network({ gateway: "192.168.100.150" }) }), paths)).toThrow(
      "Gateway 192.168.100.150 falls inside the DHCP range",
    );
  });

  it("rejects a VM holding the gateway address", () => {
    expect(() =>
      resolveLabSpec(config({ vms: [{ name: "Gw", ipSuffix: 1, macSuffix: "01" }] }), paths),
    ).toThrow("VM Gw is assigned the gateway address 192.168.100.1");
  });

  it("compares the gateway by address, not by spelling", () => {
    expect(() => resolveLabSpec(config({ network: network({ gateway: "192.168.100.010" }) }), paths)).toThrow(
      "VM FedoraLab1 is assigned the gateway address 192.168.100.10",
    );
  });

  it("stores gateway and DHCP range in canonical form", () => {
    const spec = resolveLabSpec(
      config({
        network: network({ gateway: "192.168.100.01", dhcpRange: { start: "192.168.100.099", end: "192.168.100.200" } }),
      }),
      paths,
    );
    expect(spec.network.gateway).toBe("192.168.100.1");
    expect(spec.network.dhcpRange).toEqual({ start: "192.168.100.99", end: "192.168.100.200" });
    expect(renderNetwork(spec.network)).toContain("  <ip address='192.168.100.1' netmask='255.255.255.0'>\n");
  });

  it("rejects a reservation inside the DHCP pool", () => {
    expect(() =>
      resolveLabSpec(config({ vms: [{ name: "Pool", ipSuffix: 150, macSuffix: "01" }] }), paths),
    ).toThrow(ValidationError);
  });

  it("rejects invalid VM names and MAC prefixes", () => {
    expect(() => resolveLabSpec(config({ vms: [{ name: "bad name", ipSuffix: 10, macSuffix: "aa" }] }), paths)).toThrow(
      ValidationError,
    );
    expect(() => resolveLabSpec(config({ network: network({ macPrefix: "52:54:00" }) }), paths)).toThrow(
      'Invalid MAC address for network.macPrefix: "52:54:00"',
    );
  });
});

describe("domainUuid", () => {
  it("is stable and RFC 4122 shaped", () => {
    const uuid = domainUuid("kvmlab:labnet", "FedoraLab1");
    expect(uuid).toBe(domainUuid("kvmlab:labnet", "FedoraLab1"));
    expect(uuid).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(domainUuid("kvmlab:labnet", "FedoraLab2")).not.toBe(uuid);
  });
});
