import { createHash } from "node:crypto";
import { basename, join, resolve } from "node:path";
import {
  gatewayInDhcpRangeError,
  invalidConfigValueError,
  invalidMacError,
  invalidVmNameError,
  ipOutsideSubnetError,
} from "../errors/index.ts";
import type { LabPaths } from "../paths.ts";
import { formatIpv4, isHostInSubnet, parseSubnet, requireIpv4 } from "./ipv4.ts";
import type { GuestConfig, LabConfig, Ownership } from "./lab-config.ts";
import { buildReservationTable, ipAddressFor, macAddressFor } from "./reservations.ts";

export type { Ownership } from "./lab-config.ts";

const VM_NAME_RE = /^[A-Za-z0-9][A-Za-z0-9_-]{0,62}$/;
const MAC_PREFIX_RE = /^[0-9a-f]{2}(:[0-9a-f]{2}){4}$/;
const GUEST_USER_RE = /^[a-z_][a-z0-9_-]{0,31}$/;
const HOSTNAME_RE = /^[a-z0-9]([a-z0-9-]*[a-z0-9])?(\.[a-z0-9]([a-z0-9-]*[a-z0-9])?)*$/;

export interface VMSpec {
  readonly name: string;
  readonly hostname: string;
  readonly fqdn: string;
  readonly uuid: string;
  readonly macAddress: string;
  readonly ipAddress: string;
  readonly memoryMB: number;
  readonly vcpuCount: number;
  readonly overlayPath: string;
  readonly descriptorPath: string;
  readonly baseImagePath: string;
  readonly networkName: string;
}

export interface Reservation {
  readonly vmName: string;
  readonly hostname: string;
  readonly fqdn: string;
  readonly mac: string;
  readonly ip: string;
}

export interface NetworkSpec {
  readonly name: string;
  readonly bridge: string;
  readonly subnetCIDR: string;
  readonly netmask: string;
  readonly gateway: string;
  readonly domainSuffix: string;
  readonly dhcpRange: { readonly start: string; readonly end: string };
  readonly reservations: readonly Reservation[];
  readonly descriptorPath: string;
}

export type GuestSpec = Readonly<GuestConfig>;

export interface LabSpec {
  readonly network: NetworkSpec;
  readonly vms: readonly VMSpec[];
  readonly guest: GuestSpec;
  readonly baseImageSource: string;
  readonly baseImagePath: string;
  readonly ownership: Ownership | null;
  readonly paths: LabPaths;
  readonly timeouts: LabConfig["timeouts"];
}

/**
 * Name-based UUID (RFC 4122 version 5 layout over SHA-1), so a VM keeps the
 * same UUID and its rendered descriptor stays byte-identical across runs.
 */
export function domainUuid(namespace: string, name: string): string {
  const bytes = createHash("sha1").update(`${namespace}\0${name}`).digest().subarray(0, 16);
  bytes[6] = (bytes[6] & 0x0f) | 0x50;
  bytes[8] = (bytes[8] & 0x3f) | 0x80;
  const hex = bytes.toString("hex");
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (typeof child === "object" && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Expand configuration into the immutable lab description every workflow
 * receives. All address validation happens here, once per run.
 */
export function resolveLabSpec(config: LabConfig, paths: LabPaths): LabSpec {
  const net = config.network;
  const subnet = parseSubnet(net.subnet);

  const gateway = requireIpv4("network.gateway", net.gateway);
  if (!isHostInSubnet(subnet, gateway)) {
    throw ipOutsideSubnetError("network.gateway", net.gateway, subnet.cidr);
  }
  const dhcpStart = requireIpv4("network.dhcpRange.start", net.dhcpRange.start);
  const dhcpEnd = requireIpv4("network.dhcpRange.end", net.dhcpRange.end);
  if (!isHostInSubnet(subnet, dhcpStart)) {
    throw ipOutsideSubnetError("network.dhcpRange.start", net.dhcpRange.start, subnet.cidr);
  }
  if (!isHostInSubnet(subnet, dhcpEnd)) {
    throw ipOutsideSubnetError("network.dhcpRange.end", net.dhcpRange.end, subnet.cidr);
  }
  if (dhcpStart > dhcpEnd) {
    throw invalidConfigValueError("network.dhcpRange", "start must not be after end");
  }
  if (gateway >= dhcpStart && gateway <= dhcpEnd) throw gatewayInDhcpRangeError(net.gateway);

  const macPrefix = net.macPrefix.toLowerCase();
  if (!MAC_PREFIX_RE.test(macPrefix)) throw invalidMacError("network.macPrefix", net.macPrefix);

  const domainSuffix = net.domain.toLowerCase();
  if (!HOSTNAME_RE.test(domainSuffix)) {
    throw invalidConfigValueError("network.domain", `"${net.domain}" is not a valid DNS domain`);
  }

  if (!GUEST_USER_RE.test(config.guest.user)) {
    throw invalidConfigValueError("guest.user", `"${config.guest.user}" is not a valid login name`);
  }

  const baseImageSource = resolve(paths.configDir, config.baseImage);
  const baseImagePath = join(paths.imagesDir, basename(baseImageSource));

  const vms: VMSpec[] = config.vms.map((vm) => {
    if (!VM_NAME_RE.test(vm.name)) throw invalidVmNameError(vm.name);
    const hostname = vm.name.toLowerCase().replaceAll("_", "-");
    return {
      name: vm.name,
      hostname,
      fqdn: `${hostname}.${domainSuffix}`,
      uuid: domainUuid(`kvmlab:${net.name}`, vm.name),
      macAddress: macAddressFor(macPrefix, vm.macSuffix),
      ipAddress: ipAddressFor(subnet, vm.ipSuffix),
      memoryMB: vm.memoryMB ?? config.resources.memoryMB,
      vcpuCount: vm.vcpus ?? config.resources.vcpus,
      overlayPath: join(paths.labDir, `${vm.name}.qcow2`),
      descriptorPath: join(paths.labDir, `${vm.name}.xml`),
      baseImagePath,
      networkName: net.name,
    };
  });

  const reservations = buildReservationTable(vms, subnet, net.gateway);
  for (const reservation of reservations) {
    const ip = requireIpv4("reservation", reservation.ip);
    if (ip >= dhcpStart && ip <= dhcpEnd) {
      throw invalidConfigValueError(
        "vms",
        `${reservation.vmName} (${reservation.ip}) falls inside the DHCP pool ${formatIpv4(dhcpStart)}-${formatIpv4(dhcpEnd)}`,
      );
    }
  }

  return deepFreeze({
    network: {
      name: net.name,
      bridge: net.bridge,
      subnetCIDR: subnet.cidr,
      netmask: subnet.netmask,
      gateway: formatIpv4(gateway),
      domainSuffix,
      dhcpRange: { start: formatIpv4(dhcpStart), end: formatIpv4(dhcpEnd) },
      reservations,
      descriptorPath: join(paths.labDir, `${net.name}.xml`),
    },
    vms,
    guest: { ...config.guest },
    baseImageSource,
    baseImagePath,
    ownership: config.ownership ? { ...config.ownership } : null,
    paths: { ...paths },
    timeouts: { ...config.timeouts },
  });
}
