import {
  duplicateReservationError,
  gatewayReservedError,
  invalidIntegerError,
  invalidMacError,
  ipOutsideSubnetError,
} from "../errors/index.ts";
import { formatIpv4, isHostInSubnet, isMacAddress, parseIpv4, type Subnet } from "./ipv4.ts";
import type { Reservation, VMSpec } from "./lab-spec.ts";

export function macAddressFor(prefix: string, suffix: string): string {
  const mac = `${prefix}:${suffix}`.toLowerCase();
  if (!isMacAddress(mac)) throw invalidMacError(`MAC suffix "${suffix}"`, mac);
  return mac;
}

export function ipAddressFor(subnet: Subnet, suffix: number): string {
  const maxSuffix = subnet.broadcast - subnet.network - 1;
  if (!Number.isInteger(suffix) || suffix < 1 || suffix > maxSuffix) {
    throw invalidIntegerError("ipSuffix", suffix, 1, maxSuffix);
  }
  return formatIpv4(subnet.network + suffix);
}

/**
 * Build the DHCP reservation table from the VM list, in declared order.
 * Throws unless names, MACs and IPs are all unique, every IP is a host
 * address inside `subnet`, and no VM holds the gateway address.
 */
export function buildReservationTable(
  vms: readonly VMSpec[],
  subnet: Subnet,
  gateway: string,
): Reservation[] {
  const names = new Set<string>();
  const macs = new Set<string>();
  const ips = new Set<string>();
  const gatewayIp = parseIpv4(gateway);

  return vms.map((vm) => {
    const hostname = vm.hostname.toLowerCase();
    if (names.has(hostname)) throw duplicateReservationError("name", vm.name);
    if (macs.has(vm.macAddress)) throw duplicateReservationError("mac", vm.macAddress);
    if (ips.has(vm.ipAddress)) throw duplicateReservationError("ip", vm.ipAddress);

    const ip = parseIpv4(vm.ipAddress);
    if (ip === null || !isHostInSubnet(subnet, ip)) {
      throw ipOutsideSubnetError(`IP of ${vm.name}`, vm.ipAddress, subnet.cidr);
    }
    if (ip === gatewayIp) throw gatewayReservedError(vm.name, formatIpv4(ip));

    names.add(hostname);
    macs.add(vm.macAddress);
    ips.add(vm.ipAddress);

    return {
      vmName: vm.name,
      hostname,
      fqdn: vm.fqdn,
      mac: vm.macAddress,
      ip: vm.ipAddress,
    };
  });
}
