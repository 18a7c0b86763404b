import {
  invalidCidrFormatError,
  invalidCidrPrefixError,
  invalidIpAddressError,
} from "../errors/index.ts";

const IPV4_RE = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;
const MAC_RE = /^[0-9a-f]{2}(:[0-9a-f]{2}){5}$/;

export interface Subnet {
  cidr: string;
  /** Network address as an unsigned 32-bit integer */
  network: number;
  prefix: number;
  netmask: string;
  broadcast: number;
}

export function parseIpv4(ip: string): number | null {
  const match = IPV4_RE.exec(ip.trim());
  if (!match) return null;
  let value = 0;
  for (let i = 1; i <= 4; i++) {
    const octet = Number(match[i]);
    if (octet > 255) return null;
    value = value * 256 + octet;
  }
  return value;
}

export function formatIpv4(value: number): string {
  return [value >>> 24, (value >>> 16) & 255, (value >>> 8) & 255, value & 255].join(".");
}

export function requireIpv4(field: string, ip: string): number {
  const value = parseIpv4(ip);
  if (value === null) throw invalidIpAddressError(field, ip);
  return value;
}

export function parseSubnet(cidr: string): Subnet {
  const [address, prefixText, ...rest] = cidr.trim().split("/");
  if (!address || prefixText === undefined || rest.length > 0 || !/^\d{1,2}$/.test(prefixText)) {
    throw invalidCidrFormatError(cidr);
  }
  const ip = parseIpv4(address);
  if (ip === null) throw invalidCidrFormatError(cidr);

  const prefix = Number(prefixText);
  if (prefix < 8 || prefix > 30) throw invalidCidrPrefixError(cidr);

  const mask = (0xffffffff << (32 - prefix)) >>> 0;
  const network = (ip & mask) >>> 0;
  const broadcast = (network | (~mask >>> 0)) >>> 0;
  return { cidr, network, prefix, netmask: formatIpv4(mask), broadcast };
}

/** True for usable host addresses: excludes the network and broadcast addresses. */
export function isHostInSubnet(subnet: Subnet, ip: number): boolean {
  return ip > subnet.network && ip < subnet.broadcast;
}

export function isMacAddress(mac: string): boolean {
  return MAC_RE.test(mac);
}
