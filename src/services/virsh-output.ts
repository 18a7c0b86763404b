import type { DomainState, DhcpLease } from "./control-plane.ts";

// virsh prints human-oriented text; everything that reads it lives here.

const MAC_RE = /\b([0-9a-f]{2}(?::[0-9a-f]{2}){5})\b/i;

const DOMAIN_STATES: Readonly<Record<string, DomainState>> = {
  running: "running",
  "shut off": "shut-off",
  paused: "paused",
  "in shutdown": "in-shutdown",
  crashed: "crashed",
  pmsuspended: "pmsuspended",
  idle: "blocked",
  blocked: "blocked",
};

/** `virsh domstate <name>` → DomainState; unrecognized text maps to "unknown". */
export function parseDomainState(output: string): DomainState {
  const line = output.trim().split("\n")[0]?.trim().toLowerCase() ?? "";
  return DOMAIN_STATES[line] ?? "unknown";
}

/** `virsh net-info <name>` → whether the `Active:` row says yes. */
export function parseNetworkActive(output: string): boolean {
  for (const line of output.split("\n")) {
    const match = /^\s*Active:\s*(\S+)/i.exec(line);
    if (match) return match[1].toLowerCase() === "yes";
  }
  return false;
}

/**
 * `virsh net-dhcp-leases <network>`:
 *
 *  Expiry Time           MAC address         Protocol   IP address          Hostname     Client ID or DUID
 * ---------------------------------------------------------------------------------------------------------
 *  2026-01-10 12:00:00   52:54:00:1a:b0:aa   ipv4       192.168.100.10/24   fedoralab1   01:52:54:00:1a:b0:aa
 */
export function parseDhcpLeases(output: string): DhcpLease[] {
  const leases: DhcpLease[] = [];
  for (const raw of output.split("\n")) {
    const fields = raw.trim().split(/\s+/);
    if (fields.length < 5 || !MAC_RE.test(fields[2])) continue;
    const [date, time, mac, , address, hostname] = fields;
    leases.push({
      expiry: `${date} ${time}`,
      mac: mac.toLowerCase(),
      ip: address.split("/")[0],
      hostname: hostname && hostname !== "-" ? hostname : null,
    });
  }
  return leases;
}

/** `virsh domiflist <name>` → MAC addresses of the domain's interfaces, in order. */
export function parseInterfaceMacs(output: string): string[] {
  const macs: string[] = [];
  for (const line of output.split("\n")) {
    const match = MAC_RE.exec(line);
    if (match) macs.push(match[1].toLowerCase());
  }
  return macs;
}

/** `virsh define <file>` → defined domain name, or null when the text is unfamiliar. */
export function parseDefinedName(output: string): string | null {
  const match = /Domain '?([^'\s]+)'? defined/.exec(output);
  return match ? match[1] : null;
}

export function isDomainNotFound(stderr: string): boolean {
  return /failed to get domain|Domain not found|no domain with matching name/i.test(stderr);
}

export function isNetworkNotFound(stderr: string): boolean {
  return /failed to get network|Network not found|no network with matching name/i.test(stderr);
}

/** Stderr of net-start/start when the resource is already running. */
export function isAlreadyActive(stderr: string): boolean {
  return /is already active|already running/i.test(stderr);
}

/** Stderr of destroy/net-destroy when there was nothing to stop. */
export function isNotRunning(stderr: string): boolean {
  return /domain is not running|network is not active|not running/i.test(stderr);
}
