import { copyFileSync, existsSync, readFileSync, writeFileSync } from "node:fs";
import { hostsEntriesPresentError, hostsLocalNotFoundError } from "../errors/index.ts";
import type { Reservation } from "./lab-spec.ts";

export const MARKER_START = "# BEGIN kvmlab VMs";
export const MARKER_END = "# END kvmlab VMs";

const ENTRY_RE = /^[0-9]/;

export function hostsLine(reservation: Reservation): string {
  return `${reservation.ip}   ${reservation.fqdn} ${reservation.hostname}`;
}

/** /etc/hosts copied into every guest: loopback plus all lab VMs. */
export function renderGuestHosts(reservations: readonly Reservation[]): string {
  return [
    "127.0.0.1   localhost localhost.localdomain",
    "::1         localhost localhost.localdomain",
    "",
    "# Lab VMs",
    ...reservations.map(hostsLine),
    "",
  ].join("\n");
}

export function renderHostsLocal(
  reservations: readonly Reservation[],
  hostsLocalPath: string,
  now: Date = new Date(),
): string {
  return [
    "# kvmlab VMs - entries for /etc/hosts on the host machine",
    `# Generated by kvmlab create on ${now.toISOString()}`,
    "#",
    "# To add them to your system:",
    "#   sudo kvmlab hosts add",
    `# Or append the lines below from ${hostsLocalPath} manually.`,
    "",
    ...reservations.map(hostsLine),
    "",
  ].join("\n");
}

export function writeHostsLocal(
  path: string,
  reservations: readonly Reservation[],
  now: Date = new Date(),
): void {
  writeFileSync(path, renderHostsLocal(reservations, path, now), { mode: 0o644 });
}

/** Address lines of a hosts file (comments and blanks dropped). */
export function entryLines(content: string): string[] {
  return content.split("\n").filter((line) => ENTRY_RE.test(line));
}

export function hasManagedSection(content: string): boolean {
  return content.split("\n").includes(MARKER_START);
}

export function managedEntries(content: string): string[] {
  const lines = content.split("\n");
  const start = lines.indexOf(MARKER_START);
  if (start === -1) return [];
  const end = lines.indexOf(MARKER_END, start + 1);
  return entryLines(lines.slice(start + 1, end === -1 ? undefined : end).join("\n"));
}

function trimTrailingBlankLines(lines: string[]): string[] {
  let end = lines.length;
  while (end > 0 && lines[end - 1].trim() === "") end--;
  return lines.slice(0, end);
}

export function removeManagedSection(content: string): string {
  const kept: string[] = [];
  let inside = false;
  for (const line of content.split("\n")) {
    if (line === MARKER_START) {
      inside = true;
      continue;
    }
    if (inside) {
      if (line === MARKER_END) inside = false;
      continue;
    }
    kept.push(line);
  }
  const trimmed = trimTrailingBlankLines(kept);
  return trimmed.length > 0 ? `${trimmed.join("\n")}\n` : "";
}

export function appendManagedSection(content: string, entries: readonly string[]): string {
  const base = trimTrailingBlankLines(content.split("\n"));
  const head = base.length > 0 ? `${base.join("\n")}\n\n` : "";
  return `${head}${[MARKER_START, ...entries, MARKER_END].join("\n")}\n`;
}

function backupSuffix(now: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  );
}

export interface HostsFiles {
  hostsFile: string;
  hostsLocal: string;
}

export interface HostsChange {
  backup: string | null;
  entries: string[];
}

export interface HostsStatus {
  configured: boolean;
  entries: string[];
  hostsLocalPresent: boolean;
  /** Lines in hosts.local that `add` would install */
  available: string[];
}

function backup(hostsFile: string, now: Date): string {
  const path = `${hostsFile}.bak.${backupSuffix(now)}`;
  copyFileSync(hostsFile, path);
  return path;
}

function readHostsFile(path: string): string {
  return existsSync(path) ? readFileSync(path, "utf-8") : "";
}

function readHostsLocal(path: string): string[] {
  if (!existsSync(path)) throw hostsLocalNotFoundError(path);
  return entryLines(readFileSync(path, "utf-8"));
}

export function addHostsEntries(files: HostsFiles, now: Date = new Date()): HostsChange {
  const entries = readHostsLocal(files.hostsLocal);
  const content = readHostsFile(files.hostsFile);
  if (hasManagedSection(content)) throw hostsEntriesPresentError(files.hostsFile);

  const backupPath = existsSync(files.hostsFile) ? backup(files.hostsFile, now) : null;
  writeFileSync(files.hostsFile, appendManagedSection(content, entries));
  return { backup: backupPath, entries };
}

export function removeHostsEntries(files: HostsFiles, now: Date = new Date()): HostsChange {
  const content = readHostsFile(files.hostsFile);
  if (!hasManagedSection(content)) return { backup: null, entries: [] };

  const entries = managedEntries(content);
  const backupPath = backup(files.hostsFile, now);
  writeFileSync(files.hostsFile, removeManagedSection(content));
  return { backup: backupPath, entries };
}

/** Replace the managed section with the current hosts.local entries. */
export function updateHostsEntries(files: HostsFiles, now: Date = new Date()): HostsChange {
  const entries = readHostsLocal(files.hostsLocal);
  const content = readHostsFile(files.hostsFile);

  const backupPath = existsSync(files.hostsFile) ? backup(files.hostsFile, now) : null;
  writeFileSync(files.hostsFile, appendManagedSection(removeManagedSection(content), entries));
  return { backup: backupPath, entries };
}

export function hostsStatus(files: HostsFiles): HostsStatus {
  const content = readHostsFile(files.hostsFile);
  const hostsLocalPresent = existsSync(files.hostsLocal);
  return {
    configured: hasManagedSection(content),
    entries: managedEntries(content),
    hostsLocalPresent,
    available: hostsLocalPresent ? entryLines(readFileSync(files.hostsLocal, "utf-8")) : [],
  };
}
