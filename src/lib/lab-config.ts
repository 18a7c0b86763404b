import { existsSync, readFileSync } from "node:fs";
import { invalidConfigFileError, invalidConfigValueError, invalidIntegerError } from "../errors/index.ts";
import { resolveConfigPath } from "../paths.ts";

export interface NetworkConfig {
  name: string;
  bridge: string;
  subnet: string;
  gateway: string;
  domain: string;
  dhcpRange: { start: string; end: string };
  /** First five octets shared by every lab VM's MAC address */
  macPrefix: string;
}

export interface VmConfig {
  name: string;
  ipSuffix: number;
  macSuffix: string;
  memoryMB?: number;
  vcpus?: number;
}

export interface GuestConfig {
  user: string;
  password: string;
  locale: string;
  timezone: string;
  keymap: string;
}

export interface Ownership {
  user: string;
  group: string;
}

export interface TimeoutConfig {
  controlPlaneMs: number;
  imageMs: number;
  customizeMs: number;
}

export interface LabConfig {
  /** Source qcow2 image, copied once into imagesDir */
  baseImage: string;
  imagesDir: string;
  labDirName: string;
  network: NetworkConfig;
  vms: VmConfig[];
  resources: { memoryMB: number; vcpus: number };
  guest: GuestConfig;
  /** chown target for images; null skips chown */
  ownership: Ownership | null;
  timeouts: TimeoutConfig;
}

export const DEFAULT_LAB_CONFIG: LabConfig = {
  baseImage: "./Fedora43Lab.qcow2",
  imagesDir: "/var/lib/libvirt/images",
  labDirName: "fedora-lab",
  network: {
    name: "labnet",
    bridge: "virbr-lab",
    subnet: "192.168.100.0/24",
    gateway: "192.168.100.1",
    domain: "example.com",
    dhcpRange: { start: "192.168.100.100", end: "192.168.100.200" },
    macPrefix: "52:54:00:1a:b0",
  },
  vms: [
    { name: "FedoraLab1", ipSuffix: 10, macSuffix: "aa" },
    { name: "FedoraLab2", ipSuffix: 11, macSuffix: "bb" },
  ],
  resources: { memoryMB: 1024, vcpus: 2 },
  guest: {
    user: "ansibleuser",
    password: "changeme",
    locale: "en_US.UTF-8",
    timezone: "America/New_York",
    keymap: "us",
  },
  ownership: { user: "qemu", group: "qemu" },
  timeouts: { controlPlaneMs: 30_000, imageMs: 120_000, customizeMs: 900_000 },
};

export interface LoadedLabConfig {
  config: LabConfig;
  /** Absolute path of the config file (it may not exist) */
  path: string;
  fromFile: boolean;
}

type RawObject = Record<string, unknown>;

function isRecord(value: unknown): value is RawObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: RawObject, key: string): RawObject {
  const value = raw[key];
  if (value === undefined) return {};
  if (!isRecord(value)) throw invalidConfigValueError(key, "must be an object");
  return value;
}

function readString(obj: RawObject, key: string, field: string, fallback: string): string {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== "string" || value.trim() === "") {
    throw invalidConfigValueError(field, "must be a non-empty string");
  }
  return value.trim();
}

function readInteger(
  obj: RawObject,
  key: string,
  field: string,
  fallback: number,
  min: number,
  max: number,
): number {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isInteger(value) || value < min || value > max) {
    throw invalidIntegerError(field, value, min, max);
  }
  return value;
}

function parseVm(value: unknown, index: number): VmConfig {
  const field = `vms[${index}]`;
  if (!isRecord(value)) throw invalidConfigValueError(field, "must be an object");

  const name = readString(value, "name", `${field}.name`, "");
  if (!name) throw invalidConfigValueError(`${field}.name`, "is required");
  const macSuffix = readString(value, "macSuffix", `${field}.macSuffix`, "");
  if (!macSuffix) throw invalidConfigValueError(`${field}.macSuffix`, "is required");
  if (value.ipSuffix === undefined) throw invalidConfigValueError(`${field}.ipSuffix`, "is required");

  const vm: VmConfig = {
    name,
    ipSuffix: readInteger(value, "ipSuffix", `${field}.ipSuffix`, 0, 1, 16_777_214),
    macSuffix,
  };
  if (value.memoryMB !== undefined) {
    vm.memoryMB = readInteger(value, "memoryMB", `${field}.memoryMB`, 0, 256, 1_048_576);
  }
  if (value.vcpus !== undefined) {
    vm.vcpus = readInteger(value, "vcpus", `${field}.vcpus`, 0, 1, 256);
  }
  return vm;
}

function parseOwnership(raw: RawObject): Ownership | null {
  if (raw.ownership === null) return null;
  const defaults = DEFAULT_LAB_CONFIG.ownership ?? { user: "qemu", group: "qemu" };
  const ownership = section(raw, "ownership");
  return {
    user: readString(ownership, "user", "ownership.user", defaults.user),
    group: readString(ownership, "group", "ownership.group", defaults.group),
  };
}

/**
 * Merge a raw (parsed JSON) configuration over the defaults, section by section.
 * Shape errors are ValidationErrors; address-level checks happen in resolveLabSpec.
 */
export function parseLabConfig(raw: unknown, source: string): LabConfig {
  if (!isRecord(raw)) throw invalidConfigFileError(source, "expected a JSON object");
  const defaults = DEFAULT_LAB_CONFIG;

  const network = section(raw, "network");
  const dhcpRange = section(network, "dhcpRange");
  const resources = section(raw, "resources");
  const guest = section(raw, "guest");
  const timeouts = section(raw, "timeouts");

  let vms = defaults.vms;
  if (raw.vms !== undefined) {
    if (!Array.isArray(raw.vms) || raw.vms.length === 0) {
      throw invalidConfigValueError("vms", "must be a non-empty array");
    }
    vms = raw.vms.map((vm, index) => parseVm(vm, index));
  }

  return {
    baseImage: readString(raw, "baseImage", "baseImage", defaults.baseImage),
    imagesDir: readString(raw, "imagesDir", "imagesDir", defaults.imagesDir),
    labDirName: readString(raw, "labDirName", "labDirName", defaults.labDirName),
    network: {
      name: readString(network, "name", "network.name", defaults.network.name),
      bridge: readString(network, "bridge", "network.bridge", defaults.network.bridge),
      subnet: readString(network, "subnet", "network.subnet", defaults.network.subnet),
      gateway: readString(network, "gateway", "network.gateway", defaults.network.gateway),
      domain: readString(network, "domain", "network.domain", defaults.network.domain),
      dhcpRange: {
        start: readString(dhcpRange, "start", "network.dhcpRange.start", defaults.network.dhcpRange.start),
        end: readString(dhcpRange, "end", "network.dhcpRange.end", defaults.network.dhcpRange.end),
      },
      macPrefix: readString(network, "macPrefix", "network.macPrefix", defaults.network.macPrefix),
    },
    vms,
    resources: {
      memoryMB: readInteger(resources, "memoryMB", "resources.memoryMB", defaults.resources.memoryMB, 256, 1_048_576),
      vcpus: readInteger(resources, "vcpus", "resources.vcpus", defaults.resources.vcpus, 1, 256),
    },
    guest: {
      user: readString(guest, "user", "guest.user", defaults.guest.user),
      password: readString(guest, "password", "guest.password", defaults.guest.password),
      locale: readString(guest, "locale", "guest.locale", defaults.guest.locale),
      timezone: readString(guest, "timezone", "guest.timezone", defaults.guest.timezone),
      keymap: readString(guest, "keymap", "guest.keymap", defaults.guest.keymap),
    },
    ownership: parseOwnership(raw),
    timeouts: {
      controlPlaneMs: readInteger(timeouts, "controlPlaneMs", "timeouts.controlPlaneMs", defaults.timeouts.controlPlaneMs, 1_000, 3_600_000),
      imageMs: readInteger(timeouts, "imageMs", "timeouts.imageMs", defaults.timeouts.imageMs, 1_000, 3_600_000),
      customizeMs: readInteger(timeouts, "customizeMs", "timeouts.customizeMs", defaults.timeouts.customizeMs, 1_000, 7_200_000),
    },
  };
}

/**
 * Read the lab configuration. A missing file at the default location yields
 * the built-in two-VM lab; a missing file that was asked for explicitly is an error.
 * $KVMLAB_IMAGES_DIR overrides imagesDir.
 */
export function loadLabConfig(
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): LoadedLabConfig {
  const path = resolveConfigPath(explicitPath, env);
  const explicit = Boolean(explicitPath || env.KVMLAB_CONFIG);

  let config: LabConfig;
  let fromFile = false;
  if (existsSync(path)) {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (error) {
      throw invalidConfigFileError(path, error instanceof Error ? error.message : String(error));
    }
    config = parseLabConfig(raw, path);
    fromFile = true;
  } else if (explicit) {
    throw invalidConfigFileError(path, "file not found");
  } else {
    config = structuredClone(DEFAULT_LAB_CONFIG);
  }

  if (env.KVMLAB_IMAGES_DIR) {
    config = { ...config, imagesDir: env.KVMLAB_IMAGES_DIR };
  }

  return { config, path, fromFile };
}
