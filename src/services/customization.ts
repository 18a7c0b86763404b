import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ControlPlaneError, customizeFailedError } from "../errors/index.ts";
import { defaultExec, type ExecFn } from "../lib/exec.ts";
import type { GuestSpec } from "../lib/lab-spec.ts";

export interface CustomizationSpec {
  fqdn: string;
  guest: GuestSpec;
  /** Full /etc/hosts content for the guest */
  hostsContent: string;
}

export interface CustomizationTool {
  /** Apply every guest customization to `diskPath`, or fail with nothing promised. */
  apply(diskPath: string, spec: CustomizationSpec): Promise<void>;
}

const INITIAL_SETUP_UNITS = [
  "/etc/systemd/system/multi-user.target.wants/initial-setup.service",
  "/etc/systemd/system/graphical.target.wants/initial-setup.service",
  "/usr/lib/systemd/system/initial-setup.service",
  "/usr/lib/systemd/system/initial-setup-text.service",
];

/**
 * virt-customize arguments. Staged files (hosts, password) are read from
 * `stagingDir`, which the caller creates and removes.
 */
export function customizeArgs(diskPath: string, spec: CustomizationSpec, stagingDir: string): string[] {
  const { user, locale, timezone, keymap } = spec.guest;
  const run = (command: string) => ["--run-command", command];

  return [
    "-a", diskPath,
    "--hostname", spec.fqdn,
    "--timezone", timezone,
    "--write", `/etc/locale.conf:LANG=${locale}`,
    "--write", `/etc/vconsole.conf:KEYMAP=${keymap}`,
    ...run(`useradd -m -G wheel -s /bin/bash ${user} 2>/dev/null || true`),
    "--password", `${user}:file:${join(stagingDir, "password")}`,
    ...run(`echo '${user} ALL=(ALL) NOPASSWD:ALL' > /etc/sudoers.d/${user}`),
    ...run(`chmod 440 /etc/sudoers.d/${user}`),
    ...run(`chown root:root /etc/sudoers.d/${user}`),
    "--copy-in", `${join(stagingDir, "hosts")}:/etc/`,
    ...run("chmod 644 /etc/hosts"),
    ...INITIAL_SETUP_UNITS.flatMap((unit) => run(`rm -f ${unit}`)),
    ...run("mkdir -p /etc/sysconfig && touch /etc/sysconfig/initial-setup-reconfiguration-complete"),
    ...run("mkdir -p /var/lib/initial-setup && touch /var/lib/initial-setup/state"),
    "--selinux-relabel",
  ];
}

export interface VirtCustomizeToolOptions {
  exec?: ExecFn;
  timeoutMs?: number;
  bin?: string;
}

export class VirtCustomizeTool implements CustomizationTool {
  private readonly exec: ExecFn;
  private readonly timeoutMs: number;
  private readonly bin: string;

  constructor(options: VirtCustomizeToolOptions = {}) {
    this.exec = options.exec ?? defaultExec;
    this.timeoutMs = options.timeoutMs ?? 900_000;
    this.bin = options.bin ?? "virt-customize";
  }

  async apply(diskPath: string, spec: CustomizationSpec): Promise<void> {
    const stagingDir = await mkdtemp(join(tmpdir(), "kvmlab-customize-"));
    try {
      await writeFile(join(stagingDir, "hosts"), spec.hostsContent, { mode: 0o644 });
      await writeFile(join(stagingDir, "password"), spec.guest.password, { mode: 0o600 });
      await this.exec(this.bin, customizeArgs(diskPath, spec, stagingDir), {
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      if (error instanceof ControlPlaneError) {
        throw customizeFailedError(diskPath, error.stderr.trim() || error.message);
      }
      throw error;
    } finally {
      await rm(stagingDir, { recursive: true, force: true });
    }
  }
}
