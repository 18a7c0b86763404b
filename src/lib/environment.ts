import { accessSync, constants } from "node:fs";
import { delimiter, join } from "node:path";
import { missingBinaryError, privilegesRequiredError } from "../errors/index.ts";

/** Binary → package that ships it on Fedora/RHEL */
export const REQUIRED_TOOLS: Readonly<Record<string, string>> = {
  "qemu-img": "qemu-img",
  "virt-customize": "libguestfs-tools",
  virsh: "libvirt-client",
};

export function isRoot(): boolean {
  return process.getuid?.() === 0;
}

/** Options whose value is the next argument */
const VALUE_OPTIONS: ReadonlySet<string> = new Set(["--config"]);
const ROOT_COMMANDS: ReadonlySet<string> = new Set(["create", "start", "reset", "status"]);
const ROOT_HOSTS_COMMANDS: ReadonlySet<string> = new Set(["add", "remove", "update"]);

/** Subcommand words of a CLI invocation, with options and their values skipped. */
export function commandWords(argv: readonly string[]): string[] {
  const words: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith("-")) {
      if (VALUE_OPTIONS.has(arg)) i++;
      continue;
    }
    words.push(arg);
  }
  return words;
}

/** The command (`create`, `hosts add`, ...) when `argv` needs root, otherwise null. */
export function privilegedCommand(argv: readonly string[]): string | null {
  const [command, nested] = commandWords(argv);
  if (command !== undefined && ROOT_COMMANDS.has(command)) return command;
  if (command === "hosts" && nested !== undefined && ROOT_HOSTS_COMMANDS.has(nested)) return `hosts ${nested}`;
  return null;
}

export function assertPrivileges(command: string, root: boolean = isRoot()): void {
  if (!root) throw privilegesRequiredError(command);
}

export function findOnPath(bin: string, pathEnv: string = process.env.PATH ?? ""): string | null {
  for (const dir of pathEnv.split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, bin);
    try {
      accessSync(candidate, constants.X_OK);
      return candidate;
    } catch {
      // not here
    }
  }
  return null;
}

export function checkDependencies(
  tools: Readonly<Record<string, string>> = REQUIRED_TOOLS,
  pathEnv?: string,
): void {
  const missing = Object.keys(tools).filter((bin) => findOnPath(bin, pathEnv) === null);
  if (missing.length > 0) {
    throw missingBinaryError(
      missing,
      missing.map((bin) => tools[bin] ?? bin),
    );
  }
}
