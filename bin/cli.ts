#!/usr/bin/env tsx

import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { defineCommand, runMain } from "citty";
import { consola } from "consola";
import { initLabLogger } from "../src/lib/logger/index.ts";
import { isRoot, privilegedCommand } from "../src/lib/environment.ts";
import { formatCommandError, privilegesRequiredError } from "../src/errors/index.ts";

function findPackageVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  while (dir !== dirname(dir)) {
    const pkgPath = join(dir, "package.json");
    if (existsSync(pkgPath)) {
      const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf8"));
      if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
        return pkg.version;
      }
    }
    dir = dirname(dir);
  }
  return "0.0.0";
}

const version = findPackageVersion();

const privileged = privilegedCommand(process.argv.slice(2));
if (privileged !== null && !isRoot()) {
  consola.error(formatCommandError(privilegesRequiredError(privileged)));
  process.exit(1);
}

const main = defineCommand({
  meta: {
    name: "kvmlab",
    version,
    description: "Build and run a small libvirt/KVM lab from one shared base image",
  },
  args: {
    json: {
      type: "boolean",
      default: false,
      description: "Output structured JSON (one event per command)",
    },
    verbose: {
      type: "boolean",
      default: false,
      description: "Show detailed debug output with wide event tree",
    },
  },
  setup({ args }) {
    const mode = args.json ? "json" : args.verbose ? "verbose" : "normal";
    initLabLogger(mode);
  },
  subCommands: {
    create: () => import("../src/commands/create.ts").then((m) => m.default),
    start: () => import("../src/commands/start.ts").then((m) => m.default),
    reset: () => import("../src/commands/reset.ts").then((m) => m.default),
    status: () => import("../src/commands/status.ts").then((m) => m.default),
    hosts: () => import("../src/commands/hosts.ts").then((m) => m.default),
  },
});

runMain(main);
