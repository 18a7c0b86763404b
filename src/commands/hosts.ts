import type { CommandDef } from "citty";
import { defineCommand } from "citty";
import { consola } from "consola";
import { createCommandLogger, getOutputMode } from "../lib/logger/index.ts";
import { handleCommandError } from "../errors/index.ts";
import {
  addHostsEntries,
  hostsStatus,
  removeHostsEntries,
  updateHostsEntries,
  type HostsChange,
  type HostsFiles,
} from "../lib/hosts-file.ts";
import { loadLabConfig } from "../lib/lab-config.ts";
import { labPaths } from "../paths.ts";
import { configArg } from "./shared.ts";

function hostsFiles(configPath: string | undefined): HostsFiles {
  const { config, path } = loadLabConfig(configPath);
  const paths = labPaths({ configFile: path, imagesDir: config.imagesDir, labDirName: config.labDirName });
  return { hostsFile: paths.hostsFile, hostsLocal: paths.hostsLocal };
}

function defineHostsChange(
  name: "add" | "remove" | "update",
  description: string,
  apply: (files: HostsFiles) => HostsChange,
): CommandDef {
  return defineCommand({
    meta: { name, description },
    args: { ...configArg },
    run({ args }) {
      const cmdLog = createCommandLogger(`hosts ${name}`);
      const log = consola.withTag("hosts");

      try {
        const files = hostsFiles(args.config);
        const change = apply(files);
        cmdLog.set({ hostsFile: files.hostsFile, backup: change.backup, entries: change.entries });

        if (change.backup) log.info(`Backup created: ${change.backup}`);
        if (name === "remove" && change.entries.length === 0 && !change.backup) {
          log.warn(`No lab entries found in ${files.hostsFile}`);
        } else {
          log.success(`${files.hostsFile}: ${name} complete`);
          for (const entry of change.entries) log.log(`  ${entry}`);
        }
        cmdLog.emit();
      } catch (error) {
        handleCommandError(error, cmdLog);
      }
    },
  }) as CommandDef;
}

const statusCommand = defineCommand({
  meta: { name: "status", description: "Show whether the lab entries are in /etc/hosts" },
  args: { ...configArg },
  run({ args }) {
    const cmdLog = createCommandLogger("hosts status");
    const log = consola.withTag("hosts");

    try {
      const files = hostsFiles(args.config);
      const status = hostsStatus(files);
      cmdLog.set({ hostsFile: files.hostsFile, ...status });

      if (getOutputMode() !== "json") {
        if (status.configured) {
          log.success(`Entries are configured in ${files.hostsFile}`);
          for (const entry of status.entries) log.log(`  ${entry}`);
        } else {
          log.warn(`No lab entries in ${files.hostsFile}`);
          if (status.hostsLocalPresent) {
            log.log("Available entries in hosts.local:");
            for (const entry of status.available) log.log(`  ${entry}`);
            log.log("Run 'sudo kvmlab hosts add' to add them.");
          }
        }
      }
      cmdLog.emit();
    } catch (error) {
      handleCommandError(error, cmdLog);
    }
  },
});

const hostsCommand = defineCommand({
  meta: {
    name: "hosts",
    description: "Manage the lab section of the host's /etc/hosts",
  },
  subCommands: {
    add: defineHostsChange("add", "Add the lab entries from hosts.local", addHostsEntries),
    remove: defineHostsChange("remove", "Remove the lab entries", removeHostsEntries),
    update: defineHostsChange("update", "Replace the lab entries with the current hosts.local", updateHostsEntries),
    status: statusCommand as CommandDef,
  },
});

export default hostsCommand as CommandDef;
