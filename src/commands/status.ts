import type { CommandDef } from "citty";
import { defineCommand } from "citty";
import { consola } from "consola";
import { createCommandLogger, getOutputMode } from "../lib/logger/index.ts";
import { handleCommandError } from "../errors/index.ts";
import { checkPort, type PortState } from "../lib/ssh-port.ts";
import { table } from "../lib/utils.ts";
import type { VmStatus } from "../services/reconciler.ts";
import { configArg, openLab } from "./shared.ts";

const STATE_COLORS: Record<string, string> = {
  running: "\x1b[32m", // green
  active: "\x1b[32m",
  paused: "\x1b[33m", // yellow
  inactive: "\x1b[33m",
  "shut-off": "\x1b[2;90m", // dim gray
  undefined: "\x1b[31m", // red
  "not-defined": "\x1b[31m",
};
const RESET = "\x1b[0m";

function colorState(state: string): string {
  const color = STATE_COLORS[state] || "";
  return `${color}${state}${RESET}`;
}

type StatusRow = VmStatus & { ssh: PortState | "-" };

const statusCommand = defineCommand({
  meta: {
    name: "status",
    description: "Show network, VM, lease and hosts-file status of the lab",
  },
  args: {
    ...configArg,
  },
  async run({ args }) {
    const cmdLog = createCommandLogger("status", args.config);
    const log = consola.withTag("status");

    try {
      const lab = await openLab({ config: args.config });
      const report = await lab.status();

      const rows: StatusRow[] = [];
      for (const vm of report.vms) {
        const ssh = vm.state === "running" ? await checkPort(vm.leasedIp ?? vm.expectedIp) : "-";
        rows.push({ ...vm, ssh });
      }

      cmdLog.set({
        network: report.network,
        leases: report.leases,
        vms: rows,
        hostsConfigured: report.hostsConfigured,
        hostsLocalPresent: report.hostsLocalPresent,
      });

      if (getOutputMode() !== "json") {
        const { network } = report;
        log.log(`Network ${network.name}: ${colorState(network.state)} (${network.subnet}, gateway ${network.gateway})`);
        log.log("");
        log.log(
          table<StatusRow>(rows, [
            { title: "NAME", value: (vm) => vm.name },
            { title: "STATE", value: (vm) => vm.state, style: colorState },
            { title: "EXPECTED IP", value: (vm) => vm.expectedIp },
            { title: "LEASED IP", value: (vm) => vm.leasedIp ?? "-" },
            { title: "FQDN", value: (vm) => vm.fqdn },
            { title: "SSH", value: (vm) => vm.ssh },
          ]),
        );
        log.log("");
        if (network.state === "active") {
          log.log(report.leases.length > 0 ? `DHCP leases: ${report.leases.length}` : "No active DHCP leases");
        }
        log.log(`/etc/hosts entries: ${report.hostsConfigured ? "configured" : "not configured (sudo kvmlab hosts add)"}`);
        log.log(`hosts.local file:   ${report.hostsLocalPresent ? "present" : "missing"}`);
      }
      cmdLog.emit();
    } catch (error) {
      handleCommandError(error, cmdLog);
    }
  },
});

export default statusCommand as CommandDef;
