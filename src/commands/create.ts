import type { CommandDef } from "citty";
import { defineCommand } from "citty";
import { consola } from "consola";
import { createCommandLogger } from "../lib/logger/index.ts";
import { handleCommandError } from "../errors/index.ts";
import { checkDependencies } from "../lib/environment.ts";
import type { LabSpec } from "../lib/lab-spec.ts";
import type { CreateReport } from "../services/reconciler.ts";
import { configArg, openLab, yesArg } from "./shared.ts";

export function buildCreateSummaryLines(spec: LabSpec, report: CreateReport): string[] {
  const { network } = spec;
  return [
    `Network: ${network.name} (${report.network.action})`,
    `  Subnet: ${network.subnetCIDR}`,
    `  Gateway: ${network.gateway}`,
    "",
    "VMs:",
    ...spec.vms.map((vm) => {
      const overlay = report.overlays.find((o) => o.vmName === vm.name);
      return `  ${vm.name}: ${vm.ipAddress} (${vm.fqdn}) overlay ${overlay?.action ?? "-"}`;
    }),
    "",
    `Guest user: ${spec.guest.user} (passwordless sudo)`,
    "",
    "Add the lab hosts to /etc/hosts:  sudo kvmlab hosts add",
    "Start the VMs:                    sudo kvmlab start",
  ];
}

const createCommand = defineCommand({
  meta: {
    name: "create",
    description: "Create the lab: base image, overlays, descriptors and network",
  },
  args: {
    ...configArg,
    ...yesArg,
    "recreate-network": {
      type: "boolean",
      default: false,
      description: "Offer to destroy and redefine an existing lab network",
    },
  },
  async run({ args }) {
    const cmdLog = createCommandLogger("create", args.config);
    const log = consola.withTag("create");

    try {
      checkDependencies();
      const lab = await openLab({ config: args.config, yes: args.yes });
      cmdLog.set({ network: lab.spec.network.name, vms: lab.spec.vms.map((vm) => vm.name) });

      const report = await lab.create({ recreateNetwork: args["recreate-network"] });

      cmdLog.set({
        baseImage: report.baseImage,
        overlays: report.overlays,
        customized: report.customized,
        networkAction: report.network.action,
        registered: report.vms.map((t) => ({ vmName: t.vmName, action: t.action, state: t.state })),
      });
      cmdLog.warnings(report.warnings);

      log.success("Lab created");
      for (const line of buildCreateSummaryLines(lab.spec, report)) log.log(line);
      cmdLog.emit();
    } catch (error) {
      handleCommandError(error, cmdLog);
    }
  },
});

export default createCommand as CommandDef;
