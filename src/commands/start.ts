import type { CommandDef } from "citty";
import { defineCommand } from "citty";
import { consola } from "consola";
import { createCommandLogger } from "../lib/logger/index.ts";
import { handleCommandError } from "../errors/index.ts";
import { checkDependencies } from "../lib/environment.ts";
import { configArg, openLab } from "./shared.ts";

const startCommand = defineCommand({
  meta: {
    name: "start",
    description: "Start the lab network and every lab VM",
  },
  args: {
    ...configArg,
  },
  async run({ args }) {
    const cmdLog = createCommandLogger("start", args.config);
    const log = consola.withTag("start");

    try {
      checkDependencies();
      const lab = await openLab({ config: args.config });
      const report = await lab.start();

      cmdLog.set({
        network: { name: report.network.name, action: report.network.action },
        vms: report.vms.map((t) => ({ vmName: t.vmName, from: t.from, state: t.state, action: t.action })),
      });
      cmdLog.warnings(report.warnings);

      const running = report.vms.filter((t) => t.state === "running").length;
      log.success(`${running}/${report.vms.length} VMs running`);
      for (const vm of lab.spec.vms) {
        log.log(`  ${vm.name}: ${vm.ipAddress} (${vm.fqdn})`);
      }
      log.log("");
      log.log(`SSH: ssh ${lab.spec.guest.user}@${lab.spec.vms[0]?.fqdn ?? "<vm>"}`);
      cmdLog.emit();
    } catch (error) {
      handleCommandError(error, cmdLog);
    }
  },
});

export default startCommand as CommandDef;
