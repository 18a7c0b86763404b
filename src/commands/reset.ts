import type { CommandDef } from "citty";
import { defineCommand } from "citty";
import { consola } from "consola";
import { createCommandLogger } from "../lib/logger/index.ts";
import { handleCommandError, mutuallyExclusiveFlagsError } from "../errors/index.ts";
import { checkDependencies } from "../lib/environment.ts";
import { configArg, openLab, yesArg } from "./shared.ts";

const resetCommand = defineCommand({
  meta: {
    name: "reset",
    description: "Destroy the lab VMs (and network) and rebuild them from the base image",
  },
  args: {
    ...configArg,
    ...yesArg,
    full: {
      type: "boolean",
      default: false,
      description: "Remove VMs, overlays and the network (default)",
    },
    "vms-only": {
      type: "boolean",
      default: false,
      description: "Remove VMs and overlays; keep the network",
    },
    "destroy-only": {
      type: "boolean",
      default: false,
      description: "Tear down without recreating",
    },
  },
  async run({ args }) {
    const cmdLog = createCommandLogger("reset", args.config);
    const log = consola.withTag("reset");

    try {
      if (args.full && args["vms-only"]) throw mutuallyExclusiveFlagsError("--full", "--vms-only");
      checkDependencies();

      const scope = args["vms-only"] ? "vms-only" : "full";
      const lab = await openLab({ config: args.config, yes: args.yes });
      const report = await lab.reset({ scope, destroyOnly: args["destroy-only"] });

      cmdLog.set({ scope, aborted: report.aborted, steps: report.steps });
      cmdLog.warnings(report.warnings);
      if (report.aborted) {
        log.info("Reset aborted; nothing was changed");
        cmdLog.emit();
        return;
      }

      const failed = report.steps.filter((s) => !s.ok);
      if (failed.length > 0) {
        log.warn(`${failed.length} teardown step(s) failed: ${failed.map((s) => `${s.step} ${s.target}`).join(", ")}`);
      }
      if (args["destroy-only"]) {
        log.success("Lab torn down. Recreate with: sudo kvmlab create");
      } else {
        log.success("Lab reset complete");
      }
      cmdLog.emit();
    } catch (error) {
      handleCommandError(error, cmdLog);
    }
  },
});

export default resetCommand as CommandDef;
