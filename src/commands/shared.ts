import { createLab } from "../context.ts";
import { allowAll, createInteractiveConfirm } from "../lib/confirm.ts";
import { getOutputMode } from "../lib/logger/index.ts";
import type { Reconciler } from "../services/reconciler.ts";

export const configArg = {
  config: {
    type: "string",
    description: "Path to lab.config.json (default: $KVMLAB_CONFIG or ./lab.config.json)",
  },
} as const;

export const yesArg = {
  yes: {
    type: "boolean",
    alias: "y",
    default: false,
    description: "Confirm destructive steps without prompting",
  },
} as const;

/** Build the lab for a CLI run. Prompts only on a TTY and never in --json mode. */
export function openLab(options: { config?: string; yes?: boolean }): Promise<Reconciler> {
  const interactive = getOutputMode() !== "json" && Boolean(process.stdin.isTTY);
  return createLab({
    configPath: options.config,
    confirm: options.yes ? allowAll : createInteractiveConfirm(interactive),
  });
}
