import type { LabContext } from "./context.ts";

export interface LabPlugin {
  name: string;
  setup: (ctx: LabContext) => void | Promise<void>;
}

export function definePlugin(plugin: LabPlugin): LabPlugin {
  return plugin;
}
