import { consola, type ConsolaInstance } from "consola";
import { createRequestLogger, initLogger } from "evlog";
import type { RequestLogger } from "evlog";

export type OutputMode = "normal" | "json" | "verbose";

interface ModeSettings {
  /** consola level; unset keeps consola's default */
  level?: number;
  timestamps: boolean;
  events: "off" | "json" | "pretty";
}

const MODES: Record<OutputMode, ModeSettings> = {
  normal: { timestamps: false, events: "off" },
  // stdout carries only the JSON event
  json: { level: -999, timestamps: false, events: "json" },
  verbose: { level: 4, timestamps: true, events: "pretty" },
};

let currentMode: OutputMode = "normal";

/** Configure consola (human output) and evlog (wide events) before any command runs. */
export function initLabLogger(mode: OutputMode): void {
  currentMode = mode;
  const settings = MODES[mode];

  if (settings.level !== undefined) consola.level = settings.level;
  if (settings.timestamps) {
    consola.options.formatOptions = { ...consola.options.formatOptions, date: true };
  }
  initLogger({
    enabled: settings.events !== "off",
    pretty: settings.events === "pretty",
    stringify: settings.events === "json",
    env: { service: "kvmlab" },
  });
}

export function getOutputMode(): OutputMode {
  return currentMode;
}

export interface CommandLogger {
  /** Add structured context to the wide event */
  set: RequestLogger["set"];
  /** Record an error in the wide event */
  error: RequestLogger["error"];
  /** Record non-fatal findings of a workflow; they never change the exit status */
  warnings: (warnings: readonly string[]) => void;
  /** Emit the wide event (json/verbose modes only) */
  emit: () => void;
}

/** One wide event per command run, tagged with the command and the config it used. */
export function createCommandLogger(command: string, configPath?: string): CommandLogger {
  const reqLog = createRequestLogger({ path: `kvmlab ${command}` });
  reqLog.set({ command, ...(configPath !== undefined && { config: configPath }) });

  return {
    set: reqLog.set.bind(reqLog),
    error: reqLog.error.bind(reqLog),
    warnings: (warnings) => {
      reqLog.set({ warnings: [...warnings], warningCount: warnings.length });
    },
    emit: () => {
      if (MODES[currentMode].events !== "off") {
        reqLog.emit();
      }
    },
  };
}

/** Scoped consola instance; output reads `[tag] message`. */
export function createScopedLogger(tag: string): ConsolaInstance {
  return consola.withTag(tag);
}
