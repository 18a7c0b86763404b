import { consola } from "consola";
import { EvlogError } from "evlog";
import type { CommandLogger } from "../lib/logger/index.ts";
import { getOutputMode } from "../lib/logger/index.ts";
import { LabError } from "./base.ts";
import { ControlPlaneError } from "./control-plane.ts";

/** Human-readable rendering: message and code, then why/fix/link, and the failed command in verbose mode. */
export function formatCommandError(error: unknown, verbose: boolean = false): string {
  if (!(error instanceof Error)) return String(error);
  if (!(error instanceof EvlogError)) return error.message;

  const lines = [error instanceof LabError ? `${error.message} [${error.code}]` : error.message];
  if (verbose && error instanceof ControlPlaneError) lines.push(`  Command: ${error.command}`);
  if (error.why) lines.push(`  Why: ${error.why}`);
  if (error.fix) lines.push(`  Fix: ${error.fix}`);
  if (error.link) lines.push(`  More: ${error.link}`);
  return lines.join("\n");
}

/** Record the failure in the wide event, print it unless in JSON mode, and fail the process. */
export function handleCommandError(error: unknown, cmdLog: CommandLogger): void {
  cmdLog.error(error instanceof Error ? error : String(error));
  cmdLog.emit();
  process.exitCode = 1;

  // JSON mode: the emitted event already carries the error
  const mode = getOutputMode();
  if (mode === "json") return;
  consola.error(formatCommandError(error, mode === "verbose"));
}
