import type { LabLogger } from "./lab-logger.ts";
import type { DomainState } from "./services/control-plane.ts";
import type { BaseImageResult, OverlayResult } from "./services/image.ts";
import type { NetworkResult } from "./services/network.ts";
import type { ResetStepName, Workflow } from "./services/reconciler.ts";

type HookResult = void | Promise<void>;

export interface LabHooks {
  // Images
  "image:baseReady": (result: BaseImageResult) => HookResult;
  "image:overlayReady": (result: OverlayResult) => HookResult;
  "image:customized": (params: { vmName: string; path: string }) => HookResult;

  // Network
  "network:ready": (result: NetworkResult) => HookResult;
  "network:teardown": (params: { name: string }) => HookResult;

  // VM lifecycle
  "vm:registered": (params: { vmName: string }) => HookResult;
  "vm:started": (params: { vmName: string; from: DomainState }) => HookResult;
  "vm:stopped": (params: { vmName: string; from: DomainState }) => HookResult;
  "vm:undefined": (params: { vmName: string }) => HookResult;

  // Workflows
  "reset:step": (params: { step: ResetStepName; target: string; ok: boolean; error?: Error }) => HookResult;
  "workflow:error": (params: { workflow: Workflow; error: Error }) => HookResult;
}

/** Await a hook; a failing plugin is logged and never breaks the core operation. */
export async function safeHook(
  logger: LabLogger,
  name: keyof LabHooks,
  result: void | Promise<unknown>,
): Promise<void> {
  try {
    await result;
  } catch (error) {
    logger.warn(`Hook ${name} failed: ${error instanceof Error ? error.message : String(error)}`);
  }
}
