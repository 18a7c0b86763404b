import { consola } from "consola";

export type ConfirmKind = "overlay-overwrite" | "network-recreate" | "reset";

export interface ConfirmRequest {
  kind: ConfirmKind;
  /** Resource the decision applies to (overlay path, network name, lab root) */
  target: string;
  message: string;
}

/** Asked before every destructive step; resolving false keeps the resource. */
export type Confirm = (request: ConfirmRequest) => Promise<boolean>;

export const denyAll: Confirm = async () => false;

export const allowAll: Confirm = async () => true;

/**
 * Prompt on a TTY. Without one (pipes, CI, --json) every destructive step is
 * declined.
 */
export function createInteractiveConfirm(isTTY: boolean = Boolean(process.stdin.isTTY)): Confirm {
  if (!isTTY) return denyAll;
  return async (request) => {
    const answer = await consola.prompt(request.message, {
      type: "confirm",
      initial: false,
      cancel: "default",
    });
    return answer === true;
  };
}
