import { existsSync } from "node:fs";
import { baseImageNotFoundError, ControlPlaneError, overlayCreateError } from "../errors/index.ts";
import { defaultExec, type ExecFn } from "../lib/exec.ts";

export interface ImageTool {
  /** Create `overlayPath` as a qcow2 child of `basePath`. */
  createOverlay(basePath: string, overlayPath: string): Promise<void>;
}

export interface QemuImageToolOptions {
  exec?: ExecFn;
  timeoutMs?: number;
  bin?: string;
}

export class QemuImageTool implements ImageTool {
  private readonly exec: ExecFn;
  private readonly timeoutMs: number;
  private readonly bin: string;

  constructor(options: QemuImageToolOptions = {}) {
    this.exec = options.exec ?? defaultExec;
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.bin = options.bin ?? "qemu-img";
  }

  async createOverlay(basePath: string, overlayPath: string): Promise<void> {
    if (!existsSync(basePath)) throw baseImageNotFoundError(basePath);
    try {
      await this.exec(
        this.bin,
        ["create", "-f", "qcow2", "-b", basePath, "-F", "qcow2", overlayPath],
        { timeoutMs: this.timeoutMs },
      );
    } catch (error) {
      if (error instanceof ControlPlaneError) {
        throw overlayCreateError(overlayPath, error.stderr.trim() || error.message);
      }
      throw error;
    }
  }
}
