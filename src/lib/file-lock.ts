import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { check, lock, type LockOptions } from "proper-lockfile";
import { lockTimeoutError } from "../errors/index.ts";

const STALE_MS = 300_000;
const RETRY_MS = 100;

export interface FileLockOptions {
  /** A holder that stopped refreshing the lock for this long is considered dead */
  staleMs?: number;
  /** How long to wait for another holder before failing with ERR_TIMEOUT_LOCK */
  waitMs?: number;
  /** Called once when the lock is busy and we start waiting */
  onWait?: () => void;
}

function isLocked(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ELOCKED";
}

/** Cross-process exclusive lock on `path` (created if missing). */
export class FileLock {
  private readonly staleMs: number;
  private readonly waitMs: number;
  private readonly onWait?: () => void;

  constructor(
    private readonly path: string,
    private readonly name: string,
    options: FileLockOptions = {},
  ) {
    this.staleMs = options.staleMs ?? STALE_MS;
    this.waitMs = options.waitMs ?? 5_000;
    this.onWait = options.onWait;
  }

  isHeld(): Promise<boolean> {
    mkdirSync(dirname(this.path), { recursive: true });
    return check(this.path, { stale: this.staleMs, realpath: false });
  }

  async runAsync<T>(fn: () => Promise<T>): Promise<T> {
    mkdirSync(dirname(this.path), { recursive: true });
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      await release();
    }
  }

  private async acquire(): Promise<() => Promise<void>> {
    try {
      return await lock(this.path, this.options(0));
    } catch (error) {
      if (!isLocked(error)) throw error;
    }

    this.onWait?.();
    const retries = Math.max(1, Math.ceil(this.waitMs / RETRY_MS));
    try {
      return await lock(this.path, this.options(retries));
    } catch (error) {
      if (isLocked(error)) throw lockTimeoutError(this.name);
      throw error;
    }
  }

  private options(retries: number): LockOptions {
    return {
      stale: this.staleMs,
      realpath: false,
      retries: { retries, minTimeout: RETRY_MS, maxTimeout: RETRY_MS, factor: 1 },
    };
  }
}
