import { VAULT_CONSTANTS } from "../../constants";
import { ValidationError } from "../../errors";
import type { Lockable } from "../../types";

export interface AutoLockOptions {
  timeoutMs?: number;
  onLock?: () => void;
}

/** Locks `target` after a period without {@link touch} calls. */
export class AutoLock {
  private timer: NodeJS.Timeout | null = null;
  private readonly timeoutMs: number;
  private readonly onLock?: () => void;

  constructor(private readonly target: Lockable, opts?: AutoLockOptions) {
    this.timeoutMs = opts?.timeoutMs ?? VAULT_CONSTANTS.AUTO_LOCK_MS;
    if (!Number.isFinite(this.timeoutMs) || this.timeoutMs <= 0) {
      throw new ValidationError("timeoutMs must be a positive number");
    }
    this.onLock = opts?.onLock;
  }

  get isArmed(): boolean {
    return this.timer !== null;
  }

  start(): void {
    this.arm();
  }

  /** Records activity. Does nothing unless armed. */
  touch(): void {
    if (this.timer) this.arm();
  }

  stop(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }

  private arm(): void {
    this.stop();
    this.timer = setTimeout(() => {
      this.timer = null;
      this.target.lock();
      this.onLock?.();
    }, this.timeoutMs);
    this.timer.unref();
  }
}
