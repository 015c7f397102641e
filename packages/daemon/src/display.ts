/**
 * Display adapter
 *
 * Sole writer to the panel. Hardware refreshes are rate-limited: a frame that
 * arrives too soon after the previous refresh waits for the next allowed
 * time, and a newer frame arriving meanwhile replaces it.
 */

import { DisplayWriteError, type Frame } from "@paperday/core";
import type { PanelDevice } from "./devices.js";

export interface DisplayAdapterOptions {
  minRefreshIntervalMs: number;
  now?: () => number;
}

interface Waiter {
  resolve: () => void;
  reject: (error: DisplayWriteError) => void;
}

interface PendingWrite {
  frame: Frame;
  waiters: Waiter[];
}

export class DisplayAdapter {
  private lastRefreshAt: number | null = null;
  private pending: PendingWrite | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private readonly now: () => number;

  constructor(
    private readonly device: PanelDevice,
    private readonly options: DisplayAdapterOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Resolves once this frame, or a newer one that replaced it, is on the panel
   */
  show(frame: Frame): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.pending) {
        this.pending.frame = frame;
        this.pending.waiters.push({ resolve, reject });
        return;
      }

      this.pending = { frame, waiters: [{ resolve, reject }] };
      const wait = this.lastRefreshAt === null ? 0 : this.lastRefreshAt + this.options.minRefreshIntervalMs - this.now();

      if (wait <= 0) {
        this.flush();
      } else {
        console.log(`[display] Refresh deferred by ${Math.ceil(wait / 1000)}s`);
        this.timer = setTimeout(() => this.flush(), wait);
      }
    });
  }

  /**
   * Cancel a deferred write; its callers are rejected
   */
  dispose(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const pending = this.pending;
    this.pending = null;
    pending?.waiters.forEach((waiter) => waiter.reject(new DisplayWriteError("Display adapter disposed")));
  }

  private flush(): void {
    this.timer = null;
    const pending = this.pending;
    this.pending = null;
    if (!pending) return;

    // The refresh interval counts from the start of a write
    this.lastRefreshAt = this.now();
    this.device.show(pending.frame).then(
      () => {
        console.log(`[display] Frame written to ${this.device.name}`);
        pending.waiters.forEach((waiter) => waiter.resolve());
      },
      (error: unknown) => {
        const failure = new DisplayWriteError(
          `${this.device.name}: ${error instanceof Error ? error.message : String(error)}`,
          { cause: error }
        );
        pending.waiters.forEach((waiter) => waiter.reject(failure));
      }
    );
  }
}
