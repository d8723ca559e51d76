import { errorMessage } from "./errors.js";
import type { TaskStore } from "./taskStore.js";
import type { Task } from "./types.js";

export interface LeaseSweeperOptions {
  store: Pick<TaskStore, "listExpiredLeases">;
  /** Applies the lease_expired transition; resolves false when the task had already moved on. */
  expire: (task: Task, nowMs: number) => Promise<boolean>;
  intervalMs: number;
  batchSize: number;
  clock?: () => number;
  debug?: boolean;
}

export interface SweeperStatus {
  running: boolean;
  last_sweep_at: number | null;
  expired_total: number;
}

/**
 * Periodically returns tasks with a lapsed lease to `pending`.
 *
 * It keeps no expiry table of its own: each pass reads `lease_expires_at`
 * from the store, so renewals and re-claims are picked up for free, and each
 * expiry is an ordinary compare-and-swap that loses cleanly to a concurrent
 * complete/cancel/fail.
 */
export class LeaseSweeper {
  private readonly opts: LeaseSweeperOptions;
  private readonly clock: () => number;
  private running = false;
  private loop: Promise<void> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;
  private lastSweepAt: number | null = null;
  private expiredTotal = 0;

  constructor(opts: LeaseSweeperOptions) {
    this.opts = opts;
    this.clock = opts.clock ?? Date.now;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    console.log(`[lease-sweeper] starting interval=${this.opts.intervalMs}ms batch=${this.opts.batchSize}`);
    this.loop = this.run();
  }

  /** Stops the loop. Resolves after an in-flight pass has worked through every batch it started. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.wake?.();
    await this.loop;
    this.loop = null;
    console.log("[lease-sweeper] stopped");
  }

  status(): SweeperStatus {
    return { running: this.running, last_sweep_at: this.lastSweepAt, expired_total: this.expiredTotal };
  }

  /**
   * One pass over the expired leases, fetched `batchSize` at a time until a
   * short batch comes back. Returns how many tasks went back to pending.
   */
  async sweepOnce(): Promise<number> {
    const nowMs = this.clock();
    let scanned = 0;
    let reclaimed = 0;

    for (;;) {
      const expired = await this.opts.store.listExpiredLeases(nowMs, this.opts.batchSize);
      let batchReclaimed = 0;
      for (const task of expired) {
        if (await this.opts.expire(task, nowMs)) batchReclaimed++;
      }
      scanned += expired.length;
      reclaimed += batchReclaimed;
      // a full batch where nothing moved would come back unchanged
      if (expired.length < this.opts.batchSize || batchReclaimed === 0) break;
    }

    this.lastSweepAt = nowMs;
    this.expiredTotal += reclaimed;
    if (reclaimed > 0 || this.opts.debug) {
      console.log(`[lease-sweeper] scanned=${scanned} reclaimed=${reclaimed}`);
    }
    return reclaimed;
  }

  private async run(): Promise<void> {
    while (this.running) {
      try {
        await this.sweepOnce();
      } catch (e) {
        console.error(`[lease-sweeper] sweep failed: ${errorMessage(e)}`);
      }
      if (!this.running) break;
      await this.sleep(this.opts.intervalMs);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wake = resolve;
      this.timer = setTimeout(() => {
        this.timer = null;
        this.wake = null;
        resolve();
      }, ms);
    });
  }
}
