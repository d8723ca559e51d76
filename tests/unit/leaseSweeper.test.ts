import { describe, it, expect, afterEach, vi } from "vitest";
import { LeaseSweeper } from "../../src/tasks/leaseSweeper.js";
import type { Task } from "../../src/tasks/types.js";
import { T0, makeTask, worker1 } from "../helpers.js";

function expiredTasks(count: number): Task[] {
  return Array.from({ length: count }, (_, i) =>
    makeTask({ id: `task-${i}`, status: "in_progress", claimed_by: worker1, lease_expires_at: T0 })
  );
}

describe("LeaseSweeper", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("keeps fetching batches until a short one comes back", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    let remaining = expiredTasks(7);
    const listExpiredLeases = vi.fn(async (_nowMs: number, limit: number) => remaining.slice(0, limit));
    const sweeper = new LeaseSweeper({
      store: { listExpiredLeases },
      expire: async (task) => {
        remaining = remaining.filter((t) => t.id !== task.id);
        return true;
      },
      intervalMs: 1000,
      batchSize: 3,
      clock: () => T0 + 1,
    });

    expect(await sweeper.sweepOnce()).toBe(7);
    expect(listExpiredLeases).toHaveBeenCalledTimes(3);
    expect(sweeper.status()).toEqual({ running: false, last_sweep_at: T0 + 1, expired_total: 7 });
  });

  it("ends the pass when a full batch reclaims nothing", async () => {
    const stuck = expiredTasks(2);
    const listExpiredLeases = vi.fn(async () => stuck);
    const sweeper = new LeaseSweeper({
      store: { listExpiredLeases },
      expire: async () => false,
      intervalMs: 1000,
      batchSize: 2,
      clock: () => T0 + 1,
    });

    expect(await sweeper.sweepOnce()).toBe(0);
    expect(listExpiredLeases).toHaveBeenCalledTimes(1);
  });
});
