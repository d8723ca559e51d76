import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { TaskOrchestrator } from "../../src/tasks/orchestrator.js";
import type { TaskEvent } from "../../src/tasks/types.js";
import { alice, createHarness, sleep, worker1, worker2 } from "../helpers.js";

describe("task lifecycle scenarios", () => {
  let orch: TaskOrchestrator;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    orch = createHarness({ config: { sweepIntervalMs: 100 } }).orchestrator;
    orch.start();
  });

  afterEach(async () => {
    await orch.stop();
    vi.restoreAllMocks();
  });

  it("create, claim and complete", async () => {
    const task = await orch.createTask({ title: "Rotate certificates", priority: 8, channel: "ops" }, alice);
    await orch.claimTask(task.id, worker1, 60_000);
    const done = await orch.completeTask(task.id, worker1, { result: "ok" });

    expect(done.status).toBe("completed");
    expect(done.outputs).toEqual({ result: "ok" });
    expect(done.claimed_by).toBeNull();
    expect(done.lease_expires_at).toBeNull();
    expect(await orch.getTask(task.id)).toEqual(done);
  });

  it("an abandoned claim returns to pending and a watcher sees the expiry", async () => {
    const task = await orch.createTask({ title: "Reindex search" }, alice);
    const watcher = orch.watch({ event_kinds: ["task.lease_expired"] });
    const claimedAt = Date.now();
    await orch.claimTask(task.id, worker1, 500);

    const seen: Array<{ event: TaskEvent; at: number }> = [];
    const reader = (async () => {
      for await (const event of watcher) seen.push({ event, at: Date.now() });
    })();

    await sleep(1000);
    watcher.close();
    await reader;

    expect((await orch.getTask(task.id)).status).toBe("pending");
    expect(seen).toHaveLength(1);
    expect(seen[0].event.task_id).toBe(task.id);
    expect(seen[0].at - claimedAt).toBeGreaterThanOrEqual(500);

    const reclaimed = await orch.claimTask(task.id, worker2, 60_000);
    expect(reclaimed.claimed_by).toEqual(worker2);
    expect(reclaimed.attempts).toBe(2);
  });

  it("reject then reopen", async () => {
    const task = await orch.createTask({ title: "Migrate billing" }, alice);
    await orch.rejectTask(task.id, worker1, "out of scope");
    const reopened = await orch.reopenTask(task.id, alice, "revisit");

    expect(reopened.status).toBe("pending");
    expect(reopened.rejection_reason).toBe("out of scope");
    expect(reopened.reopen_reason).toBe("revisit");
  });

  it("a handoff conversation survives the task finishing", async () => {
    const task = await orch.createTask({ title: "Draft release notes", channel: "docs" }, alice);
    const watcher = orch.watch({ channel: "docs" });

    await orch.claimTask(task.id, worker1);
    await orch.addMessage(task.id, worker1, "Which version?");
    await orch.addMessage(task.id, alice, "2.4");
    await orch.completeTask(task.id, worker1, { notes: "draft" });
    await orch.addMessage(task.id, alice, { thanks: true }, "json");

    const thread = await orch.listMessages(task.id);
    expect(thread.map((m) => [m.sequence, m.author.id])).toEqual([
      [1, "worker-1"],
      [2, "alice"],
      [3, "alice"],
    ]);
    expect(watcher.delivered).toBe(5);
  });
});
