import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, afterEach } from "vitest";
import { startAuditTrail, toAuditRow } from "../../src/tasks/audit.js";
import { EventBus } from "../../src/tasks/eventBus.js";
import type { TaskEvent } from "../../src/tasks/types.js";
import { T0, alice, makeTask, sleep, worker1 } from "../helpers.js";

const claimedEvent: TaskEvent = {
  kind: "task.claimed",
  task_id: "task-1",
  channel: "ops",
  task_type: "summary",
  actor: worker1,
  timestamp: T0,
  task: makeTask({ status: "in_progress", claimed_by: worker1, lease_expires_at: T0 + 1000, version: 1 }),
};

const messageEvent: TaskEvent = {
  kind: "task.message",
  task_id: "task-1",
  channel: "ops",
  task_type: "summary",
  actor: alice,
  timestamp: T0 + 5,
  message: { task_id: "task-1", sequence: 3, author: alice, content: "hi", content_type: "text", created_at: T0 + 5 },
};

describe("toAuditRow", () => {
  it("records status and version for task changes", () => {
    expect(toAuditRow(claimedEvent)).toEqual({
      ts: T0,
      type: "task.claimed",
      taskId: "task-1",
      taskType: "summary",
      channel: "ops",
      actor: "agent:worker-1",
      status: "in_progress",
      version: 1,
    });
  });

  it("records the sequence for messages", () => {
    expect(toAuditRow(messageEvent)).toEqual({
      ts: T0 + 5,
      type: "task.message",
      taskId: "task-1",
      taskType: "summary",
      channel: "ops",
      actor: "human:alice",
      sequence: 3,
    });
  });
});

describe("startAuditTrail", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it("appends one JSON line per event", async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "task-audit-"));
    const bus = new EventBus();
    const trail = startAuditTrail(bus, dir);

    bus.publish(claimedEvent);
    bus.publish(messageEvent);
    await sleep(10);
    await trail.stop();

    const lines = fs.readFileSync(trail.file, "utf8").trim().split("\n");
    expect(lines.map((l) => JSON.parse(l).type)).toEqual(["task.claimed", "task.message"]);
    expect(bus.size).toBe(0);
  });
});
