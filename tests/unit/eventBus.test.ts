import { describe, it, expect, vi } from "vitest";
import { EventBus, matchesFilter } from "../../src/tasks/eventBus.js";
import type { TaskEvent } from "../../src/tasks/types.js";
import { T0, alice, makeTask } from "../helpers.js";

function created(id: string, channel = "ops", type = "summary"): TaskEvent {
  const task = makeTask({ id, channel, type });
  return { kind: "task.created", task_id: id, channel, task_type: type, actor: alice, timestamp: T0, task };
}

function deleted(id: string, channel = "ops"): TaskEvent {
  return { kind: "task.deleted", task_id: id, channel, task_type: "summary", actor: alice, timestamp: T0, version: 0 };
}

async function drain(sub: AsyncIterator<TaskEvent>, count: number): Promise<string[]> {
  const ids: string[] = [];
  for (let i = 0; i < count; i++) {
    const r = await sub.next();
    if (r.done) break;
    ids.push(r.value.task_id);
  }
  return ids;
}

describe("matchesFilter", () => {
  it("matches everything with an empty filter", () => {
    expect(matchesFilter(created("a"), {})).toBe(true);
  });

  it("requires every given field to match", () => {
    const event = created("a", "ops", "summary");
    expect(matchesFilter(event, { channel: "ops" })).toBe(true);
    expect(matchesFilter(event, { channel: "dev" })).toBe(false);
    expect(matchesFilter(event, { channel: "ops", task_type: "review" })).toBe(false);
    expect(matchesFilter(event, { event_kinds: ["task.created", "task.claimed"] })).toBe(true);
    expect(matchesFilter(event, { event_kinds: ["task.deleted"] })).toBe(false);
  });
});

describe("EventBus", () => {
  it("delivers matching events in publish order", async () => {
    const bus = new EventBus();
    const ops = bus.subscribe({ channel: "ops" });
    const all = bus.subscribe();

    expect(bus.publish(created("a", "ops"))).toBe(2);
    expect(bus.publish(created("b", "dev"))).toBe(1);
    expect(bus.publish(deleted("c", "ops"))).toBe(2);

    expect(await drain(ops, 2)).toEqual(["a", "c"]);
    expect(await drain(all, 3)).toEqual(["a", "b", "c"]);
  });

  it("does not replay events published before subscribing", async () => {
    const bus = new EventBus();
    bus.publish(created("early"));
    const late = bus.subscribe();
    bus.publish(created("later"));

    expect(await drain(late, 1)).toEqual(["later"]);
    expect(late.delivered).toBe(1);
  });

  it("hands an event straight to a waiting reader", async () => {
    const bus = new EventBus();
    const sub = bus.subscribe();
    const pending = sub.next();
    bus.publish(created("a"));

    const r = await pending;
    expect(r.done).toBe(false);
    if (!r.done) expect(r.value.task_id).toBe("a");
  });

  it("drops for a saturated subscriber only and counts the drops", async () => {
    const bus = new EventBus();
    const slow = bus.subscribe({}, { bufferSize: 2 });
    const fast = bus.subscribe({}, { bufferSize: 10 });

    for (const id of ["a", "b", "c", "d", "e"]) bus.publish(created(id));

    expect(slow.dropped).toBe(3);
    expect(slow.delivered).toBe(2);
    expect(fast.dropped).toBe(0);
    expect(await drain(slow, 2)).toEqual(["a", "b"]);
    expect(await drain(fast, 5)).toEqual(["a", "b", "c", "d", "e"]);

    bus.publish(created("f"));
    expect(await drain(slow, 1)).toEqual(["f"]);
  });

  it("close ends pending reads and unsubscribes", async () => {
    const bus = new EventBus();
    const sub = bus.subscribe();
    const pending = sub.next();
    expect(bus.size).toBe(1);

    sub.close();

    expect(await pending).toEqual({ value: undefined, done: true });
    expect(bus.size).toBe(0);
    expect(sub.isClosed).toBe(true);
    expect(bus.publish(created("a"))).toBe(0);
  });

  it("ends a for-await loop when its signal aborts", async () => {
    const bus = new EventBus();
    const controller = new AbortController();
    const sub = bus.subscribe({}, { signal: controller.signal });

    const seen: string[] = [];
    const loop = (async () => {
      for await (const event of sub) {
        seen.push(event.task_id);
        if (seen.length === 1) controller.abort();
      }
    })();

    bus.publish(created("a"));
    await loop;

    expect(seen).toEqual(["a"]);
    expect(bus.size).toBe(0);
  });

  it("releases its abort listener when closed normally", () => {
    const bus = new EventBus();
    const controller = new AbortController();
    const removed = vi.spyOn(controller.signal, "removeEventListener");

    const sub = bus.subscribe({}, { signal: controller.signal });
    sub.close();

    expect(removed).toHaveBeenCalledWith("abort", expect.any(Function));
    controller.abort();
    expect(bus.size).toBe(0);
  });

  it("returns an already-closed subscription for an aborted signal", async () => {
    const bus = new EventBus();
    const sub = bus.subscribe({}, { signal: AbortSignal.abort() });

    expect(sub.isClosed).toBe(true);
    expect(bus.size).toBe(0);
    expect(await sub.next()).toEqual({ value: undefined, done: true });
  });

  it("closeAll closes every subscriber", () => {
    const bus = new EventBus();
    const a = bus.subscribe();
    const b = bus.subscribe({ channel: "dev" });

    bus.closeAll();

    expect(a.isClosed && b.isClosed).toBe(true);
    expect(bus.size).toBe(0);
  });
});
