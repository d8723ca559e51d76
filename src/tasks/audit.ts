import fs from "node:fs";
import path from "node:path";
import { errorMessage } from "./errors.js";
import type { EventBus } from "./eventBus.js";
import type { EventKind, TaskEvent } from "./types.js";

type AuditRow = {
  ts: number;
  type: EventKind;
  taskId: string;
  taskType: string;
  channel: string;
  actor: string;
  status?: string;
  version?: number;
  sequence?: number;
};

export interface AuditTrail {
  file: string;
  stop(): Promise<void>;
}

function ensureDir(dir: string): string {
  const resolved = path.resolve(process.cwd(), dir);
  if (!fs.existsSync(resolved)) fs.mkdirSync(resolved, { recursive: true });
  return resolved;
}

export function toAuditRow(event: TaskEvent): AuditRow {
  const row: AuditRow = {
    ts: event.timestamp,
    type: event.kind,
    taskId: event.task_id,
    taskType: event.task_type,
    channel: event.channel,
    actor: `${event.actor.type}:${event.actor.id}`,
  };
  if (event.kind === "task.message") {
    row.sequence = event.message.sequence;
  } else if (event.kind === "task.deleted") {
    row.version = event.version;
  } else {
    row.status = event.task.status;
    row.version = event.task.version;
  }
  return row;
}

/**
 * Appends every event to `<dir>/task-events.jsonl`. It is an ordinary watcher,
 * so it only records what it sees while running and is not a replay source.
 */
export function startAuditTrail(bus: EventBus, dir = ".orchestrator"): AuditTrail {
  const file = path.join(ensureDir(dir), "task-events.jsonl");
  const sub = bus.subscribe();

  const done = (async () => {
    for await (const event of sub) {
      try {
        fs.appendFileSync(file, JSON.stringify(toAuditRow(event)) + "\n", { encoding: "utf8" });
      } catch (e) {
        console.error(`[audit] failed to append ${event.kind} for task=${event.task_id}: ${errorMessage(e)}`);
      }
    }
  })();

  return {
    file,
    async stop() {
      sub.close();
      await done;
    },
  };
}
