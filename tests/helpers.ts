import { openTasksDb } from "../src/tasks/db.js";
import type { TasksDb } from "../src/tasks/db.js";
import { migrateTasksDb } from "../src/tasks/migrations.js";
import { TaskOrchestrator } from "../src/tasks/orchestrator.js";
import type { OrchestratorConfig } from "../src/tasks/config.js";
import { SqliteTaskStore } from "../src/tasks/taskStore.js";
import type { Actor, Task } from "../src/tasks/types.js";

export const alice: Actor = { type: "human", id: "alice", name: "Alice" };
export const worker1: Actor = { type: "agent", id: "worker-1", name: "Worker 1" };
export const worker2: Actor = { type: "agent", id: "worker-2", name: "Worker 2" };

export const T0 = 1_700_000_000_000;

export class ManualClock {
  private current: number;

  constructor(start = T0) {
    this.current = start;
  }

  readonly now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

export function memoryDb(): TasksDb {
  const db = openTasksDb(":memory:");
  migrateTasksDb(db);
  return db;
}

export interface TestHarness {
  db: TasksDb;
  store: SqliteTaskStore;
  orchestrator: TaskOrchestrator;
}

export function createHarness(
  opts: { clock?: () => number; config?: Partial<OrchestratorConfig>; store?: (db: TasksDb) => SqliteTaskStore } = {}
): TestHarness {
  const db = memoryDb();
  const store = opts.store ? opts.store(db) : new SqliteTaskStore(db, { clock: opts.clock });
  const orchestrator = new TaskOrchestrator({ store, clock: opts.clock, config: opts.config });
  return { db, store, orchestrator };
}

export function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: "task-1",
    title: "Summarise logs",
    description: "",
    type: "summary",
    channel: "ops",
    priority: 5,
    status: "pending",
    payload: null,
    outputs: null,
    failure_reason: null,
    rejection_reason: null,
    reopen_reason: null,
    claimed_by: null,
    lease_expires_at: null,
    attempts: 0,
    created_by: alice,
    created_at: T0,
    updated_at: T0,
    version: 0,
    ...overrides,
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
