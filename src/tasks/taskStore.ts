import type { TasksDb } from "./db.js";
import { NotFoundError, OrchestratorError, StoreUnavailableError, VersionConflictError } from "./errors.js";
import { parseStoredActor } from "./schemas.js";
import { TASK_STATUSES } from "./types.js";
import type { Actor, JsonValue, Message, NewMessage, NewTask, Task, TaskFilter, TaskStatus } from "./types.js";

/**
 * Durable record of every task and its message thread.
 *
 * All task mutation goes through {@link TaskStore.compareAndSwap} (or
 * {@link TaskStore.remove} for deletion): the caller names the version it read,
 * and the write is refused with a VersionConflictError if anyone else got there first.
 */
export interface TaskStore {
  insert(task: NewTask): Promise<Task>;
  get(id: string): Promise<Task>;
  list(filter: TaskFilter): Promise<Task[]>;
  compareAndSwap(id: string, expectedVersion: number, mutator: (current: Task) => Task): Promise<Task>;
  remove(id: string, expectedVersion: number): Promise<void>;
  listExpiredLeases(nowMs: number, limit: number): Promise<Task[]>;
  appendMessage(taskId: string, message: NewMessage): Promise<Message>;
  listMessages(taskId: string): Promise<Message[]>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

interface TaskRow {
  id: string;
  title: string;
  description: string;
  type: string;
  channel: string;
  priority: number;
  status: string;
  payload_json: string | null;
  outputs_json: string | null;
  failure_reason: string | null;
  rejection_reason: string | null;
  reopen_reason: string | null;
  claimed_by_json: string | null;
  lease_expires_at_ms: number | null;
  attempts: number;
  created_by_json: string | null;
  created_at_ms: number;
  updated_at_ms: number;
  version: number;
  message_seq: number;
}

interface MessageRow {
  task_id: string;
  sequence: number;
  author_json: string;
  content_json: string;
  content_type: string;
  created_at_ms: number;
}

function parseStatus(s: string): TaskStatus {
  const status = TASK_STATUSES.find((candidate) => candidate === s);
  if (!status) throw new Error(`Unknown task status in store: ${s}`);
  return status;
}

function parseJson(text: string | null): JsonValue | null {
  return text === null ? null : JSON.parse(text);
}

function encodeJson(value: JsonValue | Actor | null): string | null {
  return value === null ? null : JSON.stringify(value);
}

function rowToTask(row: TaskRow): Task {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    type: row.type,
    channel: row.channel,
    priority: row.priority,
    status: parseStatus(row.status),
    payload: parseJson(row.payload_json),
    outputs: parseJson(row.outputs_json),
    failure_reason: row.failure_reason,
    rejection_reason: row.rejection_reason,
    reopen_reason: row.reopen_reason,
    claimed_by: row.claimed_by_json === null ? null : parseStoredActor(row.claimed_by_json),
    lease_expires_at: row.lease_expires_at_ms,
    attempts: row.attempts,
    created_by: row.created_by_json === null ? null : parseStoredActor(row.created_by_json),
    created_at: row.created_at_ms,
    updated_at: row.updated_at_ms,
    version: row.version,
  };
}

function rowToMessage(row: MessageRow): Message {
  return {
    task_id: row.task_id,
    sequence: row.sequence,
    author: parseStoredActor(row.author_json),
    content: JSON.parse(row.content_json),
    content_type: row.content_type,
    created_at: row.created_at_ms,
  };
}

function mutableParams(task: NewTask) {
  return {
    title: task.title,
    description: task.description,
    type: task.type,
    channel: task.channel,
    priority: task.priority,
    status: task.status,
    payload_json: encodeJson(task.payload),
    outputs_json: encodeJson(task.outputs),
    failure_reason: task.failure_reason,
    rejection_reason: task.rejection_reason,
    reopen_reason: task.reopen_reason,
    claimed_by_json: encodeJson(task.claimed_by),
    lease_expires_at_ms: task.lease_expires_at,
    attempts: task.attempts,
  };
}

function sqliteCode(e: unknown): string | null {
  if (!(e instanceof Error) || !("code" in e)) return null;
  const code = e.code;
  return typeof code === "string" && code.startsWith("SQLITE_") ? code : null;
}

/** Maps engine failures onto StoreUnavailableError; domain errors pass through untouched. */
function toStoreError(e: unknown): unknown {
  if (e instanceof OrchestratorError) return e;
  const code = sqliteCode(e);
  if (code && !code.startsWith("SQLITE_CONSTRAINT")) {
    return new StoreUnavailableError(`Task store error (${code}): ${e instanceof Error ? e.message : String(e)}`, {
      cause: e,
    });
  }
  if (e instanceof TypeError && e.message.includes("database connection is not open")) {
    return new StoreUnavailableError("Task store is closed", { cause: e });
  }
  return e;
}

export interface SqliteTaskStoreOptions {
  clock?: () => number;
}

export class SqliteTaskStore implements TaskStore {
  private readonly db: TasksDb;
  private readonly clock: () => number;

  constructor(db: TasksDb, opts: SqliteTaskStoreOptions = {}) {
    this.db = db;
    this.clock = opts.clock ?? Date.now;
  }

  async insert(task: NewTask): Promise<Task> {
    return this.guard(() => {
      const now = this.clock();
      this.db
        .prepare(
          `
          INSERT INTO tasks (
            id, title, description, type, channel, priority, status,
            payload_json, outputs_json, failure_reason, rejection_reason, reopen_reason,
            claimed_by_json, lease_expires_at_ms, attempts, created_by_json,
            created_at_ms, updated_at_ms, version, message_seq
          ) VALUES (
            @id, @title, @description, @type, @channel, @priority, @status,
            @payload_json, @outputs_json, @failure_reason, @rejection_reason, @reopen_reason,
            @claimed_by_json, @lease_expires_at_ms, @attempts, @created_by_json,
            @created_at_ms, @updated_at_ms, 0, 0
          )
        `
        )
        .run({
          ...mutableParams(task),
          id: task.id,
          created_by_json: encodeJson(task.created_by),
          created_at_ms: now,
          updated_at_ms: now,
        });
      return this.mustGet(task.id);
    });
  }

  async get(id: string): Promise<Task> {
    return this.guard(() => this.mustGet(id));
  }

  async list(filter: TaskFilter): Promise<Task[]> {
    return this.guard(() => {
      const where: string[] = [];
      const params: Array<string | number> = [];

      if (filter.status) {
        where.push("status = ?");
        params.push(filter.status);
      } else if (!filter.includeAll) {
        where.push("status IN ('pending', 'in_progress')");
      }
      if (filter.channel !== undefined) {
        where.push("channel = ?");
        params.push(filter.channel);
      }
      if (filter.type !== undefined) {
        where.push("type = ?");
        params.push(filter.type);
      }

      const order =
        filter.sort === "priority" ? "priority DESC, created_at_ms ASC, rowid ASC" : "created_at_ms ASC, rowid ASC";

      let sql = `SELECT * FROM tasks`;
      if (where.length > 0) sql += ` WHERE ${where.join(" AND ")}`;
      sql += ` ORDER BY ${order}`;
      if (filter.limit !== undefined) {
        sql += ` LIMIT ?`;
        params.push(filter.limit);
      }

      const rows = this.db.prepare(sql).all(...params) as TaskRow[];
      return rows.map(rowToTask);
    });
  }

  async compareAndSwap(id: string, expectedVersion: number, mutator: (current: Task) => Task): Promise<Task> {
    return this.guard(() =>
      this.immediate(() => {
        const current = this.checkVersion(id, expectedVersion);
        const next = mutator(current);

        const info = this.db
          .prepare(
            `
            UPDATE tasks
            SET title = @title,
                description = @description,
                type = @type,
                channel = @channel,
                priority = @priority,
                status = @status,
                payload_json = @payload_json,
                outputs_json = @outputs_json,
                failure_reason = @failure_reason,
                rejection_reason = @rejection_reason,
                reopen_reason = @reopen_reason,
                claimed_by_json = @claimed_by_json,
                lease_expires_at_ms = @lease_expires_at_ms,
                attempts = @attempts,
                updated_at_ms = @updated_at_ms,
                version = version + 1
            WHERE id = @id AND version = @expected_version
          `
          )
          .run({
            ...mutableParams(next),
            id,
            expected_version: expectedVersion,
            updated_at_ms: this.clock(),
          });

        if (info.changes !== 1) throw new VersionConflictError(id, expectedVersion, null);
        return this.mustGet(id);
      })
    );
  }

  async remove(id: string, expectedVersion: number): Promise<void> {
    return this.guard(() =>
      this.immediate(() => {
        this.checkVersion(id, expectedVersion);
        const info = this.db.prepare(`DELETE FROM tasks WHERE id = ? AND version = ?`).run(id, expectedVersion);
        if (info.changes !== 1) throw new VersionConflictError(id, expectedVersion, null);
      })
    );
  }

  async listExpiredLeases(nowMs: number, limit: number): Promise<Task[]> {
    return this.guard(() => {
      const rows = this.db
        .prepare(
          `
          SELECT * FROM tasks
          WHERE status = 'in_progress'
            AND lease_expires_at_ms <= ?
          ORDER BY lease_expires_at_ms ASC
          LIMIT ?
        `
        )
        .all(nowMs, limit) as TaskRow[];
      return rows.map(rowToTask);
    });
  }

  async appendMessage(taskId: string, message: NewMessage): Promise<Message> {
    return this.guard(() =>
      this.immediate(() => {
        // The per-task counter is bumped under the write lock, so sequences never collide or skip.
        const bumped = this.db
          .prepare(`UPDATE tasks SET message_seq = message_seq + 1 WHERE id = ? RETURNING message_seq`)
          .get(taskId) as { message_seq: number } | undefined;
        if (!bumped) throw new NotFoundError(taskId);

        const row: MessageRow = {
          task_id: taskId,
          sequence: bumped.message_seq,
          author_json: JSON.stringify(message.author),
          content_json: JSON.stringify(message.content),
          content_type: message.content_type,
          created_at_ms: this.clock(),
        };
        this.db
          .prepare(
            `
            INSERT INTO task_messages (task_id, sequence, author_json, content_json, content_type, created_at_ms)
            VALUES (@task_id, @sequence, @author_json, @content_json, @content_type, @created_at_ms)
          `
          )
          .run(row);
        return rowToMessage(row);
      })
    );
  }

  async listMessages(taskId: string): Promise<Message[]> {
    return this.guard(() => {
      this.mustGet(taskId);
      const rows = this.db
        .prepare(`SELECT * FROM task_messages WHERE task_id = ? ORDER BY sequence ASC`)
        .all(taskId) as MessageRow[];
      return rows.map(rowToMessage);
    });
  }

  async ping(): Promise<void> {
    return this.guard(() => {
      this.db.prepare(`SELECT 1`).get();
    });
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }

  private mustGet(id: string): Task {
    const row = this.db.prepare(`SELECT * FROM tasks WHERE id = ?`).get(id) as TaskRow | undefined;
    if (!row) throw new NotFoundError(id);
    return rowToTask(row);
  }

  private checkVersion(id: string, expectedVersion: number): Task {
    const current = this.mustGet(id);
    if (current.version !== expectedVersion) {
      throw new VersionConflictError(id, expectedVersion, current.version);
    }
    return current;
  }

  // BEGIN IMMEDIATE takes the write lock up front, so read-check-write cannot interleave across processes
  private immediate<T>(fn: () => T): T {
    this.db.exec("BEGIN IMMEDIATE");
    try {
      const out = fn();
      this.db.exec("COMMIT");
      return out;
    } catch (e) {
      if (this.db.inTransaction) this.db.exec("ROLLBACK");
      throw e;
    }
  }

  private guard<T>(fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      throw toStoreError(e);
    }
  }
}
