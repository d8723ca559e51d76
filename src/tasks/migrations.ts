import type { TasksDb } from "./db.js";

const SCHEMA_VERSION = 1;

export function migrateTasksDb(db: TasksDb): void {
  const current = db.pragma("user_version", { simple: true });
  if (typeof current === "number" && current >= SCHEMA_VERSION) return;

  db.exec(`
    CREATE TABLE IF NOT EXISTS tasks (
      id TEXT PRIMARY KEY,
      title TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      type TEXT NOT NULL DEFAULT '',
      channel TEXT NOT NULL DEFAULT '',
      priority INTEGER NOT NULL DEFAULT 5 CHECK (priority BETWEEN 1 AND 10),
      status TEXT NOT NULL CHECK (status IN ('pending', 'in_progress', 'completed', 'cancelled', 'failed', 'rejected')),
      payload_json TEXT,
      outputs_json TEXT,
      failure_reason TEXT,
      rejection_reason TEXT,
      reopen_reason TEXT,
      claimed_by_json TEXT,
      lease_expires_at_ms INTEGER,
      attempts INTEGER NOT NULL DEFAULT 0,
      created_by_json TEXT,
      created_at_ms INTEGER NOT NULL,
      updated_at_ms INTEGER NOT NULL,
      version INTEGER NOT NULL DEFAULT 0,
      message_seq INTEGER NOT NULL DEFAULT 0,
      CHECK ((status = 'in_progress') = (lease_expires_at_ms IS NOT NULL)),
      CHECK ((status = 'in_progress') = (claimed_by_json IS NOT NULL))
    );

    CREATE TABLE IF NOT EXISTS task_messages (
      task_id TEXT NOT NULL,
      sequence INTEGER NOT NULL,
      author_json TEXT NOT NULL,
      content_json TEXT NOT NULL,
      content_type TEXT NOT NULL,
      created_at_ms INTEGER NOT NULL,
      PRIMARY KEY (task_id, sequence),
      FOREIGN KEY (task_id) REFERENCES tasks(id) ON DELETE CASCADE
    );

    CREATE INDEX IF NOT EXISTS idx_tasks_status_created
      ON tasks(status, created_at_ms);

    CREATE INDEX IF NOT EXISTS idx_tasks_lease
      ON tasks(lease_expires_at_ms) WHERE status = 'in_progress';
  `);

  db.pragma(`user_version = ${SCHEMA_VERSION}`);
}
