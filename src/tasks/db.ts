import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";

export type TasksDb = Database.Database;

export function openTasksDb(dbPath: string): TasksDb {
  const inMemory = dbPath === ":memory:";

  if (!inMemory) {
    const dir = path.dirname(path.resolve(process.cwd(), dbPath));
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }

  const db = new Database(dbPath);

  // WAL = concurrent readers, crash-resilient (no-op for :memory:)
  if (!inMemory) db.pragma("journal_mode = WAL");

  // FULL = strongest durability
  db.pragma("synchronous = FULL");

  // Messages cascade with their task
  db.pragma("foreign_keys = ON");

  // Avoid immediate "database is locked" errors when several processes share the file
  db.pragma("busy_timeout = 5000");

  return db;
}
