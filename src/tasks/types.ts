export const TASK_STATUSES = ["pending", "in_progress", "completed", "cancelled", "failed", "rejected"] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export const TERMINAL_STATUSES: readonly TaskStatus[] = ["completed", "cancelled", "failed", "rejected"];

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type ActorType = "human" | "agent" | "system";

export interface Actor {
  type: ActorType;
  id: string;
  name: string;
}

export const SYSTEM_ACTOR: Actor = { type: "system", id: "lease-sweeper", name: "Lease sweeper" };

export interface Task {
  id: string;
  title: string;
  description: string;
  type: string;
  channel: string;
  priority: number;
  status: TaskStatus;
  payload: JsonValue | null;
  outputs: JsonValue | null;
  failure_reason: string | null;
  rejection_reason: string | null;
  reopen_reason: string | null;
  claimed_by: Actor | null;
  lease_expires_at: number | null; // epoch ms
  attempts: number;
  created_by: Actor | null;
  created_at: number; // epoch ms
  updated_at: number; // epoch ms
  version: number;
}

/** Fields supplied by the orchestrator on insert; the store fills timestamps and version. */
export type NewTask = Omit<Task, "created_at" | "updated_at" | "version">;

export interface Message {
  task_id: string;
  sequence: number;
  author: Actor;
  content: JsonValue;
  content_type: string;
  created_at: number; // epoch ms
}

export type NewMessage = Omit<Message, "task_id" | "sequence" | "created_at">;

export type TaskSort = "created" | "priority";

export interface TaskFilter {
  status?: TaskStatus;
  channel?: string;
  type?: string;
  limit?: number;
  includeAll?: boolean;
  sort?: TaskSort;
}

export const EVENT_KINDS = [
  "task.created",
  "task.claimed",
  "task.updated",
  "task.completed",
  "task.cancelled",
  "task.failed",
  "task.rejected",
  "task.reopened",
  "task.message",
  "task.lease_expired",
  "task.deleted",
] as const;

export type EventKind = (typeof EVENT_KINDS)[number];

interface BaseEvent {
  kind: EventKind;
  task_id: string;
  channel: string;
  task_type: string;
  actor: Actor;
  timestamp: number; // epoch ms
}

export interface TaskChangedEvent extends BaseEvent {
  kind: Exclude<EventKind, "task.message" | "task.deleted">;
  task: Task;
}

export interface TaskMessageEvent extends BaseEvent {
  kind: "task.message";
  message: Message;
}

export interface TaskDeletedEvent extends BaseEvent {
  kind: "task.deleted";
  version: number;
}

export type TaskEvent = TaskChangedEvent | TaskMessageEvent | TaskDeletedEvent;

export interface WatchFilter {
  channel?: string;
  task_type?: string;
  event_kinds?: readonly EventKind[];
}

export interface HealthReport {
  status: "ok" | "degraded";
  store: "ok" | "unavailable";
  sweeper: {
    running: boolean;
    last_sweep_at: number | null;
    expired_total: number;
  };
  watchers: number;
}
