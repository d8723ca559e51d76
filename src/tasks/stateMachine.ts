import { AlreadyClaimedError, InvalidTransitionError } from "./errors.js";
import { TERMINAL_STATUSES } from "./types.js";
import type { Actor, JsonValue, Task, TaskChangedEvent, TaskStatus } from "./types.js";

/*
 * Task lifecycle:
 *
 *   (create) -> pending --claim--> in_progress --complete--> completed
 *                 |  ^                 |  --cancel----> cancelled
 *                 |  '--lease_expired--'  --fail------> failed
 *                 '--reject--> rejected
 *
 *   completed | cancelled | failed | rejected --reopen--> pending
 *
 * `update` edits title/description/priority in any status, `renew` pushes the
 * lease of a running task forward, and `delete` removes a non-terminal task.
 */

export interface TaskFieldUpdate {
  title?: string;
  description?: string;
  priority?: number;
}

export type TransitionRequest =
  | { event: "claim"; actor: Actor; leaseMs: number; nowMs: number }
  | { event: "renew"; actor: Actor; leaseMs: number; nowMs: number }
  | { event: "complete"; outputs: JsonValue | null }
  | { event: "cancel" }
  | { event: "fail"; reason: string }
  | { event: "lease_expired"; nowMs: number }
  | { event: "reject"; reason: string }
  | { event: "reopen"; reason: string | null }
  | { event: "update"; fields: TaskFieldUpdate };

export type TransitionEvent = TransitionRequest["event"] | "delete";

interface Edge {
  from: readonly TaskStatus[];
  // null = the task is removed
  to: TaskStatus | null;
}

const EDGES: Record<Exclude<TransitionEvent, "update">, Edge> = {
  claim: { from: ["pending"], to: "in_progress" },
  renew: { from: ["in_progress"], to: "in_progress" },
  complete: { from: ["in_progress"], to: "completed" },
  cancel: { from: ["in_progress"], to: "cancelled" },
  fail: { from: ["in_progress"], to: "failed" },
  lease_expired: { from: ["in_progress"], to: "pending" },
  reject: { from: ["pending"], to: "rejected" },
  reopen: { from: TERMINAL_STATUSES, to: "pending" },
  delete: { from: ["pending", "in_progress"], to: null },
};

export const EVENT_KIND_FOR: Record<TransitionRequest["event"], TaskChangedEvent["kind"]> = {
  claim: "task.claimed",
  renew: "task.updated",
  complete: "task.completed",
  cancel: "task.cancelled",
  fail: "task.failed",
  lease_expired: "task.lease_expired",
  reject: "task.rejected",
  reopen: "task.reopened",
  update: "task.updated",
};

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * The status a task moves to when `event` is applied in `current`.
 * Returns null for `delete`. Throws InvalidTransitionError for any edge not in the table.
 */
export function nextStatus(current: TaskStatus, event: TransitionEvent): TaskStatus | null {
  if (event === "update") return current;
  const edge = EDGES[event];
  if (!edge.from.includes(current)) throw new InvalidTransitionError(current, event);
  return edge.to;
}

function withoutClaim(task: Task): Task {
  return { ...task, claimed_by: null, lease_expires_at: null };
}

/**
 * Computes the task that results from `request`. Pure: the caller persists the
 * result through the store's compare-and-swap.
 */
export function applyTransition(task: Task, request: TransitionRequest): Task {
  if (request.event === "claim" && task.status === "in_progress") {
    throw new AlreadyClaimedError(task.id, task.claimed_by?.id ?? null);
  }

  const to = nextStatus(task.status, request.event);
  if (to === null) throw new InvalidTransitionError(task.status, request.event);

  switch (request.event) {
    case "claim":
      return {
        ...task,
        status: to,
        claimed_by: request.actor,
        lease_expires_at: request.nowMs + request.leaseMs,
        attempts: task.attempts + 1,
      };

    case "renew":
      if (task.claimed_by?.id !== request.actor.id) {
        throw new AlreadyClaimedError(task.id, task.claimed_by?.id ?? null);
      }
      return { ...task, lease_expires_at: request.nowMs + request.leaseMs };

    case "complete":
      // completing without outputs keeps what an earlier run recorded
      return { ...withoutClaim(task), status: to, outputs: request.outputs ?? task.outputs };

    case "cancel":
      return { ...withoutClaim(task), status: to };

    case "fail":
      return { ...withoutClaim(task), status: to, failure_reason: request.reason };

    case "lease_expired":
      // A renewed lease is still live; the sweep saw a stale expiry.
      if (task.lease_expires_at === null || task.lease_expires_at > request.nowMs) {
        throw new InvalidTransitionError(task.status, request.event);
      }
      return { ...withoutClaim(task), status: to };

    case "reject":
      return { ...task, status: to, rejection_reason: request.reason };

    case "reopen":
      // outputs and earlier reasons are kept as history
      return { ...withoutClaim(task), status: to, reopen_reason: request.reason };

    case "update":
      return {
        ...task,
        title: request.fields.title ?? task.title,
        description: request.fields.description ?? task.description,
        priority: request.fields.priority ?? task.priority,
      };
  }
}
