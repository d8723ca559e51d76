import { randomUUID } from "node:crypto";
import { loadConfig } from "./config.js";
import type { OrchestratorConfig } from "./config.js";
import { InvalidTransitionError, NotFoundError, ValidationError, VersionConflictError, errorMessage } from "./errors.js";
import { EventBus } from "./eventBus.js";
import type { Subscription } from "./eventBus.js";
import { LeaseSweeper } from "./leaseSweeper.js";
import {
  ActorSchema,
  CreateTaskSchema,
  LeaseSchema,
  MessageSchema,
  OptionalReasonSchema,
  OutputsSchema,
  RequiredReasonSchema,
  TaskFilterSchema,
  TaskIdSchema,
  UpdateTaskSchema,
  WatchFilterSchema,
  parseInput,
} from "./schemas.js";
import { EVENT_KIND_FOR, applyTransition, nextStatus } from "./stateMachine.js";
import type { TaskFieldUpdate, TransitionRequest } from "./stateMachine.js";
import type { TaskStore } from "./taskStore.js";
import { SYSTEM_ACTOR } from "./types.js";
import type {
  Actor,
  HealthReport,
  JsonValue,
  Message,
  Task,
  TaskEvent,
  TaskFilter,
  WatchFilter,
} from "./types.js";

export interface CreateTaskInput {
  title: string;
  type?: string;
  channel?: string;
  priority?: number;
  description?: string;
  payload?: JsonValue;
}

export interface WatchOptions {
  signal?: AbortSignal;
  bufferSize?: number;
}

export interface TaskOrchestratorOptions {
  store: TaskStore;
  config?: Partial<OrchestratorConfig>;
  bus?: EventBus;
  clock?: () => number;
  newId?: () => string;
}

/**
 * Façade over the task store, state machine, lease sweeper and event bus.
 *
 * Every mutation reads the task, runs the transition through the state
 * machine, commits it with compare-and-swap against the version it read, and
 * only then publishes exactly one event. Version conflicts are retried from
 * the read up to `casMaxAttempts` times.
 */
export class TaskOrchestrator {
  readonly bus: EventBus;
  readonly sweeper: LeaseSweeper;
  private readonly store: TaskStore;
  private readonly config: OrchestratorConfig;
  private readonly clock: () => number;
  private readonly newId: () => string;

  constructor(opts: TaskOrchestratorOptions) {
    this.store = opts.store;
    this.config = { ...loadConfig({}), ...opts.config };
    this.clock = opts.clock ?? Date.now;
    this.newId = opts.newId ?? randomUUID;
    this.bus = opts.bus ?? new EventBus({ bufferSize: this.config.watchBuffer });
    this.sweeper = new LeaseSweeper({
      store: this.store,
      expire: (task, nowMs) => this.expireLease(task, nowMs),
      intervalMs: this.config.sweepIntervalMs,
      batchSize: this.config.sweepBatch,
      clock: this.clock,
      debug: this.config.debug,
    });
  }

  start(): void {
    this.sweeper.start();
  }

  /** Stops the sweeper (after its in-flight pass) and ends every open watch. */
  async stop(): Promise<void> {
    await this.sweeper.stop();
    this.bus.closeAll();
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  async getTask(id: string): Promise<Task> {
    return this.store.get(parseInput(TaskIdSchema, id));
  }

  async listTasks(filter: TaskFilter = {}): Promise<Task[]> {
    return this.store.list(parseInput(TaskFilterSchema, filter));
  }

  async listMessages(taskId: string): Promise<Message[]> {
    return this.store.listMessages(parseInput(TaskIdSchema, taskId));
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async createTask(input: CreateTaskInput, actor: Actor): Promise<Task> {
    const fields = parseInput(CreateTaskSchema, input);
    const who = parseInput(ActorSchema, actor);

    const task = await this.store.insert({
      id: this.newId(),
      title: fields.title,
      description: fields.description,
      type: fields.type,
      channel: fields.channel,
      priority: fields.priority,
      status: "pending",
      payload: fields.payload ?? null,
      outputs: null,
      failure_reason: null,
      rejection_reason: null,
      reopen_reason: null,
      claimed_by: null,
      lease_expires_at: null,
      attempts: 0,
      created_by: who,
    });

    this.publish({ kind: "task.created", ...this.eventBase(task, who), task });
    return task;
  }

  async updateTask(id: string, fields: TaskFieldUpdate, actor: Actor): Promise<Task> {
    const update = parseInput(UpdateTaskSchema, fields);
    return this.transition(id, actor, () => ({ event: "update", fields: update }));
  }

  async claimTask(id: string, actor: Actor, leaseMs?: number): Promise<Task> {
    const lease = this.parseLease(leaseMs);
    const who = parseInput(ActorSchema, actor);
    return this.transition(id, who, (nowMs) => ({ event: "claim", actor: who, leaseMs: lease, nowMs }));
  }

  /** Heartbeat from the current claimant: moves the lease forward without changing status. */
  async renewLease(id: string, actor: Actor, leaseMs?: number): Promise<Task> {
    const lease = this.parseLease(leaseMs);
    const who = parseInput(ActorSchema, actor);
    return this.transition(id, who, (nowMs) => ({ event: "renew", actor: who, leaseMs: lease, nowMs }));
  }

  async completeTask(id: string, actor: Actor, outputs?: JsonValue): Promise<Task> {
    const out = parseInput(OutputsSchema, outputs);
    return this.transition(id, actor, () => ({ event: "complete", outputs: out ?? null }));
  }

  async cancelTask(id: string, actor: Actor): Promise<Task> {
    return this.transition(id, actor, () => ({ event: "cancel" }));
  }

  async failTask(id: string, actor: Actor, reason: string): Promise<Task> {
    const why = parseInput(RequiredReasonSchema, reason);
    return this.transition(id, actor, () => ({ event: "fail", reason: why }));
  }

  async rejectTask(id: string, actor: Actor, reason: string): Promise<Task> {
    const why = parseInput(RequiredReasonSchema, reason);
    return this.transition(id, actor, () => ({ event: "reject", reason: why }));
  }

  async reopenTask(id: string, actor: Actor, reason?: string): Promise<Task> {
    const why = parseInput(OptionalReasonSchema, reason);
    return this.transition(id, actor, () => ({ event: "reopen", reason: why ?? null }));
  }

  async deleteTask(id: string, actor: Actor): Promise<void> {
    const taskId = parseInput(TaskIdSchema, id);
    const who = parseInput(ActorSchema, actor);

    await this.withRetries(taskId, async () => {
      const current = await this.store.get(taskId);
      nextStatus(current.status, "delete");
      await this.store.remove(taskId, current.version);
      this.publish({ kind: "task.deleted", ...this.eventBase(current, who), version: current.version });
    });
  }

  // -------------------------------------------------------------------------
  // Messages
  // -------------------------------------------------------------------------

  async addMessage(taskId: string, author: Actor, content: JsonValue, contentType = "text"): Promise<Message> {
    const id = parseInput(TaskIdSchema, taskId);
    const who = parseInput(ActorSchema, author);
    const body = parseInput(MessageSchema, { content, contentType });

    // channel and type never change after creation, so reading them first is safe
    const task = await this.store.get(id);
    const message = await this.store.appendMessage(id, {
      author: who,
      content: body.content,
      content_type: body.contentType,
    });

    this.publish({ kind: "task.message", ...this.eventBase(task, who), message });
    return message;
  }

  // -------------------------------------------------------------------------
  // Events
  // -------------------------------------------------------------------------

  /**
   * Opens a live event stream. Only events published after this call are
   * seen; the stream ends when it is closed, `signal` aborts, or the
   * orchestrator stops.
   */
  watch(filter: WatchFilter = {}, opts: WatchOptions = {}): Subscription {
    const parsed = parseInput(WatchFilterSchema, filter);
    return this.bus.subscribe(parsed, {
      bufferSize: opts.bufferSize ?? this.config.watchBuffer,
      signal: opts.signal,
    });
  }

  // -------------------------------------------------------------------------
  // Leases
  // -------------------------------------------------------------------------

  /**
   * Single-shot lease expiry used by the sweeper. Resolves false when the task
   * was completed, renewed, re-claimed or deleted since it was scanned.
   */
  async expireLease(task: Task, nowMs: number): Promise<boolean> {
    try {
      const next = applyTransition(task, { event: "lease_expired", nowMs });
      const updated = await this.store.compareAndSwap(task.id, task.version, () => next);
      this.publish({ kind: "task.lease_expired", ...this.eventBase(updated, SYSTEM_ACTOR), task: updated });
      return true;
    } catch (e) {
      if (e instanceof VersionConflictError || e instanceof InvalidTransitionError || e instanceof NotFoundError) {
        if (this.config.debug) console.log(`[orchestrator] lease expiry skipped task=${task.id}: ${e.message}`);
        return false;
      }
      throw e;
    }
  }

  async health(): Promise<HealthReport> {
    let store: HealthReport["store"] = "ok";
    try {
      await this.store.ping();
    } catch (e) {
      console.error(`[orchestrator] health check: store unavailable: ${errorMessage(e)}`);
      store = "unavailable";
    }

    const sweeper = this.sweeper.status();
    return {
      status: store === "ok" && sweeper.running ? "ok" : "degraded",
      store,
      sweeper,
      watchers: this.bus.size,
    };
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private parseLease(leaseMs: number | undefined): number {
    const lease = parseInput(LeaseSchema, leaseMs ?? this.config.defaultLeaseMs);
    if (lease > this.config.maxLeaseMs) {
      throw new ValidationError([`leaseMs: must not exceed ${this.config.maxLeaseMs}`]);
    }
    return lease;
  }

  private async transition(
    id: string,
    actor: Actor,
    build: (nowMs: number) => TransitionRequest
  ): Promise<Task> {
    const taskId = parseInput(TaskIdSchema, id);
    const who = parseInput(ActorSchema, actor);

    return this.withRetries(taskId, async () => {
      const current = await this.store.get(taskId);
      const request = build(this.clock());
      const next = applyTransition(current, request);
      const updated = await this.store.compareAndSwap(taskId, current.version, () => next);
      this.publish({ kind: EVENT_KIND_FOR[request.event], ...this.eventBase(updated, who), task: updated });
      return updated;
    });
  }

  private async withRetries<T>(taskId: string, attempt: () => Promise<T>): Promise<T> {
    const max = this.config.casMaxAttempts;
    for (let n = 1; ; n++) {
      try {
        return await attempt();
      } catch (e) {
        if (!(e instanceof VersionConflictError)) throw e;
        if (n >= max) {
          throw new VersionConflictError(
            taskId,
            e.expected,
            e.actual,
            `Task ${taskId} kept changing underneath this update; gave up after ${n} attempts`
          );
        }
        if (this.config.debug) console.log(`[orchestrator] version conflict task=${taskId} attempt=${n}, retrying`);
      }
    }
  }

  private eventBase(task: Task, actor: Actor) {
    return {
      task_id: task.id,
      channel: task.channel,
      task_type: task.type,
      actor,
      timestamp: this.clock(),
    };
  }

  private publish(event: TaskEvent): void {
    const delivered = this.bus.publish(event);
    if (this.config.debug) console.log(`[orchestrator] ${event.kind} task=${event.task_id} delivered=${delivered}`);
  }
}
