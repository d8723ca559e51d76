import { DEFAULT_WATCH_BUFFER } from "./config.js";
import type { TaskEvent, WatchFilter } from "./types.js";

export function matchesFilter(event: TaskEvent, filter: WatchFilter): boolean {
  if (filter.channel !== undefined && filter.channel !== event.channel) return false;
  if (filter.task_type !== undefined && filter.task_type !== event.task_type) return false;
  if (filter.event_kinds !== undefined && !filter.event_kinds.includes(event.kind)) return false;
  return true;
}

/**
 * One watcher's view of the bus: a lazy, non-restartable async sequence of
 * events, backed by a bounded queue. When the queue is full new events are
 * dropped for this watcher only.
 */
export class Subscription implements AsyncIterableIterator<TaskEvent> {
  readonly filter: WatchFilter;
  private readonly capacity: number;
  private readonly queue: TaskEvent[] = [];
  private readonly waiters: Array<(result: IteratorResult<TaskEvent>) => void> = [];
  private readonly onClose: (sub: Subscription) => void;
  private closed = false;
  private droppedCount = 0;
  private deliveredCount = 0;

  constructor(filter: WatchFilter, capacity: number, onClose: (sub: Subscription) => void) {
    this.filter = filter;
    this.capacity = capacity;
    this.onClose = onClose;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get delivered(): number {
    return this.deliveredCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Hands an event to this watcher without ever waiting. Returns false if it was dropped. */
  offer(event: TaskEvent): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      this.deliveredCount++;
      waiter({ value: event, done: false });
      return true;
    }

    if (this.queue.length >= this.capacity) {
      this.droppedCount++;
      return false;
    }

    this.queue.push(event);
    this.deliveredCount++;
    return true;
  }

  next(): Promise<IteratorResult<TaskEvent>> {
    const event = this.queue.shift();
    if (event) return Promise.resolve({ value: event, done: false });
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  return(): Promise<IteratorResult<TaskEvent>> {
    this.close();
    return Promise.resolve({ value: undefined, done: true });
  }

  /** Unsubscribes. Queued events are discarded and pending reads finish. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue.length = 0;
    for (const waiter of this.waiters.splice(0)) waiter({ value: undefined, done: true });
    this.onClose(this);
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<TaskEvent> {
    return this;
  }
}

export interface SubscribeOptions {
  bufferSize?: number;
  signal?: AbortSignal;
}

/**
 * Fans each published event out to every live subscription whose filter
 * matches. Holds no history: a subscription only sees events published
 * while it is open.
 */
export class EventBus {
  private readonly subscribers = new Set<Subscription>();
  private readonly defaultBuffer: number;

  constructor(opts: { bufferSize?: number } = {}) {
    this.defaultBuffer = opts.bufferSize ?? DEFAULT_WATCH_BUFFER;
  }

  get size(): number {
    return this.subscribers.size;
  }

  subscribe(filter: WatchFilter = {}, opts: SubscribeOptions = {}): Subscription {
    const { signal } = opts;
    const onAbort = () => sub.close();
    const sub = new Subscription(filter, opts.bufferSize ?? this.defaultBuffer, (s) => {
      this.subscribers.delete(s);
      signal?.removeEventListener("abort", onAbort);
    });

    if (signal?.aborted) {
      sub.close();
      return sub;
    }
    this.subscribers.add(sub);
    signal?.addEventListener("abort", onAbort, { once: true });
    return sub;
  }

  /** Delivers synchronously to matching subscribers. Never throws and never waits on a subscriber. */
  publish(event: TaskEvent): number {
    let delivered = 0;
    for (const sub of [...this.subscribers]) {
      if (matchesFilter(event, sub.filter) && sub.offer(event)) delivered++;
    }
    return delivered;
  }

  closeAll(): void {
    for (const sub of [...this.subscribers]) sub.close();
  }
}
