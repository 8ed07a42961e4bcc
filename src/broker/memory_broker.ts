import { parseTaskUnit, type TaskUnit } from "../contracts/task_unit";
import type { AckOutcome, Broker, TaskLease } from "./broker";

type CacheEntry = { value: string; expiresAt: number | null };

/**
 * In-process broker with the same queue semantics as RedisBroker. Only useful
 * when producer and consumer share a process (tests, local experiments).
 */
export class MemoryBroker implements Broker {
  private ready = new Map<string, string[]>();
  private processing = new Map<string, string[]>();
  private dead = new Map<string, string[]>();
  private cache = new Map<string, CacheEntry>();
  private waiters = new Map<string, Set<() => void>>();
  private now: () => number;

  constructor(opts: { now?: () => number } = {}) {
    this.now = opts.now ?? Date.now;
  }

  private list(map: Map<string, string[]>, queue: string): string[] {
    let items = map.get(queue);
    if (!items) {
      items = [];
      map.set(queue, items);
    }
    return items;
  }

  private wake(queue: string) {
    const waiting = this.waiters.get(queue);
    if (!waiting) return;
    this.waiters.delete(queue);
    for (const notify of waiting) notify();
  }

  private static remove(items: string[], raw: string) {
    const index = items.indexOf(raw);
    if (index >= 0) items.splice(index, 1);
  }

  async ping(): Promise<string> {
    return "PONG";
  }

  async enqueue(unit: TaskUnit): Promise<void> {
    this.list(this.ready, unit.queue).unshift(JSON.stringify(unit));
    this.wake(unit.queue);
  }

  /** Raw push, for entries that are not valid envelopes. */
  async pushRaw(queue: string, raw: string): Promise<void> {
    this.list(this.ready, queue).unshift(raw);
    this.wake(queue);
  }

  async dequeue(queue: string, timeoutMs: number): Promise<TaskLease | null> {
    const take = (): TaskLease | null => {
      const raw = this.list(this.ready, queue).pop();
      if (raw === undefined) return null;
      this.list(this.processing, queue).unshift(raw);
      return { queue, raw, unit: parseTaskUnit(raw) };
    };

    const immediate = take();
    if (immediate || timeoutMs <= 0) return immediate;

    await new Promise<void>((resolve) => {
      const waiting = this.waiters.get(queue) ?? new Set<() => void>();
      this.waiters.set(queue, waiting);
      const done = () => {
        clearTimeout(timer);
        waiting.delete(done);
        resolve();
      };
      const timer = setTimeout(done, timeoutMs);
      waiting.add(done);
    });
    return take();
  }

  async ack(lease: TaskLease, outcome: AckOutcome): Promise<void> {
    MemoryBroker.remove(this.list(this.processing, lease.queue), lease.raw);
    if (outcome === "failed") this.list(this.dead, lease.queue).unshift(lease.raw);
  }

  async release(lease: TaskLease): Promise<void> {
    MemoryBroker.remove(this.list(this.processing, lease.queue), lease.raw);
    this.list(this.ready, lease.queue).push(lease.raw);
    this.wake(lease.queue);
  }

  async reclaim(queue: string): Promise<number> {
    const inFlight = this.list(this.processing, queue);
    const moved = inFlight.length;
    while (inFlight.length > 0) {
      const raw = inFlight.pop();
      if (raw !== undefined) this.list(this.ready, queue).push(raw);
    }
    if (moved > 0) this.wake(queue);
    return moved;
  }

  async queueDepth(queue: string): Promise<{ ready: number; deadLettered: number }> {
    return {
      ready: this.list(this.ready, queue).length,
      deadLettered: this.list(this.dead, queue).length,
    };
  }

  /** Entries currently leased and not yet acked or released. */
  inFlight(queue: string): number {
    return this.list(this.processing, queue).length;
  }

  async cacheGet(key: string): Promise<string | null> {
    const entry = this.cache.get(key);
    if (!entry) return null;
    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.cache.delete(key);
      return null;
    }
    return entry.value;
  }

  async cacheSet(key: string, value: string, ttlMs?: number): Promise<void> {
    this.cache.set(key, { value, expiresAt: ttlMs === undefined ? null : this.now() + ttlMs });
  }

  async cacheDel(key: string): Promise<void> {
    this.cache.delete(key);
  }

  async cacheKeys(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    for (const key of this.cache.keys()) {
      if (key.startsWith(prefix) && (await this.cacheGet(key)) !== null) keys.push(key);
    }
    return keys;
  }

  async close(): Promise<void> {
    for (const queue of [...this.waiters.keys()]) this.wake(queue);
  }
}
