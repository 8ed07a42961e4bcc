import type { TaskUnit } from "../contracts/task_unit";

/** A dequeued entry, held in the consumer's processing list until ack or release. */
export type TaskLease = {
  queue: string;
  raw: string;
  // null when the entry is not a valid TaskUnit envelope
  unit: TaskUnit | null;
};

export type AckOutcome = "succeeded" | "failed";

/**
 * Queue and cache operations shared by the API and the workers. Delivery is
 * at-least-once: a lease that is never acked is handed out again after
 * `release` or `reclaim`. Every method may throw TransientIOError.
 */
export interface Broker {
  ping(): Promise<string>;

  enqueue(unit: TaskUnit): Promise<void>;
  dequeue(queue: string, timeoutMs: number): Promise<TaskLease | null>;
  ack(lease: TaskLease, outcome: AckOutcome): Promise<void>;
  release(lease: TaskLease): Promise<void>;
  /** Returns units left in this consumer's processing list to the queue. */
  reclaim(queue: string): Promise<number>;
  queueDepth(queue: string): Promise<{ ready: number; deadLettered: number }>;

  cacheGet(key: string): Promise<string | null>;
  cacheSet(key: string, value: string, ttlMs?: number): Promise<void>;
  cacheDel(key: string): Promise<void>;
  cacheKeys(prefix: string): Promise<string[]>;

  close(): Promise<void>;
}

export const queueKeys = (queue: string, consumerId: string) => ({
  ready: `queue:${queue}`,
  processing: `queue:${queue}:processing:${consumerId}`,
  dead: `queue:${queue}:dead`,
});

export const taskStatusKey = (taskId: string) => `task:${taskId}:status`;

export const HEARTBEAT_PREFIX = "worker:heartbeat:";
export const heartbeatKey = (workerId: string) => `${HEARTBEAT_PREFIX}${workerId}`;
