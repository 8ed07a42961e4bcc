import { createClient } from "redis";

import { parseTaskUnit, type TaskUnit } from "../contracts/task_unit";
import { TransientIOError } from "../errors/service_errors";
import type { ServiceLogger } from "../logging/logger";
import { queueKeys, type AckOutcome, type Broker, type TaskLease } from "./broker";

type RedisClient = ReturnType<typeof createClient>;

type RedisBrokerOptions = {
  host: string;
  port: number;
  consumerId: string;
  log: ServiceLogger;
  connectTimeoutMs?: number;
};

export class RedisBroker implements Broker {
  private client: RedisClient;
  // BLMOVE holds its connection for the whole timeout, so it gets its own.
  private blocking: RedisClient;
  private consumerId: string;
  private log: ServiceLogger;

  constructor(opts: RedisBrokerOptions) {
    this.consumerId = opts.consumerId;
    this.log = opts.log;
    this.client = createClient({
      socket: {
        host: opts.host,
        port: opts.port,
        connectTimeout: opts.connectTimeoutMs ?? 2000,
        reconnectStrategy: (retries: number) => Math.min(50 * 2 ** retries, 2000),
      },
      // Fail commands while disconnected instead of parking them.
      disableOfflineQueue: true,
    });
    this.blocking = this.client.duplicate();

    for (const [role, client] of [
      ["main", this.client],
      ["blocking", this.blocking],
    ] as const) {
      client.on("error", (error: Error) => {
        this.log.warn({ evt: "broker.client_error", role, error: error.message }, "broker.client_error");
      });
    }
  }

  async connect(): Promise<void> {
    await this.run("connect", async () => {
      if (!this.client.isOpen) await this.client.connect();
      if (!this.blocking.isOpen) await this.blocking.connect();
    });
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new TransientIOError({ dependency: "broker", operation, cause: error });
    }
  }

  ping(): Promise<string> {
    return this.run("ping", () => this.client.ping());
  }

  async enqueue(unit: TaskUnit): Promise<void> {
    const keys = queueKeys(unit.queue, this.consumerId);
    await this.run("enqueue", () => this.client.lPush(keys.ready, JSON.stringify(unit)));
  }

  async dequeue(queue: string, timeoutMs: number): Promise<TaskLease | null> {
    const keys = queueKeys(queue, this.consumerId);
    const raw = await this.run("dequeue", () =>
      this.blocking.blMove(keys.ready, keys.processing, "RIGHT", "LEFT", timeoutMs / 1000)
    );
    if (raw === null) return null;
    return { queue, raw, unit: parseTaskUnit(raw) };
  }

  async ack(lease: TaskLease, outcome: AckOutcome): Promise<void> {
    const keys = queueKeys(lease.queue, this.consumerId);
    await this.run("ack", async () => {
      const tx = this.client.multi().lRem(keys.processing, 1, lease.raw);
      if (outcome === "failed") tx.lPush(keys.dead, lease.raw);
      await tx.exec();
    });
  }

  async release(lease: TaskLease): Promise<void> {
    const keys = queueKeys(lease.queue, this.consumerId);
    await this.run("release", async () => {
      await this.client.multi().lRem(keys.processing, 1, lease.raw).rPush(keys.ready, lease.raw).exec();
    });
  }

  async reclaim(queue: string): Promise<number> {
    const keys = queueKeys(queue, this.consumerId);
    return this.run("reclaim", async () => {
      let moved = 0;
      while ((await this.client.lMove(keys.processing, keys.ready, "RIGHT", "RIGHT")) !== null) {
        moved += 1;
      }
      return moved;
    });
  }

  async queueDepth(queue: string): Promise<{ ready: number; deadLettered: number }> {
    const keys = queueKeys(queue, this.consumerId);
    return this.run("queue_depth", async () => ({
      ready: await this.client.lLen(keys.ready),
      deadLettered: await this.client.lLen(keys.dead),
    }));
  }

  cacheGet(key: string): Promise<string | null> {
    return this.run("cache_get", () => this.client.get(key));
  }

  async cacheSet(key: string, value: string, ttlMs?: number): Promise<void> {
    await this.run("cache_set", () =>
      ttlMs === undefined ? this.client.set(key, value) : this.client.set(key, value, { PX: ttlMs })
    );
  }

  async cacheDel(key: string): Promise<void> {
    await this.run("cache_del", () => this.client.del(key));
  }

  async cacheKeys(prefix: string): Promise<string[]> {
    return this.run("cache_keys", async () => {
      const keys: string[] = [];
      for await (const key of this.client.scanIterator({ MATCH: `${prefix}*`, COUNT: 100 })) {
        keys.push(key);
      }
      return keys;
    });
  }

  async close(): Promise<void> {
    for (const client of [this.blocking, this.client]) {
      if (client.isOpen) await client.quit();
    }
  }
}
