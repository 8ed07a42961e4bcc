import { describe, it, expect, vi } from "vitest";

import { heartbeatKey } from "../src/broker/broker";
import { MemoryBroker } from "../src/broker/memory_broker";
import { buildTaskUnit } from "../src/broker/task_envelope";
import type { ProbeResult, ReadinessProbe } from "../src/contracts/service";
import { DependencyTimeout, TransientIOError } from "../src/errors/service_errors";
import { MemoryTaskStore, type RecordOutcomeArgs } from "../src/store/task_store";
import { buildDependencies, buildDependentDescriptor } from "../src/topology/service_topology";
import { TaskHandlerRegistry } from "../src/worker/task_handlers";
import { WorkerLoop, type WorkerLoopOptions, type WorkerState } from "../src/worker/worker_loop";
import { fastPolicy, makeLogger, recordingSleep } from "./helpers";

/** Probe that answers from `script` in order, then stays ready. */
const scripted = (script: boolean[]) => {
  let calls = 0;
  const probe: ReadinessProbe = {
    check: async (): Promise<ProbeResult> => {
      const ready = script[calls] ?? true;
      calls += 1;
      return ready ? { ready, observedAt: "t" } : { ready, observedAt: "t", reason: "unreachable", detail: "down" };
    },
  };
  return { probe, calls: () => calls };
};

class FlakyStore extends MemoryTaskStore {
  failures = 0;
  recorded = 0;
  onRecorded: () => void = () => undefined;

  async recordOutcome(args: RecordOutcomeArgs) {
    if (this.failures > 0) {
      this.failures -= 1;
      throw new TransientIOError({ dependency: "store", operation: "record_outcome", cause: new Error("disk full") });
    }
    const outcome = await super.recordOutcome(args);
    this.recorded += 1;
    this.onRecorded();
    return outcome;
  }
}

const signed = (name: string, id: string, secretKey = "test-secret") =>
  buildTaskUnit({ name, queue: "default", payload: { id }, taskId: id, secretKey });

const setup = (opts: { storeScript?: boolean[]; brokerScript?: boolean[] } = {}) => {
  const storeProbe = scripted(opts.storeScript ?? []);
  const brokerProbe = scripted(opts.brokerScript ?? []);
  const broker = new MemoryBroker();
  const store = new FlakyStore();
  const controller = new AbortController();
  const states: WorkerState[] = [];
  const { log, events } = makeLogger();
  const echoCalls: unknown[] = [];
  const handlers = new TaskHandlerRegistry().register("system.echo", async (payload) => {
    echoCalls.push(payload);
    return payload;
  });

  let loop: WorkerLoop | null = null;
  const descriptor = buildDependentDescriptor({
    name: "worker-1",
    kind: "worker",
    dependencies: buildDependencies({ store: storeProbe.probe, broker: brokerProbe.probe }),
    isReady: () => loop?.state === "draining",
  });

  const make = (overrides: Partial<WorkerLoopOptions> = {}) => {
    loop = new WorkerLoop({
      workerId: "worker-1",
      descriptor,
      broker,
      store,
      handlers,
      secretKey: "test-secret",
      queues: ["default"],
      gatePolicy: fastPolicy({ maxAttempts: 3 }),
      recoveryPolicy: fastPolicy({ maxAttempts: 3 }),
      maxConsecutiveFailures: 3,
      dequeueTimeoutMs: 10,
      log,
      signal: controller.signal,
      sleepImpl: recordingSleep().sleepImpl,
      onStateChange: (state) => states.push(state),
      ...overrides,
    });
    return loop;
  };

  return { broker, store, controller, states, events, echoCalls, storeProbe, brokerProbe, make };
};

describe("WorkerLoop", () => {
  it("releases a unit whose outcome could not be stored and runs it again once the store is back", async () => {
    const ctx = setup({ storeScript: [true, false, true] });
    ctx.store.failures = 1;
    ctx.store.onRecorded = () => ctx.controller.abort();
    await ctx.broker.enqueue(signed("system.echo", "task-1"));

    const exit = await ctx.make().run();

    expect(exit).toEqual({
      reason: "shutdown",
      processed: 1,
      lastError: "store.record_outcome failed: disk full",
    });
    expect(ctx.states).toEqual(["ready", "draining", "recovering", "draining", "terminated"]);
    // startup gate, then two rounds of the store-only recovery gate
    expect(ctx.storeProbe.calls()).toBe(3);
    expect(ctx.brokerProbe.calls()).toBe(1);
    expect(ctx.echoCalls).toEqual([{ id: "task-1" }, { id: "task-1" }]);
    expect(await ctx.store.getOutcome("task-1")).toMatchObject({ status: "succeeded", attempts: 1 });
    expect(await ctx.broker.queueDepth("default")).toEqual({ ready: 0, deadLettered: 0 });
    expect(ctx.broker.inFlight("default")).toBe(0);
  });

  it("dead-letters units that fail and records why", async () => {
    const ctx = setup();
    ctx.store.onRecorded = () => {
      if (ctx.store.recorded === 2) ctx.controller.abort();
    };
    await ctx.broker.pushRaw("default", "{not json");
    await ctx.broker.enqueue(signed("report.build", "task-unknown"));
    await ctx.broker.enqueue(signed("system.echo", "task-forged", "other-secret"));

    const exit = await ctx.make().run();

    expect(exit.reason).toBe("shutdown");
    expect(exit.processed).toBe(3);
    expect(ctx.echoCalls).toEqual([]);
    expect(await ctx.broker.queueDepth("default")).toEqual({ ready: 0, deadLettered: 3 });
    expect(await ctx.store.getOutcome("task-unknown")).toMatchObject({
      status: "failed",
      error: "no handler registered for report.build",
    });
    expect(await ctx.store.getOutcome("task-forged")).toMatchObject({
      status: "failed",
      error: "task signature does not verify",
    });
    expect(ctx.events()).toContain("worker.task_rejected");
  });

  it("replays an ack that failed once the broker is back", async () => {
    const ctx = setup({ brokerScript: [true, false, true] });
    const ack = vi
      .spyOn(ctx.broker, "ack")
      .mockRejectedValueOnce(new TransientIOError({ dependency: "broker", operation: "ack", cause: new Error("ECONNRESET") }));
    await ctx.broker.enqueue(signed("system.echo", "task-1"));

    let drainingEntries = 0;
    const exit = await ctx
      .make({
        onStateChange: (state) => {
          ctx.states.push(state);
          if (state === "draining") drainingEntries += 1;
          if (drainingEntries === 2) ctx.controller.abort();
        },
      })
      .run();

    expect(exit).toEqual({ reason: "shutdown", processed: 1, lastError: "broker.ack failed: ECONNRESET" });
    expect(ack).toHaveBeenCalledTimes(2);
    expect(ctx.echoCalls).toHaveLength(1);
    expect(ctx.broker.inFlight("default")).toBe(0);
    expect(ctx.brokerProbe.calls()).toBe(3);
  });

  it("gives up after too many consecutive dependency failures", async () => {
    const ctx = setup();
    ctx.store.failures = Number.POSITIVE_INFINITY;
    await ctx.broker.enqueue(signed("system.echo", "task-1"));

    const exit = await ctx.make({ maxConsecutiveFailures: 2 }).run();

    expect(exit.reason).toBe("recovery_exhausted");
    expect(exit.processed).toBe(0);
    expect(ctx.echoCalls).toHaveLength(3);
    // The last lease is left for reclaim on the next start.
    expect(ctx.broker.inFlight("default")).toBe(1);
    expect(ctx.states.at(-1)).toBe("terminated");
    expect(ctx.events()).toContain("worker.recovery_exhausted");
  });

  it("does not count failures separated by healthy idle polls as consecutive", async () => {
    const ctx = setup();
    const dequeue = ctx.broker.dequeue.bind(ctx.broker);
    let polls = 0;
    vi.spyOn(ctx.broker, "dequeue").mockImplementation(async (queue, timeoutMs) => {
      polls += 1;
      if (polls === 40) ctx.controller.abort();
      if (polls % 5 === 0) {
        throw new TransientIOError({ dependency: "broker", operation: "dequeue", cause: new Error("ECONNRESET") });
      }
      return dequeue(queue, timeoutMs);
    });

    const exit = await ctx.make({ maxConsecutiveFailures: 1, dequeueTimeoutMs: 0 }).run();

    expect(exit.reason).toBe("shutdown");
    expect(ctx.events().filter((evt) => evt === "worker.dependency_failed")).toHaveLength(8);
    expect(ctx.events()).not.toContain("worker.recovery_exhausted");
  });

  it("terminates when the recovery gate times out", async () => {
    const ctx = setup({ storeScript: [true, false, false] });
    ctx.store.failures = 1;
    await ctx.broker.enqueue(signed("system.echo", "task-1"));

    const exit = await ctx.make({ recoveryPolicy: fastPolicy({ maxAttempts: 2 }) }).run();

    expect(exit).toEqual({
      reason: "recovery_exhausted",
      processed: 0,
      lastError: "worker-1:store: dependencies not ready after 2 attempts: store",
    });
  });

  it("fails the startup gate without touching the queue", async () => {
    const ctx = setup({ brokerScript: [false, false, false] });
    const reclaim = vi.spyOn(ctx.broker, "reclaim");
    const loop = ctx.make();

    await expect(loop.run()).rejects.toBeInstanceOf(DependencyTimeout);
    expect(loop.state).toBe("terminated");
    expect(reclaim).not.toHaveBeenCalled();
  });

  it("reclaims its own abandoned leases on startup", async () => {
    const ctx = setup();
    await ctx.broker.enqueue(signed("system.echo", "task-1"));
    await ctx.broker.dequeue("default", 0);
    ctx.store.onRecorded = () => ctx.controller.abort();

    const exit = await ctx.make().run();

    expect(exit.processed).toBe(1);
    expect(ctx.events()).toContain("worker.reclaimed");
    expect(ctx.broker.inFlight("default")).toBe(0);
  });

  it("publishes a heartbeat once past the gate and clears it on exit", async () => {
    const ctx = setup();
    const seen: Array<string | null> = [];
    ctx.store.onRecorded = () => ctx.controller.abort();
    await ctx.broker.enqueue(signed("system.echo", "task-1"));

    const loop = ctx.make({
      heartbeatMs: 1000,
      onStateChange: (state) => {
        if (state === "terminated") return;
        void ctx.broker.cacheGet(heartbeatKey("worker-1")).then((raw) => {
          seen.push(raw);
        });
      },
    });
    await loop.run();

    const lastBeat = seen.at(-1);
    expect(lastBeat).toBeTypeOf("string");
    expect(JSON.parse(lastBeat ?? "{}")).toMatchObject({ workerId: "worker-1", state: "ready", processed: 0 });
    expect(await ctx.broker.cacheGet(heartbeatKey("worker-1"))).toBeNull();
  });
});
