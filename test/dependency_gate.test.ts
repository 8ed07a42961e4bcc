import { describe, it, expect } from "vitest";

import { defineService, type ReadinessProbe, type ServiceDescriptor } from "../src/contracts/service";
import { ConfigurationError, DependencyTimeout, GateAbortedError } from "../src/errors/service_errors";
import { awaitReady, runProbe, scopedDescriptor } from "../src/gate/dependency_gate";
import { createFlagProbe } from "../src/probes/readiness_probe";
import { fastPolicy, makeLogger, neverReady, readyAfter, recordingSleep } from "./helpers";

const hanging: ReadinessProbe = { check: () => new Promise(() => undefined) };

const dependent = (...deps: Array<{ name: string; kind: "store" | "broker"; probe: ReadinessProbe }>) =>
  defineService({
    name: "api",
    kind: "api",
    readinessProbe: createFlagProbe(() => false, "not serving"),
    dependencies: deps.map((dep) => defineService({ name: dep.name, kind: dep.kind, readinessProbe: dep.probe })),
  });

describe("awaitReady", () => {
  it("only passes a round in which every dependency is ready", async () => {
    // store ready from round 3, broker from round 4
    const store = readyAfter(2);
    const broker = readyAfter(3);
    const { sleepImpl, delays } = recordingSleep();
    const { log, events } = makeLogger();

    const state = await awaitReady(
      dependent(
        { name: "store", kind: "store", probe: store.probe },
        { name: "broker", kind: "broker", probe: broker.probe }
      ),
      fastPolicy({ maxAttempts: 10, intervalMs: 1 }),
      { sleepImpl, log }
    );

    expect(state.outcome).toBe("satisfied");
    expect(state.attemptsMade).toBe(4);
    // The store stays in every round even after it first reported ready.
    expect(store.calls()).toBe(4);
    expect(broker.calls()).toBe(4);
    expect(delays).toEqual([1, 1, 1]);
    expect(events()).toEqual(["gate.waiting", "gate.waiting", "gate.waiting", "gate.satisfied"]);
    expect(Object.isFrozen(state)).toBe(true);
  });

  it("issues exactly maxAttempts rounds and no trailing sleep", async () => {
    const store = neverReady();
    const { sleepImpl, delays } = recordingSleep();

    const error = await awaitReady(
      dependent({ name: "store", kind: "store", probe: store.probe }),
      fastPolicy({ maxAttempts: 3 }),
      { sleepImpl }
    ).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DependencyTimeout);
    expect(store.calls()).toBe(3);
    expect(delays).toEqual([10, 10]);
    if (!(error instanceof DependencyTimeout)) throw error;
    expect(error.attempts).toBe(3);
    expect(error.service).toBe("api");
    expect(error.pending.map((dep) => dep.name)).toEqual(["store"]);
    expect(error.pending[0]?.lastResult?.detail).toBe("call 3");
    expect(error.toJSON().pending).toEqual([
      { name: "store", kind: "store", reason: "unreachable", detail: "call 3" },
    ]);
  });

  it("names only the dependencies still pending in the last round", async () => {
    const error = await awaitReady(
      dependent(
        { name: "store", kind: "store", probe: readyAfter(0).probe },
        { name: "broker", kind: "broker", probe: neverReady().probe }
      ),
      fastPolicy({ maxAttempts: 2 }),
      { sleepImpl: recordingSleep().sleepImpl }
    ).catch((err: unknown) => err);

    if (!(error instanceof DependencyTimeout)) throw error;
    expect(error.pending.map((dep) => dep.name)).toEqual(["broker"]);
    expect(error.message).toBe("api: dependencies not ready after 2 attempts: broker");
  });

  it("grows exponential delays up to the cap", async () => {
    const { sleepImpl, delays } = recordingSleep();

    await expect(
      awaitReady(
        dependent({ name: "store", kind: "store", probe: neverReady().probe }),
        fastPolicy({ backoff: "exponential", intervalMs: 10, multiplier: 2, maxIntervalMs: 35, maxAttempts: 5 }),
        { sleepImpl }
      )
    ).rejects.toBeInstanceOf(DependencyTimeout);

    expect(delays).toEqual([10, 20, 35, 35]);
  });

  it("clips sleeps to the remaining maxWaitMs and stops at the deadline", async () => {
    let clock = 0;
    const delays: number[] = [];
    const probe = neverReady();

    const error = await awaitReady(
      dependent({ name: "store", kind: "store", probe: probe.probe }),
      fastPolicy({ maxAttempts: undefined, maxWaitMs: 25, intervalMs: 10 }),
      {
        now: () => clock,
        sleepImpl: async (ms) => {
          delays.push(ms);
          clock += ms;
        },
      }
    ).catch((err: unknown) => err);

    if (!(error instanceof DependencyTimeout)) throw error;
    expect(delays).toEqual([10, 10, 5]);
    expect(error.attempts).toBe(4);
    expect(probe.calls()).toBe(4);
  });

  it("never reuses an earlier satisfied outcome", async () => {
    let calls = 0;
    const flaky: ReadinessProbe = {
      check: async () => {
        calls += 1;
        return calls === 1
          ? { ready: true, observedAt: "t" }
          : { ready: false, observedAt: "t", reason: "unreachable" };
      },
    };
    const descriptor = dependent({ name: "store", kind: "store", probe: flaky });
    const { sleepImpl } = recordingSleep();

    const first = await awaitReady(descriptor, fastPolicy({ maxAttempts: 2 }), { sleepImpl });
    expect(first.outcome).toBe("satisfied");

    await expect(awaitReady(descriptor, fastPolicy({ maxAttempts: 2 }), { sleepImpl })).rejects.toBeInstanceOf(
      DependencyTimeout
    );
    expect(calls).toBe(3);
  });

  it("does not probe at all when already aborted", async () => {
    const probe = neverReady();
    const controller = new AbortController();
    controller.abort();

    const error = await awaitReady(
      dependent({ name: "store", kind: "store", probe: probe.probe }),
      fastPolicy(),
      { signal: controller.signal }
    ).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(GateAbortedError);
    expect(probe.calls()).toBe(0);
  });

  it("aborts a pending sleep promptly", async () => {
    const controller = new AbortController();
    const started = Date.now();
    setTimeout(() => controller.abort(), 20);

    const error = await awaitReady(
      dependent({ name: "store", kind: "store", probe: neverReady().probe }),
      fastPolicy({ intervalMs: 60_000, maxAttempts: 3 }),
      { signal: controller.signal }
    ).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(GateAbortedError);
    if (!(error instanceof GateAbortedError)) throw error;
    expect(error.attempts).toBe(1);
    expect(Date.now() - started).toBeLessThan(2000);
  });

  it("aborts a probe that never answers", async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    await expect(
      awaitReady(
        dependent({ name: "store", kind: "store", probe: hanging }),
        fastPolicy({ probeTimeoutMs: 60_000 }),
        { signal: controller.signal }
      )
    ).rejects.toBeInstanceOf(GateAbortedError);
  });

  it("rejects a policy without any bound", async () => {
    await expect(
      awaitReady(
        dependent({ name: "store", kind: "store", probe: neverReady().probe }),
        fastPolicy({ maxAttempts: undefined, maxWaitMs: undefined })
      )
    ).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe("runProbe", () => {
  const dep = (probe: ReadinessProbe): ServiceDescriptor =>
    defineService({ name: "store", kind: "store", readinessProbe: probe });

  it("reports a probe that overruns its timeout", async () => {
    const result = await runProbe(dep(hanging), { probeTimeoutMs: 20 });
    expect(result.ready).toBe(false);
    expect(result.reason).toBe("timeout");
    expect(result.detail).toBe("probe exceeded 20ms");
  });

  it("turns a rejected check into a not-ready result", async () => {
    const result = await runProbe(
      dep({ check: () => Promise.reject(new Error("boom")) }),
      { probeTimeoutMs: 1000 }
    );
    expect(result).toMatchObject({ ready: false, reason: "error", detail: "boom" });
  });

  it("passes the probe result through", async () => {
    const result = await runProbe(dep(readyAfter(0).probe), { probeTimeoutMs: 1000 });
    expect(result.ready).toBe(true);
  });
});

describe("scopedDescriptor", () => {
  it("keeps only the dependency of the requested kind", () => {
    const descriptor = dependent(
      { name: "store", kind: "store", probe: readyAfter(0).probe },
      { name: "broker", kind: "broker", probe: readyAfter(0).probe }
    );
    const scoped = scopedDescriptor(descriptor, "broker");
    expect(scoped.name).toBe("api:broker");
    expect(scoped.dependencies.map((dep) => dep.name)).toEqual(["broker"]);
  });

  it("refuses a kind the service does not depend on", () => {
    const descriptor = dependent({ name: "store", kind: "store", probe: readyAfter(0).probe });
    expect(() => scopedDescriptor(descriptor, "broker")).toThrow(ConfigurationError);
  });
});
