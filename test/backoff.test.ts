import { describe, it, expect } from "vitest";

import { defineService } from "../src/contracts/service";
import { DependencyTimeout } from "../src/errors/service_errors";
import { delayAfterAttempt, guaranteedGateWindowMs } from "../src/gate/backoff";
import { awaitReady } from "../src/gate/dependency_gate";
import { fastPolicy, neverReady, recordingSleep } from "./helpers";

describe("delayAfterAttempt", () => {
  it("keeps a fixed interval", () => {
    const policy = fastPolicy({ backoff: "fixed", intervalMs: 250 });
    expect([1, 2, 7].map((attempt) => delayAfterAttempt(policy, attempt))).toEqual([250, 250, 250]);
  });

  it("multiplies and caps exponential delays", () => {
    const policy = fastPolicy({ backoff: "exponential", intervalMs: 100, multiplier: 3, maxIntervalMs: 1000 });
    expect([1, 2, 3, 4].map((attempt) => delayAfterAttempt(policy, attempt))).toEqual([100, 300, 900, 1000]);
  });

  it("never caps below the base interval", () => {
    const policy = fastPolicy({ backoff: "exponential", intervalMs: 500, maxIntervalMs: 100 });
    expect(delayAfterAttempt(policy, 3)).toBe(500);
  });
});

describe("guaranteedGateWindowMs", () => {
  it("counts only the sleeps between rounds", () => {
    // 2 sleeps * 10ms; probe timeouts are not part of the window
    expect(guaranteedGateWindowMs(fastPolicy({ maxAttempts: 3 }))).toBe(20);
    const exponential = fastPolicy({ backoff: "exponential", intervalMs: 100, maxIntervalMs: 300, maxAttempts: 5 });
    expect(guaranteedGateWindowMs(exponential)).toBe(100 + 200 + 300 + 300);
  });

  it("is bounded by maxWaitMs", () => {
    expect(guaranteedGateWindowMs(fastPolicy({ maxAttempts: 3, maxWaitMs: 15 }))).toBe(15);
    expect(guaranteedGateWindowMs(fastPolicy({ maxAttempts: undefined, maxWaitMs: 4000 }))).toBe(4000);
  });

  it("matches the time a gate spends sleeping when probes fail at once", async () => {
    const policy = fastPolicy({ intervalMs: 1000, maxAttempts: 5, probeTimeoutMs: 2000 });
    const store = neverReady();
    const broker = neverReady();
    const descriptor = defineService({
      name: "api",
      kind: "api",
      readinessProbe: store.probe,
      dependencies: [
        defineService({ name: "store", kind: "store", readinessProbe: store.probe }),
        defineService({ name: "broker", kind: "broker", readinessProbe: broker.probe }),
      ],
    });
    const { sleepImpl, delays } = recordingSleep();

    await expect(awaitReady(descriptor, policy, { sleepImpl })).rejects.toBeInstanceOf(DependencyTimeout);
    expect(delays.reduce((sum, ms) => sum + ms, 0)).toBe(guaranteedGateWindowMs(policy));
    expect(guaranteedGateWindowMs(policy)).toBe(4000);
  });
});
