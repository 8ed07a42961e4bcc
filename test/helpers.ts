import type { AppConfig } from "../src/config/env";
import { loadConfig } from "../src/config/env";
import type { GatePolicy, ProbeResult, ReadinessProbe } from "../src/contracts/service";
import type { SleepFn } from "../src/gate/dependency_gate";

type LogEntry = {
  level: "debug" | "info" | "warn" | "error";
  message: string;
  context: Record<string, unknown>;
};

export const makeLogger = () => {
  const entries: LogEntry[] = [];
  const push = (level: LogEntry["level"]) => (context: Record<string, unknown>, message?: string) => {
    entries.push({ level, message: message ?? "", context });
  };
  const log = {
    debug: push("debug"),
    info: push("info"),
    warn: push("warn"),
    error: push("error"),
  };
  const events = () => entries.map((entry) => entry.context.evt);
  return { log, entries, events };
};

const observedAt = "2026-01-01T00:00:00.000Z";

/** Probe that reports not ready for the first `failures` checks, then ready. */
export const readyAfter = (failures: number) => {
  let calls = 0;
  const probe: ReadinessProbe = {
    check: async (): Promise<ProbeResult> => {
      calls += 1;
      return calls > failures
        ? { ready: true, observedAt }
        : { ready: false, observedAt, reason: "unreachable", detail: `call ${calls}` };
    },
  };
  return { probe, calls: () => calls };
};

export const neverReady = () => readyAfter(Number.POSITIVE_INFINITY);

/** Sleep that returns at once and records the requested delays. */
export const recordingSleep = () => {
  const delays: number[] = [];
  const sleepImpl: SleepFn = async (ms, signal) => {
    delays.push(ms);
    if (signal?.aborted) throw new Error("aborted");
  };
  return { sleepImpl, delays };
};

export const fastPolicy = (overrides: Partial<GatePolicy> = {}): GatePolicy => ({
  intervalMs: 10,
  maxAttempts: 5,
  backoff: "fixed",
  maxIntervalMs: 100,
  multiplier: 2,
  probeTimeoutMs: 200,
  ...overrides,
});

export const baseEnv = (overrides: Record<string, string> = {}): NodeJS.ProcessEnv => ({
  DB_CONN_STRING: "sqlite:./data/test.db",
  SECRET_KEY: "test-secret",
  ADMIN_TOKEN: "test-admin-token",
  ...overrides,
});

export const testConfig = (
  role: AppConfig["role"] = "api",
  overrides: Record<string, string> = {}
): AppConfig => loadConfig(role, baseEnv(overrides));
