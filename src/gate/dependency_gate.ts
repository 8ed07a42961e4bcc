import { setTimeout as sleep } from "node:timers/promises";

import {
  defineService,
  type GatePolicy,
  type GateState,
  type ProbeResult,
  type ServiceDescriptor,
  type ServiceKind,
} from "../contracts/service";
import {
  ConfigurationError,
  DependencyTimeout,
  GateAbortedError,
  describeCause,
} from "../errors/service_errors";
import type { ServiceLogger } from "../logging/logger";
import { delayAfterAttempt } from "./backoff";

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export type GateOptions = {
  signal?: AbortSignal;
  log?: ServiceLogger;
  now?: () => number;
  sleepImpl?: SleepFn;
};

const defaultSleep: SleepFn = async (ms, signal) => {
  await sleep(ms, undefined, signal ? { signal } : undefined);
};

export function validateGatePolicy(policy: GatePolicy): void {
  const issues: string[] = [];
  if (policy.maxAttempts === undefined && policy.maxWaitMs === undefined) {
    issues.push("gate policy needs maxAttempts or maxWaitMs");
  }
  if (policy.maxAttempts !== undefined && policy.maxAttempts < 1) {
    issues.push("gate maxAttempts must be >= 1");
  }
  if (policy.intervalMs < 0) issues.push("gate intervalMs must be >= 0");
  if (policy.probeTimeoutMs <= 0) issues.push("probeTimeoutMs must be > 0");
  if (policy.backoff === "exponential" && policy.multiplier < 1) {
    issues.push("gate multiplier must be >= 1");
  }
  if (issues.length > 0) throw new ConfigurationError(issues);
}

const notReady = (observedAt: number, reason: ProbeResult["reason"], detail: string): ProbeResult => ({
  ready: false,
  observedAt: new Date(observedAt).toISOString(),
  reason,
  detail,
});

/**
 * Runs one probe, bounded by the policy timeout. Never throws: a probe that
 * rejects or overruns is reported as not ready.
 */
export async function runProbe(
  dependency: ServiceDescriptor,
  policy: Pick<GatePolicy, "probeTimeoutMs">,
  opts: { signal?: AbortSignal; now?: () => number } = {}
): Promise<ProbeResult> {
  const now = opts.now ?? Date.now;
  const controller = new AbortController();
  const cancel = () => controller.abort();
  opts.signal?.addEventListener("abort", cancel, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const timedOut = new Promise<ProbeResult>((resolve) => {
    timer = setTimeout(() => {
      resolve(notReady(now(), "timeout", `probe exceeded ${policy.probeTimeoutMs}ms`));
      controller.abort();
    }, policy.probeTimeoutMs);
  });
  const cancelled = new Promise<ProbeResult>((resolve) => {
    controller.signal.addEventListener(
      "abort",
      () => resolve(notReady(now(), "error", "probe cancelled")),
      { once: true }
    );
  });

  const checked = dependency.readinessProbe
    .check(dependency, { signal: controller.signal })
    .then(
      (result) => result,
      (error: unknown) => notReady(now(), "error", describeCause(error))
    );

  try {
    return await Promise.race([checked, timedOut, cancelled]);
  } finally {
    clearTimeout(timer);
    opts.signal?.removeEventListener("abort", cancel);
  }
}

/**
 * Blocks until every dependency of `descriptor` reports ready within the same
 * round. Each call starts from scratch; nothing from an earlier run is reused.
 *
 * Throws DependencyTimeout once the attempt or wall-clock budget is spent and
 * GateAbortedError as soon as `signal` fires.
 */
export async function awaitReady(
  descriptor: ServiceDescriptor,
  policy: GatePolicy,
  opts: GateOptions = {}
): Promise<Readonly<GateState>> {
  validateGatePolicy(policy);

  const now = opts.now ?? Date.now;
  const sleepImpl = opts.sleepImpl ?? defaultSleep;
  const { signal, log } = opts;
  const startedAt = now();

  const state: GateState = {
    descriptor,
    attemptsMade: 0,
    startedAt,
    deadline: policy.maxWaitMs === undefined ? null : startedAt + policy.maxWaitMs,
    outcome: "pending",
    lastResults: {},
  };

  const abort = () => new GateAbortedError(descriptor.name, state.attemptsMade);

  for (;;) {
    if (signal?.aborted) throw abort();

    state.attemptsMade += 1;
    const round: Record<string, ProbeResult> = {};
    const pending: ServiceDescriptor[] = [];

    for (const dependency of descriptor.dependencies) {
      const result = await runProbe(dependency, policy, { signal, now });
      if (signal?.aborted) throw abort();
      round[dependency.name] = result;
      if (result.ready !== true) pending.push(dependency);
    }
    state.lastResults = round;

    if (pending.length === 0) {
      state.outcome = "satisfied";
      log?.info(
        {
          evt: "gate.satisfied",
          service: descriptor.name,
          attempts: state.attemptsMade,
          elapsedMs: now() - startedAt,
        },
        "gate.satisfied"
      );
      return Object.freeze({ ...state });
    }

    const attemptsExhausted =
      policy.maxAttempts !== undefined && state.attemptsMade >= policy.maxAttempts;
    const remainingMs = state.deadline === null ? Number.POSITIVE_INFINITY : state.deadline - now();

    if (attemptsExhausted || remainingMs <= 0) {
      state.outcome = "timed_out";
      const error = new DependencyTimeout({
        service: descriptor.name,
        attempts: state.attemptsMade,
        pending: pending.map((dependency) => ({
          name: dependency.name,
          kind: dependency.kind,
          lastResult: round[dependency.name] ?? null,
        })),
      });
      log?.error({ evt: "gate.timed_out", ...error.toJSON() }, "gate.timed_out");
      throw error;
    }

    const delayMs = Math.min(delayAfterAttempt(policy, state.attemptsMade), remainingMs);
    log?.info(
      {
        evt: "gate.waiting",
        service: descriptor.name,
        attempt: state.attemptsMade,
        maxAttempts: policy.maxAttempts ?? null,
        delayMs,
        pending: pending.map((dependency) => ({
          name: dependency.name,
          reason: round[dependency.name]?.reason ?? null,
          detail: round[dependency.name]?.detail ?? null,
        })),
      },
      "gate.waiting"
    );

    try {
      await sleepImpl(delayMs, signal);
    } catch (error) {
      if (signal?.aborted) throw abort();
      throw error;
    }
  }
}

/** The same service, gated on a single kind of dependency only. */
export function scopedDescriptor(descriptor: ServiceDescriptor, kind: ServiceKind): ServiceDescriptor {
  const dependencies = descriptor.dependencies.filter((dependency) => dependency.kind === kind);
  if (dependencies.length === 0) {
    throw new ConfigurationError([`${descriptor.name} has no ${kind} dependency`]);
  }
  return defineService({
    name: `${descriptor.name}:${kind}`,
    kind: descriptor.kind,
    readinessProbe: descriptor.readinessProbe,
    dependencies,
  });
}
