import type { GatePolicy } from "../contracts/service";

/** Delay before round `attempt + 1`, given that `attempt` rounds have failed. */
export function delayAfterAttempt(policy: GatePolicy, attempt: number): number {
  if (policy.backoff === "fixed") return policy.intervalMs;
  const grown = policy.intervalMs * Math.pow(policy.multiplier, Math.max(0, attempt - 1));
  return Math.min(grown, Math.max(policy.maxIntervalMs, policy.intervalMs));
}

/**
 * Shortest time one full gate run is guaranteed to keep waiting: the sleeps
 * between `maxAttempts` rounds, clipped to `maxWaitMs`. Probes against a
 * dependency that refuses connections return at once, so probe time is not
 * counted.
 */
export function guaranteedGateWindowMs(policy: GatePolicy): number {
  if (policy.maxAttempts === undefined) {
    return policy.maxWaitMs ?? 0;
  }
  let total = 0;
  for (let attempt = 1; attempt < policy.maxAttempts; attempt += 1) {
    total += delayAfterAttempt(policy, attempt);
  }
  return policy.maxWaitMs === undefined ? total : Math.min(total, policy.maxWaitMs);
}
