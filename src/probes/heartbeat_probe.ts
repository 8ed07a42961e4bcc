import { z } from "zod";

import { heartbeatKey } from "../broker/broker";
import type { Broker } from "../broker/broker";
import type { ReadinessProbe } from "../contracts/service";
import { describeCause } from "../errors/service_errors";
import { probeNotReady, probeReady } from "./readiness_probe";

export const WorkerHeartbeat = z.object({
  workerId: z.string(),
  state: z.enum(["gating", "ready", "draining", "recovering", "terminated"]),
  processed: z.number().int().nonnegative(),
  at: z.string(),
});

export type WorkerHeartbeat = z.infer<typeof WorkerHeartbeat>;

export function parseHeartbeat(raw: string | null): WorkerHeartbeat | null {
  if (raw === null) return null;
  try {
    const parsed = WorkerHeartbeat.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/**
 * Worker liveness as seen through the cache: the heartbeat key expires on its
 * own when the worker stops writing it.
 */
export function createHeartbeatProbe(cache: Pick<Broker, "cacheGet">, workerId: string): ReadinessProbe {
  return {
    async check() {
      let raw: string | null;
      try {
        raw = await cache.cacheGet(heartbeatKey(workerId));
      } catch (error) {
        return probeNotReady("unreachable", `heartbeat unreadable: ${describeCause(error)}`);
      }
      const beat = parseHeartbeat(raw);
      if (!beat) return probeNotReady("unreachable", `no heartbeat from ${workerId}`);
      if (beat.state === "draining" || beat.state === "ready") return probeReady(`state=${beat.state}`);
      return probeNotReady("starting", `worker ${workerId} is ${beat.state}`);
    },
  };
}
