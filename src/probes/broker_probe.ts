import { createClient } from "redis";

import type { ProbeResult, ReadinessProbe } from "../contracts/service";
import { describeCause } from "../errors/service_errors";
import { errorCode, probeNotReady, probeReady, probeWithSession } from "./readiness_probe";

export const EXPECTED_PING_REPLY = "PONG";

export type PingSession = {
  ping(): Promise<string>;
  close(): Promise<void>;
};

export type PingSessionFactory = (signal?: AbortSignal) => Promise<PingSession>;

/** Ready only when the broker answers its liveness command with exactly PONG. */
export function createBrokerProbe(
  openSession: PingSessionFactory,
  expected: string = EXPECTED_PING_REPLY
): ReadinessProbe {
  return {
    check: (_descriptor, ctx) =>
      probeWithSession({
        open: openSession,
        signal: ctx?.signal,
        classify: classifyBrokerError,
        use: async (session) => {
          const reply = await session.ping();
          return reply === expected
            ? probeReady()
            : probeNotReady("unexpected_response", `expected ${expected}, got ${JSON.stringify(reply)}`);
        },
      }),
  };
}

export function classifyBrokerError(error: unknown): ProbeResult {
  const code = errorCode(error);
  const message = describeCause(error);
  if (/LOADING/.test(message)) {
    return probeNotReady("starting", `broker is loading its dataset: ${message}`);
  }
  if (/NOAUTH|WRONGPASS/.test(message)) {
    return probeNotReady("auth_failed", `broker rejected credentials: ${message}`);
  }
  return probeNotReady("unreachable", `connection failed${code ? ` (${code})` : ""}: ${message}`);
}

/**
 * Throwaway connection per probe with reconnects disabled. An abort tears the
 * socket down even while the connection handshake is still waiting.
 */
export function redisPingSession(opts: { host: string; port: number; timeoutMs: number }): PingSessionFactory {
  return async (signal) => {
    let lastError: Error | null = null;
    const client = createClient({
      socket: {
        host: opts.host,
        port: opts.port,
        connectTimeout: opts.timeoutMs,
        reconnectStrategy: false,
      },
    });
    client.on("error", (error: Error) => {
      lastError = error;
    });
    const close = async () => {
      if (client.isOpen) await client.disconnect();
    };
    const onAbort = () => {
      close().catch((error: unknown) => {
        lastError = error instanceof Error ? error : new Error(describeCause(error));
      });
    };
    signal?.addEventListener("abort", onAbort, { once: true });
    try {
      await client.connect();
    } catch (error) {
      throw lastError ?? error;
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }
    return { ping: () => client.ping(), close };
  };
}
