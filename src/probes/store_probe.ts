import * as fs from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import postgres from "postgres";

import type { ProbeFailureReason, ProbeResult, ReadinessProbe } from "../contracts/service";
import { describeCause } from "../errors/service_errors";
import { resolveStoreTarget, type StoreTarget } from "../store/store_target";
import { errorCode, probeNotReady, probeReady, probeWithSession } from "./readiness_probe";

/** One throwaway session against the store; opened and closed per probe. */
export type StoreProbeSession = {
  selectOne(): Promise<unknown>;
  close(): Promise<void>;
};

export type StoreProbeSessionFactory = () => StoreProbeSession;

const AUTH_CODES = new Set(["28P01", "28000"]);
const STARTING_CODES = new Set(["57P03"]);
const UNREACHABLE_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ETIMEDOUT",
  "CONNECT_TIMEOUT",
  "CONNECTION_CLOSED",
  "CONNECTION_ENDED",
  "CONNECTION_DESTROYED",
  "SQLITE_CANTOPEN",
  "ENOENT",
  "EACCES",
]);

export function classifyStoreError(error: unknown): { reason: ProbeFailureReason; detail: string } {
  const code = errorCode(error);
  const message = describeCause(error);
  if (code && AUTH_CODES.has(code)) {
    return { reason: "auth_failed", detail: `authentication rejected (${code}): ${message}` };
  }
  if (code && STARTING_CODES.has(code)) {
    return { reason: "starting", detail: `store is starting up (${code}): ${message}` };
  }
  if ((code && UNREACHABLE_CODES.has(code)) || /unable to open|does not exist/i.test(message)) {
    return { reason: "unreachable", detail: `connection failed${code ? ` (${code})` : ""}: ${message}` };
  }
  return { reason: "error", detail: `store check failed${code ? ` (${code})` : ""}: ${message}` };
}

const isOkRow = (value: unknown): boolean => {
  const row = Array.isArray(value) ? value[0] : value;
  return typeof row === "object" && row !== null && "ok" in row && row.ok === 1;
};

function classifiedNotReady(error: unknown): ProbeResult {
  const { reason, detail } = classifyStoreError(error);
  return probeNotReady(reason, detail);
}

/** The session is closed when the gate gives up on the probe, so a hung `select 1` does not keep its connection. */
export function createStoreProbe(openSession: StoreProbeSessionFactory): ReadinessProbe {
  return {
    check: (_descriptor, ctx) =>
      probeWithSession({
        open: async () => openSession(),
        signal: ctx?.signal,
        classify: classifiedNotReady,
        use: async (session) =>
          isOkRow(await session.selectOne())
            ? probeReady()
            : probeNotReady("unexpected_response", "store answered select 1 with an unexpected row"),
      }),
  };
}

export function postgresProbeSession(url: string, timeoutMs: number): StoreProbeSessionFactory {
  return () => {
    const sql = postgres(url, {
      max: 1,
      connect_timeout: Math.max(1, Math.ceil(timeoutMs / 1000)),
      idle_timeout: 1,
      onnotice: () => undefined,
      connection: { application_name: "readiness_probe" },
    });
    return {
      selectOne: () => sql<{ ok: number }[]>`select 1 as ok`,
      close: () => sql.end({ timeout: 0 }),
    };
  };
}

/**
 * A missing database file is ready as long as its directory is writable: the
 * first store connection creates it. The probe itself never creates it.
 */
export function sqliteProbeSession(path: string, timeoutMs: number): StoreProbeSessionFactory {
  return () => {
    if (!fs.existsSync(path)) {
      fs.accessSync(dirname(path), fs.constants.W_OK);
      return {
        selectOne: async () => ({ ok: 1 }),
        close: async () => undefined,
      };
    }
    const db = new Database(path, { readonly: true, timeout: timeoutMs });
    return {
      selectOne: async () => db.prepare("select 1 as ok").get(),
      close: async () => {
        db.close();
      },
    };
  };
}

export function storeProbeFor(target: StoreTarget, timeoutMs: number): ReadinessProbe {
  return createStoreProbe(
    target.driver === "postgres"
      ? postgresProbeSession(target.url, timeoutMs)
      : sqliteProbeSession(target.path, timeoutMs)
  );
}

export function storeProbeFromConnectionString(connectionString: string, timeoutMs: number): ReadinessProbe {
  return storeProbeFor(resolveStoreTarget(connectionString), timeoutMs);
}
