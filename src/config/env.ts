import { hostname } from "node:os";

import { config as loadEnv } from "dotenv";
import { z } from "zod";

import type { GatePolicy } from "../contracts/service";
import { ConfigurationError } from "../errors/service_errors";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

export type ProcessRole = "api" | "worker" | "supervisor";

const TRUTHY = ["1", "true", "yes", "on"];
const FALSY = ["0", "false", "no", "off", ""];

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined) return fallback;
      const normalized = value.trim().toLowerCase();
      if (TRUTHY.includes(normalized)) return true;
      if (FALSY.includes(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${value}"` });
      return z.NEVER;
    });

const int = (fallback: number, min = 0) => z.coerce.number().int().min(min).default(fallback);
const optionalInt = (min = 1) => z.coerce.number().int().min(min).optional();

const required = z.string().trim().min(1, "is required");

const EnvSchema = z.object({
  DB_CONN_STRING: required,
  DB_ECHO: flag(false),
  REDIS_HOST: z.string().trim().min(1).default("localhost"),
  REDIS_PORT: z.coerce.number().int().min(1).max(65535).default(6379),
  ADMIN_TOKEN: z.string().trim().optional(),
  SECRET_KEY: required,

  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  LOG_LEVEL: z.string().optional(),

  GATE_INTERVAL_MS: int(1000, 1),
  GATE_MAX_ATTEMPTS: optionalInt(),
  GATE_MAX_WAIT_MS: optionalInt(),
  GATE_BACKOFF: z.enum(["fixed", "exponential"]).default("exponential"),
  GATE_MAX_INTERVAL_MS: int(10_000, 1),
  GATE_MULTIPLIER: z.coerce.number().min(1).default(2),
  PROBE_TIMEOUT_MS: int(2000, 1),

  WORKER_ID: z.string().trim().min(1).optional(),
  WORKER_QUEUES: z.string().default("default"),
  WORKER_DEQUEUE_TIMEOUT_MS: int(1000, 1),
  WORKER_MAX_CONSECUTIVE_FAILURES: int(5, 1),
  WORKER_RECOVERY_ATTEMPTS: int(10, 1),
  WORKER_RECOVERY_INTERVAL_MS: int(500, 1),
  WORKER_HEARTBEAT_MS: int(5000, 100),
  TASK_ROUTES: z.string().default(""),

  WORKER_REPLICAS: int(1, 0),
  SUPERVISOR_RESTART_BASE_MS: int(1000, 1),
  SUPERVISOR_RESTART_MAX_MS: int(30_000, 1),
  SUPERVISOR_STABLE_AFTER_MS: int(60_000, 1),
  SUPERVISOR_DEPENDENCY_STARTUP_MS: int(10_000, 0),
});

export type TaskRoute = { pattern: string; queue: string };

export type AppConfig = {
  role: ProcessRole;
  store: { connectionString: string; echo: boolean };
  broker: { host: string; port: number };
  adminToken: string | null;
  secretKey: string;
  http: { host: string; port: number };
  logLevel?: string;
  gate: GatePolicy;
  worker: {
    // Stable across restarts: reclaim only drains this id's processing list.
    id: string;
    queues: string[];
    dequeueTimeoutMs: number;
    maxConsecutiveFailures: number;
    recovery: GatePolicy;
    heartbeatMs: number;
  };
  taskRoutes: TaskRoute[];
  supervisor: {
    workerReplicas: number;
    restartBaseMs: number;
    restartMaxMs: number;
    stableAfterMs: number;
    dependencyStartupMs: number;
  };
};

export function parseTaskRoutes(value: string): TaskRoute[] {
  const routes: TaskRoute[] = [];
  const issues: string[] = [];
  for (const entry of value.split(",")) {
    const trimmed = entry.trim();
    if (!trimmed) continue;
    const [pattern, queue] = trimmed.split("=").map((part) => part.trim());
    if (!pattern || !queue) {
      issues.push(`TASK_ROUTES: malformed entry "${trimmed}" (expected pattern=queue)`);
      continue;
    }
    routes.push({ pattern, queue });
  }
  if (issues.length > 0) throw new ConfigurationError(issues);
  return routes;
}

const splitList = (value: string) =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);

/**
 * Reads the process configuration. Every problem is collected into a single
 * ConfigurationError so the operator sees all of them on the first failed start.
 */
export function loadConfig(role: ProcessRole, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"} ${issue.message}`)
    );
  }
  const values = parsed.data;
  const issues: string[] = [];

  const adminToken = values.ADMIN_TOKEN ? values.ADMIN_TOKEN : null;
  if (role === "api" && !adminToken) {
    issues.push("ADMIN_TOKEN is required");
  }
  if (values.GATE_MAX_ATTEMPTS === undefined && values.GATE_MAX_WAIT_MS === undefined) {
    // Neither bound set: fall back to a bounded default rather than waiting forever.
    values.GATE_MAX_ATTEMPTS = 30;
  }
  if (values.SUPERVISOR_RESTART_MAX_MS < values.SUPERVISOR_RESTART_BASE_MS) {
    issues.push("SUPERVISOR_RESTART_MAX_MS must be >= SUPERVISOR_RESTART_BASE_MS");
  }
  const queues = splitList(values.WORKER_QUEUES);
  if (role === "worker" && queues.length === 0) {
    issues.push("WORKER_QUEUES must name at least one queue");
  }

  let taskRoutes: TaskRoute[] = [];
  try {
    taskRoutes = parseTaskRoutes(values.TASK_ROUTES);
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;
    issues.push(...error.issues);
  }

  if (issues.length > 0) throw new ConfigurationError(issues);

  return {
    role,
    store: { connectionString: values.DB_CONN_STRING, echo: values.DB_ECHO },
    broker: { host: values.REDIS_HOST, port: values.REDIS_PORT },
    adminToken,
    secretKey: values.SECRET_KEY,
    http: { host: values.HOST, port: values.PORT },
    logLevel: values.LOG_LEVEL,
    gate: {
      intervalMs: values.GATE_INTERVAL_MS,
      maxAttempts: values.GATE_MAX_ATTEMPTS,
      maxWaitMs: values.GATE_MAX_WAIT_MS,
      backoff: values.GATE_BACKOFF,
      maxIntervalMs: values.GATE_MAX_INTERVAL_MS,
      multiplier: values.GATE_MULTIPLIER,
      probeTimeoutMs: values.PROBE_TIMEOUT_MS,
    },
    worker: {
      id: values.WORKER_ID ?? `worker-${hostname()}`,
      queues,
      dequeueTimeoutMs: values.WORKER_DEQUEUE_TIMEOUT_MS,
      maxConsecutiveFailures: values.WORKER_MAX_CONSECUTIVE_FAILURES,
      recovery: {
        intervalMs: values.WORKER_RECOVERY_INTERVAL_MS,
        maxAttempts: values.WORKER_RECOVERY_ATTEMPTS,
        backoff: values.GATE_BACKOFF,
        maxIntervalMs: values.GATE_MAX_INTERVAL_MS,
        multiplier: values.GATE_MULTIPLIER,
        probeTimeoutMs: values.PROBE_TIMEOUT_MS,
      },
      heartbeatMs: values.WORKER_HEARTBEAT_MS,
    },
    taskRoutes,
    supervisor: {
      workerReplicas: values.WORKER_REPLICAS,
      restartBaseMs: values.SUPERVISOR_RESTART_BASE_MS,
      restartMaxMs: values.SUPERVISOR_RESTART_MAX_MS,
      stableAfterMs: values.SUPERVISOR_STABLE_AFTER_MS,
      dependencyStartupMs: values.SUPERVISOR_DEPENDENCY_STARTUP_MS,
    },
  };
}
