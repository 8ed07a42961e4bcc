import type { FastifyBaseLogger, FastifyInstance } from "fastify";

import { buildApp } from "./app";
import type { Broker } from "./broker/broker";
import { RedisBroker } from "./broker/redis_broker";
import { loadConfig, type AppConfig } from "./config/env";
import { awaitReady, type SleepFn } from "./gate/dependency_gate";
import { EXIT_CODES } from "./lifecycle/exit_codes";
import type { ProcessRuntime } from "./lifecycle/process_runtime";
import { maskConnectionString, type ServiceLogger } from "./logging/logger";
import { openTaskStore } from "./store/open_store";
import { resolveStoreTarget } from "./store/store_target";
import type { TaskStore } from "./store/task_store";
import {
  buildDependencies,
  buildDependentDescriptor,
  defaultDependencyProbes,
  type DependencyProbes,
} from "./topology/service_topology";

export type ApiClients = { broker: Broker; store: TaskStore };

export type StartApiOptions = {
  config: AppConfig;
  probes: DependencyProbes;
  /** Opens the broker and store clients; only called once the gate is satisfied. */
  connect: () => Promise<ApiClients>;
  log: ServiceLogger;
  fastifyLogger?: FastifyBaseLogger;
  signal?: AbortSignal;
  sleepImpl?: SleepFn;
};

export type ApiServer = {
  app: FastifyInstance;
  /** Flips /readyz to serving; call once the listener is bound. */
  markServing: () => void;
  close: () => Promise<void>;
};

/**
 * Gate on store and broker, then build the HTTP app. Nothing is connected
 * and no route exists until the gate passes.
 */
export async function startApi(opts: StartApiOptions): Promise<ApiServer> {
  const { config } = opts;
  const adminToken = config.adminToken;
  if (!adminToken) throw new Error("api: admin token missing from configuration");

  let serving = false;
  const dependencies = buildDependencies(opts.probes);
  const descriptor = buildDependentDescriptor({
    name: "api",
    kind: "api",
    dependencies,
    isReady: () => serving,
  });

  await awaitReady(descriptor, config.gate, {
    signal: opts.signal,
    log: opts.log,
    sleepImpl: opts.sleepImpl,
  });

  const { broker, store } = await opts.connect();
  const app = buildApp({
    broker,
    store,
    dependencies,
    secretKey: config.secretKey,
    adminToken,
    taskRoutes: config.taskRoutes,
    probeTimeoutMs: config.gate.probeTimeoutMs,
    isServing: () => serving,
    logger: opts.fastifyLogger,
  });
  await app.ready();

  return {
    app,
    markServing: () => {
      serving = true;
    },
    close: async () => {
      serving = false;
      await app.close();
      await Promise.allSettled([broker.close(), store.close()]);
    },
  };
}

/** Redis broker and the store named by DB_CONN_STRING. */
export async function connectApiClients(config: AppConfig, log: ServiceLogger): Promise<ApiClients> {
  const broker = new RedisBroker({
    host: config.broker.host,
    port: config.broker.port,
    consumerId: "api",
    log,
    connectTimeoutMs: config.gate.probeTimeoutMs,
  });
  await broker.connect();
  const store = openTaskStore(resolveStoreTarget(config.store.connectionString), {
    log,
    echo: config.store.echo,
  });
  return { broker, store };
}

export type ApiRuntime = ProcessRuntime & {
  fastifyLogger?: FastifyBaseLogger;
  connect?: (config: AppConfig, log: ServiceLogger) => Promise<ApiClients>;
};

/**
 * The API process: configuration, gate, clients, listener, then serve until
 * shutdown. Configuration errors surface before any probe runs.
 */
export async function runApi(runtime: ApiRuntime): Promise<number> {
  const { log, signal } = runtime;
  const config = loadConfig("api", runtime.env);

  log.info(
    {
      evt: "api.starting",
      store: maskConnectionString(config.store.connectionString),
      broker: `${config.broker.host}:${config.broker.port}`,
      gate: config.gate,
    },
    "api.starting"
  );

  // The port is not bound until the gate passes: clients see connection
  // refused while the API is gating.
  const connect = runtime.connect ?? connectApiClients;
  const server = await startApi({
    config,
    probes: (runtime.probesFor ?? defaultDependencyProbes)(config),
    log,
    fastifyLogger: runtime.fastifyLogger,
    signal,
    sleepImpl: runtime.sleepImpl,
    connect: () => connect(config, log),
  });

  await server.app.listen({ port: config.http.port, host: config.http.host });
  server.markServing();
  log.info({ evt: "api.serving", host: config.http.host, port: config.http.port }, "api.serving");

  await new Promise<void>((resolve) => {
    if (signal.aborted) resolve();
    else signal.addEventListener("abort", () => resolve(), { once: true });
  });

  await server.close();
  log.info({ evt: "api.stopped" }, "api.stopped");
  return EXIT_CODES.ok;
}
