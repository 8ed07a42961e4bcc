import type { Broker } from "../broker/broker";
import { RedisBroker } from "../broker/redis_broker";
import { loadConfig, type AppConfig } from "../config/env";
import { EXIT_CODES } from "../lifecycle/exit_codes";
import type { ProcessRuntime } from "../lifecycle/process_runtime";
import { maskConnectionString, type ServiceLogger } from "../logging/logger";
import { openTaskStore } from "../store/open_store";
import { resolveStoreTarget } from "../store/store_target";
import type { TaskStore } from "../store/task_store";
import {
  buildDependencies,
  buildDependentDescriptor,
  defaultDependencyProbes,
} from "../topology/service_topology";
import { createDefaultRegistry } from "./task_handlers";
import { WorkerLoop } from "./worker_loop";

export type WorkerClients = {
  broker: Broker;
  store: TaskStore;
  /** Opens the broker connections; runs only after the startup gate. */
  connect: () => Promise<void>;
};

export function redisWorkerClients(config: AppConfig, workerId: string, log: ServiceLogger): WorkerClients {
  const broker = new RedisBroker({
    host: config.broker.host,
    port: config.broker.port,
    consumerId: workerId,
    log,
    connectTimeoutMs: config.gate.probeTimeoutMs,
  });
  const store = openTaskStore(resolveStoreTarget(config.store.connectionString), {
    log,
    echo: config.store.echo,
  });
  return { broker, store, connect: () => broker.connect() };
}

export type WorkerRuntime = ProcessRuntime & {
  clientsFor?: (config: AppConfig, workerId: string, log: ServiceLogger) => WorkerClients;
};

/**
 * The worker process. Returns 0 on shutdown and 69 when recovery gives up;
 * configuration and startup gate failures are thrown.
 */
export async function runWorker(runtime: WorkerRuntime): Promise<number> {
  const { log, signal } = runtime;
  const config = loadConfig("worker", runtime.env);
  const workerId = config.worker.id;
  const { broker, store, connect } = (runtime.clientsFor ?? redisWorkerClients)(config, workerId, log);

  let loop: WorkerLoop | null = null;
  const descriptor = buildDependentDescriptor({
    name: workerId,
    kind: "worker",
    dependencies: buildDependencies((runtime.probesFor ?? defaultDependencyProbes)(config)),
    isReady: () => loop?.state === "draining",
  });

  log.info(
    {
      evt: "worker.starting",
      workerId,
      store: maskConnectionString(config.store.connectionString),
      broker: `${config.broker.host}:${config.broker.port}`,
      queues: config.worker.queues,
      gate: config.gate,
      recovery: config.worker.recovery,
      maxConsecutiveFailures: config.worker.maxConsecutiveFailures,
    },
    "worker.starting"
  );

  loop = new WorkerLoop({
    workerId,
    descriptor,
    broker,
    store,
    handlers: createDefaultRegistry(),
    secretKey: config.secretKey,
    queues: config.worker.queues,
    gatePolicy: config.gate,
    recoveryPolicy: config.worker.recovery,
    maxConsecutiveFailures: config.worker.maxConsecutiveFailures,
    dequeueTimeoutMs: config.worker.dequeueTimeoutMs,
    heartbeatMs: config.worker.heartbeatMs,
    log,
    signal,
    sleepImpl: runtime.sleepImpl,
    prepare: connect,
  });

  try {
    const exit = await loop.run();
    log.info({ evt: "worker.stopped", workerId, ...exit }, "worker.stopped");
    return exit.reason === "shutdown" ? EXIT_CODES.ok : EXIT_CODES.recoveryExhausted;
  } finally {
    await Promise.allSettled([broker.close(), store.close()]);
  }
}
