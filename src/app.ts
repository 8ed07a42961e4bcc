import Fastify, { type FastifyBaseLogger } from "fastify";
import cors from "@fastify/cors";

import type { Broker } from "./broker/broker";
import { DEFAULT_QUEUE } from "./broker/task_routes";
import type { TaskRoute } from "./config/env";
import { adminRoutes } from "./routes/admin";
import { healthRoutes } from "./routes/healthz";
import { taskRoutes } from "./routes/tasks";
import type { TaskStore } from "./store/task_store";
import type { Dependencies } from "./topology/service_topology";

export type ApiDeps = {
  broker: Broker;
  store: TaskStore;
  dependencies: Dependencies;
  secretKey: string;
  adminToken: string;
  taskRoutes: TaskRoute[];
  probeTimeoutMs: number;
  isServing: () => boolean;
  logger?: FastifyBaseLogger;
};

export function knownQueues(routes: readonly TaskRoute[]): string[] {
  return [...new Set([DEFAULT_QUEUE, ...routes.map((route) => route.queue)])];
}

export function buildApp(deps: ApiDeps) {
  const app = deps.logger ? Fastify({ logger: deps.logger }) : Fastify({ logger: false });

  // CORS: permissive; the API sits behind the deployment's own edge.
  app.register(cors, { origin: true });

  app.register(healthRoutes, {
    service: "api",
    dependencies: deps.dependencies,
    probeTimeoutMs: deps.probeTimeoutMs,
    isServing: deps.isServing,
  });
  app.register(taskRoutes, {
    prefix: "/v1",
    broker: deps.broker,
    store: deps.store,
    secretKey: deps.secretKey,
    taskRoutes: deps.taskRoutes,
  });
  app.register(adminRoutes, {
    prefix: "/v1/admin",
    adminToken: deps.adminToken,
    broker: deps.broker,
    queues: knownQueues(deps.taskRoutes),
  });

  return app;
}
