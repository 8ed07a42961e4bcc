import { timingSafeEqual } from "node:crypto";

import type { FastifyInstance } from "fastify";

import { HEARTBEAT_PREFIX, type Broker } from "../broker/broker";
import { defineService } from "../contracts/service";
import { describeCause } from "../errors/service_errors";
import { createHeartbeatProbe, parseHeartbeat } from "../probes/heartbeat_probe";

type AdminRouteOptions = {
  adminToken: string;
  broker: Broker;
  queues: string[];
};

const AUTH_SCHEME = "token";

export function isAdminAuthorized(header: string | undefined, adminToken: string): boolean {
  if (!header) return false;
  const [scheme, token, ...rest] = header.trim().split(/\s+/);
  if (!scheme || scheme.toLowerCase() !== AUTH_SCHEME || !token || rest.length > 0) return false;
  const expected = Buffer.from(adminToken);
  const provided = Buffer.from(token);
  return expected.length === provided.length && timingSafeEqual(expected, provided);
}

export async function adminRoutes(app: FastifyInstance, opts: AdminRouteOptions) {
  app.addHook("onRequest", async (req, reply) => {
    if (!isAdminAuthorized(req.headers.authorization, opts.adminToken)) {
      req.log.warn({ evt: "admin.unauthorized", ip: req.ip, url: req.url }, "admin.unauthorized");
      return reply.code(401).send({ error: "unauthorized" });
    }
  });

  app.get("/queues", async (req, reply) => {
    try {
      const queues = [];
      for (const queue of opts.queues) {
        queues.push({ queue, ...(await opts.broker.queueDepth(queue)) });
      }

      const workers = [];
      for (const key of (await opts.broker.cacheKeys(HEARTBEAT_PREFIX)).sort()) {
        const workerId = key.slice(HEARTBEAT_PREFIX.length);
        const heartbeat = parseHeartbeat(await opts.broker.cacheGet(key));
        const descriptor = defineService({
          name: workerId,
          kind: "worker",
          readinessProbe: createHeartbeatProbe(opts.broker, workerId),
        });
        const readiness = await descriptor.readinessProbe.check(descriptor);
        workers.push({ workerId, heartbeat, readiness });
      }

      return { ok: true, queues, workers, ts: new Date().toISOString() };
    } catch (error) {
      req.log.warn({ evt: "admin.queues_failed", error: describeCause(error) }, "admin.queues_failed");
      return reply.code(503).send({ error: "broker_unavailable", retryable: true });
    }
  });
}
