import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { taskStatusKey, type Broker } from "../broker/broker";
import { buildTaskUnit } from "../broker/task_envelope";
import { resolveQueue } from "../broker/task_routes";
import type { TaskRoute } from "../config/env";
import { EnqueueTaskInput } from "../contracts/task_unit";
import { describeCause } from "../errors/service_errors";
import type { TaskStore } from "../store/task_store";

type TaskRouteOptions = {
  broker: Broker;
  store: TaskStore;
  secretKey: string;
  taskRoutes: TaskRoute[];
  statusTtlMs?: number;
  retryAfterSeconds?: number;
};

const QueuedStatus = z.object({
  status: z.literal("queued"),
  queue: z.string(),
  name: z.string(),
  enqueuedAt: z.string(),
});

const TaskParams = z.object({ id: z.string().min(1).max(128) });

export async function taskRoutes(app: FastifyInstance, opts: TaskRouteOptions) {
  const statusTtlMs = opts.statusTtlMs ?? 24 * 60 * 60 * 1000;
  const retryAfter = String(opts.retryAfterSeconds ?? 5);

  const readQueuedStatus = async (taskId: string) => {
    const raw = await opts.broker.cacheGet(taskStatusKey(taskId));
    if (raw === null) return null;
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return null;
    }
    const parsed = QueuedStatus.safeParse(json);
    return parsed.success ? parsed.data : null;
  };

  app.post("/tasks", async (req, reply) => {
    const parsed = EnqueueTaskInput.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({
        error: "invalid_request",
        details: parsed.error.flatten(),
      });
    }

    const input = parsed.data;

    // A client retrying with its own task id must not enqueue the unit twice.
    // A finished task answers from the store; the queued marker outlives it.
    if (input.taskId) {
      try {
        const finished = await opts.store.getOutcome(input.taskId);
        if (finished) {
          return reply.code(200).send({
            taskId: finished.taskId,
            status: finished.status,
            queue: finished.queue,
            name: finished.name,
            completedAt: finished.completedAt,
            duplicate: true,
          });
        }
        const existing = await readQueuedStatus(input.taskId);
        if (existing) {
          return reply.code(202).send({ taskId: input.taskId, ...existing, duplicate: true });
        }
      } catch (error) {
        req.log.warn(
          { evt: "tasks.dedupe_check_failed", taskId: input.taskId, error: describeCause(error) },
          "tasks.dedupe_check_failed"
        );
      }
    }

    const queue = resolveQueue(input.name, opts.taskRoutes);
    const unit = buildTaskUnit({
      name: input.name,
      queue,
      payload: input.payload,
      taskId: input.taskId,
      secretKey: opts.secretKey,
    });

    try {
      await opts.broker.enqueue(unit);
    } catch (error) {
      req.log.warn(
        { evt: "tasks.enqueue_failed", taskId: unit.id, queue, error: describeCause(error) },
        "tasks.enqueue_failed"
      );
      return reply
        .code(503)
        .header("retry-after", retryAfter)
        .send({ error: "broker_unavailable", retryable: true, taskId: unit.id });
    }

    try {
      await opts.broker.cacheSet(
        taskStatusKey(unit.id),
        JSON.stringify({ status: "queued", queue, name: unit.name, enqueuedAt: unit.enqueuedAt }),
        statusTtlMs
      );
    } catch (error) {
      // The unit is already queued; only the status lookup is degraded.
      req.log.warn(
        { evt: "tasks.status_cache_failed", taskId: unit.id, error: describeCause(error) },
        "tasks.status_cache_failed"
      );
    }

    req.log.info({ evt: "tasks.enqueued", taskId: unit.id, name: unit.name, queue }, "tasks.enqueued");
    return reply.code(202).send({
      taskId: unit.id,
      status: "queued",
      queue,
      name: unit.name,
      enqueuedAt: unit.enqueuedAt,
    });
  });

  app.get("/tasks/:id", async (req, reply) => {
    const params = TaskParams.safeParse(req.params);
    if (!params.success) {
      return reply.code(400).send({ error: "invalid_request", details: params.error.flatten() });
    }
    const taskId = params.data.id;

    try {
      const outcome = await opts.store.getOutcome(taskId);
      if (outcome) return { ok: true, task: outcome };
    } catch (error) {
      req.log.warn({ evt: "tasks.lookup_failed", taskId, error: describeCause(error) }, "tasks.lookup_failed");
      return reply
        .code(503)
        .header("retry-after", retryAfter)
        .send({ error: "store_unavailable", retryable: true });
    }

    try {
      const queued = await readQueuedStatus(taskId);
      if (queued) return { ok: true, task: { taskId, ...queued } };
    } catch (error) {
      req.log.warn({ evt: "tasks.lookup_failed", taskId, error: describeCause(error) }, "tasks.lookup_failed");
      return reply
        .code(503)
        .header("retry-after", retryAfter)
        .send({ error: "broker_unavailable", retryable: true });
    }

    return reply.code(404).send({ error: "not_found" });
  });
}
