import { z } from "zod";

const QUEUE_NAME = /^[A-Za-z0-9_.:-]{1,64}$/;

export const TaskUnit = z.object({
  id: z.string().min(1).max(128),
  name: z.string().min(1).max(200),
  queue: z.string().regex(QUEUE_NAME),
  // Opaque to the fabric; only the task handler interprets it.
  payload: z.unknown(),
  enqueuedAt: z.string().datetime(),
  signature: z.string().regex(/^[a-f0-9]{64}$/),
});

export type TaskUnit = z.infer<typeof TaskUnit>;

export const EnqueueTaskInput = z.object({
  name: z.string().min(1).max(200),
  payload: z.unknown().optional(),
  // Client-chosen id makes resubmission after a 503 idempotent.
  taskId: z.string().min(1).max(128).optional(),
});

export type EnqueueTaskInput = z.infer<typeof EnqueueTaskInput>;

export type TaskStatus = "queued" | "succeeded" | "failed";

export type TaskOutcome = {
  taskId: string;
  name: string;
  queue: string;
  status: Exclude<TaskStatus, "queued">;
  result: unknown;
  error: string | null;
  attempts: number;
  enqueuedAt: string;
  completedAt: string;
};

export function parseTaskUnit(raw: string): TaskUnit | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = TaskUnit.safeParse(json);
  return parsed.success ? parsed.data : null;
}
