import { createHmac, randomUUID, timingSafeEqual } from "node:crypto";

import type { TaskUnit } from "../contracts/task_unit";

type UnsignedTask = Omit<TaskUnit, "signature">;

const canonical = (task: UnsignedTask) =>
  JSON.stringify([task.id, task.name, task.queue, task.enqueuedAt, task.payload ?? null]);

export function signTask(task: UnsignedTask, secretKey: string): TaskUnit {
  const signature = createHmac("sha256", secretKey).update(canonical(task)).digest("hex");
  return { ...task, signature };
}

export function verifyTaskSignature(unit: TaskUnit, secretKey: string): boolean {
  const expected = Buffer.from(signTask(unit, secretKey).signature, "hex");
  const provided = Buffer.from(unit.signature, "hex");
  return expected.length === provided.length && timingSafeEqual(expected, provided);
}

export function buildTaskUnit(args: {
  name: string;
  queue: string;
  payload: unknown;
  taskId?: string;
  secretKey: string;
  now?: Date;
}): TaskUnit {
  return signTask(
    {
      id: args.taskId ?? randomUUID(),
      name: args.name,
      queue: args.queue,
      payload: args.payload ?? null,
      enqueuedAt: (args.now ?? new Date()).toISOString(),
    },
    args.secretKey
  );
}
