import type { TaskOutcome } from "../contracts/task_unit";

export type RecordOutcomeArgs = Omit<TaskOutcome, "attempts" | "completedAt"> & {
  completedAt?: string;
};

/**
 * Durable record of what happened to each task. `recordOutcome` is an upsert
 * keyed by task id: a redelivered unit overwrites its earlier outcome and
 * bumps `attempts`.
 */
export interface TaskStore {
  recordOutcome(args: RecordOutcomeArgs): Promise<TaskOutcome>;
  getOutcome(taskId: string): Promise<TaskOutcome | null>;
  close(): Promise<void>;
}

export class MemoryTaskStore implements TaskStore {
  private outcomes = new Map<string, TaskOutcome>();

  async recordOutcome(args: RecordOutcomeArgs): Promise<TaskOutcome> {
    const previous = this.outcomes.get(args.taskId);
    const outcome: TaskOutcome = {
      taskId: args.taskId,
      name: args.name,
      queue: args.queue,
      status: args.status,
      result: args.result ?? null,
      error: args.error,
      attempts: (previous?.attempts ?? 0) + 1,
      enqueuedAt: args.enqueuedAt,
      completedAt: args.completedAt ?? new Date().toISOString(),
    };
    this.outcomes.set(args.taskId, outcome);
    return outcome;
  }

  async getOutcome(taskId: string): Promise<TaskOutcome | null> {
    return this.outcomes.get(taskId) ?? null;
  }

  async close(): Promise<void> {
    this.outcomes.clear();
  }
}
