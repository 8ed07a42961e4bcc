import type { ServiceLogger } from "../logging/logger";

export type TaskContext = {
  taskId: string;
  attemptLog: ServiceLogger;
  signal?: AbortSignal;
};

/** Task bodies live outside the fabric and must tolerate redelivery. */
export type TaskHandler = (payload: unknown, ctx: TaskContext) => Promise<unknown>;

export class TaskHandlerRegistry {
  private handlers = new Map<string, TaskHandler>();

  register(name: string, handler: TaskHandler): this {
    if (this.handlers.has(name)) {
      throw new Error(`task handler already registered: ${name}`);
    }
    this.handlers.set(name, handler);
    return this;
  }

  get(name: string): TaskHandler | undefined {
    return this.handlers.get(name);
  }

  names(): string[] {
    return [...this.handlers.keys()].sort();
  }
}

export function createDefaultRegistry(): TaskHandlerRegistry {
  return new TaskHandlerRegistry().register("system.echo", async (payload) => payload);
}
