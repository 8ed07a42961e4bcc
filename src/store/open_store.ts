import type { ServiceLogger } from "../logging/logger";
import { PostgresTaskStore } from "./postgres_task_store";
import { SqliteTaskStore } from "./sqlite_task_store";
import type { StoreTarget } from "./store_target";
import type { TaskStore } from "./task_store";

export function openTaskStore(
  target: StoreTarget,
  opts: { log?: ServiceLogger; echo?: boolean } = {}
): TaskStore {
  if (target.driver === "postgres") {
    return new PostgresTaskStore(target.url, opts);
  }
  return new SqliteTaskStore(target.path, opts);
}
