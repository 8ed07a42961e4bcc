import type { TaskRoute } from "../config/env";

export const DEFAULT_QUEUE = "default";

const matches = (pattern: string, taskName: string) => {
  if (pattern === "*") return true;
  if (pattern.endsWith(".*")) return taskName.startsWith(pattern.slice(0, -1));
  return pattern === taskName;
};

/** First matching route wins; unrouted tasks land on the default queue. */
export function resolveQueue(taskName: string, routes: readonly TaskRoute[]): string {
  return routes.find((route) => matches(route.pattern, taskName))?.queue ?? DEFAULT_QUEUE;
}
