import { join } from "node:path";

import type { ChildSpec } from "./process_supervisor";

/** The API plus `replicas` workers, each run through tsx with a stable worker id. */
export function supervisedChildren(replicas: number, srcDir: string, command: string = process.execPath): ChildSpec[] {
  const tsx = (entry: string) => ["--import", "tsx", join(srcDir, entry)];
  const children: ChildSpec[] = [{ name: "api", command, args: tsx("index.ts") }];
  for (let n = 1; n <= replicas; n += 1) {
    children.push({
      name: `worker-${n}`,
      command,
      args: tsx("worker.ts"),
      env: { WORKER_ID: `worker-${n}` },
    });
  }
  return children;
}
