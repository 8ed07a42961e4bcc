import type { FastifyInstance } from "fastify";

import type { ProbeResult } from "../contracts/service";
import { runProbe } from "../gate/dependency_gate";
import type { Dependencies } from "../topology/service_topology";

type HealthRouteOptions = {
  service: string;
  dependencies: Dependencies;
  probeTimeoutMs: number;
  isServing: () => boolean;
};

export async function healthRoutes(app: FastifyInstance, opts: HealthRouteOptions) {
  app.get("/healthz", async () => ({
    ok: true,
    service: opts.service,
    ts: new Date().toISOString(),
  }));

  // Probed fresh on every call; a cached "ready" is never reported.
  app.get("/readyz", async (_req, reply) => {
    const checks: Record<string, ProbeResult> = {};
    for (const dependency of [opts.dependencies.store, opts.dependencies.broker]) {
      checks[dependency.name] = await runProbe(dependency, { probeTimeoutMs: opts.probeTimeoutMs });
    }
    const serving = opts.isServing();
    const ok = serving && Object.values(checks).every((check) => check.ready);

    return reply.code(ok ? 200 : 503).send({
      ok,
      service: opts.service,
      serving,
      checks,
      ts: new Date().toISOString(),
    });
  });
}
