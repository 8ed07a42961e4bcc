import type { AppConfig } from "../config/env";
import { defineService, type ReadinessProbe, type ServiceDescriptor } from "../contracts/service";
import { createBrokerProbe, redisPingSession } from "../probes/broker_probe";
import { createFlagProbe } from "../probes/readiness_probe";
import { storeProbeFor } from "../probes/store_probe";
import { resolveStoreTarget } from "../store/store_target";

export type DependencyProbes = {
  store: ReadinessProbe;
  broker: ReadinessProbe;
};

export type Dependencies = {
  store: ServiceDescriptor;
  broker: ServiceDescriptor;
};

export function defaultDependencyProbes(config: AppConfig): DependencyProbes {
  const timeoutMs = config.gate.probeTimeoutMs;
  return {
    store: storeProbeFor(resolveStoreTarget(config.store.connectionString), timeoutMs),
    broker: createBrokerProbe(
      redisPingSession({ host: config.broker.host, port: config.broker.port, timeoutMs })
    ),
  };
}

export function buildDependencies(probes: DependencyProbes): Dependencies {
  return {
    store: defineService({ name: "store", kind: "store", readinessProbe: probes.store }),
    broker: defineService({ name: "broker", kind: "broker", readinessProbe: probes.broker }),
  };
}

/** API and worker both gate on the store and the broker. */
export function buildDependentDescriptor(args: {
  name: string;
  kind: "api" | "worker";
  dependencies: Dependencies;
  isReady: () => boolean;
}): ServiceDescriptor {
  return defineService({
    name: args.name,
    kind: args.kind,
    readinessProbe: createFlagProbe(args.isReady, `${args.name} has not passed its gate`),
    dependencies: [args.dependencies.store, args.dependencies.broker],
  });
}
