import type { ServiceLogger } from "../logging/logger";

type ShutdownSignalName = "SIGTERM" | "SIGINT";

export type SignalSource = {
  once(event: ShutdownSignalName, listener: () => void): unknown;
  removeListener(event: ShutdownSignalName, listener: () => void): unknown;
};

export type ShutdownHandle = {
  signal: AbortSignal;
  dispose: () => void;
};

/**
 * Turns SIGTERM/SIGINT into an AbortSignal so gates, sleeps and the worker
 * loop can stop at their next await point.
 */
export function createShutdownSignal(
  log: ServiceLogger,
  source: SignalSource = process
): ShutdownHandle {
  const controller = new AbortController();
  const handlers = (["SIGTERM", "SIGINT"] as const).map((name) => {
    const handler = () => {
      log.info({ evt: "process.shutdown_requested", signal: name }, "process.shutdown_requested");
      controller.abort();
    };
    source.once(name, handler);
    return [name, handler] as const;
  });

  return {
    signal: controller.signal,
    dispose: () => {
      for (const [name, handler] of handlers) source.removeListener(name, handler);
    },
  };
}
