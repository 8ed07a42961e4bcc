import { loadConfig } from "./config/env";
import { EXIT_CODES, exitCodeFor } from "./lifecycle/exit_codes";
import { createShutdownSignal } from "./lifecycle/shutdown";
import { createLogger } from "./logging/logger";
import { supervisedChildren } from "./supervisor/children";
import { ProcessSupervisor } from "./supervisor/process_supervisor";
import { assertRestartFitsGate, type RestartSettings } from "./supervisor/restart_policy";

const log = createLogger({ service: "supervisor" });

async function main(): Promise<number> {
  const config = loadConfig("supervisor");
  const restart: RestartSettings = {
    baseDelayMs: config.supervisor.restartBaseMs,
    maxDelayMs: config.supervisor.restartMaxMs,
    stableAfterMs: config.supervisor.stableAfterMs,
  };
  // Store and broker are gated on by every child.
  assertRestartFitsGate(restart, config.gate, config.supervisor.dependencyStartupMs);

  const supervisor = new ProcessSupervisor({
    children: supervisedChildren(config.supervisor.workerReplicas, __dirname),
    restart,
    log,
  });
  const shutdown = createShutdownSignal(log);
  shutdown.signal.addEventListener(
    "abort",
    () => {
      supervisor.stop().catch((error: unknown) => {
        log.error({ evt: "supervisor.stop_failed", error: String(error) }, "supervisor.stop_failed");
      });
    },
    { once: true }
  );

  log.info(
    { evt: "supervisor.starting", workers: config.supervisor.workerReplicas, restart },
    "supervisor.starting"
  );
  supervisor.start();
  await supervisor.wait();
  shutdown.dispose();
  log.info({ evt: "supervisor.stopped" }, "supervisor.stopped");
  return EXIT_CODES.ok;
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    const code = exitCodeFor(err);
    log.error(
      { evt: "supervisor.fatal", exitCode: code, error: err instanceof Error ? err.message : String(err) },
      "supervisor.fatal"
    );
    process.exit(code);
  }
);
