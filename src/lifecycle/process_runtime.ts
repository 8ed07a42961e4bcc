import type { AppConfig } from "../config/env";
import type { SleepFn } from "../gate/dependency_gate";
import type { ServiceLogger } from "../logging/logger";
import type { DependencyProbes } from "../topology/service_topology";
import { EXIT_CODES, exitCodeFor } from "./exit_codes";

/** What an entry file hands to its process body. */
export type ProcessRuntime = {
  log: ServiceLogger;
  signal: AbortSignal;
  env?: NodeJS.ProcessEnv;
  probesFor?: (config: AppConfig) => DependencyProbes;
  sleepImpl?: SleepFn;
};

/** Exit status of a process body; failures are logged as `<service>.aborted` or `<service>.fatal`. */
export async function settleExitCode(service: string, log: ServiceLogger, run: () => Promise<number>): Promise<number> {
  try {
    return await run();
  } catch (error) {
    const exitCode = exitCodeFor(error);
    const evt = exitCode === EXIT_CODES.ok ? `${service}.aborted` : `${service}.fatal`;
    log.error({ evt, exitCode, error: error instanceof Error ? error.message : String(error) }, evt);
    return exitCode;
  }
}
