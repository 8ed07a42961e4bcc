import type { GatePolicy } from "../contracts/service";
import { ConfigurationError } from "../errors/service_errors";
import { guaranteedGateWindowMs } from "../gate/backoff";
import { EXIT_CODES } from "../lifecycle/exit_codes";

export type RestartSettings = {
  baseDelayMs: number;
  maxDelayMs: number;
  stableAfterMs: number;
};

/**
 * Restart delay bookkeeping for one supervised child. Restarts are never
 * refused; only the delay grows.
 */
export class RestartPolicy {
  private consecutive = 0;

  constructor(private readonly settings: RestartSettings) {}

  get restarts(): number {
    return this.consecutive;
  }

  /** Delay before the next spawn, given how the child exited and how long it ran. */
  nextDelay(exitCode: number | null, uptimeMs: number): number {
    if (uptimeMs >= this.settings.stableAfterMs) this.consecutive = 0;
    this.consecutive += 1;

    // A bad configuration will not fix itself between two quick restarts.
    if (exitCode === EXIT_CODES.configuration) return this.settings.maxDelayMs;

    const grown = this.settings.baseDelayMs * Math.pow(2, this.consecutive - 1);
    return Math.min(grown, this.settings.maxDelayMs);
  }

  reset(): void {
    this.consecutive = 0;
  }
}

/**
 * A dependency that is restarted (worst case `maxDelayMs`) and then takes
 * `dependencyStartupMs` to come up must still be caught by one gate run of
 * its dependents, even when every probe in that run fails at once.
 */
export function assertRestartFitsGate(
  restart: RestartSettings,
  gate: GatePolicy,
  dependencyStartupMs: number
): void {
  const needed = restart.maxDelayMs + dependencyStartupMs;
  const window = guaranteedGateWindowMs(gate);
  if (needed > window) {
    throw new ConfigurationError([
      `gate window ${window}ms is shorter than restart delay ${restart.maxDelayMs}ms ` +
        `plus dependency startup ${dependencyStartupMs}ms; raise GATE_MAX_ATTEMPTS/GATE_MAX_WAIT_MS ` +
        `or lower SUPERVISOR_RESTART_MAX_MS`,
    ]);
  }
}
