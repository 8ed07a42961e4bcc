import {
  ConfigurationError,
  DependencyTimeout,
  GateAbortedError,
} from "../errors/service_errors";

/**
 * Process exit statuses. The supervisor and external alerting rely on these
 * to tell "never got healthy" apart from "was told to stop".
 * Values follow sysexits.h where one fits.
 */
export const EXIT_CODES = {
  ok: 0,
  unexpected: 1,
  recoveryExhausted: 69, // EX_UNAVAILABLE
  dependencyTimeout: 75, // EX_TEMPFAIL
  configuration: 78, // EX_CONFIG
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigurationError) return EXIT_CODES.configuration;
  if (error instanceof DependencyTimeout) return EXIT_CODES.dependencyTimeout;
  if (error instanceof GateAbortedError) return EXIT_CODES.ok;
  return EXIT_CODES.unexpected;
}

export function describeExitCode(code: number | null): string {
  switch (code) {
    case EXIT_CODES.ok:
      return "stopped";
    case EXIT_CODES.recoveryExhausted:
      return "recovery_exhausted";
    case EXIT_CODES.dependencyTimeout:
      return "dependency_timeout";
    case EXIT_CODES.configuration:
      return "configuration_error";
    case null:
      return "killed";
    default:
      return "crashed";
  }
}
