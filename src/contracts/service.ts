export type ServiceKind = "store" | "broker" | "api" | "worker";

export type ProbeFailureReason =
  | "unreachable"
  | "auth_failed"
  | "starting"
  | "unexpected_response"
  | "timeout"
  | "error";

export type ProbeResult = {
  ready: boolean;
  observedAt: string;
  detail?: string;
  reason?: ProbeFailureReason;
};

export type ProbeContext = {
  signal?: AbortSignal;
};

export interface ReadinessProbe {
  check(descriptor: ServiceDescriptor, ctx?: ProbeContext): Promise<ProbeResult>;
}

export type ServiceDescriptor = Readonly<{
  name: string;
  kind: ServiceKind;
  readinessProbe: ReadinessProbe;
  dependencies: readonly ServiceDescriptor[];
}>;

export type BackoffKind = "fixed" | "exponential";

export type GatePolicy = {
  intervalMs: number;
  maxAttempts?: number;
  maxWaitMs?: number;
  backoff: BackoffKind;
  // Only consulted for exponential backoff.
  maxIntervalMs: number;
  multiplier: number;
  probeTimeoutMs: number;
};

export type GateOutcome = "pending" | "satisfied" | "timed_out";

export type GateState = {
  descriptor: ServiceDescriptor;
  attemptsMade: number;
  startedAt: number;
  deadline: number | null;
  outcome: GateOutcome;
  lastResults: Record<string, ProbeResult>;
};

export function defineService(args: {
  name: string;
  kind: ServiceKind;
  readinessProbe: ReadinessProbe;
  dependencies?: ServiceDescriptor[];
}): ServiceDescriptor {
  return Object.freeze({
    name: args.name,
    kind: args.kind,
    readinessProbe: args.readinessProbe,
    dependencies: Object.freeze([...(args.dependencies ?? [])]),
  });
}
