import type { ProbeResult, ServiceKind } from "../contracts/service";

export type ServiceErrorCode =
  | "configuration_invalid"
  | "dependency_timeout"
  | "gate_aborted"
  | "transient_io"
  | "task_execution_failed";

export type DependencyKind = Extract<ServiceKind, "store" | "broker">;

export class ConfigurationError extends Error {
  public readonly code: ServiceErrorCode = "configuration_invalid";
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigurationError";
    this.issues = issues;
  }

  toJSON() {
    return { error: this.code, message: this.message, issues: this.issues };
  }
}

export type PendingDependency = {
  name: string;
  kind: ServiceKind;
  lastResult: ProbeResult | null;
};

export class DependencyTimeout extends Error {
  public readonly code: ServiceErrorCode = "dependency_timeout";
  public readonly service: string;
  public readonly attempts: number;
  public readonly pending: PendingDependency[];

  constructor(args: { service: string; attempts: number; pending: PendingDependency[] }) {
    const names = args.pending.map((dep) => dep.name).join(", ") || "unknown";
    super(`${args.service}: dependencies not ready after ${args.attempts} attempts: ${names}`);
    this.name = "DependencyTimeout";
    this.service = args.service;
    this.attempts = args.attempts;
    this.pending = args.pending;
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      service: this.service,
      attempts: this.attempts,
      pending: this.pending.map((dep) => ({
        name: dep.name,
        kind: dep.kind,
        reason: dep.lastResult?.reason ?? null,
        detail: dep.lastResult?.detail ?? null,
      })),
    };
  }
}

export class GateAbortedError extends Error {
  public readonly code: ServiceErrorCode = "gate_aborted";
  public readonly service: string;
  public readonly attempts: number;

  constructor(service: string, attempts: number) {
    super(`${service}: gate aborted after ${attempts} attempts`);
    this.name = "GateAbortedError";
    this.service = service;
    this.attempts = attempts;
  }
}

export class TransientIOError extends Error {
  public readonly code: ServiceErrorCode = "transient_io";
  public readonly dependency: DependencyKind;
  public readonly operation: string;

  constructor(args: { dependency: DependencyKind; operation: string; cause?: unknown }) {
    super(`${args.dependency}.${args.operation} failed: ${describeCause(args.cause)}`, {
      cause: args.cause,
    });
    this.name = "TransientIOError";
    this.dependency = args.dependency;
    this.operation = args.operation;
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      dependency: this.dependency,
      operation: this.operation,
    };
  }
}

export type TaskFailureReason = "unknown_task" | "invalid_signature" | "invalid_envelope" | "handler_failed";

export class TaskExecutionError extends Error {
  public readonly code: ServiceErrorCode = "task_execution_failed";
  public readonly taskId: string;
  public readonly reason: TaskFailureReason;

  constructor(args: { taskId: string; reason: TaskFailureReason; message: string; cause?: unknown }) {
    super(args.message, { cause: args.cause });
    this.name = "TaskExecutionError";
    this.taskId = args.taskId;
    this.reason = args.reason;
  }

  toJSON() {
    return { error: this.code, taskId: this.taskId, reason: this.reason, message: this.message };
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return "unknown error";
  return String(cause);
}

export const isTransientIOError = (error: unknown): error is TransientIOError =>
  error instanceof TransientIOError;
