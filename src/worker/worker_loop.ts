import { heartbeatKey, type AckOutcome, type Broker, type TaskLease } from "../broker/broker";
import { verifyTaskSignature } from "../broker/task_envelope";
import type { GatePolicy, ServiceDescriptor } from "../contracts/service";
import type { TaskUnit } from "../contracts/task_unit";
import {
  DependencyTimeout,
  GateAbortedError,
  TaskExecutionError,
  TransientIOError,
  describeCause,
  type DependencyKind,
} from "../errors/service_errors";
import { awaitReady, scopedDescriptor, type SleepFn } from "../gate/dependency_gate";
import type { ServiceLogger } from "../logging/logger";
import type { WorkerHeartbeat } from "../probes/heartbeat_probe";
import type { TaskStore } from "../store/task_store";
import type { TaskHandlerRegistry } from "./task_handlers";

export type WorkerState = "gating" | "ready" | "draining" | "recovering" | "terminated";

export type WorkerExit = {
  reason: "shutdown" | "recovery_exhausted";
  processed: number;
  lastError: string | null;
};

export type WorkerLoopOptions = {
  workerId: string;
  descriptor: ServiceDescriptor;
  broker: Broker;
  store: TaskStore;
  handlers: TaskHandlerRegistry;
  secretKey: string;
  queues: string[];
  gatePolicy: GatePolicy;
  recoveryPolicy: GatePolicy;
  maxConsecutiveFailures: number;
  dequeueTimeoutMs: number;
  heartbeatMs?: number;
  log: ServiceLogger;
  signal?: AbortSignal;
  sleepImpl?: SleepFn;
  now?: () => number;
  /** Runs once the gate is satisfied, before draining (e.g. opening client connections). */
  prepare?: () => Promise<void>;
  onStateChange?: (state: WorkerState) => void;
};

type Execution =
  | { status: "succeeded"; result: unknown }
  | { status: "failed"; error: TaskExecutionError };

type Step = "processed" | "idle" | "recovered" | "terminated";

type PendingBrokerOp = { kind: "ack"; lease: TaskLease; outcome: AckOutcome } | { kind: "release"; lease: TaskLease };

const dependencyOf = (error: unknown, fallback: DependencyKind): DependencyKind =>
  error instanceof TransientIOError ? error.dependency : fallback;

/**
 * gating -> ready -> draining <-> recovering -> terminated
 *
 * Units are persisted before they are acked, so a store failure leaves the
 * unit leased and it is released back to its queue for redelivery.
 */
export class WorkerLoop {
  private currentState: WorkerState = "gating";
  private processed = 0;
  private consecutiveFailures = 0;
  private lastError: string | null = null;
  private pending: PendingBrokerOp[] = [];
  private heartbeatTimer: NodeJS.Timeout | null = null;

  constructor(private readonly opts: WorkerLoopOptions) {}

  get state(): WorkerState {
    return this.currentState;
  }

  get processedCount(): number {
    return this.processed;
  }

  private transition(next: WorkerState) {
    if (next === this.currentState) return;
    const previous = this.currentState;
    this.currentState = next;
    this.opts.log.info(
      {
        evt: "worker.state",
        workerId: this.opts.workerId,
        from: previous,
        to: next,
        consecutiveFailures: this.consecutiveFailures,
      },
      "worker.state"
    );
    this.opts.onStateChange?.(next);
    if (this.heartbeatTimer) this.beat();
  }

  private beat() {
    const heartbeat: WorkerHeartbeat = {
      workerId: this.opts.workerId,
      state: this.currentState,
      processed: this.processed,
      at: new Date(this.now()).toISOString(),
    };
    const intervalMs = this.opts.heartbeatMs ?? 5000;
    this.opts.broker
      .cacheSet(heartbeatKey(this.opts.workerId), JSON.stringify(heartbeat), intervalMs * 3)
      .catch((error: unknown) => {
        this.opts.log.warn(
          { evt: "worker.heartbeat_failed", workerId: this.opts.workerId, error: describeCause(error) },
          "worker.heartbeat_failed"
        );
      });
  }

  private startHeartbeat() {
    if (this.opts.heartbeatMs === undefined) return;
    this.heartbeatTimer = setInterval(() => this.beat(), this.opts.heartbeatMs);
    this.heartbeatTimer.unref();
    this.beat();
  }

  private stopHeartbeat() {
    if (!this.heartbeatTimer) return;
    clearInterval(this.heartbeatTimer);
    this.heartbeatTimer = null;
    this.opts.broker.cacheDel(heartbeatKey(this.opts.workerId)).catch((error: unknown) => {
      this.opts.log.warn(
        { evt: "worker.heartbeat_clear_failed", workerId: this.opts.workerId, error: describeCause(error) },
        "worker.heartbeat_clear_failed"
      );
    });
  }

  private now(): number {
    return (this.opts.now ?? Date.now)();
  }

  private get aborted(): boolean {
    return this.opts.signal?.aborted === true;
  }

  private finish(reason: WorkerExit["reason"]): WorkerExit {
    this.transition("terminated");
    return { reason, processed: this.processed, lastError: this.lastError };
  }

  /**
   * Gates, then drains until shutdown or until recovery gives up. Throws
   * DependencyTimeout when the startup gate fails and GateAbortedError when
   * shutdown arrives during the startup gate.
   */
  async run(): Promise<WorkerExit> {
    const { log, signal, sleepImpl, now } = this.opts;
    this.transition("gating");
    try {
      await awaitReady(this.opts.descriptor, this.opts.gatePolicy, { signal, log, sleepImpl, now });
    } catch (error) {
      this.transition("terminated");
      throw error;
    }
    this.transition("ready");

    try {
      const started = await this.startup();
      if (started === "terminated") return this.finish("recovery_exhausted");
      if (this.aborted) return this.finish("shutdown");

      this.startHeartbeat();
      this.transition("draining");

      while (!this.aborted) {
        for (const queue of this.opts.queues) {
          if (this.aborted) break;
          const step = await this.drainOne(queue);
          if (step === "terminated") return this.finish("recovery_exhausted");
        }
      }
      return this.finish("shutdown");
    } finally {
      this.stopHeartbeat();
    }
  }

  private async startup(): Promise<"ok" | "terminated"> {
    for (;;) {
      try {
        await this.opts.prepare?.();
        for (const queue of this.opts.queues) {
          const reclaimed = await this.opts.broker.reclaim(queue);
          if (reclaimed > 0) {
            this.opts.log.warn(
              { evt: "worker.reclaimed", workerId: this.opts.workerId, queue, count: reclaimed },
              "worker.reclaimed"
            );
          }
        }
        return "ok";
      } catch (error) {
        const step = await this.recover(dependencyOf(error, "broker"), error);
        if (step === "terminated") return "terminated";
        if (this.aborted) return "ok";
      }
    }
  }

  private async drainOne(queue: string): Promise<Step> {
    let lease: TaskLease | null;
    try {
      lease = await this.opts.broker.dequeue(queue, this.opts.dequeueTimeoutMs);
    } catch (error) {
      return this.recover(dependencyOf(error, "broker"), error);
    }
    if (!lease) {
      // A healthy empty poll ends any run of failures.
      this.consecutiveFailures = 0;
      return "idle";
    }

    if (!lease.unit) {
      this.opts.log.error(
        { evt: "worker.task_rejected", workerId: this.opts.workerId, queue, reason: "invalid_envelope" },
        "worker.task_rejected"
      );
      return this.acknowledge(lease, "failed");
    }

    const unit = lease.unit;
    const execution = await this.execute(unit);

    try {
      await this.opts.store.recordOutcome({
        taskId: unit.id,
        name: unit.name,
        queue: unit.queue,
        status: execution.status,
        result: execution.status === "succeeded" ? execution.result : null,
        error: execution.status === "failed" ? execution.error.message : null,
        enqueuedAt: unit.enqueuedAt,
      });
    } catch (error) {
      this.pending.push({ kind: "release", lease });
      return this.recover(dependencyOf(error, "store"), error);
    }

    return this.acknowledge(lease, execution.status);
  }

  private async acknowledge(lease: TaskLease, outcome: AckOutcome): Promise<Step> {
    try {
      await this.opts.broker.ack(lease, outcome);
    } catch (error) {
      this.pending.push({ kind: "ack", lease, outcome });
      return this.recover(dependencyOf(error, "broker"), error);
    }
    this.processed += 1;
    this.consecutiveFailures = 0;
    return "processed";
  }

  private async execute(unit: TaskUnit): Promise<Execution> {
    const failed = (reason: TaskExecutionError["reason"], message: string, cause?: unknown): Execution => {
      const error = new TaskExecutionError({ taskId: unit.id, reason, message, cause });
      this.opts.log.warn({ evt: "worker.task_failed", workerId: this.opts.workerId, ...error.toJSON() }, "worker.task_failed");
      return { status: "failed", error };
    };

    if (!verifyTaskSignature(unit, this.opts.secretKey)) {
      return failed("invalid_signature", "task signature does not verify");
    }
    const handler = this.opts.handlers.get(unit.name);
    if (!handler) {
      return failed("unknown_task", `no handler registered for ${unit.name}`);
    }

    const startedAt = this.now();
    try {
      const result = await handler(unit.payload, {
        taskId: unit.id,
        attemptLog: this.opts.log,
        signal: this.opts.signal,
      });
      this.opts.log.info(
        {
          evt: "worker.task_succeeded",
          workerId: this.opts.workerId,
          taskId: unit.id,
          name: unit.name,
          durationMs: this.now() - startedAt,
        },
        "worker.task_succeeded"
      );
      return { status: "succeeded", result: result ?? null };
    } catch (error) {
      return failed("handler_failed", describeCause(error), error);
    }
  }

  /** Replays acks and releases that could not reach the broker earlier. */
  private async flushPending(): Promise<void> {
    while (this.pending.length > 0) {
      const op = this.pending[0];
      if (!op) return;
      if (op.kind === "ack") {
        await this.opts.broker.ack(op.lease, op.outcome);
        this.processed += 1;
      } else {
        await this.opts.broker.release(op.lease);
      }
      this.pending.shift();
    }
  }

  private async recover(dependency: DependencyKind, cause: unknown): Promise<Step> {
    this.consecutiveFailures += 1;
    this.lastError = describeCause(cause);
    this.opts.log.warn(
      {
        evt: "worker.dependency_failed",
        workerId: this.opts.workerId,
        dependency,
        consecutiveFailures: this.consecutiveFailures,
        maxConsecutiveFailures: this.opts.maxConsecutiveFailures,
        error: this.lastError,
      },
      "worker.dependency_failed"
    );

    if (this.consecutiveFailures > this.opts.maxConsecutiveFailures) {
      this.opts.log.error(
        { evt: "worker.recovery_exhausted", workerId: this.opts.workerId, dependency },
        "worker.recovery_exhausted"
      );
      return "terminated";
    }

    this.transition("recovering");
    try {
      await awaitReady(scopedDescriptor(this.opts.descriptor, dependency), this.opts.recoveryPolicy, {
        signal: this.opts.signal,
        log: this.opts.log,
        sleepImpl: this.opts.sleepImpl,
        now: this.opts.now,
      });
    } catch (error) {
      if (error instanceof GateAbortedError) return "recovered";
      if (error instanceof DependencyTimeout) {
        this.lastError = error.message;
        this.opts.log.error(
          { evt: "worker.recovery_exhausted", workerId: this.opts.workerId, dependency, attempts: error.attempts },
          "worker.recovery_exhausted"
        );
        return "terminated";
      }
      throw error;
    }

    try {
      await this.flushPending();
    } catch (error) {
      return this.recover(dependencyOf(error, "broker"), error);
    }
    this.transition("draining");
    return "recovered";
  }
}
