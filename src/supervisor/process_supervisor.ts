import { spawn } from "node:child_process";
import { setTimeout as sleep } from "node:timers/promises";

import type { SleepFn } from "../gate/dependency_gate";
import { describeExitCode } from "../lifecycle/exit_codes";
import type { ServiceLogger } from "../logging/logger";
import { RestartPolicy, type RestartSettings } from "./restart_policy";

export type ChildSpec = {
  name: string;
  command: string;
  args: string[];
  env?: Record<string, string>;
};

export type ExitListener = (code: number | null, signal: NodeJS.Signals | null) => void;

export type SupervisedChild = {
  readonly pid?: number;
  once(event: "exit", listener: ExitListener): unknown;
  kill(signal?: NodeJS.Signals): boolean;
};

export type SpawnFn = (spec: ChildSpec) => SupervisedChild;

export type SupervisorOptions = {
  children: ChildSpec[];
  restart: RestartSettings;
  log: ServiceLogger;
  spawnImpl?: SpawnFn;
  sleepImpl?: SleepFn;
  now?: () => number;
};

type ChildExit = { code: number | null; signal: NodeJS.Signals | null };

export function createSpawn(log: ServiceLogger): SpawnFn {
  return (spec) => {
    const child = spawn(spec.command, spec.args, {
      env: { ...process.env, ...spec.env },
      stdio: "inherit",
    });
    child.on("error", (error) => {
      log.error({ evt: "supervisor.spawn_failed", child: spec.name, error: error.message }, "supervisor.spawn_failed");
      // A child that never started emits no exit of its own.
      if (child.pid === undefined) child.emit("exit", 1, null);
    });
    return child;
  };
}

const defaultSleep: SleepFn = async (ms, signal) => {
  await sleep(ms, undefined, signal ? { signal } : undefined);
};

/**
 * Keeps every configured child running. There is no restart limit: a child
 * that cannot reach its dependencies exits with a gate timeout and is
 * started again after the restart delay.
 */
export class ProcessSupervisor {
  private readonly controller = new AbortController();
  private readonly running = new Map<string, SupervisedChild>();
  private readonly loops: Promise<void>[] = [];
  private readonly spawnImpl: SpawnFn;
  private readonly sleepImpl: SleepFn;
  private readonly now: () => number;

  constructor(private readonly opts: SupervisorOptions) {
    this.spawnImpl = opts.spawnImpl ?? createSpawn(opts.log);
    this.sleepImpl = opts.sleepImpl ?? defaultSleep;
    this.now = opts.now ?? Date.now;
  }

  get stopping(): boolean {
    return this.controller.signal.aborted;
  }

  runningChildren(): string[] {
    return [...this.running.keys()].sort();
  }

  start(): void {
    if (this.loops.length > 0) throw new Error("supervisor already started");
    for (const spec of this.opts.children) {
      this.loops.push(this.supervise(spec));
    }
  }

  /** Resolves once every child loop has ended, i.e. after stop(). */
  async wait(): Promise<void> {
    await Promise.all(this.loops);
  }

  async stop(): Promise<void> {
    if (!this.stopping) {
      this.opts.log.info({ evt: "supervisor.stopping", children: this.runningChildren() }, "supervisor.stopping");
      this.controller.abort();
      for (const child of this.running.values()) child.kill("SIGTERM");
    }
    await this.wait();
  }

  private async supervise(spec: ChildSpec): Promise<void> {
    const policy = new RestartPolicy(this.opts.restart);
    const log = this.opts.log;

    while (!this.stopping) {
      const startedAt = this.now();
      const child = this.spawnImpl(spec);
      const exited = new Promise<ChildExit>((resolve) => {
        child.once("exit", (code, signal) => resolve({ code, signal }));
      });
      this.running.set(spec.name, child);
      log.info({ evt: "supervisor.child_started", child: spec.name, pid: child.pid ?? null }, "supervisor.child_started");

      const exit = await exited;
      this.running.delete(spec.name);
      const uptimeMs = this.now() - startedAt;

      if (this.stopping) {
        log.info(
          { evt: "supervisor.child_stopped", child: spec.name, exitCode: exit.code, signal: exit.signal },
          "supervisor.child_stopped"
        );
        return;
      }

      const delayMs = policy.nextDelay(exit.code, uptimeMs);
      log.warn(
        {
          evt: "supervisor.child_exited",
          child: spec.name,
          exitCode: exit.code,
          signal: exit.signal,
          outcome: describeExitCode(exit.code),
          uptimeMs,
          restarts: policy.restarts,
          restartInMs: delayMs,
        },
        "supervisor.child_exited"
      );

      try {
        await this.sleepImpl(delayMs, this.controller.signal);
      } catch (error) {
        if (this.stopping) return;
        throw error;
      }
    }
  }
}
