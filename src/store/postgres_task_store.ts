import postgres from "postgres";

import type { TaskOutcome } from "../contracts/task_unit";
import { TransientIOError } from "../errors/service_errors";
import type { ServiceLogger } from "../logging/logger";
import type { RecordOutcomeArgs, TaskStore } from "./task_store";

type OutcomeRow = {
  task_id: string;
  name: string;
  queue: string;
  status: TaskOutcome["status"];
  result_json: string | null;
  error: string | null;
  attempts: number;
  enqueued_at: string;
  completed_at: string;
};

const fromRow = (row: OutcomeRow): TaskOutcome => ({
  taskId: row.task_id,
  name: row.name,
  queue: row.queue,
  status: row.status,
  result: row.result_json === null ? null : JSON.parse(row.result_json),
  error: row.error,
  attempts: row.attempts,
  enqueuedAt: row.enqueued_at,
  completedAt: row.completed_at,
});

export class PostgresTaskStore implements TaskStore {
  private sql: postgres.Sql;
  private schemaReady: Promise<void> | null = null;

  constructor(url: string, opts: { log?: ServiceLogger; echo?: boolean; poolSize?: number } = {}) {
    const log = opts.log;
    this.sql = postgres(url, {
      max: opts.poolSize ?? 10,
      connect_timeout: 5,
      onnotice: () => undefined,
      connection: { application_name: "gated-services" },
      ...(opts.echo && log
        ? {
            debug: (_connection: number, query: string, parameters: unknown[]) =>
              log.debug({ evt: "store.query", sql: query, params: parameters.length }, "store.query"),
          }
        : {}),
    });
  }

  private guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return fn().catch((error: unknown) => {
      throw new TransientIOError({ dependency: "store", operation, cause: error });
    });
  }

  private ensureSchema(): Promise<void> {
    // Reset on failure so the next call retries after the store recovers.
    this.schemaReady ??= this.sql`
      create table if not exists task_outcomes (
        task_id text primary key,
        name text not null,
        queue text not null,
        status text not null,
        result_json text,
        error text,
        attempts integer not null default 1,
        enqueued_at text not null,
        completed_at text not null
      )
    `.then(
      () => undefined,
      (error: unknown) => {
        this.schemaReady = null;
        throw error;
      }
    );
    return this.schemaReady;
  }

  async recordOutcome(args: RecordOutcomeArgs): Promise<TaskOutcome> {
    const completedAt = args.completedAt ?? new Date().toISOString();
    const resultJson = args.result === undefined ? null : JSON.stringify(args.result);
    return this.guard("record_outcome", async () => {
      await this.ensureSchema();
      const rows = await this.sql<OutcomeRow[]>`
        insert into task_outcomes
          (task_id, name, queue, status, result_json, error, attempts, enqueued_at, completed_at)
        values
          (${args.taskId}, ${args.name}, ${args.queue}, ${args.status}, ${resultJson},
           ${args.error}, 1, ${args.enqueuedAt}, ${completedAt})
        on conflict (task_id) do update set
          status = excluded.status,
          result_json = excluded.result_json,
          error = excluded.error,
          attempts = task_outcomes.attempts + 1,
          completed_at = excluded.completed_at
        returning *
      `;
      const row = rows[0];
      if (!row) throw new Error(`task_outcomes upsert returned no row: ${args.taskId}`);
      return fromRow(row);
    });
  }

  async getOutcome(taskId: string): Promise<TaskOutcome | null> {
    return this.guard("get_outcome", async () => {
      await this.ensureSchema();
      const rows = await this.sql<OutcomeRow[]>`
        select * from task_outcomes where task_id = ${taskId}
      `;
      return rows[0] ? fromRow(rows[0]) : null;
    });
  }

  async close(): Promise<void> {
    await this.sql.end({ timeout: 5 });
  }
}
