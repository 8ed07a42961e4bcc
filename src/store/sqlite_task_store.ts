import * as fs from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

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

export class SqliteTaskStore implements TaskStore {
  private db: Database.Database | null = null;
  private dbPath: string;
  private log?: ServiceLogger;
  private echo: boolean;

  constructor(dbPath: string, opts: { log?: ServiceLogger; echo?: boolean } = {}) {
    this.dbPath = dbPath;
    this.log = opts.log;
    this.echo = opts.echo ?? false;
  }

  // Opened on first use so that constructing the store never touches the disk.
  private connection(): Database.Database {
    if (this.db) return this.db;
    if (this.dbPath !== ":memory:") {
      fs.mkdirSync(dirname(this.dbPath), { recursive: true });
    }
    const log = this.log;
    const db = new Database(this.dbPath, {
      ...(this.echo && log
        ? { verbose: (sql: unknown) => log.debug({ evt: "store.query", sql: String(sql) }, "store.query") }
        : {}),
    });
    db.pragma("journal_mode = WAL");
    this.initSchema(db);
    this.db = db;
    return db;
  }

  private initSchema(db: Database.Database) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS task_outcomes (
        task_id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        queue TEXT NOT NULL,
        status TEXT NOT NULL,
        result_json TEXT,
        error TEXT,
        attempts INTEGER NOT NULL DEFAULT 1,
        enqueued_at TEXT NOT NULL,
        completed_at TEXT NOT NULL
      );
    `);
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new TransientIOError({ dependency: "store", operation, cause: error });
    }
  }

  async recordOutcome(args: RecordOutcomeArgs): Promise<TaskOutcome> {
    const completedAt = args.completedAt ?? new Date().toISOString();
    return this.guard("record_outcome", () => {
      this.connection()
        .prepare(
          `INSERT INTO task_outcomes
             (task_id, name, queue, status, result_json, error, attempts, enqueued_at, completed_at)
           VALUES (@taskId, @name, @queue, @status, @resultJson, @error, 1, @enqueuedAt, @completedAt)
           ON CONFLICT(task_id) DO UPDATE SET
             status = excluded.status,
             result_json = excluded.result_json,
             error = excluded.error,
             attempts = task_outcomes.attempts + 1,
             completed_at = excluded.completed_at`
        )
        .run({
          taskId: args.taskId,
          name: args.name,
          queue: args.queue,
          status: args.status,
          resultJson: args.result === undefined ? null : JSON.stringify(args.result),
          error: args.error,
          enqueuedAt: args.enqueuedAt,
          completedAt,
        });
      const row = this.selectOutcome(args.taskId);
      if (!row) throw new Error(`task_outcomes row missing after upsert: ${args.taskId}`);
      return fromRow(row);
    });
  }

  private selectOutcome(taskId: string): OutcomeRow | undefined {
    return this.connection()
      .prepare<[string], OutcomeRow>("SELECT * FROM task_outcomes WHERE task_id = ?")
      .get(taskId);
  }

  async getOutcome(taskId: string): Promise<TaskOutcome | null> {
    return this.guard("get_outcome", () => {
      const row = this.selectOutcome(taskId);
      return row ? fromRow(row) : null;
    });
  }

  async close(): Promise<void> {
    if (this.db?.open) this.db.close();
    this.db = null;
  }
}
