import { ConfigurationError } from "../errors/service_errors";

export type StoreTarget =
  | { driver: "postgres"; url: string }
  | { driver: "sqlite"; path: string };

/**
 * `postgres://` / `postgresql://` select PostgreSQL; `sqlite:<path>` or
 * `file:<path>` select a SQLite file.
 */
export function resolveStoreTarget(connectionString: string): StoreTarget {
  const value = connectionString.trim();
  if (/^postgres(ql)?:\/\//i.test(value)) {
    return { driver: "postgres", url: value };
  }
  const sqlite = /^(sqlite|file):(.+)$/i.exec(value);
  if (sqlite && sqlite[2]) {
    const path = sqlite[2].replace(/^\/\/(?=\/)/, "");
    // Each process would get its own empty database.
    if (path === ":memory:") {
      throw new ConfigurationError(["DB_CONN_STRING must name a SQLite file that every process can open, not :memory:"]);
    }
    return { driver: "sqlite", path };
  }
  throw new ConfigurationError([
    "DB_CONN_STRING must start with postgres://, postgresql://, sqlite: or file:",
  ]);
}
