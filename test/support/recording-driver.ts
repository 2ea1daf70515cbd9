import type { CompiledQuery, DatabaseConnection, Driver, QueryResult } from "kysely";

export const BACKEND_PID = 4242;

/**
 * Driver stand-in for storage tests. Without `searchRows` the search
 * statement stays open until a `pg_cancel_backend` call arrives; with them
 * it returns those rows. Every other statement returns canned rows.
 */
export class RecordingDriver implements Driver, DatabaseConnection {
  readonly statements: CompiledQuery[] = [];
  private cancelOpen: ((err: Error) => void) | null = null;

  constructor(private readonly searchRows?: readonly object[]) {}

  get waiting(): boolean {
    return this.cancelOpen !== null;
  }

  async init(): Promise<void> {}
  async acquireConnection(): Promise<DatabaseConnection> {
    return this;
  }
  async beginTransaction(): Promise<void> {}
  async commitTransaction(): Promise<void> {}
  async rollbackTransaction(): Promise<void> {}
  async releaseConnection(): Promise<void> {}
  async destroy(): Promise<void> {}

  async executeQuery<R>(query: CompiledQuery): Promise<QueryResult<R>> {
    this.statements.push(query);
    if (query.sql.includes("pg_backend_pid")) {
      // Rows arrive as untyped JSON from the wire.
      const rows: R[] = JSON.parse(JSON.stringify([{ pid: BACKEND_PID }]));
      return { rows };
    }
    if (query.sql.includes("pg_cancel_backend")) {
      this.cancelOpen?.(new Error("canceling statement due to user request"));
      this.cancelOpen = null;
      return { rows: [] };
    }
    if (this.searchRows) {
      const rows: R[] = JSON.parse(JSON.stringify(this.searchRows));
      return { rows };
    }
    return new Promise<QueryResult<R>>((_, reject) => {
      this.cancelOpen = reject;
    });
  }

  async *streamQuery<R>(): AsyncIterableIterator<QueryResult<R>> {
    throw new Error("streaming is not supported");
  }
}
