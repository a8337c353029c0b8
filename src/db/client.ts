import { Pool, type QueryResultRow } from "pg";

/**
 * The slice of a Postgres connection the repositories use.
 */
export interface Database {
  query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<{ rows: T[] }>;
  close(): Promise<void>;
}

/**
 * Opens a pooled connection to the run-history database.
 * @param connectionString - A `postgres://` URL, usually DATABASE_URL
 */
export function createDatabase(connectionString: string): Database {
  const pool = new Pool({
    connectionString,
    max: 5,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    ssl: {
      rejectUnauthorized: false
    }
  });

  pool.on("error", (err) => {
    console.error("Unexpected error on idle Postgres client", err);
  });

  return {
    /**
     * Executes a query using a pooled client. The type parameter describes the
     * returned rows.
     */
    async query<T extends QueryResultRow = QueryResultRow>(
      text: string,
      params: unknown[] = []
    ): Promise<{ rows: T[] }> {
      return pool.query<T>(text, params);
    },

    /**
     * Drains the pool. Call once the job is finished so the process can exit.
     */
    async close(): Promise<void> {
      await pool.end();
    }
  };
}
