import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema.js";

export interface DbOptions {
  /** Postgres schema holding the KPI tables. Defaults to `public`. */
  schema?: string;
}

/**
 * Create a Drizzle ORM client connected to PostgreSQL.
 * Uses the postgres.js driver for Node.js; `close()` ends the connection pool.
 */
export function createDb(url: string, options: DbOptions = {}) {
  const sql = postgres(url, {
    onnotice: () => {},
    connection: { search_path: options.schema ?? "public" },
  });
  const db = drizzle(sql, { schema });
  return { db, close: () => sql.end() };
}

export type Database = ReturnType<typeof createDb>["db"];
export type DbHandle = ReturnType<typeof createDb>;
