import { readFileSync, readdirSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { BerthwatchError, ErrorCode } from "@berthwatch/shared/errors";
import postgres from "postgres";

const MIGRATIONS_DIR = fileURLToPath(new URL("../migrations/", import.meta.url));

export interface MigrationLogger {
  info: (obj: Record<string, unknown>, msg: string) => void;
}

/**
 * Split a migration file into individual statements. Line comments are dropped.
 */
export function splitStatements(source: string): string[] {
  return source
    .split("\n")
    .filter((line) => !line.trim().startsWith("--"))
    .join("\n")
    .split(/;\s*(?:\n|$)/)
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
}

/** Migration files in apply order. */
export function listMigrations(dir = MIGRATIONS_DIR): string[] {
  return readdirSync(dir)
    .filter((name) => name.endsWith(".sql"))
    .sort();
}

/**
 * Create the target schema if needed and apply every migration file inside one transaction.
 * Statements are idempotent, so re-running is safe.
 */
export async function runMigrations(
  url: string,
  schema: string,
  logger?: MigrationLogger,
): Promise<void> {
  const sql = postgres(url, { max: 1, onnotice: () => {} });

  try {
    await sql`create schema if not exists ${sql(schema)}`;
    await sql.begin(async (tx) => {
      await tx`set local search_path to ${tx(schema)}`;
      for (const file of listMigrations()) {
        const statements = splitStatements(readFileSync(`${MIGRATIONS_DIR}${file}`, "utf-8"));
        for (const statement of statements) {
          await tx.unsafe(statement);
        }
        logger?.info({ file, statements: statements.length, schema }, "Applied migration");
      }
    });
  } catch (err) {
    throw new BerthwatchError(
      ErrorCode.DB.MIGRATION_FAILED,
      err instanceof Error ? err.message : "PostgreSQL migration failed",
      { schema, cause: err },
    );
  } finally {
    await sql.end();
  }
}
