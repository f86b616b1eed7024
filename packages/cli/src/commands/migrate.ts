import { runMigrations } from "@berthwatch/db/migrate";
import { BerthwatchError, ErrorCode, isBerthwatchError } from "@berthwatch/shared/errors";
import type { Command } from "commander";
import { loadDatabaseConfig } from "../util/config.js";
import { createLogger } from "../util/logger.js";
import { error, info, success } from "../util/output.js";

export function registerMigrate(program: Command): void {
  program
    .command("migrate")
    .description("Create the KPI tables in the configured schema")
    .action(async () => {
      try {
        const config = loadDatabaseConfig();
        if (!config.databaseUrl) {
          throw new BerthwatchError(
            ErrorCode.CONFIG.REQUIRED_ENV_VAR_MISSING,
            "DATABASE_URL must be set to run migrations",
            { variable: "DATABASE_URL" },
          );
        }
        const logger = createLogger(config.logLevel);
        info(`Applying migrations to schema ${config.dbSchema}`);
        await runMigrations(config.databaseUrl, config.dbSchema, logger);
        success(`KPI tables ready in schema ${config.dbSchema}`);
      } catch (err) {
        error(isBerthwatchError(err) ? `${err.code} ${err.message}` : String(err));
        process.exitCode = 1;
      }
    });
}
