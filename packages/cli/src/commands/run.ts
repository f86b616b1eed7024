import { createDb, type DbHandle } from "@berthwatch/db/client";
import { PostgresKpiSink } from "@berthwatch/db/writer";
import { KPI_TABLES, type KpiTableKey } from "@berthwatch/kpi";
import { BerthwatchError, ErrorCode, isBerthwatchError } from "@berthwatch/shared/errors";
import type { Command } from "commander";
import { type PipelineResult, runPipeline } from "../pipeline.js";
import { loadConfig } from "../util/config.js";
import { FetchClient } from "../util/http.js";
import { type Logger, createLogger } from "../util/logger.js";
import { error, flag, heading, success, table, warn } from "../util/output.js";

const TABLE_ORDER = [
  "volumePressure",
  "terminalCongestion",
  "outgateStress",
  "berth",
  "healthSummary",
] as const satisfies readonly KpiTableKey[];

interface RunOptions {
  dryRun?: boolean;
  from?: string;
  to?: string;
}

export function registerRun(program: Command): void {
  program
    .command("run")
    .description("Fetch vendor KPIs, build the KPI tables and write them to PostgreSQL")
    .option("--dry-run", "Build the tables but skip the database write")
    .option("--from <date>", "Query window start (overrides FROM_DATE)")
    .option("--to <date>", "Query window end (overrides TO_DATE)")
    .action(async (opts: RunOptions) => {
      let logger: Logger | null = null;
      let handle: DbHandle | null = null;

      try {
        const config = loadConfig(process.env, { fromDate: opts.from, toDate: opts.to });
        logger = createLogger(config.logLevel);

        if (!opts.dryRun) {
          if (!config.databaseUrl) {
            throw new BerthwatchError(
              ErrorCode.CONFIG.REQUIRED_ENV_VAR_MISSING,
              "DATABASE_URL must be set to write KPI tables (or pass --dry-run)",
              { variable: "DATABASE_URL" },
            );
          }
          handle = createDb(config.databaseUrl, { schema: config.dbSchema });
        }

        const source = new FetchClient({
          baseUrl: config.source.baseUrl,
          headers: config.source.headers,
          cookies: config.source.cookies,
          timeoutMs: config.source.timeoutMs,
          maxRetries: config.source.maxRetries,
          backoffMs: config.source.backoffMs,
          logger,
        });
        const sink = handle ? new PostgresKpiSink(handle.db, logger) : null;

        const result = await runPipeline({ config, source, sink, logger });

        if (opts.dryRun) {
          printSummary(result);
        }
        if (result.skippedWeeks.length > 0) {
          warn(`Skipped ${result.skippedWeeks.length} week(s) without a full rolling window`);
        }
        if (result.failures.length > 0) {
          error(`Failed tables: ${result.failures.map((f) => f.table).join(", ")}`);
          process.exitCode = 1;
          return;
        }
        success(
          result.written ? `KPI tables written to schema ${config.dbSchema}` : "Dry run complete",
        );
      } catch (err) {
        if (isBerthwatchError(err)) {
          logger?.error(err.toJSON(), "Run aborted");
          error(`${err.code} ${err.message}`);
        } else {
          logger?.error({ err }, "Run aborted");
          error(err instanceof Error ? err.message : String(err));
        }
        process.exitCode = 1;
      } finally {
        await handle?.close();
      }
    });
}

function printSummary(result: PipelineResult): void {
  heading("KPI tables (dry run)");
  const failed = new Set<string>(result.failures.map((f) => f.table));
  table(
    TABLE_ORDER.map((key) => {
      const name = KPI_TABLES[key];
      const rows = result.tables[key];
      if (failed.has(name)) return [name, flag("UNKNOWN") + " failed"];
      return [name, `${rows?.length ?? 0} rows`];
    }),
  );

  const health = result.tables.healthSummary?.[0];
  if (health) {
    heading("Health");
    table([
      ["Volume pressure", flag(health.volume_pressure_flag)],
      ["Congestion (loaded)", flag(health.terminal_congestion_loaded_flag)],
      ["Congestion (empty)", flag(health.terminal_congestion_empty_flag)],
      ["Outgate stress HIGH", health.outgate_stress_high_statuses],
      ["Berth", flag(health.berth_flag)],
    ]);
  }
  console.log("");
}
