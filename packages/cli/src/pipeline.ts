import type { KpiSink } from "@berthwatch/db/writer";
import {
  type DomainTables,
  KPI_TABLES,
  type KpiTableName,
  type KpiTables,
  type RunStamp,
  buildBerthTable,
  buildHealthSummaryTable,
  buildOutgateStressTable,
  buildTerminalCongestionTable,
  buildVolumePressureTable,
  parseBerthVessels,
  parseOutgateMetrics,
  parseTerminalContainers,
  parseWeeklyVolumes,
} from "@berthwatch/kpi";
import { EmptyBucketSetError } from "@berthwatch/shared/errors";
import type { AppConfig } from "./util/config.js";
import type { Logger } from "./util/logger.js";

export interface JsonSource {
  fetchJson(endpoint: string, payload?: Record<string, unknown> | null): Promise<unknown>;
}

export interface PipelineOptions {
  config: AppConfig;
  source: JsonSource;
  /** `null` for a dry run: tables are built but not written. */
  sink: KpiSink | null;
  logger: Logger;
  now?: () => Date;
}

export interface TableFailure {
  table: KpiTableName;
  error: EmptyBucketSetError;
}

export interface PipelineResult {
  stamp: RunStamp;
  tables: Partial<KpiTables>;
  failures: TableFailure[];
  skippedWeeks: string[];
  written: boolean;
}

/**
 * One extraction run: fetch the four vendor payloads, validate them, build the KPI tables and
 * hand them to the sink.
 *
 * Malformed payloads abort the run before anything is built. A table whose ratio is undefined
 * fails on its own; the remaining tables are still written and the failure is reported in the
 * result.
 */
export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const { config, source, sink, logger } = options;
  const stamp: RunStamp = {
    extractionTsUtc: options.now?.() ?? new Date(),
    fromDate: config.fromDate,
    toDate: config.toDate,
  };
  logger.info(
    {
      extractionTsUtc: stamp.extractionTsUtc.toISOString(),
      fromDate: stamp.fromDate,
      toDate: stamp.toDate,
    },
    "Starting KPI pipeline",
  );

  const { endpoints } = config.source;
  const weeklyPayload = await source.fetchJson(
    endpoints.weeklyVolumes.url,
    endpoints.weeklyVolumes.payload,
  );
  const terminalPayload = await source.fetchJson(
    endpoints.containersAtTerminal.url,
    endpoints.containersAtTerminal.payload,
  );
  const outgatePayload = await source.fetchJson(
    endpoints.outgatedMetrics.url,
    endpoints.outgatedMetrics.payload,
  );
  const berthPayload = await source.fetchJson(endpoints.berth.url, endpoints.berth.payload);

  const weekly = parseWeeklyVolumes(weeklyPayload);
  const terminal = parseTerminalContainers(terminalPayload);
  const outgate = parseOutgateMetrics(outgatePayload);
  const vessels = parseBerthVessels(berthPayload);
  logger.info(
    {
      weeks: weekly.length,
      terminalRecords: terminal.length,
      outgateRecords: outgate.length,
      vessels: vessels.length,
    },
    "Parsed vendor payloads",
  );

  const failures: TableFailure[] = [];
  const skippedWeeks: string[] = [];
  const { thresholds } = config;

  const attempt = <T>(table: KpiTableName, build: () => T): T | undefined => {
    try {
      return build();
    } catch (err) {
      if (err instanceof EmptyBucketSetError) {
        logger.error({ table, ...err.toJSON() }, "KPI table failed");
        failures.push({ table, error: err });
        return undefined;
      }
      throw err;
    }
  };

  const volumeLog = logger.child({ domain: "weekly_volumes" });
  const volumePressure = attempt(KPI_TABLES.volumePressure, () =>
    buildVolumePressureTable(weekly, stamp, {
      thresholds: thresholds.volumePressure,
      onSkip: (err) => {
        skippedWeeks.push(err.weekStartDate);
        volumeLog.warn(
          {
            weekStartDate: err.weekStartDate,
            availableWeeks: err.availableWeeks,
            windowWeeks: err.windowWeeks,
          },
          "Skipped week without full rolling window",
        );
      },
    }),
  );
  const terminalCongestion = attempt(KPI_TABLES.terminalCongestion, () =>
    buildTerminalCongestionTable(terminal, stamp, thresholds.terminalCongestion),
  );
  const outgateStress = attempt(KPI_TABLES.outgateStress, () =>
    buildOutgateStressTable(outgate, stamp, thresholds.outgateStress),
  );
  const berth = attempt(KPI_TABLES.berth, () => buildBerthTable(vessels, stamp, thresholds.berth));

  const domainTables: DomainTables = {
    ...(volumePressure && { volumePressure }),
    ...(terminalCongestion && { terminalCongestion }),
    ...(outgateStress && { outgateStress }),
    ...(berth && { berth }),
  };
  const tables: Partial<KpiTables> = {
    ...domainTables,
    healthSummary: buildHealthSummaryTable(domainTables, stamp, {
      latestInputWeek: latestWeekStart(weekly),
    }),
  };

  let written = false;
  if (sink) {
    await sink.writeTables(tables);
    written = true;
    logger.info({ tables: Object.keys(tables).length }, "KPI tables written");
  } else {
    logger.info("Dry run: database write skipped");
  }

  return { stamp, tables, failures, skippedWeeks, written };
}

function latestWeekStart(weeks: readonly { weekStartDate: string }[]): string | undefined {
  let latest: string | undefined;
  for (const { weekStartDate } of weeks) {
    if (latest === undefined || weekStartDate > latest) latest = weekStartDate;
  }
  return latest;
}
