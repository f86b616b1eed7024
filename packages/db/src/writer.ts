import type {
  BerthRow,
  HealthSummaryRow,
  KpiTables,
  OutgateStressRow,
  TerminalCongestionRow,
  VolumePressureRow,
} from "@berthwatch/kpi";
import { KPI_TABLES } from "@berthwatch/kpi";
import { BerthwatchError, ErrorCode } from "@berthwatch/shared/errors";
import type { Database } from "./client.js";
import {
  kpiBerthSnapshot,
  kpiHealthSummary,
  kpiOutgateStressByStatus,
  kpiTerminalCongestion,
  kpiWeeklyVolumePressure,
} from "./schema.js";

/** Destination for one run's KPI tables. Tables missing from the input are left untouched. */
export interface KpiSink {
  writeTables(tables: Partial<KpiTables>): Promise<void>;
}

export interface SinkLogger {
  info: (obj: Record<string, unknown>, msg: string) => void;
}

// ---------------------------------------------------------------------------
// Row mappers (snake_case KPI rows -> Drizzle insert values)
// ---------------------------------------------------------------------------

export function toVolumePressureInsert(
  row: VolumePressureRow,
): typeof kpiWeeklyVolumePressure.$inferInsert {
  return {
    weekStartDate: row.week_start_date,
    inboundFullTeu: row.inbound_full_teu,
    rolling4wAvgTeu: row.rolling_4w_avg_teu,
    volumePressureIndex: row.volume_pressure_index,
    windowWeeks: row.window_weeks,
    flag: row.flag,
    extractionTsUtc: row.extraction_ts_utc,
    fromDate: row.from_date,
    toDate: row.to_date,
  };
}

export function toTerminalCongestionInsert(
  row: TerminalCongestionRow,
): typeof kpiTerminalCongestion.$inferInsert {
  return {
    loadType: row.load_type,
    totalContainers: row.total_containers,
    congestedContainers: row.congested_containers,
    congestedPct: row.congested_pct,
    flag: row.flag,
    extractionTsUtc: row.extraction_ts_utc,
    fromDate: row.from_date,
    toDate: row.to_date,
  };
}

export function toOutgateStressInsert(
  row: OutgateStressRow,
): typeof kpiOutgateStressByStatus.$inferInsert {
  return {
    status: row.status,
    totalContainers: row.total_containers,
    slowContainers: row.slow_containers,
    slowPct: row.slow_pct,
    flag: row.flag,
    extractionTsUtc: row.extraction_ts_utc,
    fromDate: row.from_date,
    toDate: row.to_date,
  };
}

export function toBerthInsert(row: BerthRow): typeof kpiBerthSnapshot.$inferInsert {
  return {
    recordType: row.record_type,
    rank: row.rank,
    vessel: row.vessel,
    terminal: row.terminal,
    timeAtBerthHours: row.time_at_berth_hours,
    avgTimeAtBerthHours: row.avg_time_at_berth_hours,
    flag: row.flag,
    extractionTsUtc: row.extraction_ts_utc,
    fromDate: row.from_date,
    toDate: row.to_date,
  };
}

export function toHealthSummaryInsert(
  row: HealthSummaryRow,
): typeof kpiHealthSummary.$inferInsert {
  return {
    volumePressureFlag: row.volume_pressure_flag,
    terminalCongestionLoadedFlag: row.terminal_congestion_loaded_flag,
    terminalCongestionEmptyFlag: row.terminal_congestion_empty_flag,
    outgateStressHighStatuses: row.outgate_stress_high_statuses,
    berthFlag: row.berth_flag,
    extractionTsUtc: row.extraction_ts_utc,
  };
}

// ---------------------------------------------------------------------------
// Sink
// ---------------------------------------------------------------------------

/**
 * Replaces each KPI table's snapshot (delete, then insert) inside a single transaction, so a
 * run either lands completely or not at all.
 */
export class PostgresKpiSink implements KpiSink {
  constructor(
    private readonly db: Database,
    private readonly logger?: SinkLogger,
  ) {}

  async writeTables(tables: Partial<KpiTables>): Promise<void> {
    try {
      await this.db.transaction(async (tx) => {
        if (tables.volumePressure) {
          await tx.delete(kpiWeeklyVolumePressure);
          await insertAll(tables.volumePressure.map(toVolumePressureInsert), (values) =>
            tx.insert(kpiWeeklyVolumePressure).values(values),
          );
          this.logWritten(KPI_TABLES.volumePressure, tables.volumePressure.length);
        }
        if (tables.terminalCongestion) {
          await tx.delete(kpiTerminalCongestion);
          await insertAll(tables.terminalCongestion.map(toTerminalCongestionInsert), (values) =>
            tx.insert(kpiTerminalCongestion).values(values),
          );
          this.logWritten(KPI_TABLES.terminalCongestion, tables.terminalCongestion.length);
        }
        if (tables.outgateStress) {
          await tx.delete(kpiOutgateStressByStatus);
          await insertAll(tables.outgateStress.map(toOutgateStressInsert), (values) =>
            tx.insert(kpiOutgateStressByStatus).values(values),
          );
          this.logWritten(KPI_TABLES.outgateStress, tables.outgateStress.length);
        }
        if (tables.berth) {
          await tx.delete(kpiBerthSnapshot);
          await insertAll(tables.berth.map(toBerthInsert), (values) =>
            tx.insert(kpiBerthSnapshot).values(values),
          );
          this.logWritten(KPI_TABLES.berth, tables.berth.length);
        }
        if (tables.healthSummary) {
          await tx.delete(kpiHealthSummary);
          await insertAll(tables.healthSummary.map(toHealthSummaryInsert), (values) =>
            tx.insert(kpiHealthSummary).values(values),
          );
          this.logWritten(KPI_TABLES.healthSummary, tables.healthSummary.length);
        }
      });
    } catch (err) {
      throw new BerthwatchError(
        ErrorCode.DB.WRITE_FAILED,
        err instanceof Error ? err.message : "KPI table write failed",
        { tables: Object.keys(tables), cause: err },
      );
    }
  }

  private logWritten(table: string, rows: number): void {
    this.logger?.info({ table, rows }, "Replaced KPI table");
  }
}

// Drizzle rejects an empty VALUES list.
async function insertAll<V>(
  values: V[],
  insert: (values: V[]) => PromiseLike<unknown>,
): Promise<void> {
  if (values.length === 0) return;
  await insert(values);
}
