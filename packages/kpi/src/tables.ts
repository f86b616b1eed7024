/** Output table names, fixed by the contract with the BI dashboards. */
export const KPI_TABLES = {
  volumePressure: "kpi_weekly_volume_pressure",
  terminalCongestion: "kpi_terminal_congestion",
  outgateStress: "kpi_outgate_stress_by_status",
  berth: "kpi_berth_snapshot",
  healthSummary: "kpi_health_summary",
} as const;

export type KpiTableKey = keyof typeof KPI_TABLES;
export type KpiTableName = (typeof KPI_TABLES)[KpiTableKey];

export type VolumePressureFlag = "HIGH" | "NORMAL" | "LOW";
export type StressFlag = "HIGH" | "NORMAL";
export type SummaryFlag = VolumePressureFlag | "UNKNOWN";

/** Identifies one extraction run. Stamped onto every row the run produces. */
export interface RunStamp {
  extractionTsUtc: Date;
  fromDate: string | null;
  toDate: string | null;
}

export interface RunColumns {
  extraction_ts_utc: Date;
  from_date: string | null;
  to_date: string | null;
}

export function runColumns(stamp: RunStamp): RunColumns {
  return {
    extraction_ts_utc: stamp.extractionTsUtc,
    from_date: stamp.fromDate,
    to_date: stamp.toDate,
  };
}

export interface VolumePressureRow extends RunColumns {
  week_start_date: string;
  inbound_full_teu: number;
  rolling_4w_avg_teu: number;
  volume_pressure_index: number;
  window_weeks: number;
  flag: VolumePressureFlag;
}

export interface TerminalCongestionRow extends RunColumns {
  load_type: string;
  total_containers: number;
  congested_containers: number;
  congested_pct: number;
  flag: StressFlag;
}

export interface OutgateStressRow extends RunColumns {
  status: string;
  total_containers: number;
  slow_containers: number;
  slow_pct: number;
  flag: StressFlag;
}

export interface BerthRow extends RunColumns {
  record_type: "summary" | "vessel";
  rank: number | null;
  vessel: string | null;
  terminal: string | null;
  time_at_berth_hours: number | null;
  avg_time_at_berth_hours: number;
  flag: StressFlag;
}

export interface HealthSummaryRow {
  volume_pressure_flag: SummaryFlag;
  terminal_congestion_loaded_flag: SummaryFlag;
  terminal_congestion_empty_flag: SummaryFlag;
  outgate_stress_high_statuses: string;
  berth_flag: SummaryFlag;
  extraction_ts_utc: Date;
}

export interface KpiTables {
  volumePressure: VolumePressureRow[];
  terminalCongestion: TerminalCongestionRow[];
  outgateStress: OutgateStressRow[];
  berth: BerthRow[];
  healthSummary: HealthSummaryRow[];
}

/** Byte-order comparison; independent of the host locale so output order never drifts. */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
