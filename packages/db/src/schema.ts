import {
  date,
  doublePrecision,
  integer,
  pgTable,
  text,
  timestamp,
} from "drizzle-orm/pg-core";

// Tables are unqualified; the connection's search_path selects the target schema.
// Keep in sync with migrations/0001_kpi_tables.sql.

const STRESS_FLAGS = ["HIGH", "NORMAL"] as const;
const SUMMARY_FLAGS = ["HIGH", "NORMAL", "LOW", "UNKNOWN"] as const;

const runColumns = () => ({
  extractionTsUtc: timestamp("extraction_ts_utc", { withTimezone: true }).notNull(),
  fromDate: text("from_date"),
  toDate: text("to_date"),
});

// =============================================================================
// 1. Weekly volume pressure
// =============================================================================

export const kpiWeeklyVolumePressure = pgTable("kpi_weekly_volume_pressure", {
  weekStartDate: date("week_start_date", { mode: "string" }).notNull(),
  inboundFullTeu: doublePrecision("inbound_full_teu").notNull(),
  rolling4wAvgTeu: doublePrecision("rolling_4w_avg_teu").notNull(),
  volumePressureIndex: doublePrecision("volume_pressure_index").notNull(),
  windowWeeks: integer("window_weeks").notNull(),
  flag: text("flag", { enum: ["HIGH", "NORMAL", "LOW"] }).notNull(),
  ...runColumns(),
});

// =============================================================================
// 2. Terminal congestion
// =============================================================================

export const kpiTerminalCongestion = pgTable("kpi_terminal_congestion", {
  loadType: text("load_type").notNull(),
  totalContainers: doublePrecision("total_containers").notNull(),
  congestedContainers: doublePrecision("congested_containers").notNull(),
  congestedPct: doublePrecision("congested_pct").notNull(),
  flag: text("flag", { enum: STRESS_FLAGS }).notNull(),
  ...runColumns(),
});

// =============================================================================
// 3. Outgate stress by status
// =============================================================================

export const kpiOutgateStressByStatus = pgTable("kpi_outgate_stress_by_status", {
  status: text("status").notNull(),
  totalContainers: doublePrecision("total_containers").notNull(),
  slowContainers: doublePrecision("slow_containers").notNull(),
  slowPct: doublePrecision("slow_pct").notNull(),
  flag: text("flag", { enum: STRESS_FLAGS }).notNull(),
  ...runColumns(),
});

// =============================================================================
// 4. Berth snapshot
// =============================================================================

export const kpiBerthSnapshot = pgTable("kpi_berth_snapshot", {
  recordType: text("record_type", { enum: ["summary", "vessel"] }).notNull(),
  rank: integer("rank"),
  vessel: text("vessel"),
  terminal: text("terminal"),
  timeAtBerthHours: doublePrecision("time_at_berth_hours"),
  avgTimeAtBerthHours: doublePrecision("avg_time_at_berth_hours").notNull(),
  flag: text("flag", { enum: STRESS_FLAGS }).notNull(),
  ...runColumns(),
});

// =============================================================================
// 5. Health summary
// =============================================================================

export const kpiHealthSummary = pgTable("kpi_health_summary", {
  volumePressureFlag: text("volume_pressure_flag", { enum: SUMMARY_FLAGS }).notNull(),
  terminalCongestionLoadedFlag: text("terminal_congestion_loaded_flag", {
    enum: SUMMARY_FLAGS,
  }).notNull(),
  terminalCongestionEmptyFlag: text("terminal_congestion_empty_flag", {
    enum: SUMMARY_FLAGS,
  }).notNull(),
  outgateStressHighStatuses: text("outgate_stress_high_statuses").notNull(),
  berthFlag: text("berth_flag", { enum: SUMMARY_FLAGS }).notNull(),
  extractionTsUtc: timestamp("extraction_ts_utc", { withTimezone: true }).notNull(),
});
