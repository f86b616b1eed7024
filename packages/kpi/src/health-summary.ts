import type { HealthSummaryRow, KpiTables, RunStamp, SummaryFlag } from "./tables.js";

export type DomainTables = Partial<
  Pick<KpiTables, "volumePressure" | "terminalCongestion" | "outgateStress" | "berth">
>;

export interface HealthSummaryOptions {
  /**
   * Newest week in the weekly payload. When the volume table has no row for it (the week was
   * skipped for lack of history), the volume flag is `UNKNOWN` rather than an older week's.
   */
  latestInputWeek?: string;
}

/**
 * Single-row roll-up of the latest flag per domain. A domain whose table failed to build, or
 * came out empty, reports `UNKNOWN`.
 */
export function buildHealthSummaryTable(
  tables: DomainTables,
  stamp: RunStamp,
  options: HealthSummaryOptions = {},
): HealthSummaryRow[] {
  const lastRow = tables.volumePressure?.at(-1);
  const latestWeek =
    options.latestInputWeek === undefined || lastRow?.week_start_date === options.latestInputWeek
      ? lastRow
      : undefined;
  const congestionFlag = (loadType: string): SummaryFlag =>
    tables.terminalCongestion?.find((r) => r.load_type === loadType)?.flag ?? "UNKNOWN";
  const berthSummary = tables.berth?.find((r) => r.record_type === "summary");

  return [
    {
      volume_pressure_flag: latestWeek?.flag ?? "UNKNOWN",
      terminal_congestion_loaded_flag: congestionFlag("Loaded"),
      terminal_congestion_empty_flag: congestionFlag("Empty"),
      outgate_stress_high_statuses: highStatuses(tables.outgateStress),
      berth_flag: berthSummary?.flag ?? "UNKNOWN",
      extraction_ts_utc: stamp.extractionTsUtc,
    },
  ];
}

function highStatuses(rows: KpiTables["outgateStress"] | undefined): string {
  if (!rows || rows.length === 0) return "UNKNOWN";
  const high = rows.filter((r) => r.flag === "HIGH").map((r) => r.status);
  return high.length > 0 ? high.join(", ") : "NONE";
}
