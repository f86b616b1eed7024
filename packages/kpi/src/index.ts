export { buildBerthTable } from "./berth.js";
export { type BucketShare, shareByCategory } from "./bucket-share.js";
export {
  type DomainTables,
  type HealthSummaryOptions,
  buildHealthSummaryTable,
} from "./health-summary.js";
export { buildOutgateStressTable } from "./outgate-stress.js";
export {
  parseBerthVessels,
  parseOutgateMetrics,
  parseTerminalContainers,
  parseWeeklyVolumes,
} from "./payload.js";
export {
  berthFlag,
  outgateStressFlag,
  terminalCongestionFlag,
  volumePressureFlag,
} from "./rules.js";
export {
  KPI_TABLES,
  type BerthRow,
  type HealthSummaryRow,
  type KpiTableKey,
  type KpiTableName,
  type KpiTables,
  type OutgateStressRow,
  type RunStamp,
  type StressFlag,
  type SummaryFlag,
  type TerminalCongestionRow,
  type VolumePressureFlag,
  type VolumePressureRow,
} from "./tables.js";
export { buildTerminalCongestionTable } from "./terminal-congestion.js";
export {
  type VolumePressureOptions,
  buildVolumePressureTable,
  trailingWindow,
} from "./volume-pressure.js";
