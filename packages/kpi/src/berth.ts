import { MalformedInputError } from "@berthwatch/shared/errors";
import {
  type BerthThresholds,
  type BerthVesselRecord,
  DEFAULT_THRESHOLDS,
} from "@berthwatch/shared/validation";
import { berthFlag } from "./rules.js";
import { type BerthRow, type RunStamp, compareText, runColumns } from "./tables.js";

/**
 * One summary row with the average time at berth, followed by the `topN` longest-staying
 * vessels (hours descending, vessel name ascending on ties). Vessel rows repeat the summary's
 * average and flag so the dashboard can filter on either record type.
 */
export function buildBerthTable(
  records: readonly BerthVesselRecord[],
  stamp: RunStamp,
  thresholds: BerthThresholds = DEFAULT_THRESHOLDS.berth,
): BerthRow[] {
  if (records.length === 0) {
    throw new MalformedInputError("berth", "No vessels at berth; average is undefined");
  }

  const avg = records.reduce((sum, r) => sum + r.timeAtBerthHours, 0) / records.length;
  const flag = berthFlag(avg, thresholds);
  const run = runColumns(stamp);

  const summary: BerthRow = {
    record_type: "summary",
    rank: null,
    vessel: null,
    terminal: null,
    time_at_berth_hours: null,
    avg_time_at_berth_hours: avg,
    flag,
    ...run,
  };

  const vessels = [...records]
    .sort((a, b) => b.timeAtBerthHours - a.timeAtBerthHours || compareText(a.vessel, b.vessel))
    .slice(0, thresholds.topN)
    .map(
      (r, i): BerthRow => ({
        record_type: "vessel",
        rank: i + 1,
        vessel: r.vessel,
        terminal: r.terminal,
        time_at_berth_hours: r.timeAtBerthHours,
        avg_time_at_berth_hours: avg,
        flag,
        ...run,
      }),
    );

  return [summary, ...vessels];
}
