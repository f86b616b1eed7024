import {
  EmptyBucketSetError,
  InsufficientHistoryError,
  MalformedInputError,
} from "@berthwatch/shared/errors";
import {
  DEFAULT_THRESHOLDS,
  type VolumePressureThresholds,
  type WeeklyVolumeRecord,
} from "@berthwatch/shared/validation";
import { volumePressureFlag } from "./rules.js";
import { type RunStamp, type VolumePressureRow, compareText, runColumns } from "./tables.js";

const DAY_MS = 86_400_000;

export interface VolumePressureOptions {
  thresholds?: VolumePressureThresholds;
  /** Called once for every week dropped for lack of history. */
  onSkip?: (err: InsufficientHistoryError) => void;
}

/**
 * Weekly inbound-full TEU against its trailing rolling average.
 *
 * A week is only emitted when it closes a complete run of `windowWeeks` weeks spaced exactly
 * seven days apart. Weeks without that history are reported through `onSkip` and left out.
 */
export function buildVolumePressureTable(
  records: readonly WeeklyVolumeRecord[],
  stamp: RunStamp,
  options: VolumePressureOptions = {},
): VolumePressureRow[] {
  const thresholds = options.thresholds ?? DEFAULT_THRESHOLDS.volumePressure;
  const weeks = [...records].sort((a, b) => compareText(a.weekStartDate, b.weekStartDate));
  assertUniqueWeeks(weeks);

  const rows: VolumePressureRow[] = [];
  for (let i = 0; i < weeks.length; i++) {
    let window: WeeklyVolumeRecord[];
    try {
      window = trailingWindow(weeks, i, thresholds.windowWeeks);
    } catch (err) {
      if (err instanceof InsufficientHistoryError) {
        options.onSkip?.(err);
        continue;
      }
      throw err;
    }

    const current = weeks[i];
    const rollingAvg = window.reduce((sum, w) => sum + w.inboundFullTeu, 0) / window.length;
    if (rollingAvg === 0) {
      throw new EmptyBucketSetError("weekly_volumes", current.weekStartDate);
    }
    const index = current.inboundFullTeu / rollingAvg;

    rows.push({
      week_start_date: current.weekStartDate,
      inbound_full_teu: current.inboundFullTeu,
      rolling_4w_avg_teu: rollingAvg,
      volume_pressure_index: index,
      window_weeks: thresholds.windowWeeks,
      flag: volumePressureFlag(index, thresholds),
      ...runColumns(stamp),
    });
  }
  return rows;
}

/**
 * The `windowWeeks` weeks ending at `weeks[end]`, inclusive.
 * Throws {@link InsufficientHistoryError} when the run of contiguous weeks is shorter.
 */
export function trailingWindow(
  weeks: readonly WeeklyVolumeRecord[],
  end: number,
  windowWeeks: number,
): WeeklyVolumeRecord[] {
  let available = 1;
  let start = end;
  while (
    start > 0 &&
    available < windowWeeks &&
    daysBetween(weeks[start - 1].weekStartDate, weeks[start].weekStartDate) === 7
  ) {
    start--;
    available++;
  }
  if (available < windowWeeks) {
    throw new InsufficientHistoryError(weeks[end].weekStartDate, windowWeeks, available);
  }
  return weeks.slice(start, end + 1);
}

export function assertUniqueWeeks(weeks: readonly WeeklyVolumeRecord[]): void {
  const seen = new Set<string>();
  for (const week of weeks) {
    if (seen.has(week.weekStartDate)) {
      throw new MalformedInputError("weekly_volumes", `Duplicate week ${week.weekStartDate}`, {
        weekStartDate: week.weekStartDate,
      });
    }
    seen.add(week.weekStartDate);
  }
}

function daysBetween(from: string, to: string): number {
  return (Date.parse(`${to}T00:00:00Z`) - Date.parse(`${from}T00:00:00Z`)) / DAY_MS;
}
