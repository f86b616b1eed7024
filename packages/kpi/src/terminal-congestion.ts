import {
  DEFAULT_THRESHOLDS,
  type TerminalContainerRecord,
  type TerminalCongestionThresholds,
} from "@berthwatch/shared/validation";
import { shareByCategory } from "./bucket-share.js";
import { terminalCongestionFlag } from "./rules.js";
import { type RunStamp, type TerminalCongestionRow, runColumns } from "./tables.js";

/**
 * Share of containers at the terminal that sit in a congested dwell bucket, per load type.
 * A load type whose buckets sum to zero raises `EmptyBucketSetError`.
 */
export function buildTerminalCongestionTable(
  records: readonly TerminalContainerRecord[],
  stamp: RunStamp,
  thresholds: TerminalCongestionThresholds = DEFAULT_THRESHOLDS.terminalCongestion,
): TerminalCongestionRow[] {
  const shares = shareByCategory(
    records,
    (r) => r.loadType,
    thresholds.congestedBuckets,
    "terminal_congestion",
  );

  return shares.map((share) => ({
    load_type: share.category,
    total_containers: share.total,
    congested_containers: share.matched,
    congested_pct: share.share,
    flag: terminalCongestionFlag(share.category, share.share, thresholds),
    ...runColumns(stamp),
  }));
}
