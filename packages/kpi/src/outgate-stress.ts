import {
  DEFAULT_THRESHOLDS,
  type OutgateRecord,
  type OutgateStressThresholds,
} from "@berthwatch/shared/validation";
import { shareByCategory } from "./bucket-share.js";
import { outgateStressFlag } from "./rules.js";
import { type OutgateStressRow, type RunStamp, runColumns } from "./tables.js";

/**
 * Share of outgated containers that dwelt in a slow bucket, per container status.
 */
export function buildOutgateStressTable(
  records: readonly OutgateRecord[],
  stamp: RunStamp,
  thresholds: OutgateStressThresholds = DEFAULT_THRESHOLDS.outgateStress,
): OutgateStressRow[] {
  return shareByCategory(records, (r) => r.status, thresholds.slowBuckets, "outgate_stress").map(
    (share) => ({
      status: share.category,
      total_containers: share.total,
      slow_containers: share.matched,
      slow_pct: share.share,
      flag: outgateStressFlag(share.share, thresholds),
      ...runColumns(stamp),
    }),
  );
}
