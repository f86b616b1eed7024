import { EmptyBucketSetError, type KpiDomain } from "@berthwatch/shared/errors";
import { compareText } from "./tables.js";

export interface BucketCount {
  bucket: string;
  containers: number;
}

export interface BucketShare<K extends string = string> {
  category: K;
  total: number;
  matched: number;
  /** `matched / total`, always within [0, 1]. */
  share: number;
}

/**
 * Group bucketed counts by category and compute the share of each category's containers that
 * sit in `matchBuckets`. Categories come back in ascending order.
 */
export function shareByCategory<T extends BucketCount, K extends string>(
  records: readonly T[],
  categoryOf: (record: T) => K,
  matchBuckets: readonly string[],
  domain: KpiDomain,
): BucketShare<K>[] {
  const matchSet = new Set(matchBuckets);
  const totals = new Map<K, { total: number; matched: number }>();

  for (const record of records) {
    const category = categoryOf(record);
    const entry = totals.get(category) ?? { total: 0, matched: 0 };
    entry.total += record.containers;
    if (matchSet.has(record.bucket)) {
      entry.matched += record.containers;
    }
    totals.set(category, entry);
  }

  return [...totals.entries()]
    .sort(([a], [b]) => compareText(a, b))
    .map(([category, { total, matched }]) => {
      if (total === 0) {
        throw new EmptyBucketSetError(domain, category);
      }
      return { category, total, matched, share: matched / total };
    });
}
