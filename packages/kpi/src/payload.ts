import { type KpiDomain, MalformedInputError } from "@berthwatch/shared/errors";
import {
  BerthVesselRecord,
  OutgateRecord,
  TerminalContainerRecord,
  WeeklyVolumeRecord,
  flattenZodError,
} from "@berthwatch/shared/validation";
import type { z } from "zod";
import { assertUniqueWeeks } from "./volume-pressure.js";

// ---------------------------------------------------------------------------
// Vendor field aliases. The vendor renames keys between dashboard releases; the first
// alias present on an item wins.
// ---------------------------------------------------------------------------

const BUCKET_KEYS = ["bucket", "agingBucket", "ageBucket", "aging_bucket"];
const COUNT_KEYS = ["containers", "containerCount", "value", "count"];

const WEEKLY = {
  envelope: ["weeklyVolumesComparison", "data", "items"],
  week: ["weekStartDate", "week_start_date", "week", "startDate", "date"],
  teu: [
    "inboundFullContainers",
    "inbound_full_containers",
    "inboundFullTeu",
    "inbound_full_teu",
    "inboundFullTEU",
  ],
};

const TERMINAL = {
  envelope: ["ContainersAtTerminalData", "data", "items"],
  loadType: ["loadType", "load_type", "status"],
};

const OUTGATE = {
  envelope: ["FetchOutgatedContainerMetricsData", "data", "items"],
  status: ["status", "containerStatus", "loadType"],
};

const BERTH = {
  envelope: ["FetchQuickviewDashboardBerthData", "vessels", "data", "items"],
  vessel: ["vessel", "vesselName", "name"],
  hours: ["timeAtBerthHours", "hoursAtBerth", "time_at_berth_hours", "hours"],
  terminal: ["terminal", "terminalName"],
};

// ---------------------------------------------------------------------------
// Parsers
// ---------------------------------------------------------------------------

export function parseWeeklyVolumes(payload: unknown): WeeklyVolumeRecord[] {
  const records = parseItems(
    payload,
    "weekly_volumes",
    WEEKLY.envelope,
    WeeklyVolumeRecord,
    (item) => ({
      weekStartDate: pick(item, WEEKLY.week),
      inboundFullTeu: pick(item, WEEKLY.teu),
    }),
  );
  assertUniqueWeeks(records);
  return records;
}

export function parseTerminalContainers(payload: unknown): TerminalContainerRecord[] {
  return parseItems(
    payload,
    "terminal_congestion",
    TERMINAL.envelope,
    TerminalContainerRecord,
    (item) => ({
      loadType: pick(item, TERMINAL.loadType),
      bucket: pick(item, BUCKET_KEYS),
      containers: pick(item, COUNT_KEYS),
    }),
  );
}

export function parseOutgateMetrics(payload: unknown): OutgateRecord[] {
  return parseItems(payload, "outgate_stress", OUTGATE.envelope, OutgateRecord, (item) => ({
    status: pick(item, OUTGATE.status),
    bucket: pick(item, BUCKET_KEYS),
    containers: pick(item, COUNT_KEYS),
  }));
}

export function parseBerthVessels(payload: unknown): BerthVesselRecord[] {
  return parseItems(payload, "berth", BERTH.envelope, BerthVesselRecord, (item) => ({
    vessel: pick(item, BERTH.vessel),
    timeAtBerthHours: pick(item, BERTH.hours),
    terminal: pickOptionalText(item, BERTH.terminal),
  }));
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function parseItems<S extends z.ZodTypeAny>(
  payload: unknown,
  domain: KpiDomain,
  envelopeKeys: readonly string[],
  schema: S,
  toCandidate: (item: Record<string, unknown>) => Record<string, unknown>,
): z.output<S>[] {
  const items = extractItems(payload, domain, envelopeKeys);
  if (items.length === 0) {
    throw new MalformedInputError(domain, `${domain} payload returned no rows`);
  }

  return items.map((item, index) => {
    if (!isRecord(item)) {
      throw new MalformedInputError(domain, `${domain} item ${index} is not an object`, { index });
    }
    const parsed = schema.safeParse(toCandidate(item));
    if (!parsed.success) {
      const issues = flattenZodError(parsed.error);
      throw new MalformedInputError(
        domain,
        `${domain} item ${index} failed validation: ${issues.join("; ")}`,
        { index, issues },
      );
    }
    return parsed.data;
  });
}

function extractItems(payload: unknown, domain: KpiDomain, keys: readonly string[]): unknown[] {
  if (Array.isArray(payload)) return payload;
  if (isRecord(payload)) {
    for (const key of keys) {
      const value = payload[key];
      if (Array.isArray(value)) return value;
    }
  }
  throw new MalformedInputError(
    domain,
    `Expected a list payload under one of: ${keys.join(", ")}`,
    { envelopeKeys: keys },
  );
}

function pick(item: Record<string, unknown>, aliases: readonly string[]): unknown {
  for (const key of aliases) {
    const value = item[key];
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

/** Optional text columns: blank or missing values become null instead of failing the item. */
function pickOptionalText(item: Record<string, unknown>, aliases: readonly string[]): unknown {
  const value = pick(item, aliases);
  if (value === undefined || (typeof value === "string" && value.trim() === "")) return null;
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
