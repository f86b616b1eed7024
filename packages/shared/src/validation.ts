import { z } from "zod";
import { BerthwatchError, ErrorCode } from "./errors.js";

// ---------------------------------------------------------------------------
// Scalars
// ---------------------------------------------------------------------------

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const EXPLICIT_ZONE =
  /(?:Z|GMT|UTC|(?:\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?|GMT|UTC)\s*[+-]\d{2}:?\d{2})$/i;

/** Trimmed, non-empty label (bucket names, statuses, vessel names). */
export const Label = z.string().trim().min(1);

/** A finite number, or a string holding one. Vendor counts arrive both ways. */
export const NumericValue = z
  .union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())])
  .pipe(z.number().finite());

/** Container counts, TEU and hours: never negative. */
export const NonNegative = NumericValue.pipe(z.number().nonnegative());

/**
 * Calendar date normalized to `YYYY-MM-DD`.
 *
 * Strings with an explicit zone are converted to their UTC date. Strings without one keep the
 * calendar date as written, whatever the host's time zone. Numbers are epoch seconds.
 */
export const CalendarDate = z
  .union([z.string().trim().min(1), z.number().finite(), z.date()])
  .transform((value, ctx) => {
    const invalid = () => {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unable to parse date: ${value}` });
      return z.NEVER;
    };

    if (typeof value === "string" && ISO_DATE.test(value)) {
      const utc = new Date(`${value}T00:00:00Z`);
      if (Number.isNaN(utc.getTime()) || !utc.toISOString().startsWith(value)) {
        return invalid();
      }
      return value;
    }

    if (typeof value === "string" && !EXPLICIT_ZONE.test(value)) {
      // Parsed in host-local time; read the local fields back to keep the written date.
      const local = new Date(value);
      if (Number.isNaN(local.getTime())) return invalid();
      return new Date(Date.UTC(local.getFullYear(), local.getMonth(), local.getDate()))
        .toISOString()
        .slice(0, 10);
    }

    const date =
      typeof value === "number"
        ? new Date(value * 1000)
        : typeof value === "string"
          ? new Date(value)
          : value;
    if (Number.isNaN(date.getTime())) return invalid();
    return date.toISOString().slice(0, 10);
  });

export const LoadType = z
  .string()
  .trim()
  .transform((value, ctx) => {
    const lower = value.toLowerCase();
    if (lower === "loaded") return "Loaded" as const;
    if (lower === "empty") return "Empty" as const;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Unknown load type "${value}" (expected Loaded or Empty)`,
    });
    return z.NEVER;
  });
export type LoadType = z.infer<typeof LoadType>;

// ---------------------------------------------------------------------------
// Vendor records (after alias resolution)
// ---------------------------------------------------------------------------

export const WeeklyVolumeRecord = z.object({
  weekStartDate: CalendarDate,
  inboundFullTeu: NonNegative,
});
export type WeeklyVolumeRecord = z.infer<typeof WeeklyVolumeRecord>;

export const TerminalContainerRecord = z.object({
  loadType: LoadType,
  bucket: Label,
  containers: NonNegative,
});
export type TerminalContainerRecord = z.infer<typeof TerminalContainerRecord>;

export const OutgateRecord = z.object({
  status: Label,
  bucket: Label,
  containers: NonNegative,
});
export type OutgateRecord = z.infer<typeof OutgateRecord>;

export const BerthVesselRecord = z.object({
  vessel: Label,
  terminal: Label.nullable(),
  timeAtBerthHours: NonNegative,
});
export type BerthVesselRecord = z.infer<typeof BerthVesselRecord>;

// ---------------------------------------------------------------------------
// Threshold configuration
// ---------------------------------------------------------------------------

const BucketSet = z.array(Label).min(1);
const Ratio = z.number().finite().nonnegative();

export const VolumePressureThresholds = z
  .object({
    windowWeeks: z.number().int().min(1).default(4),
    high: Ratio.default(1.15),
    low: Ratio.default(0.9),
  })
  .refine((value) => value.low < value.high, {
    message: "low must be below high",
    path: ["low"],
  });

export const TerminalCongestionThresholds = z.object({
  congestedBuckets: BucketSet.default(["9-12 Days", "13+ Days"]),
  loadedHigh: Ratio.default(0.25),
  emptyHigh: Ratio.default(0.5),
});

export const OutgateStressThresholds = z.object({
  slowBuckets: BucketSet.default(["5-8 Days", "9-12 Days", "13+ Days"]),
  slowHigh: Ratio.default(0.4),
});

export const BerthThresholds = z.object({
  highHours: z.number().finite().nonnegative().default(24),
  topN: z.number().int().min(0).default(5),
});

export const ThresholdConfig = z.object({
  volumePressure: VolumePressureThresholds.default({}),
  terminalCongestion: TerminalCongestionThresholds.default({}),
  outgateStress: OutgateStressThresholds.default({}),
  berth: BerthThresholds.default({}),
});
export type ThresholdConfig = z.infer<typeof ThresholdConfig>;
export type ThresholdConfigInput = z.input<typeof ThresholdConfig>;

/**
 * Validate a threshold configuration and freeze it. Missing fields take their defaults.
 */
export function parseThresholdConfig(input: ThresholdConfigInput = {}): Readonly<ThresholdConfig> {
  const result = ThresholdConfig.safeParse(input);
  if (!result.success) {
    throw new BerthwatchError(ErrorCode.CONFIG.INVALID_THRESHOLDS, "Invalid threshold config", {
      issues: flattenZodError(result.error),
    });
  }
  return deepFreeze(result.data);
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === "object") {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Render zod issues as `path: message` strings. */
export function flattenZodError(error: {
  issues: Array<{ path: (string | number)[]; message: string }>;
}): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${path}${issue.message}`;
  });
}

export type VolumePressureThresholds = z.infer<typeof VolumePressureThresholds>;
export type TerminalCongestionThresholds = z.infer<typeof TerminalCongestionThresholds>;
export type OutgateStressThresholds = z.infer<typeof OutgateStressThresholds>;
export type BerthThresholds = z.infer<typeof BerthThresholds>;

/** Thresholds used when the environment sets none. */
export const DEFAULT_THRESHOLDS = parseThresholdConfig();
