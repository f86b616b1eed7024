export { ErrorCode, type ErrorCodeValue } from "./error-codes.js";
import { ErrorCode } from "./error-codes.js";
import type { ErrorCodeValue } from "./error-codes.js";

/**
 * Base error class for all Berthwatch errors.
 *
 * Every error that ends a run or shows up in the logs uses a code from the error catalog.
 *
 * @example
 * import { BerthwatchError, ErrorCode } from "@berthwatch/shared/errors";
 * throw new BerthwatchError(ErrorCode.DB.WRITE_FAILED, "KPI write failed", { table });
 */
export class BerthwatchError extends Error {
  constructor(
    public readonly code: ErrorCodeValue,
    message: string,
    public readonly metadata?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "BerthwatchError";
  }

  /**
   * Serialize the error into the shape written to the structured log.
   *
   * @returns `{ code, message, metadata? }`
   */
  toJSON() {
    return {
      code: this.code,
      message: this.message,
      ...(this.metadata ? { metadata: this.metadata } : {}),
    };
  }
}

/**
 * Check whether an unknown caught value is a {@link BerthwatchError}.
 */
export function isBerthwatchError(err: unknown): err is BerthwatchError {
  return err instanceof BerthwatchError;
}

export type KpiDomain =
  | "weekly_volumes"
  | "terminal_congestion"
  | "outgate_stress"
  | "berth"
  | "health_summary";

/** Vendor payload does not match the expected shape. Aborts the run. */
export class MalformedInputError extends BerthwatchError {
  constructor(
    public readonly domain: KpiDomain,
    message: string,
    metadata?: Record<string, unknown>,
  ) {
    super(ErrorCode.TRANSFORM.MALFORMED_INPUT, message, { domain, ...metadata });
    this.name = "MalformedInputError";
  }
}

/** Not enough contiguous weekly history to compute a rolling window. Skips one week. */
export class InsufficientHistoryError extends BerthwatchError {
  constructor(
    public readonly weekStartDate: string,
    public readonly windowWeeks: number,
    public readonly availableWeeks: number,
  ) {
    super(
      ErrorCode.TRANSFORM.INSUFFICIENT_HISTORY,
      `Week ${weekStartDate} has ${availableWeeks} of ${windowWeeks} contiguous weeks of history`,
      { domain: "weekly_volumes", weekStartDate, windowWeeks, availableWeeks },
    );
    this.name = "InsufficientHistoryError";
  }
}

/** A ratio's denominator is zero for a category present in the input. Fails one table. */
export class EmptyBucketSetError extends BerthwatchError {
  constructor(
    public readonly domain: KpiDomain,
    public readonly category: string,
  ) {
    super(
      ErrorCode.TRANSFORM.EMPTY_BUCKET_SET,
      `${domain}: total count is zero for "${category}"; ratio is undefined`,
      { domain, category },
    );
    this.name = "EmptyBucketSetError";
  }
}
