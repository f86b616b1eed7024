/**
 * Error catalog. Every error raised by the pipeline carries one of these codes so that log
 * queries can group failures without parsing messages.
 *
 * Ranges: 1xxx configuration, 2xxx fetch, 3xxx transform, 4xxx database.
 */
export const ErrorCode = {
  CONFIG: {
    REQUIRED_ENV_VAR_MISSING: "BW-1000",
    INVALID_JSON_ENV_VAR: "BW-1001",
    INVALID_NUMBER_ENV_VAR: "BW-1002",
    INVALID_THRESHOLDS: "BW-1003",
    COOKIE_FILE_NOT_FOUND: "BW-1004",
    BASE_URL_REQUIRED: "BW-1005",
    INVALID_ENV_VAR: "BW-1006",
  },
  FETCH: {
    HTTP_STATUS: "BW-2000",
    NETWORK_FAILURE: "BW-2001",
    INVALID_JSON_RESPONSE: "BW-2002",
  },
  TRANSFORM: {
    MALFORMED_INPUT: "BW-3000",
    INSUFFICIENT_HISTORY: "BW-3001",
    EMPTY_BUCKET_SET: "BW-3002",
  },
  DB: {
    MIGRATION_FAILED: "BW-4000",
    WRITE_FAILED: "BW-4001",
  },
} as const;

type ValuesOf<T> = T[keyof T];

export type ErrorCodeValue = ValuesOf<{
  [K in keyof typeof ErrorCode]: ValuesOf<(typeof ErrorCode)[K]>;
}>;
