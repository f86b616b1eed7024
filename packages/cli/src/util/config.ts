import { existsSync, readFileSync } from "node:fs";
import { BerthwatchError, ErrorCode } from "@berthwatch/shared/errors";
import {
  CalendarDate,
  type ThresholdConfig,
  flattenZodError,
  parseThresholdConfig,
} from "@berthwatch/shared/validation";
import { z } from "zod";

export interface EndpointConfig {
  url: string;
  /** JSON body; when set the endpoint is called with POST, otherwise GET. */
  payload: Record<string, unknown> | null;
}

export interface SourceConfig {
  baseUrl: string | null;
  endpoints: {
    weeklyVolumes: EndpointConfig;
    containersAtTerminal: EndpointConfig;
    outgatedMetrics: EndpointConfig;
    berth: EndpointConfig;
  };
  headers: Record<string, string>;
  cookies: Record<string, string> | null;
  timeoutMs: number;
  maxRetries: number;
  backoffMs: number;
}

export interface DatabaseConfig {
  databaseUrl: string | null;
  dbSchema: string;
  logLevel: string;
}

export interface AppConfig extends DatabaseConfig {
  source: SourceConfig;
  fromDate: string | null;
  toDate: string | null;
  thresholds: Readonly<ThresholdConfig>;
}

export interface ConfigOverrides {
  fromDate?: string;
  toDate?: string;
}

type Env = Record<string, string | undefined>;

const ENDPOINT_VARS = {
  weeklyVolumes: "SOURCE_WEEKLY_VOLUMES_URL",
  containersAtTerminal: "SOURCE_CONTAINERS_AT_TERMINAL_URL",
  outgatedMetrics: "SOURCE_OUTGATED_METRICS_URL",
  berth: "SOURCE_BERTH_URL",
} as const;

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];
const SCHEMA_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

const HeaderMap = z.record(z.string());
const CookieMap = z.record(z.union([z.string(), z.number(), z.boolean()]));
const JsonObject = z.record(z.unknown());

/**
 * Build the run configuration from environment variables.
 * Thresholds are assembled into an explicit, frozen `ThresholdConfig`.
 */
export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): AppConfig {
  const missing = Object.values(ENDPOINT_VARS).filter((name) => !env[name]?.trim());
  if (missing.length > 0) {
    throw new BerthwatchError(
      ErrorCode.CONFIG.REQUIRED_ENV_VAR_MISSING,
      `Missing required endpoint env vars: ${missing.join(", ")}`,
      { variables: missing },
    );
  }

  const endpoint = (key: keyof typeof ENDPOINT_VARS): EndpointConfig => {
    const name = ENDPOINT_VARS[key];
    return {
      url: env[name]?.trim() ?? "",
      payload: parseJsonEnv(env, name.replace(/_URL$/, "_PAYLOAD"), JsonObject),
    };
  };

  return {
    source: {
      baseUrl: env.SOURCE_BASE_URL?.trim() || null,
      endpoints: {
        weeklyVolumes: endpoint("weeklyVolumes"),
        containersAtTerminal: endpoint("containersAtTerminal"),
        outgatedMetrics: endpoint("outgatedMetrics"),
        berth: endpoint("berth"),
      },
      headers: parseJsonEnv(env, "SOURCE_HEADERS_JSON", HeaderMap) ?? {},
      cookies: loadCookies(env),
      timeoutMs:
        (parseNumberEnv(env, "SOURCE_TIMEOUT_SECONDS", SourceLimits.timeoutSeconds) ?? 30) * 1000,
      maxRetries: parseNumberEnv(env, "SOURCE_MAX_RETRIES", SourceLimits.maxRetries) ?? 5,
      backoffMs: parseNumberEnv(env, "SOURCE_BACKOFF_MS", SourceLimits.backoffMs) ?? 1000,
    },
    ...loadDatabaseConfig(env),
    fromDate: parseDate(overrides.fromDate ?? env.FROM_DATE, "FROM_DATE"),
    toDate: parseDate(overrides.toDate ?? env.TO_DATE, "TO_DATE"),
    thresholds: parseThresholdConfig({
      volumePressure: {
        windowWeeks: parseNumberEnv(env, "VOLUME_PRESSURE_WINDOW_WEEKS"),
        high: parseNumberEnv(env, "VOLUME_PRESSURE_HIGH"),
        low: parseNumberEnv(env, "VOLUME_PRESSURE_LOW"),
      },
      terminalCongestion: {
        congestedBuckets: parseListEnv(env, "CONGESTED_BUCKETS"),
        loadedHigh: parseNumberEnv(env, "TERMINAL_LOADED_HIGH"),
        emptyHigh: parseNumberEnv(env, "TERMINAL_EMPTY_HIGH"),
      },
      outgateStress: {
        slowBuckets: parseListEnv(env, "SLOW_OUTGATE_BUCKETS"),
        slowHigh: parseNumberEnv(env, "OUTGATE_SLOW_HIGH"),
      },
      berth: {
        highHours: parseNumberEnv(env, "BERTH_HIGH_HOURS"),
        topN: parseNumberEnv(env, "BERTH_TOP_N"),
      },
    }),
  };
}

/**
 * The subset of configuration needed to reach the database; endpoint variables are not required.
 */
export function loadDatabaseConfig(env: Env = process.env): DatabaseConfig {
  const logLevel = (env.LOG_LEVEL ?? "info").toLowerCase();
  if (!LOG_LEVELS.includes(logLevel)) {
    throw new BerthwatchError(ErrorCode.CONFIG.INVALID_ENV_VAR, `Unknown LOG_LEVEL ${logLevel}`, {
      variable: "LOG_LEVEL",
    });
  }

  const dbSchema = env.DB_SCHEMA?.trim() || "public";
  if (!SCHEMA_NAME.test(dbSchema)) {
    throw new BerthwatchError(ErrorCode.CONFIG.INVALID_ENV_VAR, `Invalid DB_SCHEMA ${dbSchema}`, {
      variable: "DB_SCHEMA",
    });
  }

  return { databaseUrl: env.DATABASE_URL?.trim() || null, dbSchema, logLevel };
}

/**
 * Copy of the config safe to print: cookie values, header values and the database password
 * are masked.
 */
export function redactConfig(config: AppConfig): AppConfig {
  const mask = (values: Record<string, string>) =>
    Object.fromEntries(Object.keys(values).map((key) => [key, "****"]));
  return {
    ...config,
    source: {
      ...config.source,
      headers: mask(config.source.headers),
      cookies: config.source.cookies ? mask(config.source.cookies) : null,
    },
    databaseUrl: config.databaseUrl?.replace(/\/\/([^:/@]+):[^@]*@/, "//$1:****@") ?? null,
  };
}

// ---------------------------------------------------------------------------
// Env parsing helpers
// ---------------------------------------------------------------------------

function parseJsonEnv<T>(env: Env, name: string, schema: z.ZodType<T>): T | null {
  const value = env[name];
  if (value === undefined || value.trim() === "") return null;
  return parseJson(value, `Environment variable ${name}`, schema);
}

/** `source` names where the text came from, for the error message. */
function parseJson<T>(text: string, source: string, schema: z.ZodType<T>): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new BerthwatchError(
      ErrorCode.CONFIG.INVALID_JSON_ENV_VAR,
      `${source} must be valid JSON`,
      { source, cause: err },
    );
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new BerthwatchError(
      ErrorCode.CONFIG.INVALID_JSON_ENV_VAR,
      `${source} has the wrong shape`,
      { source, issues: flattenZodError(result.error) },
    );
  }
  return result.data;
}

const SourceLimits = {
  timeoutSeconds: z.number().positive(),
  maxRetries: z.number().int().nonnegative(),
  backoffMs: z.number().nonnegative(),
};

function parseNumberEnv(env: Env, name: string, schema?: z.ZodType<number>): number | undefined {
  const value = env[name]?.trim();
  if (!value) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new BerthwatchError(
      ErrorCode.CONFIG.INVALID_NUMBER_ENV_VAR,
      `Environment variable ${name} must be a number`,
      { variable: name, value },
    );
  }
  if (!schema) return parsed;
  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = flattenZodError(result.error);
    throw new BerthwatchError(
      ErrorCode.CONFIG.INVALID_NUMBER_ENV_VAR,
      `Environment variable ${name} is out of range: ${issues.join("; ")}`,
      { variable: name, value, issues },
    );
  }
  return result.data;
}

function parseListEnv(env: Env, name: string): string[] | undefined {
  const value = env[name];
  if (!value?.trim()) return undefined;
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseDate(value: string | undefined, name: string): string | null {
  if (!value?.trim()) return null;
  const result = CalendarDate.safeParse(value);
  if (!result.success) {
    throw new BerthwatchError(ErrorCode.CONFIG.INVALID_ENV_VAR, `${name} is not a date`, {
      variable: name,
      value,
    });
  }
  return result.data;
}

function loadCookies(env: Env): Record<string, string> | null {
  const inline = parseJsonEnv(env, "SOURCE_COOKIES_JSON", CookieMap);
  if (inline) return stringifyValues(inline);

  const path = env.SOURCE_COOKIES_PATH?.trim();
  if (!path) return null;
  if (!existsSync(path)) {
    throw new BerthwatchError(
      ErrorCode.CONFIG.COOKIE_FILE_NOT_FOUND,
      `Cookie file not found: ${path}`,
      { path },
    );
  }
  return stringifyValues(parseJson(readFileSync(path, "utf-8"), `Cookie file ${path}`, CookieMap));
}

function stringifyValues(
  values: Record<string, string | number | boolean>,
): Record<string, string> {
  return Object.fromEntries(Object.entries(values).map(([key, value]) => [key, String(value)]));
}
