import { BerthwatchError, ErrorCode } from "@berthwatch/shared/errors";
import type { Logger } from "./logger.js";

const RETRY_STATUSES = new Set([429, 500, 502, 503, 504]);
const MAX_LOGGED_BODY = 500;

export interface FetchClientOptions {
  /** Base for relative endpoints. Absolute endpoints ignore it. */
  baseUrl?: string | null;
  headers?: Record<string, string>;
  cookies?: Record<string, string> | null;
  /** Per-attempt timeout. Defaults to 30s. */
  timeoutMs?: number;
  /** Retries after the first attempt. Defaults to 5. */
  maxRetries?: number;
  /** First retry delay; doubles on every attempt. Defaults to 1s. */
  backoffMs?: number;
  logger: Logger;
  /** Injected `fetch` (for testing). */
  fetch?: typeof fetch;
}

/**
 * JSON client for the vendor's dashboard endpoints. Retries transient failures (network
 * errors and 429/5xx) with exponential backoff, then fails the call.
 */
export class FetchClient {
  private readonly baseUrl: string | null;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly backoffMs: number;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;

  constructor(options: FetchClientOptions) {
    this.baseUrl = options.baseUrl ?? null;
    this.headers = { Accept: "application/json", ...options.headers };
    if (options.cookies && Object.keys(options.cookies).length > 0) {
      this.headers.Cookie = Object.entries(options.cookies)
        .map(([name, value]) => `${name}=${value}`)
        .join("; ");
    }
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxRetries = options.maxRetries ?? 5;
    this.backoffMs = options.backoffMs ?? 1_000;
    this.logger = options.logger;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * Fetch and decode JSON. Sends `payload` as a POST body when given, otherwise issues a GET.
   */
  async fetchJson(
    endpoint: string,
    payload: Record<string, unknown> | null = null,
  ): Promise<unknown> {
    const url = this.resolveUrl(endpoint);
    const method = payload ? "POST" : "GET";
    this.logger.info({ url, method }, "Fetching");

    const res = await this.requestWithRetry(url, method, payload);
    const text = await res.text();

    if (!res.ok) {
      const body = text.slice(0, MAX_LOGGED_BODY);
      this.logger.error({ url, status: res.status, body }, "Request failed");
      throw new BerthwatchError(
        ErrorCode.FETCH.HTTP_STATUS,
        `Request to ${url} failed with status ${res.status}`,
        { url, status: res.status, body },
      );
    }

    try {
      const data: unknown = JSON.parse(text);
      return data;
    } catch (err) {
      throw new BerthwatchError(
        ErrorCode.FETCH.INVALID_JSON_RESPONSE,
        `Response from ${url} was not valid JSON`,
        { url, cause: err },
      );
    }
  }

  resolveUrl(endpoint: string): string {
    if (endpoint.startsWith("http")) return endpoint;
    if (!this.baseUrl) {
      throw new BerthwatchError(
        ErrorCode.CONFIG.BASE_URL_REQUIRED,
        "SOURCE_BASE_URL is required for relative endpoints",
        { endpoint },
      );
    }
    return `${this.baseUrl.replace(/\/+$/, "")}/${endpoint.replace(/^\/+/, "")}`;
  }

  private async requestWithRetry(
    url: string,
    method: "GET" | "POST",
    payload: Record<string, unknown> | null,
  ): Promise<Response> {
    const headers = payload
      ? { ...this.headers, "Content-Type": "application/json" }
      : this.headers;
    const body = payload ? JSON.stringify(payload) : undefined;

    for (let attempt = 0; ; attempt++) {
      let res: Response;
      try {
        res = await this.fetchImpl(url, {
          method,
          headers,
          body,
          signal: AbortSignal.timeout(this.timeoutMs),
        });
      } catch (err) {
        if (attempt >= this.maxRetries) {
          throw new BerthwatchError(
            ErrorCode.FETCH.NETWORK_FAILURE,
            `Request to ${url} failed after ${attempt + 1} attempts`,
            { url, attempts: attempt + 1, cause: err },
          );
        }
        this.logger.warn(
          { url, attempt: attempt + 1, err: err instanceof Error ? err.message : String(err) },
          "Network error, retrying",
        );
        await this.backoff(attempt);
        continue;
      }

      if (!RETRY_STATUSES.has(res.status) || attempt >= this.maxRetries) {
        return res;
      }
      // Drain the body so the connection can be reused.
      await res.arrayBuffer();
      this.logger.warn(
        { url, status: res.status, attempt: attempt + 1 },
        "Transient status, retrying",
      );
      await this.backoff(attempt);
    }
  }

  private async backoff(attempt: number): Promise<void> {
    const delay = this.backoffMs * 2 ** attempt; // 1s, 2s, 4s, ...
    if (delay > 0) {
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}
