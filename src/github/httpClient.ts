import {
  DEFAULT_API_BASE_URL,
  DEFAULT_API_VERSION,
  DEFAULT_PAGE_SIZE,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RETRY,
  DEFAULT_USER_AGENT
} from "../config/defaults.js";
import type { RetryConfig } from "../config/loadConfig.js";
import {
  AuthError,
  ForbiddenError,
  GitHubApiResponseError,
  NotFoundError,
  RateLimitExceededError,
  TransientNetworkError
} from "../errors/github.errors.js";
import type { Logger } from "../logging/logger.js";
import { noopLogger } from "../logging/logger.js";
import type { RateLimitGate } from "./rateLimitGate.js";
import {
  type Clock,
  computeBackoffMs,
  parseGitHubRateLimit,
  parseRetryAfterMs,
  systemClock
} from "./rateLimitHelpers.js";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type HttpMethod = "GET" | "PATCH";

export type QueryParams = Record<string, string | number | boolean | undefined>;

export type RequestOptions = {
  query?: QueryParams;
  accept?: string;
  signal?: AbortSignal;
};

export type GitHubHttpClientOptions = {
  token: string;
  gate: RateLimitGate;
  baseUrl?: string;
  retry?: RetryConfig;
  requestTimeoutMs?: number;
  fetch?: FetchLike;
  clock?: Clock;
  random?: () => number;
  logger?: Logger;
  userAgent?: string;
};

export const JSON_MEDIA_TYPE = "application/vnd.github+json";
export const RAW_MEDIA_TYPE = "application/vnd.github.raw+json";

const RETRYABLE_STATUSES = new Set([408, 500, 502, 503, 504]);
const MAX_RATE_LIMIT_RETRIES = 3;

export function parseNextLink(header: string | null): string | null {
  if (!header) return null;
  for (const part of header.split(",")) {
    const match = part.match(/<([^>]+)>\s*;\s*rel="?([^";]+)"?/);
    if (match && match[2].split(/\s+/).includes("next")) {
      return match[1];
    }
  }
  return null;
}

function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.name === "TimeoutError" ? "request timed out" : err.message;
  }
  return String(err);
}

async function discardBody(response: Response): Promise<void> {
  try {
    await response.body?.cancel();
  } catch {
    // body already consumed or stream errored; nothing left to release
  }
}

async function readErrorDetail(response: Response): Promise<string | null> {
  try {
    const text = await response.text();
    if (!text) return null;
    try {
      const parsed: unknown = JSON.parse(text);
      if (parsed && typeof parsed === "object" && "message" in parsed && typeof parsed.message === "string") {
        return parsed.message;
      }
    } catch {
      return text.slice(0, 200);
    }
    return text.slice(0, 200);
  } catch {
    return null;
  }
}

function isRateLimitResponse(response: Response, remaining: number | undefined): boolean {
  if (response.status === 429) return true;
  if (response.status !== 403) return false;
  return remaining === 0 || response.headers.has("retry-after");
}

/**
 * Thin GitHub REST transport: authentication headers, the shared rate-limit gate,
 * bounded retries for transient failures and `Link`-header pagination.
 */
export class GitHubHttpClient {
  private readonly token: string;
  private readonly gate: RateLimitGate;
  private readonly baseUrl: string;
  private readonly retry: RetryConfig;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly logger: Logger;
  private readonly userAgent: string;

  constructor(options: GitHubHttpClientOptions) {
    this.token = options.token;
    this.gate = options.gate;
    this.baseUrl = (options.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, "");
    this.retry = options.retry ?? { ...DEFAULT_RETRY };
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? noopLogger;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  buildUrl(path: string, query?: QueryParams): string {
    const url = new URL(path.startsWith("http") ? path : `${this.baseUrl}${path.startsWith("/") ? "" : "/"}${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value === undefined) continue;
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  async getJson(path: string, options: RequestOptions = {}): Promise<unknown> {
    const response = await this.request("GET", path, undefined, options);
    return response.json();
  }

  async getText(path: string, options: RequestOptions = {}): Promise<string> {
    const response = await this.request("GET", path, undefined, { accept: RAW_MEDIA_TYPE, ...options });
    return response.text();
  }

  async patchJson(path: string, body: unknown, options: RequestOptions = {}): Promise<unknown> {
    const response = await this.request("PATCH", path, body, options);
    return response.json();
  }

  /**
   * Walks every page of a list endpoint. Pages are fetched only as the consumer
   * advances, so stopping early never requests the remaining pages.
   */
  async *paginate(path: string, options: RequestOptions = {}): AsyncGenerator<unknown, void, undefined> {
    let url: string | null = this.buildUrl(path, { per_page: DEFAULT_PAGE_SIZE, ...options.query });
    while (url) {
      const response = await this.request("GET", url, undefined, { ...options, query: undefined });
      const page: unknown = await response.json();
      if (!Array.isArray(page)) {
        throw new GitHubApiResponseError(url, response.status, "expected a JSON array page");
      }
      for (const item of page) {
        yield item;
      }
      url = parseNextLink(response.headers.get("link"));
    }
  }

  async request(
    method: HttpMethod,
    path: string,
    body: unknown,
    options: RequestOptions = {}
  ): Promise<Response> {
    const url = this.buildUrl(path, options.query);
    const headers: Record<string, string> = {
      Accept: options.accept ?? JSON_MEDIA_TYPE,
      Authorization: `Bearer ${this.token}`,
      "User-Agent": this.userAgent,
      "X-GitHub-Api-Version": DEFAULT_API_VERSION
    };
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }
    const response = await this.send(url, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body)
    }, options.signal);
    if (response.ok) return response;
    throw await this.toError(url, response);
  }

  private async send(url: string, init: RequestInit, signal?: AbortSignal): Promise<Response> {
    const maxAttempts = Math.max(1, this.retry.maxAttempts);
    let attempt = 0;
    let rateLimitRetries = 0;
    let lastError = "unknown error";

    while (attempt < maxAttempts) {
      await this.gate.admit(signal);
      attempt += 1;
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          ...init,
          signal: AbortSignal.timeout(this.requestTimeoutMs)
        });
      } catch (err) {
        lastError = describeError(err);
        this.logger.debug("GitHub request failed", { method: init.method, url, attempt, error: lastError });
        if (attempt < maxAttempts) {
          await this.clock.sleep(this.backoffMs(attempt), signal);
        }
        continue;
      }

      const nowMs = this.clock.now();
      const snapshot = parseGitHubRateLimit(response.headers, nowMs);

      if (isRateLimitResponse(response, snapshot?.remaining)) {
        await discardBody(response);
        rateLimitRetries += 1;
        if (rateLimitRetries > MAX_RATE_LIMIT_RETRIES) {
          throw new RateLimitExceededError({ attempts: MAX_RATE_LIMIT_RETRIES });
        }
        const retryAfterMs = parseRetryAfterMs(response.headers.get("retry-after"), nowMs);
        if (snapshot?.remaining === 0) {
          this.gate.noteExhausted(snapshot);
        } else {
          this.gate.observe(snapshot);
        }
        // Secondary limits without retry-after still need a pause before the next try.
        this.gate.noteCooldown(retryAfterMs ?? (snapshot?.remaining === 0 ? 0 : this.backoffMs(rateLimitRetries)));
        this.logger.debug("GitHub rate limited request", {
          url,
          status: response.status,
          retryAfterMs,
          remaining: snapshot?.remaining
        });
        // Rate-limit pauses are paid at the gate and do not consume a transient retry.
        attempt -= 1;
        continue;
      }

      this.gate.observe(snapshot);

      if (RETRYABLE_STATUSES.has(response.status)) {
        lastError = `status ${response.status}`;
        await discardBody(response);
        this.logger.debug("GitHub request returned retryable status", { url, attempt, status: response.status });
        if (attempt < maxAttempts) {
          await this.clock.sleep(this.backoffMs(attempt), signal);
        }
        continue;
      }

      return response;
    }

    throw new TransientNetworkError(url, maxAttempts, lastError);
  }

  private backoffMs(attempt: number): number {
    return computeBackoffMs(attempt, this.retry.baseDelayMs, this.retry.maxDelayMs, this.random);
  }

  private async toError(url: string, response: Response): Promise<Error> {
    const detail = await readErrorDetail(response);
    switch (response.status) {
      case 401:
        return new AuthError(detail ? `GitHub rejected the token (401): ${detail}` : undefined);
      case 403:
        return new ForbiddenError(url, detail);
      case 404:
        return new NotFoundError(url);
      default:
        return new GitHubApiResponseError(url, response.status, detail);
    }
  }
}
