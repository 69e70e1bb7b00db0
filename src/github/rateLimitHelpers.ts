import { setTimeout as delay } from "node:timers/promises";
import { RequestCancelledError } from "../errors/github.errors.js";

export type RateLimitSnapshot = {
  ts: number;
  limit?: number;
  remaining?: number;
  resetAtMs?: number;
  resource?: string;
};

export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms, signal) => {
    if (signal?.aborted) throw new RequestCancelledError();
    try {
      await delay(Math.max(0, ms), undefined, { signal });
    } catch (err) {
      if (signal?.aborted) throw new RequestCancelledError();
      throw err;
    }
  }
};

/** Counting semaphore; the audit pull lock and the rate-limit gate each hold a one-permit instance. */
export class Semaphore {
  private max: number;
  private inFlight = 0;
  private queue: Array<(release: () => void) => void> = [];

  constructor(max: number) {
    this.max = Math.max(1, Math.trunc(max));
  }

  async acquire(): Promise<() => void> {
    if (this.inFlight < this.max) {
      this.inFlight += 1;
      return this.createRelease();
    }
    return new Promise((resolve) => {
      this.queue.push(resolve);
    });
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.inFlight = Math.max(0, this.inFlight - 1);
      this.drain();
    };
  }

  private drain(): void {
    while (this.queue.length > 0 && this.inFlight < this.max) {
      const next = this.queue.shift();
      if (!next) break;
      this.inFlight += 1;
      next(this.createRelease());
    }
  }
}

const parseIntHeader = (value: string | null): number | undefined => {
  if (value == null || value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? Math.trunc(parsed) : undefined;
};

export const parseRetryAfterMs = (value: string | null, nowMs: number): number | undefined => {
  if (!value) return undefined;
  const parsed = Number(value);
  if (Number.isFinite(parsed)) {
    return Math.max(0, Math.round(parsed * 1000));
  }
  const timestamp = Date.parse(value);
  if (!Number.isNaN(timestamp)) {
    return Math.max(0, Math.round(timestamp - nowMs));
  }
  return undefined;
};

/** Reads GitHub's `x-ratelimit-*` headers. `x-ratelimit-reset` is epoch seconds. */
export const parseGitHubRateLimit = (headers: Headers, nowMs: number): RateLimitSnapshot | null => {
  const remaining = parseIntHeader(headers.get("x-ratelimit-remaining"));
  const limit = parseIntHeader(headers.get("x-ratelimit-limit"));
  const reset = parseIntHeader(headers.get("x-ratelimit-reset"));
  if (remaining === undefined && reset === undefined) return null;
  return {
    ts: nowMs,
    limit,
    remaining,
    resetAtMs: reset !== undefined ? reset * 1000 : undefined,
    resource: headers.get("x-ratelimit-resource") ?? undefined
  };
};

export const computeBackoffMs = (
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random
): number => {
  const exp = Math.min(maxDelayMs, baseDelayMs * 2 ** Math.max(0, attempt - 1));
  const jitter = Math.floor(random() * Math.min(250, exp * 0.1));
  return Math.min(maxDelayMs, exp + jitter);
};
