import { RateLimitExceededError } from "../errors/github.errors.js";
import type { Logger } from "../logging/logger.js";
import { noopLogger } from "../logging/logger.js";
import { type Clock, type RateLimitSnapshot, Semaphore, systemClock } from "./rateLimitHelpers.js";

export type RateLimitGateOptions = {
  maxWaitMs: number;
  clock?: Clock;
  logger?: Logger;
};

/**
 * Run-scoped view of the GitHub core quota shared by every request of a run.
 *
 * Callers `admit()` before each request and `observe()` each response. The decision to
 * wait for a reset is made under a one-permit semaphore: while one caller sleeps until
 * the reset, the others queue behind it instead of spending quota that is not there.
 */
export class RateLimitGate {
  private readonly maxWaitMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly mutex = new Semaphore(1);

  private snapshot: RateLimitSnapshot | null = null;
  private cooldownUntilMs = 0;
  private waits = 0;

  constructor(options: RateLimitGateOptions) {
    this.maxWaitMs = Math.max(0, options.maxWaitMs);
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? noopLogger;
  }

  get current(): RateLimitSnapshot | null {
    return this.snapshot;
  }

  get waitCount(): number {
    return this.waits;
  }

  async admit(signal?: AbortSignal): Promise<void> {
    const release = await this.mutex.acquire();
    try {
      const waitMs = this.computeWaitMs(this.clock.now());
      if (waitMs > 0) {
        if (waitMs > this.maxWaitMs) {
          throw new RateLimitExceededError({ waitMs, maxWaitMs: this.maxWaitMs });
        }
        this.waits += 1;
        this.logger.warn(`GitHub rate limit reached; waiting ${Math.ceil(waitMs / 1000)}s for reset.`, {
          waitMs,
          resetAtMs: this.snapshot?.resetAtMs
        });
        await this.clock.sleep(waitMs, signal);
        this.afterReset();
      }
      this.reserve();
    } finally {
      release();
    }
  }

  observe(snapshot: RateLimitSnapshot | null): void {
    if (!snapshot) return;
    const previous = this.snapshot;
    // A response from an older window must not resurrect spent quota.
    if (
      previous?.resetAtMs !== undefined &&
      snapshot.resetAtMs !== undefined &&
      snapshot.resetAtMs < previous.resetAtMs
    ) {
      return;
    }
    this.snapshot = {
      ts: snapshot.ts,
      limit: snapshot.limit ?? previous?.limit,
      remaining: snapshot.remaining ?? previous?.remaining,
      resetAtMs: snapshot.resetAtMs ?? previous?.resetAtMs,
      resource: snapshot.resource ?? previous?.resource
    };
  }

  /** Records a server-imposed pause (`retry-after`, secondary limits). */
  noteCooldown(delayMs: number): void {
    if (!Number.isFinite(delayMs) || delayMs <= 0) return;
    const until = this.clock.now() + delayMs;
    if (until > this.cooldownUntilMs) {
      this.cooldownUntilMs = until;
    }
  }

  /** Marks the quota as spent, e.g. after a 403/429 that reported it exhausted. */
  noteExhausted(snapshot: RateLimitSnapshot | null): void {
    this.observe(snapshot);
    if (this.snapshot) {
      this.snapshot = { ...this.snapshot, remaining: 0 };
    }
  }

  private computeWaitMs(nowMs: number): number {
    let waitMs = Math.max(0, this.cooldownUntilMs - nowMs);
    const snapshot = this.snapshot;
    if (snapshot?.remaining !== undefined && snapshot.remaining <= 0) {
      if (snapshot.resetAtMs !== undefined) {
        waitMs = Math.max(waitMs, snapshot.resetAtMs - nowMs);
      }
    }
    return Math.max(0, waitMs);
  }

  private afterReset(): void {
    const nowMs = this.clock.now();
    if (this.cooldownUntilMs <= nowMs) {
      this.cooldownUntilMs = 0;
    }
    if (this.snapshot?.resetAtMs !== undefined && this.snapshot.resetAtMs <= nowMs) {
      // The window rolled over; the next response reports the fresh quota.
      this.snapshot = { ...this.snapshot, remaining: undefined };
    }
  }

  private reserve(): void {
    if (this.snapshot?.remaining === undefined) return;
    this.snapshot = { ...this.snapshot, remaining: Math.max(0, this.snapshot.remaining - 1) };
  }
}
