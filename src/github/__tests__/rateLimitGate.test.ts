import assert from "node:assert/strict";
import { test } from "node:test";
import { RateLimitGate } from "../rateLimitGate.js";
import { parseGitHubRateLimit, parseRetryAfterMs, computeBackoffMs } from "../rateLimitHelpers.js";
import { RateLimitExceededError, RequestCancelledError } from "../../errors/github.errors.js";
import { makeClock } from "../../__tests__/fixtures.js";

test("waits once for the reset when the quota is spent", async () => {
  const { clock, sleeps } = makeClock();
  const gate = new RateLimitGate({ maxWaitMs: 60_000, clock });
  gate.observe({ ts: clock.now(), limit: 5000, remaining: 0, resetAtMs: clock.now() + 2000 });

  await gate.admit();
  await gate.admit();

  assert.deepEqual(sleeps, [2000]);
  assert.equal(gate.waitCount, 1);
});

test("callers queued behind a wait do not sleep again", async () => {
  const { clock, sleeps } = makeClock();
  const gate = new RateLimitGate({ maxWaitMs: 60_000, clock });
  gate.observe({ ts: clock.now(), remaining: 0, resetAtMs: clock.now() + 2000 });

  await Promise.all([gate.admit(), gate.admit(), gate.admit()]);

  assert.deepEqual(sleeps, [2000]);
});

test("refuses to wait past the ceiling", async () => {
  const { clock, sleeps } = makeClock();
  const gate = new RateLimitGate({ maxWaitMs: 1000, clock });
  gate.observe({ ts: clock.now(), remaining: 0, resetAtMs: clock.now() + 5000 });

  await assert.rejects(gate.admit(), RateLimitExceededError);
  assert.deepEqual(sleeps, []);
});

test("counts down the quota it admits", async () => {
  const { clock, sleeps } = makeClock();
  const gate = new RateLimitGate({ maxWaitMs: 60_000, clock });
  gate.observe({ ts: clock.now(), remaining: 2, resetAtMs: clock.now() + 10_000 });

  await gate.admit();
  await gate.admit();
  assert.equal(gate.current?.remaining, 0);
  await gate.admit();

  assert.deepEqual(sleeps, [10_000]);
});

test("ignores snapshots from an older window", () => {
  const { clock } = makeClock();
  const gate = new RateLimitGate({ maxWaitMs: 60_000, clock });
  gate.observe({ ts: clock.now(), remaining: 10, resetAtMs: clock.now() + 5000 });
  gate.observe({ ts: clock.now(), remaining: 4000, resetAtMs: clock.now() - 1000 });

  assert.equal(gate.current?.remaining, 10);
});

test("honours a cooldown and propagates cancellation", async () => {
  const { clock, sleeps } = makeClock();
  const gate = new RateLimitGate({ maxWaitMs: 60_000, clock });
  gate.noteCooldown(3000);
  await gate.admit();
  assert.deepEqual(sleeps, [3000]);

  gate.noteCooldown(3000);
  const controller = new AbortController();
  controller.abort();
  await assert.rejects(gate.admit(controller.signal), RequestCancelledError);
});

test("parses GitHub rate limit headers", () => {
  const headers = new Headers({
    "x-ratelimit-limit": "5000",
    "x-ratelimit-remaining": "42",
    "x-ratelimit-reset": "1700000060",
    "x-ratelimit-resource": "core"
  });
  assert.deepEqual(parseGitHubRateLimit(headers, 1), {
    ts: 1,
    limit: 5000,
    remaining: 42,
    resetAtMs: 1_700_000_060_000,
    resource: "core"
  });
  assert.equal(parseGitHubRateLimit(new Headers(), 1), null);
});

test("parses retry-after as seconds or a date", () => {
  assert.equal(parseRetryAfterMs("3", 0), 3000);
  assert.equal(parseRetryAfterMs("Thu, 01 Jan 1970 00:00:10 GMT", 4000), 6000);
  assert.equal(parseRetryAfterMs("soon", 0), undefined);
  assert.equal(parseRetryAfterMs(null, 0), undefined);
});

test("backs off exponentially up to the cap", () => {
  const noJitter = () => 0;
  assert.equal(computeBackoffMs(1, 1000, 30_000, noJitter), 1000);
  assert.equal(computeBackoffMs(2, 1000, 30_000, noJitter), 2000);
  assert.equal(computeBackoffMs(3, 1000, 30_000, noJitter), 4000);
  assert.equal(computeBackoffMs(10, 1000, 30_000, noJitter), 30_000);
  assert.equal(computeBackoffMs(1, 1000, 30_000, () => 0.5), 1050);
});
