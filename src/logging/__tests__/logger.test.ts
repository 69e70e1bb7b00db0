import assert from "node:assert/strict";
import os from "node:os";
import path from "node:path";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { test } from "node:test";
import { combineLoggers, createAppLogger, createConsoleLogger, noopLogger, type Logger } from "../logger.js";

const captureStream = () => {
  const chunks: string[] = [];
  return { stream: { write: (chunk: string) => chunks.push(chunk) }, chunks };
};

test("console logger hides debug output unless verbose", () => {
  const quiet = captureStream();
  const logger = createConsoleLogger({ stream: quiet.stream, color: false });
  logger.debug("hidden");
  logger.info("Fetched acme/widgets", { findings: 2 });
  logger.warn("Rate limited");
  assert.deepEqual(quiet.chunks, ["Fetched acme/widgets\n", "Rate limited\n"]);

  const loud = captureStream();
  const verbose = createConsoleLogger({ stream: loud.stream, color: false, verbose: true });
  verbose.debug("Evaluated acme/widgets", { findings: 2, repository: "acme/widgets", skipped: undefined });
  assert.deepEqual(loud.chunks, ["debug Evaluated acme/widgets findings=2 repository=acme/widgets\n"]);
});

test("file logger appends JSON lines", async (t) => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "repo-audit-log-"));
  t.after(() => rm(dir, { recursive: true, force: true }));
  const filePath = path.join(dir, "logs", "audit.jsonl");

  const logger = await createAppLogger({ filePath });
  logger.warn("Rate limited", { waitMs: 2000 });
  logger.info("Done");
  await logger.close();
  logger.error("after close");

  const lines = (await readFile(filePath, "utf-8")).trim().split("\n");
  assert.equal(lines.length, 2);
  const first: unknown = JSON.parse(lines[0]);
  assert.ok(first && typeof first === "object");
  assert.equal(Reflect.get(first, "level"), "warning");
  assert.equal(Reflect.get(first, "message"), "Rate limited");
  assert.deepEqual(Reflect.get(first, "meta"), { waitMs: 2000 });
});

test("combined loggers fan out every call", () => {
  const seen: string[] = [];
  const recording = (prefix: string): Logger => ({
    ...noopLogger,
    warn: (message) => seen.push(`${prefix}:${message}`)
  });
  combineLoggers(recording("a"), recording("b")).warn("careful");
  assert.deepEqual(seen, ["a:careful", "b:careful"]);
});
