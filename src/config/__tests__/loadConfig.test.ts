import assert from "node:assert/strict";
import os from "node:os";
import path from "node:path";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { test, type TestContext } from "node:test";
import { loadConfig, normalizeConcurrency } from "../loadConfig.js";
import { ConfigFileParseError, ConfigInvalidValueError } from "../../errors/config.errors.js";

const CONFIG_ENV = [
  "REPO_AUDIT_API_BASE",
  "GITHUB_API_URL",
  "REPO_AUDIT_CONCURRENCY",
  "REPO_AUDIT_MAX_RATE_LIMIT_WAIT_MS"
];

const withEnv = (t: TestContext, values: Record<string, string>) => {
  const saved = new Map(CONFIG_ENV.map((name): [string, string | undefined] => [name, process.env[name]]));
  for (const name of CONFIG_ENV) delete process.env[name];
  Object.assign(process.env, values);
  t.after(() => {
    for (const [name, value] of saved) {
      if (value === undefined) delete process.env[name];
      else process.env[name] = value;
    }
  });
};

const tempDir = async (t: TestContext, files: Record<string, string> = {}) => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "repo-audit-config-"));
  t.after(() => rm(dir, { recursive: true, force: true }));
  for (const [name, content] of Object.entries(files)) {
    await writeFile(path.join(dir, name), content);
  }
  return dir;
};

test("falls back to built-in defaults", async (t) => {
  withEnv(t, {});
  const config = await loadConfig({ cwd: await tempDir(t) });

  assert.deepEqual(config, {
    apiBaseUrl: "https://api.github.com",
    concurrency: 4,
    requestTimeoutMs: 30_000,
    maxRateLimitWaitMs: 900_000,
    retry: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 30_000 },
    rules: [],
    format: "repo"
  });
});

test("layers the config file, environment and overrides", async (t) => {
  withEnv(t, { REPO_AUDIT_CONCURRENCY: "6", GITHUB_API_URL: "https://ghe.example.com/api/v3/" });
  const cwd = await tempDir(t, {
    "repo-audit.config.json": JSON.stringify({
      concurrency: 2,
      format: "rule",
      rules: ["no-wiki"],
      retry: { maxAttempts: 5 },
      maxRateLimitWaitMs: 60_000
    })
  });

  const config = await loadConfig({ cwd, overrides: { rules: [], format: "repo" } });
  assert.equal(config.apiBaseUrl, "https://ghe.example.com/api/v3");
  assert.equal(config.concurrency, 6);
  assert.equal(config.format, "repo");
  assert.deepEqual(config.rules, ["no-wiki"]);
  assert.deepEqual(config.retry, { maxAttempts: 5, baseDelayMs: 1000, maxDelayMs: 30_000 });
  assert.equal(config.maxRateLimitWaitMs, 60_000);

  const overridden = await loadConfig({ cwd, overrides: { concurrency: 1, rules: ["missing-readme"] } });
  assert.equal(overridden.concurrency, 1);
  assert.deepEqual(overridden.rules, ["missing-readme"]);
});

test("reads an explicit config path", async (t) => {
  withEnv(t, {});
  const cwd = await tempDir(t, { "custom.json": JSON.stringify({ requestTimeoutMs: 5000 }) });
  const config = await loadConfig({ cwd, configPath: "custom.json" });
  assert.equal(config.requestTimeoutMs, 5000);
});

test("rejects malformed config files", async (t) => {
  withEnv(t, {});
  const broken = await tempDir(t, { "repo-audit.config.json": "{ not json" });
  await assert.rejects(loadConfig({ cwd: broken }), ConfigFileParseError);

  const invalid = await tempDir(t, { "repo-audit.config.json": JSON.stringify({ format: "table" }) });
  await assert.rejects(
    loadConfig({ cwd: invalid }),
    (err: unknown) =>
      err instanceof ConfigInvalidValueError &&
      err.message === 'Invalid value for format: "table" (expected "repo" or "rule").'
  );
});

test("clamps concurrency to a usable range", () => {
  assert.equal(normalizeConcurrency(undefined), 4);
  assert.equal(normalizeConcurrency(0), 1);
  assert.equal(normalizeConcurrency(2.7), 2);
  assert.equal(normalizeConcurrency(500), 32);
});
