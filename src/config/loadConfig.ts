import path from "node:path";
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { readEnvInt, readFirstEnv } from "./env.js";
import {
  CONFIG_FILE_NAMES,
  DEFAULT_API_BASE_URL,
  DEFAULT_CONCURRENCY,
  DEFAULT_MAX_RATE_LIMIT_WAIT_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RETRY,
  MAX_CONCURRENCY
} from "./defaults.js";
import { ConfigFileParseError, ConfigInvalidValueError } from "../errors/config.errors.js";

export type OutputGrouping = "repo" | "rule";

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface AuditConfig {
  apiBaseUrl: string;
  concurrency: number;
  requestTimeoutMs: number;
  maxRateLimitWaitMs: number;
  retry: RetryConfig;
  rules: string[];
  format: OutputGrouping;
}

export type AuditConfigOverrides = {
  [K in keyof AuditConfig]?: AuditConfig[K] | undefined;
};

export interface LoadConfigParams {
  cwd: string;
  configPath?: string | null;
  overrides?: AuditConfigOverrides;
}

type ConfigFile = Partial<Omit<AuditConfig, "retry">> & { retry?: Partial<RetryConfig> };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function optionalString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string" || !value.trim()) {
    throw new ConfigInvalidValueError(key, value, "a non-empty string");
  }
  return value.trim();
}

function optionalNumber(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    throw new ConfigInvalidValueError(key, value, "a non-negative number");
  }
  return value;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isOutputGrouping(value: unknown): value is OutputGrouping {
  return value === "repo" || value === "rule";
}

function optionalRules(record: Record<string, unknown>): string[] | undefined {
  const value = record.rules;
  if (value === undefined) return undefined;
  if (!isStringArray(value)) {
    throw new ConfigInvalidValueError("rules", value, "an array of rule ids");
  }
  return value;
}

function optionalFormat(record: Record<string, unknown>): OutputGrouping | undefined {
  const value = record.format;
  if (value === undefined) return undefined;
  if (!isOutputGrouping(value)) {
    throw new ConfigInvalidValueError("format", value, '"repo" or "rule"');
  }
  return value;
}

function parseConfigFile(raw: unknown, filePath: string): ConfigFile {
  if (!isPlainObject(raw)) {
    throw new ConfigFileParseError(filePath, "expected a JSON object");
  }
  const retryRaw = raw.retry;
  if (retryRaw !== undefined && !isPlainObject(retryRaw)) {
    throw new ConfigInvalidValueError("retry", retryRaw, "an object");
  }
  return {
    apiBaseUrl: optionalString(raw, "apiBaseUrl"),
    concurrency: optionalNumber(raw, "concurrency"),
    requestTimeoutMs: optionalNumber(raw, "requestTimeoutMs"),
    maxRateLimitWaitMs: optionalNumber(raw, "maxRateLimitWaitMs"),
    rules: optionalRules(raw),
    format: optionalFormat(raw),
    retry: isPlainObject(retryRaw)
      ? {
          maxAttempts: optionalNumber(retryRaw, "maxAttempts"),
          baseDelayMs: optionalNumber(retryRaw, "baseDelayMs"),
          maxDelayMs: optionalNumber(retryRaw, "maxDelayMs")
        }
      : undefined
  };
}

async function loadConfigFile(cwd: string, configPath?: string | null): Promise<ConfigFile> {
  const candidates = configPath
    ? [path.resolve(cwd, configPath)]
    : CONFIG_FILE_NAMES.map((name) => path.resolve(cwd, name));

  for (const candidate of candidates) {
    if (!existsSync(candidate)) continue;
    const raw = await readFile(candidate, "utf-8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigFileParseError(candidate, message);
    }
    return parseConfigFile(parsed, candidate);
  }

  return {};
}

export function normalizeConcurrency(value: number | null | undefined): number {
  if (value == null || !Number.isFinite(value)) return DEFAULT_CONCURRENCY;
  const normalized = Math.trunc(value);
  if (normalized < 1) return 1;
  return Math.min(MAX_CONCURRENCY, normalized);
}

function pickDefined<T>(...values: Array<T | null | undefined>): T | undefined {
  for (const value of values) {
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

/**
 * Resolves the run configuration. Later sources win: built-in defaults, then the
 * config file, then environment variables, then explicit overrides (CLI flags).
 */
export async function loadConfig(params: LoadConfigParams): Promise<AuditConfig> {
  const file = await loadConfigFile(params.cwd, params.configPath);
  const overrides = params.overrides ?? {};

  const apiBaseUrl =
    pickDefined(
      overrides.apiBaseUrl,
      readFirstEnv(["REPO_AUDIT_API_BASE", "GITHUB_API_URL"]),
      file.apiBaseUrl
    ) ?? DEFAULT_API_BASE_URL;

  const retry: RetryConfig = {
    maxAttempts: Math.max(
      1,
      Math.trunc(pickDefined(overrides.retry?.maxAttempts, file.retry?.maxAttempts) ?? DEFAULT_RETRY.maxAttempts)
    ),
    baseDelayMs: pickDefined(overrides.retry?.baseDelayMs, file.retry?.baseDelayMs) ?? DEFAULT_RETRY.baseDelayMs,
    maxDelayMs: pickDefined(overrides.retry?.maxDelayMs, file.retry?.maxDelayMs) ?? DEFAULT_RETRY.maxDelayMs
  };

  return {
    apiBaseUrl: apiBaseUrl.replace(/\/+$/, ""),
    concurrency: normalizeConcurrency(
      pickDefined(overrides.concurrency, readEnvInt("REPO_AUDIT_CONCURRENCY"), file.concurrency)
    ),
    requestTimeoutMs:
      pickDefined(overrides.requestTimeoutMs, file.requestTimeoutMs) ?? DEFAULT_REQUEST_TIMEOUT_MS,
    maxRateLimitWaitMs:
      pickDefined(
        overrides.maxRateLimitWaitMs,
        readEnvInt("REPO_AUDIT_MAX_RATE_LIMIT_WAIT_MS"),
        file.maxRateLimitWaitMs
      ) ?? DEFAULT_MAX_RATE_LIMIT_WAIT_MS,
    retry,
    rules: overrides.rules?.length ? overrides.rules : file.rules ?? [],
    format: pickDefined(overrides.format, file.format) ?? "repo"
  };
}
