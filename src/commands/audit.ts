import pc from "picocolors";
import { applyFixes, type FixOutcome } from "../fix/applyFixes.js";
import { exitCodeFor, runAudit } from "../audit/runAudit.js";
import type { AuditProgressHandler } from "../audit/progress.js";
import { loadConfig, type OutputGrouping } from "../config/loadConfig.js";
import { resolveToken, type GhTokenReader } from "../config/token.js";
import { MissingRepositorySelectionError } from "../errors/config.errors.js";
import { GitHubHttpClient, type FetchLike } from "../github/httpClient.js";
import { RepositoryMetadataClient } from "../github/metadataClient.js";
import { RateLimitGate } from "../github/rateLimitGate.js";
import type { Clock } from "../github/rateLimitHelpers.js";
import { repositoryKey } from "../github/repositoryRef.js";
import { resolveSelection, selectRepositories } from "../github/repositorySelector.js";
import type { Logger } from "../logging/logger.js";
import { noopLogger } from "../logging/logger.js";
import { formatRunResultJson, formatRunResultText } from "../report/formatters.js";
import { defaultRegistry, type RuleRegistry } from "../rules/registry.js";

export type AuditCommandOptions = {
  active?: boolean;
  githubToken?: string;
  rule: string[];
  format?: OutputGrouping;
  json?: boolean;
  concurrency?: number;
  fix?: boolean;
  verbose?: boolean;
  logFile?: string;
  config?: string;
};

export type AuditCommandContext = {
  cwd: string;
  /** Receives the report (stdout). */
  write: (text: string) => void;
  /** Receives per-repository fix outcomes (stderr). */
  writeStatus: (text: string) => void;
  logger?: Logger;
  signal?: AbortSignal;
  onProgress?: AuditProgressHandler;
  /** Called once the audit pass is over, before anything is printed. */
  onAuditDone?: () => void;
  registry?: RuleRegistry;
  fetch?: FetchLike;
  clock?: Clock;
  readGhToken?: GhTokenReader;
  color?: boolean;
};

export function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs <= 0) return "0s";
  const totalSeconds = durationMs / 1000;
  if (totalSeconds < 60) {
    return `${totalSeconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = Math.round(totalSeconds - minutes * 60);
  return `${minutes}m ${seconds}s`;
}

function formatFixOutcome(colors: ReturnType<typeof pc.createColors>, outcome: FixOutcome): string {
  const repo = repositoryKey(outcome.repository);
  const rules = outcome.ruleIds.join(", ");
  switch (outcome.status) {
    case "applied":
      return `${repo}: ${colors.green("fixed")} [${rules}]`;
    case "skipped":
      return `${repo}: ${colors.dim("skipped")} [${rules}]`;
    case "failed":
      return `${repo}: ${colors.red("fix failed")} ${outcome.errorName}: ${outcome.message} [${rules}]`;
  }
}

/**
 * The `audit` command: configuration, rule selection and the token check all happen
 * before the first repository is fetched. Resolves to the process exit code; fatal
 * failures (bad configuration, unknown rules, a rejected token) are thrown.
 */
export async function runAuditCommand(
  repositories: readonly string[],
  options: AuditCommandOptions,
  context: AuditCommandContext
): Promise<number> {
  const logger = context.logger ?? noopLogger;
  const registry = context.registry ?? defaultRegistry;
  const colors = pc.createColors(context.color ?? pc.isColorSupported);

  const config = await loadConfig({
    cwd: context.cwd,
    configPath: options.config,
    overrides: {
      concurrency: options.concurrency,
      rules: options.rule,
      format: options.format
    }
  });
  const rules = registry.filter(config.rules);
  if (!repositories.length && !options.active) {
    throw new MissingRepositorySelectionError();
  }

  const { token, source } = await resolveToken(options.githubToken, context.readGhToken);
  logger.debug(`Using GitHub token from ${source}`);
  const gate = new RateLimitGate({ maxWaitMs: config.maxRateLimitWaitMs, clock: context.clock, logger });
  const http = new GitHubHttpClient({
    token,
    gate,
    baseUrl: config.apiBaseUrl,
    retry: config.retry,
    requestTimeoutMs: config.requestTimeoutMs,
    fetch: context.fetch,
    clock: context.clock,
    logger
  });
  const client = new RepositoryMetadataClient({ http, clock: context.clock, logger });
  // Also validates the token: a 401 here ends the run before any repository is fetched.
  const login = await client.getAuthenticatedLogin();
  const selection = resolveSelection({ repositories, active: Boolean(options.active) }, login);

  logger.debug(`Applying ${rules.length} rules`, { concurrency: config.concurrency });
  const result = await runAudit({
    repositories: selectRepositories({ source: client, selection, signal: context.signal, logger }),
    rules,
    client,
    concurrency: config.concurrency,
    signal: context.signal,
    logger,
    onProgress: context.onProgress
  });
  context.onAuditDone?.();

  if (options.json) {
    context.write(formatRunResultJson(result, { format: config.format }));
  } else {
    context.write(formatRunResultText(result, { format: config.format, color: context.color }));
    context.write(colors.dim(`Audit completed in ${formatDuration(result.durationMs)}.`));
  }

  let exitCode: number = exitCodeFor(result);
  if (options.fix) {
    if (result.cancelled) {
      logger.warn("Run was cancelled; skipping fixes.");
    } else {
      const outcomes = await applyFixes({ result, rules, client: http, signal: context.signal, logger });
      if (!outcomes.length) {
        logger.info("Nothing to fix.");
      }
      for (const outcome of outcomes) {
        context.writeStatus(formatFixOutcome(colors, outcome));
      }
      if (outcomes.some((outcome) => outcome.status === "failed")) {
        exitCode = 2;
      }
    }
  }
  return exitCode;
}
