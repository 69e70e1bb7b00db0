import { AuthError, RequestCancelledError } from "../errors/github.errors.js";
import { RuleEvaluationError } from "../errors/rule.errors.js";
import { DEFAULT_CONCURRENCY } from "../config/defaults.js";
import type { Logger } from "../logging/logger.js";
import { noopLogger } from "../logging/logger.js";
import type { RepositoryMetadataSource } from "../github/metadataClient.js";
import { repositoryKey } from "../github/repositoryRef.js";
import { Semaphore } from "../github/rateLimitHelpers.js";
import type { Rule } from "../rules/rule.js";
import type { AuditErrorRecord, Finding, RepositoryRef, RepositorySnapshot, RunResult } from "../types.js";
import type { AuditProgressHandler } from "./progress.js";

export type AuditClient = Pick<RepositoryMetadataSource, "fetchSnapshot">;

export type RunAuditParams = {
  repositories: Iterable<RepositoryRef> | AsyncIterable<RepositoryRef>;
  rules: readonly Rule[];
  client: AuditClient;
  concurrency?: number;
  signal?: AbortSignal;
  logger?: Logger;
  onProgress?: AuditProgressHandler;
  now?: () => number;
};

type PoolState = {
  exhausted: boolean;
  fatal: { error: unknown } | null;
  selectionError: AuditErrorRecord | null;
  pulled: number;
  settled: number;
};

type RepositoryOutcome =
  | { kind: "evaluated"; ref: RepositoryRef; findings: Finding[]; errors: AuditErrorRecord[] }
  | { kind: "failed"; ref: RepositoryRef; error: AuditErrorRecord }
  | { kind: "not_started"; ref: RepositoryRef };

function errorName(err: unknown): string {
  return err instanceof Error ? err.name : "Error";
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function* fromSync(source: Iterable<RepositoryRef>): AsyncGenerator<RepositoryRef, void, undefined> {
  yield* source;
}

function isAsyncIterable(
  source: Iterable<RepositoryRef> | AsyncIterable<RepositoryRef>
): source is AsyncIterable<RepositoryRef> {
  return Symbol.asyncIterator in source;
}

function toAsyncIterator(source: Iterable<RepositoryRef> | AsyncIterable<RepositoryRef>): AsyncIterator<RepositoryRef> {
  return isAsyncIterable(source) ? source[Symbol.asyncIterator]() : fromSync(source);
}

/** Runs every rule in order; a throwing rule becomes an error record and the rest still run. */
export function evaluateRules(
  snapshot: RepositorySnapshot,
  rules: readonly Rule[],
  logger: Logger = noopLogger
): { findings: Finding[]; errors: AuditErrorRecord[] } {
  const findings: Finding[] = [];
  const errors: AuditErrorRecord[] = [];
  const key = repositoryKey(snapshot.ref);
  for (const rule of rules) {
    try {
      findings.push(...rule.evaluate(snapshot));
    } catch (err) {
      const failure = new RuleEvaluationError(rule.id, key, err);
      logger.warn(failure.message, { rule: rule.id, repository: key });
      errors.push(
        Object.freeze({
          scope: "rule",
          repository: snapshot.ref,
          ruleId: rule.id,
          errorName: failure.name,
          message: failure.message
        })
      );
    }
  }
  return { findings, errors };
}

/**
 * Audits repositories with a bounded pool of workers. Results are reported in the
 * order repositories were pulled, whatever order they complete in. An `AuthError`
 * stops new work and is rethrown once in-flight repositories settle; aborting
 * `signal` stops new work and marks the run cancelled.
 */
export async function runAudit(params: RunAuditParams): Promise<RunResult> {
  const logger = params.logger ?? noopLogger;
  const now = params.now ?? Date.now;
  const startedAt = now();
  const signal = params.signal;
  const limit = Math.max(1, Math.trunc(params.concurrency ?? DEFAULT_CONCURRENCY));
  const iterator = toAsyncIterator(params.repositories);
  const pullLock = new Semaphore(1);
  const outcomes: RepositoryOutcome[] = [];

  const state: PoolState = { exhausted: false, fatal: null, selectionError: null, pulled: 0, settled: 0 };

  const shouldStop = () => state.exhausted || state.fatal !== null || Boolean(signal?.aborted);

  const pull = async (): Promise<{ index: number; ref: RepositoryRef } | null> => {
    const release = await pullLock.acquire();
    try {
      if (shouldStop()) return null;
      const next = await iterator.next();
      if (next.done) {
        state.exhausted = true;
        return null;
      }
      const index = state.pulled;
      state.pulled += 1;
      return { index, ref: next.value };
    } catch (err) {
      // A throwing iterator is finished; only an auth failure discards the partial result.
      state.exhausted = true;
      if (err instanceof AuthError) {
        state.fatal ??= { error: err };
      } else if (err instanceof RequestCancelledError && signal?.aborted) {
        logger.debug("Repository listing cancelled");
      } else {
        logger.warn(`Listing repositories failed: ${errorMessage(err)}`, { error: errorName(err) });
        state.selectionError = Object.freeze({
          scope: "selection",
          errorName: errorName(err),
          message: errorMessage(err)
        });
      }
      return null;
    } finally {
      release();
    }
  };

  const report = (outcome: RepositoryOutcome, message?: string) => {
    state.settled += 1;
    params.onProgress?.({
      phase: outcome.kind,
      repository: repositoryKey(outcome.ref),
      current: state.settled,
      total: state.pulled,
      message
    });
  };

  const auditOne = async (ref: RepositoryRef): Promise<RepositoryOutcome> => {
    const key = repositoryKey(ref);
    params.onProgress?.({ phase: "fetching", repository: key, current: state.settled, total: state.pulled });
    let snapshot: RepositorySnapshot;
    try {
      snapshot = await params.client.fetchSnapshot(ref, { signal });
    } catch (err) {
      if (err instanceof RequestCancelledError && signal?.aborted) {
        logger.debug(`Cancelled before ${key} was fetched`);
        return { kind: "not_started", ref };
      }
      if (err instanceof AuthError) {
        state.fatal ??= { error: err };
      }
      logger.warn(`Failed to fetch ${key}: ${errorMessage(err)}`, { repository: key, error: errorName(err) });
      return {
        kind: "failed",
        ref,
        error: Object.freeze({
          scope: "repository",
          repository: ref,
          errorName: errorName(err),
          message: errorMessage(err)
        })
      };
    }
    const { findings, errors } = evaluateRules(snapshot, params.rules, logger);
    logger.debug(`Evaluated ${key}`, { findings: findings.length, errors: errors.length });
    return { kind: "evaluated", ref, findings, errors };
  };

  const workers = Array.from({ length: limit }, async () => {
    for (;;) {
      const next = await pull();
      if (!next) return;
      const outcome = await auditOne(next.ref);
      outcomes[next.index] = outcome;
      report(outcome, outcome.kind === "failed" ? outcome.error.message : undefined);
    }
  });
  await Promise.all(workers);

  if (!state.exhausted && iterator.return) {
    await iterator.return();
  }

  if (state.fatal) {
    throw state.fatal.error;
  }

  const findings: Finding[] = [];
  const errors: AuditErrorRecord[] = [];
  const evaluated: RepositoryRef[] = [];
  const notStarted: RepositoryRef[] = [];
  for (const outcome of outcomes) {
    switch (outcome.kind) {
      case "evaluated":
        evaluated.push(outcome.ref);
        findings.push(...outcome.findings);
        errors.push(...outcome.errors);
        break;
      case "failed":
        errors.push(outcome.error);
        break;
      case "not_started":
        notStarted.push(outcome.ref);
        break;
    }
  }
  if (state.selectionError) {
    errors.push(state.selectionError);
  }

  return Object.freeze({
    findings: Object.freeze(findings),
    errors: Object.freeze(errors),
    evaluated: Object.freeze(evaluated),
    notStarted: Object.freeze(notStarted),
    cancelled: Boolean(signal?.aborted),
    selectedRules: Object.freeze(params.rules.map((rule) => rule.id)),
    durationMs: Math.max(0, now() - startedAt)
  });
}

/** 0 when the run completed clean, 1 when it completed with findings only, 2 when anything failed or was cancelled. */
export function exitCodeFor(result: RunResult): 0 | 1 | 2 {
  if (result.errors.length > 0) return 2;
  if (result.cancelled || result.notStarted.length > 0) return 2;
  return result.findings.length > 0 ? 1 : 0;
}
