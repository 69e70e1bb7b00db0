import type { GitHubHttpClient } from "../github/httpClient.js";
import { repositoryApiPath, repositoryKey } from "../github/repositoryRef.js";
import type { Logger } from "../logging/logger.js";
import { noopLogger } from "../logging/logger.js";
import { groupByRepository } from "../report/grouping.js";
import type { RepositorySettingsPatch, Rule } from "../rules/rule.js";
import type { RepositoryRef, RunResult } from "../types.js";

export type FixClient = Pick<GitHubHttpClient, "patchJson">;

export type FixPlan = {
  repository: RepositoryRef;
  ruleIds: string[];
  patch: RepositorySettingsPatch;
};

export type FixOutcome = FixPlan &
  (
    | { status: "applied" }
    | { status: "skipped" }
    | { status: "failed"; errorName: string; message: string }
  );

export type ApplyFixesParams = {
  result: Pick<RunResult, "findings">;
  rules: readonly Rule[];
  client: FixClient;
  signal?: AbortSignal;
  logger?: Logger;
};

/** One settings patch per repository, merging the fixes of its fixable findings. */
export function planFixes(result: Pick<RunResult, "findings">, rules: readonly Rule[]): FixPlan[] {
  const fixes = new Map<string, RepositorySettingsPatch>();
  for (const rule of rules) {
    if (rule.fix) fixes.set(rule.id, rule.fix);
  }
  const plans: FixPlan[] = [];
  for (const group of groupByRepository(result).values()) {
    const ruleIds: string[] = [];
    let patch: RepositorySettingsPatch = {};
    for (const finding of group.findings) {
      const fix = fixes.get(finding.ruleId);
      if (!finding.fixable || !fix || ruleIds.includes(finding.ruleId)) continue;
      ruleIds.push(finding.ruleId);
      patch = { ...patch, ...fix };
    }
    if (ruleIds.length) {
      plans.push({ repository: group.repository, ruleIds, patch });
    }
  }
  return plans;
}

/**
 * Sends the planned patches one repository at a time. A failed patch is reported
 * and the remaining repositories are still attempted; after an abort the rest are
 * skipped.
 */
export async function applyFixes(params: ApplyFixesParams): Promise<FixOutcome[]> {
  const logger = params.logger ?? noopLogger;
  const outcomes: FixOutcome[] = [];
  for (const plan of planFixes(params.result, params.rules)) {
    const key = repositoryKey(plan.repository);
    if (params.signal?.aborted) {
      outcomes.push({ ...plan, status: "skipped" });
      continue;
    }
    try {
      await params.client.patchJson(repositoryApiPath(plan.repository), plan.patch, { signal: params.signal });
      logger.info(`Fixed ${key}`, { rules: plan.ruleIds });
      outcomes.push({ ...plan, status: "applied" });
    } catch (err) {
      const errorName = err instanceof Error ? err.name : "Error";
      const message = err instanceof Error ? err.message : String(err);
      logger.warn(`Failed to fix ${key}: ${message}`, { rules: plan.ruleIds });
      outcomes.push({ ...plan, status: "failed", errorName, message });
    }
  }
  return outcomes;
}
