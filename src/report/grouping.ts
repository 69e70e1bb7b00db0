import { repositoryKey } from "../github/repositoryRef.js";
import type { Finding, RepositoryRef, RunResult } from "../types.js";

export type RepositoryGroup = {
  repository: RepositoryRef;
  findings: Finding[];
};

export type RuleGroupEntry = {
  repository: RepositoryRef;
  finding: Finding;
};

/** Findings keyed by `owner/name`, keys in first-appearance order. */
export function groupByRepository(result: Pick<RunResult, "findings">): Map<string, RepositoryGroup> {
  const groups = new Map<string, RepositoryGroup>();
  for (const finding of result.findings) {
    const key = repositoryKey(finding.repository);
    const group = groups.get(key);
    if (group) {
      group.findings.push(finding);
    } else {
      groups.set(key, { repository: finding.repository, findings: [finding] });
    }
  }
  return groups;
}

/** Findings keyed by rule id, keys in first-appearance order. */
export function groupByRule(result: Pick<RunResult, "findings">): Map<string, RuleGroupEntry[]> {
  const groups = new Map<string, RuleGroupEntry[]>();
  for (const finding of result.findings) {
    const entry = { repository: finding.repository, finding };
    const group = groups.get(finding.ruleId);
    if (group) {
      group.push(entry);
    } else {
      groups.set(finding.ruleId, [entry]);
    }
  }
  return groups;
}

export function flattenRepositoryGroups(groups: ReadonlyMap<string, RepositoryGroup>): Finding[] {
  return [...groups.values()].flatMap((group) => group.findings);
}

export function flattenRuleGroups(groups: ReadonlyMap<string, readonly RuleGroupEntry[]>): Finding[] {
  return [...groups.values()].flatMap((entries) => entries.map((entry) => entry.finding));
}
