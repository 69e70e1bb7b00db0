import type { Finding, RepositorySnapshot, Severity } from "../types.js";

/** Result of a single pass/fail check. `skip` means the rule does not apply. */
export type RuleOutcome = "ok" | "fail" | "skip";

/** Repository settings a rule may restore with `--fix`, in the REST API's field names. */
export type RepositorySettingsPatch = Readonly<{
  has_issues?: boolean;
  has_projects?: boolean;
  has_wiki?: boolean;
  has_discussions?: boolean;
  allow_auto_merge?: boolean;
  allow_merge_commit?: boolean;
  delete_branch_on_merge?: boolean;
}>;

/**
 * A named, stateless check over one repository snapshot. Implementations must be
 * pure: the same snapshot always yields the same findings, and nothing is kept
 * between repositories.
 */
export interface Rule {
  readonly id: string;
  readonly description: string;
  readonly severity: Severity;
  readonly fix?: RepositorySettingsPatch;
  evaluate(snapshot: RepositorySnapshot): readonly Finding[];
}

export type CheckRuleDefinition = {
  id: string;
  description: string;
  severity: Severity;
  fix?: RepositorySettingsPatch;
  check: (snapshot: RepositorySnapshot) => RuleOutcome;
};

export type Violation = {
  severity?: Severity;
  message?: string;
};

export type MultiCheckRuleDefinition = {
  id: string;
  description: string;
  severity: Severity;
  fix?: RepositorySettingsPatch;
  violations: (snapshot: RepositorySnapshot) => readonly Violation[];
};

export function createFinding(
  rule: Pick<Rule, "id" | "description" | "severity" | "fix">,
  snapshot: RepositorySnapshot,
  violation: Violation = {}
): Finding {
  return Object.freeze({
    ruleId: rule.id,
    repository: snapshot.ref,
    severity: violation.severity ?? rule.severity,
    message: violation.message ?? rule.description,
    fixable: rule.fix !== undefined
  });
}

/** A rule that fails at most once per repository, with its description as the message. */
export function defineRule(definition: CheckRuleDefinition): Rule {
  const { check, ...meta } = definition;
  return Object.freeze({
    ...meta,
    evaluate: (snapshot: RepositorySnapshot): readonly Finding[] =>
      check(snapshot) === "fail" ? [createFinding(meta, snapshot)] : []
  });
}

/** A rule that can report several violations, each with its own severity or message. */
export function defineMultiRule(definition: MultiCheckRuleDefinition): Rule {
  const { violations, ...meta } = definition;
  return Object.freeze({
    ...meta,
    evaluate: (snapshot: RepositorySnapshot): readonly Finding[] =>
      violations(snapshot).map((violation) => createFinding(meta, snapshot, violation))
  });
}
