export class UnknownRuleError extends Error {
  readonly unknown: string[];

  constructor(unknown: string[], known: string[]) {
    const label = unknown.length === 1 ? "rule" : "rules";
    super(`Unknown ${label}: ${unknown.join(", ")}. Known rules: ${known.join(", ")}.`);
    this.name = "UnknownRuleError";
    this.unknown = unknown;
  }
}

export class DuplicateRuleIdError extends Error {
  constructor(id: string) {
    super(`Rule id "${id}" is registered more than once.`);
    this.name = "DuplicateRuleIdError";
  }
}

export class RuleEvaluationError extends Error {
  readonly ruleId: string;
  readonly repository: string;

  constructor(ruleId: string, repository: string, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`Rule ${ruleId} failed on ${repository}: ${message}`, { cause });
    this.name = "RuleEvaluationError";
    this.ruleId = ruleId;
    this.repository = repository;
  }
}
