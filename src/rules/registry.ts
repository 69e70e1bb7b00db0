import { DuplicateRuleIdError, UnknownRuleError } from "../errors/rule.errors.js";
import { dependabotRules } from "./dependabot.js";
import { generalRules } from "./general.js";
import { githubActionsRules } from "./githubActions.js";
import { nixRules } from "./nix.js";
import { pythonRules } from "./python.js";
import type { Rule } from "./rule.js";

/** Immutable, ordered set of rules keyed by id. */
export class RuleRegistry {
  private readonly rules: readonly Rule[];
  private readonly byId: ReadonlyMap<string, Rule>;

  constructor(rules: Iterable<Rule>) {
    const ordered: Rule[] = [];
    const byId = new Map<string, Rule>();
    for (const rule of rules) {
      if (byId.has(rule.id)) {
        throw new DuplicateRuleIdError(rule.id);
      }
      byId.set(rule.id, rule);
      ordered.push(rule);
    }
    this.rules = Object.freeze(ordered);
    this.byId = byId;
  }

  all(): readonly Rule[] {
    return this.rules;
  }

  ids(): string[] {
    return this.rules.map((rule) => rule.id);
  }

  get(id: string): Rule | undefined {
    return this.byId.get(id);
  }

  /**
   * Subset in registration order. An empty `names` selects every rule; any unknown
   * name fails the whole call.
   */
  filter(names: Iterable<string>): readonly Rule[] {
    const wanted = new Set(names);
    if (wanted.size === 0) return this.rules;
    const unknown = [...wanted].filter((name) => !this.byId.has(name));
    if (unknown.length > 0) {
      throw new UnknownRuleError(unknown, this.ids());
    }
    return this.rules.filter((rule) => wanted.has(rule.id));
  }
}

export const defaultRegistry = new RuleRegistry([
  ...generalRules,
  ...dependabotRules,
  ...githubActionsRules,
  ...pythonRules,
  ...nixRules
]);
