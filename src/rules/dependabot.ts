import type { RepositorySnapshot } from "../types.js";
import { dependabotUpdatesFor, hasFile, requirementsMention } from "./helpers.js";
import { defineRule, type Rule, type RuleOutcome } from "./rule.js";

function pipIgnores(snapshot: RepositorySnapshot, dependencyName: string): RuleOutcome {
  const ignored = dependabotUpdatesFor(snapshot, "pip").some((update) =>
    update.ignoredDependencies.includes(dependencyName)
  );
  return ignored ? "ok" : "fail";
}

export const dependabotRules: Rule[] = [
  defineRule({
    id: "allow-auto-merge",
    description: "Repository should allow auto-merge",
    severity: "warning",
    fix: { allow_auto_merge: true },
    check: (snapshot) => {
      if (snapshot.fork || !snapshot.dependabot) return "skip";
      return snapshot.allowAutoMerge ? "ok" : "fail";
    }
  }),
  defineRule({
    id: "dependabot-auto-merge",
    description: "Set up Dependabot auto-merge",
    severity: "warning",
    check: (snapshot) => {
      if (snapshot.fork || !snapshot.dependabot) return "skip";
      return hasFile(snapshot, ".github/workflows/merge.yml") ? "ok" : "fail";
    }
  }),
  defineRule({
    id: "dependabot-schedule-weekly",
    description: "Dependabot should be scheduled weekly",
    severity: "warning",
    check: (snapshot) => {
      if (!snapshot.dependabot) return "skip";
      const intervals = new Set(snapshot.dependabot.updates.map((update) => update.scheduleInterval));
      return intervals.size === 1 && intervals.has("weekly") ? "ok" : "fail";
    }
  }),
  defineRule({
    id: "pip-dependabot",
    description: "Dependabot should be enabled for pip ecosystem",
    severity: "error",
    check: (snapshot) => {
      if (snapshot.requirementsTxt === null) return "skip";
      return dependabotUpdatesFor(snapshot, "pip").length > 0 ? "ok" : "fail";
    }
  }),
  defineRule({
    id: "pip-dependabot-ignore-types",
    description: "Dependabot should ignore types-* packages",
    severity: "warning",
    check: (snapshot) => {
      if (!requirementsMention(snapshot, "types-")) return "skip";
      return pipIgnores(snapshot, "types-*");
    }
  }),
  defineRule({
    id: "pip-dependabot-ignore-ruff-patches",
    description: "Dependabot should ignore ruff patches",
    severity: "warning",
    check: (snapshot) => {
      if (!requirementsMention(snapshot, "ruff==")) return "skip";
      return pipIgnores(snapshot, "ruff");
    }
  })
];
