import { hasFile, requiredJobStatusCheck } from "./helpers.js";
import { defineRule, type Rule } from "./rule.js";

export const nixRules: Rule[] = [
  defineRule({
    id: "required-lockfile-drv-changed-status-check",
    description: "Add Ruleset to require 'lockfile-drv-changed' status check",
    severity: "error",
    check: (snapshot) => requiredJobStatusCheck(snapshot, "lockfile-drv-changed")
  }),
  defineRule({
    id: "renovate-nix",
    description: "Configure Renovate for Nix updates",
    severity: "error",
    check: (snapshot) => {
      if (!hasFile(snapshot, "flake.nix")) return "skip";
      return hasFile(snapshot, ".github/renovate.json") ? "ok" : "fail";
    }
  })
];
