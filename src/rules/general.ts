import type { RepositorySnapshot } from "../types.js";
import { hasFile, isNewRepository, requiredJobStatusCheck, requiredStatusChecks } from "./helpers.js";
import { defineMultiRule, defineRule, type Rule, type Violation } from "./rule.js";

const MIT_LICENSE = "MIT License";
const SIZE_ERROR_KB = 1024 * 1024;
const SIZE_WARNING_KB = 50 * 1024;

function formatSize(sizeKb: number): string {
  return sizeKb >= SIZE_ERROR_KB
    ? `${(sizeKb / SIZE_ERROR_KB).toFixed(1)} GB`
    : `${(sizeKb / 1024).toFixed(1)} MB`;
}

function sizeViolations(snapshot: RepositorySnapshot): Violation[] {
  const message = `Repository size is too large (${formatSize(snapshot.sizeKb)})`;
  if (snapshot.sizeKb > SIZE_ERROR_KB) return [{ severity: "error", message }];
  if (snapshot.sizeKb > SIZE_WARNING_KB) return [{ severity: "warning", message }];
  return [];
}

export const generalRules: Rule[] = [
  defineRule({
    id: "missing-description",
    description: "Missing repository description",
    severity: "error",
    check: (snapshot) => (snapshot.description ? "ok" : "fail")
  }),
  defineRule({
    id: "missing-license",
    description: "Missing license file",
    severity: "error",
    check: (snapshot) => {
      if (snapshot.private) return "skip";
      return snapshot.license ? "ok" : "fail";
    }
  }),
  defineRule({
    id: "non-mit-license",
    description: "Using non-MIT license",
    severity: "warning",
    check: (snapshot) => {
      if (snapshot.private) return "skip";
      return snapshot.license && snapshot.license.name !== MIT_LICENSE ? "fail" : "ok";
    }
  }),
  defineRule({
    id: "missing-readme",
    description: "Missing README file",
    severity: "error",
    check: (snapshot) => (snapshot.hasReadme ? "ok" : "fail")
  }),
  defineRule({
    id: "missing-agents",
    description: "Missing AGENTS.md file",
    severity: "warning",
    check: (snapshot) => (hasFile(snapshot, "AGENTS.md") ? "ok" : "fail")
  }),
  defineRule({
    id: "missing-topics",
    description: "Missing topics",
    severity: "error",
    check: (snapshot) => (snapshot.topics.length === 0 ? "fail" : "ok")
  }),
  defineRule({
    id: "too-few-topics",
    description: "Only one topic",
    severity: "warning",
    check: (snapshot) => (snapshot.topics.length === 1 ? "fail" : "ok")
  }),
  defineRule({
    id: "has-issues",
    description: "Repository doesn't have Issues enabled",
    severity: "warning",
    fix: { has_issues: true },
    check: (snapshot) => (snapshot.hasIssues ? "ok" : "fail")
  }),
  defineRule({
    id: "no-projects",
    description: "Repository has Projects enabled",
    severity: "warning",
    fix: { has_projects: false },
    check: (snapshot) => (snapshot.hasProjects ? "fail" : "ok")
  }),
  defineRule({
    id: "no-wiki",
    description: "Repository has Wiki enabled",
    severity: "error",
    fix: { has_wiki: false },
    check: (snapshot) => (snapshot.hasWiki ? "fail" : "ok")
  }),
  defineRule({
    id: "no-discussions",
    description: "Repository has Discussions enabled",
    severity: "error",
    fix: { has_discussions: false },
    check: (snapshot) => (snapshot.hasDiscussions ? "fail" : "ok")
  }),
  defineMultiRule({
    id: "git-size",
    description: "Repository size is too large",
    severity: "error",
    violations: sizeViolations
  }),
  defineRule({
    id: "delete-branch-on-merge",
    description: "Repository should delete branches on merge",
    severity: "error",
    fix: { delete_branch_on_merge: true },
    check: (snapshot) => (snapshot.deleteBranchOnMerge ? "ok" : "fail")
  }),
  defineRule({
    id: "enable-merge-commit",
    description: "Repository should allow merge commits",
    severity: "warning",
    fix: { allow_merge_commit: true },
    check: (snapshot) => (snapshot.allowMergeCommit ? "ok" : "fail")
  }),
  defineRule({
    id: "tag-stable-projects",
    description: "Tag latest repository release",
    severity: "warning",
    check: (snapshot) => {
      if (snapshot.private || isNewRepository(snapshot) || !snapshot.activity) return "skip";
      if (snapshot.activity.hasRecentChanges) return "skip";
      return snapshot.activity.hasChangesSinceRelease ? "fail" : "ok";
    }
  }),
  defineRule({
    id: "default-branch-protection",
    description: "Default branch should be protected",
    severity: "error",
    check: (snapshot) => {
      if (snapshot.defaultBranchProtection?.enabled) return "ok";
      return snapshot.branchRules.length > 0 ? "ok" : "fail";
    }
  }),
  defineRule({
    id: "required-status-check",
    description: "Add Ruleset to require some status check",
    severity: "error",
    check: (snapshot) => {
      if (!snapshot.allowAutoMerge || !hasFile(snapshot, ".github/workflows/merge.yml")) return "skip";
      const hasStatusCheckRule = snapshot.branchRules.some((rule) => rule.type === "required_status_checks");
      return hasStatusCheckRule || requiredStatusChecks(snapshot).length > 0 ? "ok" : "fail";
    }
  }),
  defineRule({
    id: "required-test-status-check",
    description: "Add Ruleset to require 'test' status check",
    severity: "warning",
    check: (snapshot) => requiredJobStatusCheck(snapshot, "test")
  })
];
