import type { RepositorySnapshot, Workflow, WorkflowJob, WorkflowStep } from "../types.js";
import type { RuleOutcome } from "./rule.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export function hasFile(snapshot: RepositorySnapshot, filePath: string): boolean {
  return snapshot.treePaths.includes(filePath);
}

export function fileExtensions(snapshot: RepositorySnapshot): Set<string> {
  const extensions = new Set<string>();
  for (const filePath of snapshot.treePaths) {
    const base = filePath.slice(filePath.lastIndexOf("/") + 1);
    const dot = base.lastIndexOf(".");
    if (dot > 0) extensions.add(base.slice(dot));
  }
  return extensions;
}

export function hasWorkflowFiles(snapshot: RepositorySnapshot): boolean {
  return snapshot.treePaths.some((filePath) => filePath.startsWith(".github/workflows/"));
}

export function* workflowJobs(snapshot: RepositorySnapshot): Generator<[Workflow, WorkflowJob]> {
  for (const workflow of snapshot.workflows) {
    for (const job of workflow.jobs) {
      yield [workflow, job];
    }
  }
}

export function* workflowSteps(snapshot: RepositorySnapshot): Generator<WorkflowStep> {
  for (const [, job] of workflowJobs(snapshot)) {
    yield* job.steps;
  }
}

export function someStep(snapshot: RepositorySnapshot, predicate: (step: WorkflowStep) => boolean): boolean {
  for (const step of workflowSteps(snapshot)) {
    if (predicate(step)) return true;
  }
  return false;
}

export function isNewRepository(snapshot: RepositorySnapshot, days = 90): boolean {
  const createdAt = Date.parse(snapshot.createdAt);
  const fetchedAt = Date.parse(snapshot.fetchedAt);
  if (!Number.isFinite(createdAt) || !Number.isFinite(fetchedAt)) return false;
  return createdAt > fetchedAt - days * DAY_MS;
}

/** Status-check contexts required on the default branch, by rulesets or classic protection. */
export function requiredStatusChecks(snapshot: RepositorySnapshot): string[] {
  const contexts: string[] = [];
  for (const rule of snapshot.branchRules) {
    if (rule.type === "required_status_checks") contexts.push(...rule.requiredStatusChecks);
  }
  if (snapshot.defaultBranchProtection) {
    contexts.push(...snapshot.defaultBranchProtection.requiredStatusChecks);
  }
  return contexts;
}

/**
 * `ok` when a job named `jobName` is required as a status check. Matrix jobs report
 * as `name (variant)`, so a `jobName ` prefix counts too.
 */
export function requiredJobStatusCheck(snapshot: RepositorySnapshot, jobName: string): RuleOutcome {
  let defined = false;
  for (const [, job] of workflowJobs(snapshot)) {
    if (job.id === jobName) {
      defined = true;
      break;
    }
  }
  if (!defined) return "skip";
  const required = requiredStatusChecks(snapshot).some(
    (context) => context === jobName || context.startsWith(`${jobName} `)
  );
  return required ? "ok" : "fail";
}

function requirementLines(snapshot: RepositorySnapshot): string[] {
  if (!snapshot.requirementsTxt) return [];
  return snapshot.requirementsTxt
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith("#"));
}

/** Every requirement is pinned with `==` or given as a direct `@` reference. */
export function requirementsArePinned(snapshot: RepositorySnapshot): boolean {
  return requirementLines(snapshot).every(
    (line) => line.startsWith("-") || line.includes("@") || line.includes("==")
  );
}

export function requirementsMention(snapshot: RepositorySnapshot, fragment: string): boolean {
  return requirementLines(snapshot).some((line) => line.includes(fragment));
}

export function dependabotUpdatesFor(snapshot: RepositorySnapshot, ecosystem: string) {
  return (snapshot.dependabot?.updates ?? []).filter((update) => update.packageEcosystem === ecosystem);
}

export function grantsContentsWrite(permissions: Readonly<Record<string, string>>): boolean {
  return permissions.contents === "write" || permissions["*"] === "write-all";
}

export function stepRunsCommand(step: WorkflowStep, pattern: RegExp): boolean {
  return pattern.test(step.run);
}
