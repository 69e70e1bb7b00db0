import type { RepositorySnapshot, WorkflowJob } from "../types.js";
import {
  dependabotUpdatesFor,
  grantsContentsWrite,
  hasFile,
  hasWorkflowFiles,
  someStep,
  workflowJobs
} from "./helpers.js";
import { defineRule, type Rule, type RuleOutcome } from "./rule.js";

const OUTDATED_RUNNER_IMAGES = ["ubuntu-22.04", "ubuntu-20.04", "macos-12"];

const TRUSTED_ACTION_OWNERS: ReadonlyArray<{ owner: string; slug: string }> = [
  { owner: "astral-sh", slug: "astral" },
  { owner: "aws-actions", slug: "aws" },
  { owner: "dependabot", slug: "dependabot" },
  { owner: "docker", slug: "docker" },
  { owner: "DeterminateSystems", slug: "determinate-systems" },
  { owner: "cachix", slug: "cachix" }
];

const SECRET_EXPRESSION = "${{ secrets.";

function usesActionFrom(snapshot: RepositorySnapshot, owner: string): boolean {
  return someStep(snapshot, (step) => step.uses.startsWith(`${owner}/`));
}

function actionsEnabled(snapshot: RepositorySnapshot): boolean | null {
  return snapshot.actions ? snapshot.actions.enabled : null;
}

/**
 * Whether the repository's Actions policy admits actions owned by `owner`.
 * `github` stands for GitHub's own actions, which have a dedicated toggle.
 */
function ownerAllowed(snapshot: RepositorySnapshot, owner: string): RuleOutcome {
  const actions = snapshot.actions;
  if (!actions || !actions.enabled) return "skip";
  switch (actions.allowedActions) {
    case "local_only":
      return "fail";
    case "selected": {
      const selected = actions.selectedActions;
      if (!selected) return "skip";
      if (owner === "github") return selected.githubOwnedAllowed ? "ok" : "fail";
      return selected.patternsAllowed.includes(`${owner}/*`) ? "ok" : "fail";
    }
    default:
      return "ok";
  }
}

function jobRuns(job: WorkflowJob, pattern: RegExp): boolean {
  return job.steps.some((step) => pattern.test(step.run));
}

function jobChecksOut(job: WorkflowJob, predicate: (options: Readonly<Record<string, string>>) => boolean): boolean {
  return job.steps.some((step) => step.uses.startsWith("actions/checkout") && predicate(step.with));
}

function matrixStrings(job: WorkflowJob): string[] {
  if (!job.matrix) return [];
  const values: string[] = [];
  for (const entries of Object.values(job.matrix)) {
    for (const entry of entries) {
      if (typeof entry === "string") values.push(entry);
    }
  }
  return values;
}

function anyJob(snapshot: RepositorySnapshot, predicate: (job: WorkflowJob) => boolean): boolean {
  for (const [, job] of workflowJobs(snapshot)) {
    if (predicate(job)) return true;
  }
  return false;
}

const ownedActionRules: Rule[] = TRUSTED_ACTION_OWNERS.map(({ owner, slug }) =>
  defineRule({
    id: `allow-${slug}-owned-actions`,
    description: `Repository allow actions created by ${owner}`,
    severity: "error",
    check: (snapshot) => (usesActionFrom(snapshot, owner) ? ownerAllowed(snapshot, owner) : "skip")
  })
);

export const githubActionsRules: Rule[] = [
  defineRule({
    id: "disable-actions",
    description: "Repository without workflows should disable Actions",
    severity: "error",
    check: (snapshot) => {
      if (snapshot.workflows.length > 0) return "skip";
      const enabled = actionsEnabled(snapshot);
      if (enabled === null) return "skip";
      return enabled ? "fail" : "ok";
    }
  }),
  defineRule({
    id: "disable-all-actions",
    description: "Repository should not allow all actions",
    severity: "warning",
    check: (snapshot) => {
      if (snapshot.private || !snapshot.actions?.enabled) return "skip";
      return snapshot.actions.allowedActions === "all" ? "fail" : "ok";
    }
  }),
  defineRule({
    id: "allow-github-owned-actions",
    description: "Repository allow actions created by GitHub",
    severity: "error",
    check: (snapshot) => (usesActionFrom(snapshot, "actions") ? ownerAllowed(snapshot, "github") : "skip")
  }),
  ...ownedActionRules,
  defineRule({
    id: "default-workflow-permissions",
    description: "Actions should default to read permissions",
    severity: "error",
    check: (snapshot) => {
      const permissions = snapshot.actions?.workflowPermissions;
      if (snapshot.fork || !snapshot.actions?.enabled || !permissions) return "skip";
      return permissions.defaultWorkflowPermissions === "write" ? "fail" : "ok";
    }
  }),
  defineRule({
    id: "allow-actions-approve-prs",
    description: "Allow Actions to approve pull request reviews",
    severity: "warning",
    check: (snapshot) => {
      const permissions = snapshot.actions?.workflowPermissions;
      if (snapshot.fork || !snapshot.actions?.enabled || !permissions) return "skip";
      return permissions.canApprovePullRequestReviews ? "ok" : "fail";
    }
  }),
  defineRule({
    id: "use-uv-pip",
    description: "Use uv to install pip dependencies",
    severity: "warning",
    check: (snapshot) => {
      if (snapshot.requirementsTxt === null) return "skip";
      const usesPlainPip = someStep(
        snapshot,
        (step) => step.run.includes("pip install") && !step.run.includes("uv pip install")
      );
      return usesPlainPip ? "fail" : "ok";
    }
  }),
  defineRule({
    id: "setup-uv",
    description: "Use astral-sh/setup-uv",
    severity: "error",
    check: (snapshot) => (someStep(snapshot, (step) => step.run.includes("pipx install uv")) ? "fail" : "ok")
  }),
  defineRule({
    id: "uv-pip-install-with-requirements",
    description: "Use uv pip install with requirements.txt",
    severity: "error",
    check: (snapshot) => {
      if (snapshot.requirementsTxt === null) return "skip";
      const installsLoose = someStep(
        snapshot,
        (step) => step.run.includes("uv pip install") && !step.run.includes("requirements.txt")
      );
      return installsLoose ? "fail" : "ok";
    }
  }),
  defineRule({
    id: "setup-python-with-python-version-file",
    description: "setup-python should use pyproject.toml",
    severity: "error",
    check: (snapshot) => {
      const misconfigured = someStep(snapshot, (step) => {
        if (!step.uses.startsWith("actions/setup-python")) return false;
        if ((step.with["python-version"] ?? "").includes("matrix")) return false;
        return step.with["python-version-file"] !== "pyproject.toml";
      });
      return misconfigured ? "fail" : "ok";
    }
  }),
  defineRule({
    id: "disable-setup-python-cache",
    description: "setup-python cache should be disabled when using uv",
    severity: "error",
    check: (snapshot) => {
      const cached = anyJob(
        snapshot,
        (job) =>
          jobRuns(job, /uv /) &&
          job.steps.some((step) => step.uses.startsWith("actions/setup-python") && "cache" in step.with)
      );
      return cached ? "fail" : "ok";
    }
  }),
  defineRule({
    id: "no-flake-checker-action",
    description: "Do not use DeterminateSystems/flake-checker-action",
    severity: "warning",
    check: (snapshot) =>
      someStep(snapshot, (step) => step.uses.startsWith("DeterminateSystems/flake-checker-action")) ? "fail" : "ok"
  }),
  defineRule({
    id: "nix-flake-check-no-checkout",
    description: "Use direct repo URI instead of checkout for 'nix flake check'",
    severity: "warning",
    check: (snapshot) => {
      if (!hasFile(snapshot, "flake.nix")) return "skip";
      const checksOutCopy = anyJob(
        snapshot,
        (job) => jobRuns(job, /nix flake check/) && jobChecksOut(job, () => true)
      );
      return checksOutCopy ? "fail" : "ok";
    }
  }),
  defineRule({
    id: "git-commit-name",
    description: "Git commit name to github-actions",
    severity: "error",
    check: (snapshot) => {
      const wrongName = someStep(
        snapshot,
        (step) =>
          /git config/.test(step.run) &&
          /user\.name/.test(step.run) &&
          !/github-actions\[bot\]|outputs\.app-slug/.test(step.run)
      );
      return wrongName ? "fail" : "ok";
    }
  }),
  defineRule({
    id: "git-commit-email",
    description: "Git commit email to github-actions",
    severity: "error",
    check: (snapshot) => {
      const wrongEmail = someStep(
        snapshot,
        (step) =>
          /git config/.test(step.run) &&
          /user\.email/.test(step.run) &&
          !/41898282\+github-actions\[bot\]@users\.noreply\.github\.com|outputs\.app-slug/.test(step.run)
      );
      return wrongEmail ? "fail" : "ok";
    }
  }),
  defineRule({
    id: "no-workflow-env-secrets",
    description: "Do not expose secrets to entire workflow environment",
    severity: "warning",
    check: (snapshot) =>
      snapshot.workflows.some((workflow) => Object.values(workflow.env).some((value) => value.includes(SECRET_EXPRESSION)))
        ? "fail"
        : "ok"
  }),
  defineRule({
    id: "no-job-env-secrets",
    description: "Do not expose secrets to entire job environment",
    severity: "warning",
    check: (snapshot) =>
      anyJob(snapshot, (job) => Object.values(job.env).some((value) => value.includes(SECRET_EXPRESSION)))
        ? "fail"
        : "ok"
  }),
  defineRule({
    id: "wip-gh-pages-branch",
    description: "Avoid using gh-pages branch",
    severity: "warning",
    check: (snapshot) => (snapshot.pagesSourceBranch === "gh-pages" ? "fail" : "ok")
  }),
  defineRule({
    id: "git-push-concurrency-group",
    description: "Jobs that use git push must be in a concurrency group",
    severity: "error",
    check: (snapshot) => {
      const unguarded = snapshot.workflows.some((workflow) =>
        workflow.jobs.some((job) => jobRuns(job, /git push/) && !workflow.hasConcurrency && !job.hasConcurrency)
      );
      return unguarded ? "fail" : "ok";
    }
  }),
  defineRule({
    id: "git-push-if-commited",
    description: "git push step should only run if changes are commited",
    severity: "error",
    check: (snapshot) =>
      someStep(snapshot, (step) => /git push/.test(step.run) && step.condition === null) ? "fail" : "ok"
  }),
  defineRule({
    id: "enable-write-contents-permission",
    description: "Workflows using git push must have contents write permission",
    severity: "error",
    check: (snapshot) => {
      if (!snapshot.actions?.enabled) return "skip";
      const missing = snapshot.workflows.some((workflow) =>
        workflow.jobs.some(
          (job) =>
            jobRuns(job, /git push/) &&
            !grantsContentsWrite(job.permissions) &&
            !grantsContentsWrite(workflow.permissions)
        )
      );
      return missing ? "fail" : "ok";
    }
  }),
  defineRule({
    id: "git-push-pat",
    description: "Use PAT when git pushing",
    severity: "warning",
    check: (snapshot) => {
      const pagesBranch = snapshot.pagesSourceBranch;
      const pushesWithDefaultToken = anyJob(snapshot, (job) => {
        if (jobChecksOut(job, (options) => Boolean(options.token))) return false;
        if (!jobRuns(job, /git push/)) return false;
        if (jobChecksOut(job, (options) => options.ref === "secrets" || options.ref === "data")) return false;
        if (pagesBranch && job.steps.some((step) => /git push/.test(step.run) && step.run.includes(pagesBranch))) {
          return false;
        }
        return true;
      });
      return pushesWithDefaultToken ? "fail" : "ok";
    }
  }),
  defineRule({
    id: "dependabot-github-actions",
    description: "Dependabot should be enabled for GitHub Actions if workflows are present",
    severity: "error",
    check: (snapshot) => {
      if (!hasWorkflowFiles(snapshot)) return "skip";
      return dependabotUpdatesFor(snapshot, "github-actions").length > 0 ? "ok" : "fail";
    }
  }),
  defineRule({
    id: "runner-os",
    description: "Lock GitHub Actions runner to a specific version",
    severity: "error",
    check: (snapshot) =>
      anyJob(
        snapshot,
        (job) => job.runsOn.includes("-latest") || matrixStrings(job).some((value) => value.endsWith("-latest"))
      )
        ? "fail"
        : "ok"
  }),
  defineRule({
    id: "runner-os-outdated",
    description: "Use latest runner image",
    severity: "warning",
    check: (snapshot) =>
      anyJob(snapshot, (job) =>
        [job.runsOn, ...matrixStrings(job)].some((value) =>
          OUTDATED_RUNNER_IMAGES.some((image) => value.includes(image))
        )
      )
        ? "fail"
        : "ok"
  }),
  defineRule({
    id: "arm64-qemu",
    description: "Use native ARM64 runner instead of QEMU",
    severity: "error",
    check: (snapshot) =>
      someStep(
        snapshot,
        (step) => step.uses.startsWith("docker/setup-qemu-action") && (step.with.platforms ?? "").includes("arm64")
      )
        ? "fail"
        : "ok"
  })
];
