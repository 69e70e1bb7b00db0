import type { PyprojectSummary, RepositorySnapshot } from "../types.js";
import { fileExtensions, hasFile, requiredJobStatusCheck, requirementsArePinned, someStep } from "./helpers.js";
import { defineMultiRule, defineRule, type Rule, type RuleOutcome, type Violation } from "./rule.js";

const MIT_LICENSE = "MIT License";
const MIT_LICENSE_CLASSIFIER = "License :: OSI Approved :: MIT License";

function withPyproject(
  check: (pyproject: PyprojectSummary, snapshot: RepositorySnapshot) => RuleOutcome
): (snapshot: RepositorySnapshot) => RuleOutcome {
  return (snapshot) => (snapshot.pyproject ? check(snapshot.pyproject, snapshot) : "skip");
}

function allDependencies(pyproject: PyprojectSummary): string[] {
  return [...pyproject.dependencies, ...Object.values(pyproject.optionalDependencies).flat()];
}

function hasLowerBound(dependency: string): boolean {
  return ["==", ">", "~=", "@"].some((operator) => dependency.includes(operator));
}

function isMitLicensed(snapshot: RepositorySnapshot): boolean {
  return snapshot.license?.name === MIT_LICENSE;
}

/**
 * Python repositories must run `tool` in a workflow; repositories that merely
 * contain `.py` files get a warning instead.
 */
function workflowToolViolations(tool: string, pythonOnly: boolean) {
  return (snapshot: RepositorySnapshot): Violation[] => {
    if (someStep(snapshot, (step) => step.run.includes(`${tool} `))) return [];
    if (snapshot.language === "Python") return [{ severity: "error" }];
    if (!pythonOnly && fileExtensions(snapshot).has(".py")) return [{ severity: "warning" }];
    return [];
  };
}

export const pythonRules: Rule[] = [
  defineRule({
    id: "missing-pyproject",
    description: "Missing pyproject.toml",
    severity: "error",
    check: (snapshot) => {
      if (snapshot.language !== "Python") return "skip";
      return snapshot.pyproject ? "ok" : "fail";
    }
  }),
  defineRule({
    id: "missing-pyproject-project-name",
    description: "project.name missing in pyproject.toml",
    severity: "error",
    check: withPyproject((pyproject) => (pyproject.projectName === null ? "fail" : "ok"))
  }),
  defineRule({
    id: "pyproject-mit-license-classifier",
    description: "License classifier missing in pyproject.toml",
    severity: "error",
    check: withPyproject((pyproject, snapshot) => {
      if (!isMitLicensed(snapshot)) return "skip";
      return pyproject.classifiers.includes(MIT_LICENSE_CLASSIFIER) ? "ok" : "fail";
    })
  }),
  defineRule({
    id: "pyproject-omit-license",
    description: "License classifier should be omitted when using MIT License",
    severity: "warning",
    check: withPyproject((pyproject, snapshot) => {
      if (!isMitLicensed(snapshot)) return "skip";
      return pyproject.hasLicense ? "fail" : "ok";
    })
  }),
  defineRule({
    id: "pyproject-author-name",
    description: "project.authors[0].name missing in pyproject.toml",
    severity: "warning",
    check: withPyproject((pyproject) => (pyproject.authors.some((author) => author.name) ? "ok" : "fail"))
  }),
  defineRule({
    id: "pyproject-omit-author-email",
    description: "project.authors[0].email should be omitted for privacy",
    severity: "warning",
    check: withPyproject((pyproject) => (pyproject.authors.some((author) => author.email) ? "fail" : "ok"))
  }),
  defineRule({
    id: "pyproject-readme",
    description: "project.readme missing in pyproject.toml",
    severity: "error",
    check: withPyproject((pyproject) => (pyproject.hasReadme ? "ok" : "fail"))
  }),
  defineRule({
    id: "missing-pyproject-requires-python",
    description: "project.requires-python missing in pyproject.toml",
    severity: "error",
    check: withPyproject((pyproject) => (pyproject.requiresPython ? "ok" : "fail"))
  }),
  defineRule({
    id: "pyproject-dependency-lower-bound",
    description: "Dependencies should have lower bound",
    severity: "error",
    check: withPyproject((pyproject) => (allDependencies(pyproject).every(hasLowerBound) ? "ok" : "fail"))
  }),
  defineRule({
    id: "pyproject-optional-dependencies-name",
    description: "pyproject optional-dependencies should be named 'dev'",
    severity: "warning",
    check: withPyproject((pyproject) => {
      const groups = Object.keys(pyproject.optionalDependencies);
      if (groups.length === 0) return "ok";
      return groups.length === 1 && groups[0] === "dev" ? "ok" : "fail";
    })
  }),
  defineRule({
    id: "pyproject-depends-on-requests",
    description: "Avoid requests dependency",
    severity: "warning",
    check: withPyproject((pyproject) =>
      allDependencies(pyproject).some((dependency) => dependency.startsWith("requests")) ? "fail" : "ok"
    )
  }),
  defineRule({
    id: "missing-pyproject-ruff-isort-rules",
    description: "tool.ruff.lint.extend-select missing 'I' to enable isort rules",
    severity: "error",
    check: withPyproject((pyproject) => (pyproject.ruffExtendSelect.includes("I") ? "ok" : "fail"))
  }),
  defineRule({
    id: "missing-pyproject-ruff-pyupgrade-rules",
    description: "tool.ruff.lint.extend-select missing 'UP' to enable pyupgrade rules",
    severity: "error",
    check: withPyproject((pyproject) => (pyproject.ruffExtendSelect.includes("UP") ? "ok" : "fail"))
  }),
  defineRule({
    id: "mypy-strict-declared",
    description: "mypy strict mode is not declared",
    severity: "error",
    check: withPyproject((pyproject) => (pyproject.mypyStrict === null ? "fail" : "ok"))
  }),
  defineRule({
    id: "mypy-strict",
    description: "mypy strict mode is not enabled",
    severity: "warning",
    check: withPyproject((pyproject) => (pyproject.mypyStrict === false ? "fail" : "ok"))
  }),
  defineRule({
    id: "requirements-txt-exact",
    description: "Use exact versions in requirements.txt",
    severity: "error",
    check: (snapshot) => {
      if (snapshot.requirementsTxt === null) return "skip";
      return requirementsArePinned(snapshot) ? "ok" : "fail";
    }
  }),
  defineRule({
    id: "requirements-txt-uv-compiled",
    description: "requirements.txt is not compiled by uv",
    severity: "warning",
    check: (snapshot) => {
      if (snapshot.requirementsTxt === null) return "skip";
      return snapshot.requirementsTxt.includes("uv pip compile") ? "ok" : "fail";
    }
  }),
  defineRule({
    id: "prefer-uv-lock",
    description: "Prefer uv.lock instead of requirements.txt",
    severity: "warning",
    check: (snapshot) => {
      if (snapshot.requirementsTxt === null) return "skip";
      return hasFile(snapshot, "uv.lock") ? "ok" : "fail";
    }
  }),
  defineMultiRule({
    id: "missing-ruff",
    description: "Missing GitHub Actions workflow for ruff linting",
    severity: "error",
    violations: workflowToolViolations("ruff", false)
  }),
  defineRule({
    id: "required-ruff-status-check",
    description: "Add Ruleset to require 'ruff' status check",
    severity: "warning",
    check: (snapshot) => requiredJobStatusCheck(snapshot, "ruff")
  }),
  defineMultiRule({
    id: "missing-mypy",
    description: "Missing GitHub Actions workflow for mypy type checking",
    severity: "error",
    violations: workflowToolViolations("mypy", true)
  }),
  defineRule({
    id: "required-mypy-status-check",
    description: "Add Ruleset to require 'mypy' status check",
    severity: "warning",
    check: (snapshot) => requiredJobStatusCheck(snapshot, "mypy")
  })
];
