import assert from "node:assert/strict";
import { test } from "node:test";
import {
  parseBranchProtection,
  parseDependabotConfig,
  parsePyproject,
  parseRepositoryPayload,
  parseWorkflow
} from "../snapshotParsers.js";
import { UnexpectedPayloadError } from "../../errors/github.errors.js";

test("parses workflow jobs, steps and permissions", () => {
  const workflow = parseWorkflow(
    ".github/workflows/release.yml",
    `name: Release
on:
  push:
    branches: [main]
permissions: write-all
concurrency: release
env:
  PYTHONUNBUFFERED: 1
jobs:
  build:
    runs-on: [self-hosted, linux]
    strategy:
      matrix:
        python: ["3.12", "3.13"]
        include:
          - python: "3.14"
    permissions:
      contents: write
    steps:
      - name: Checkout
        uses: actions/checkout@v4
        with:
          fetch-depth: 0
      - if: github.ref == 'refs/heads/main'
        run: git push
        env:
          TOKEN: \${{ secrets.PUSH_TOKEN }}
`
  );

  assert.equal(workflow.parseError, null);
  assert.equal(workflow.name, "Release");
  assert.deepEqual(workflow.permissions, { "*": "write-all" });
  assert.equal(workflow.hasConcurrency, true);
  assert.deepEqual(workflow.env, { PYTHONUNBUFFERED: "1" });
  const [job] = workflow.jobs;
  assert.equal(job.id, "build");
  assert.equal(job.runsOn, "self-hosted linux");
  assert.deepEqual(job.matrix, { python: ["3.12", "3.13"] });
  assert.deepEqual(job.permissions, { contents: "write" });
  assert.deepEqual(job.steps[0], {
    name: "Checkout",
    uses: "actions/checkout@v4",
    run: "",
    condition: null,
    with: { "fetch-depth": "0" },
    env: {}
  });
  assert.equal(job.steps[1].condition, "github.ref == 'refs/heads/main'");
  assert.deepEqual(job.steps[1].env, { TOKEN: "${{ secrets.PUSH_TOKEN }}" });
});

test("keeps an unparsable workflow as an empty one with the error", () => {
  const workflow = parseWorkflow(".github/workflows/broken.yml", "jobs: [unclosed");
  assert.deepEqual(workflow.jobs, []);
  assert.equal(typeof workflow.parseError, "string");

  assert.equal(parseWorkflow(".github/workflows/list.yml", "- a\n- b\n").parseError, "workflow is not a YAML mapping");
});

test("parses Dependabot updates and ignored dependencies", () => {
  const config = parseDependabotConfig(
    ".github/dependabot.yml",
    `version: 2
updates:
  - package-ecosystem: pip
    directory: /
    schedule:
      interval: weekly
    ignore:
      - dependency-name: "types-*"
      - dependency-name: ruff
        update-types: ["version-update:semver-patch"]
  - directory: /docs
`
  );
  assert.deepEqual(config, {
    path: ".github/dependabot.yml",
    updates: [{ packageEcosystem: "pip", scheduleInterval: "weekly", ignoredDependencies: ["types-*", "ruff"] }]
  });
  assert.equal(parseDependabotConfig(".github/dependabot.yml", ""), null);
});

test("summarises pyproject.toml", () => {
  const summary = parsePyproject(`[project]
name = "widgets"
readme = "README.md"
requires-python = ">=3.12"
authors = [{ name = "Jo Doe", email = "jo@example.com" }]
classifiers = ["License :: OSI Approved :: MIT License"]
dependencies = ["click>=8.0", "requests"]

[project.optional-dependencies]
dev = ["ruff>=0.5"]

[tool.ruff.lint]
extend-select = ["I", "UP"]
`);
  assert.deepEqual(summary, {
    projectName: "widgets",
    hasReadme: true,
    hasLicense: false,
    requiresPython: ">=3.12",
    classifiers: ["License :: OSI Approved :: MIT License"],
    authors: [{ name: "Jo Doe", email: "jo@example.com" }],
    dependencies: ["click>=8.0", "requests"],
    optionalDependencies: { dev: ["ruff>=0.5"] },
    ruffExtendSelect: ["I", "UP"],
    mypyStrict: null
  });
  assert.equal(parsePyproject("[project\nname ="), null);
});

test("an empty pyproject.toml is treated as absent", () => {
  assert.equal(parsePyproject(""), null);
  assert.equal(parsePyproject("# managed elsewhere\n"), null);
  assert.notEqual(parsePyproject("[tool.ruff]\n"), null);
});

test("reads branch protection contexts from both check formats", () => {
  assert.equal(parseBranchProtection({ name: "main", protected: false }), null);
  assert.deepEqual(
    parseBranchProtection({
      protected: true,
      protection: {
        enabled: true,
        required_status_checks: {
          enforcement_level: "non_admins",
          contexts: ["test"],
          checks: [{ context: "test" }, { context: "mypy" }]
        }
      }
    }),
    { enabled: true, requiredStatusChecks: ["test", "mypy"], enforcementLevel: "non_admins" }
  );
});

test("rejects a repository payload without required fields", () => {
  assert.throws(
    () => parseRepositoryPayload({ name: "widgets" }, "/repos/acme/widgets"),
    (err: unknown) =>
      err instanceof UnexpectedPayloadError &&
      err.message === 'Unexpected GitHub response for /repos/acme/widgets: missing string field "login"'
  );
  const payload = parseRepositoryPayload(
    {
      name: "widgets",
      full_name: "acme/widgets",
      owner: { login: "acme" },
      private: true,
      default_branch: "main",
      created_at: "2020-01-01T00:00:00Z",
      description: ""
    },
    "/repos/acme/widgets"
  );
  assert.equal(payload.visibility, "private");
  assert.equal(payload.description, null);
  assert.equal(payload.allowMergeCommit, true);
  assert.equal(payload.license, null);
});
