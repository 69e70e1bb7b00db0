import assert from "node:assert/strict";
import { test } from "node:test";
import { formatFindingLines, formatRunResultJson, formatRunResultText, formatSummary } from "../formatters.js";
import { makeRef } from "../../__tests__/fixtures.js";
import type { Finding, RunResult } from "../../types.js";

const findings: Finding[] = [
  {
    ruleId: "missing-description",
    repository: makeRef("acme", "a"),
    severity: "error",
    message: "Missing repository description",
    fixable: false
  },
  {
    ruleId: "git-size",
    repository: makeRef("acme", "a"),
    severity: "warning",
    message: "Repository size is too large (60.0 MB)",
    fixable: false
  },
  {
    ruleId: "missing-description",
    repository: makeRef("acme", "b"),
    severity: "error",
    message: "Missing repository description",
    fixable: false
  }
];

const makeResult = (overrides: Partial<RunResult> = {}): RunResult => ({
  findings,
  errors: [],
  evaluated: [makeRef("acme", "a"), makeRef("acme", "b")],
  notStarted: [],
  cancelled: false,
  selectedRules: ["missing-description", "git-size"],
  durationMs: 1200,
  ...overrides
});

const failedResult = makeResult({
  errors: [
    {
      scope: "repository",
      repository: makeRef("acme", "private-repo"),
      errorName: "ForbiddenError",
      message: "GitHub denied access (403) to https://api.github.com/repos/acme/private-repo"
    },
    {
      scope: "rule",
      repository: makeRef("acme", "b"),
      ruleId: "explodes",
      errorName: "RuleEvaluationError",
      message: "Rule explodes failed on acme/b: boom"
    }
  ]
});

test("prints one line per finding grouped by repository", () => {
  assert.deepEqual(formatFindingLines(makeResult(), { format: "repo", color: false }), [
    "acme/a: error Missing repository description [missing-description]",
    "acme/a: warning Repository size is too large (60.0 MB) [git-size]",
    "acme/b: error Missing repository description [missing-description]"
  ]);
});

test("prints one line per finding grouped by rule", () => {
  assert.deepEqual(formatFindingLines(makeResult(), { format: "rule", color: false }), [
    "missing-description: error Missing repository description [acme/a]",
    "missing-description: error Missing repository description [acme/b]",
    "git-size: warning Repository size is too large (60.0 MB) [acme/a]"
  ]);
});

test("separates a clean run from an incomplete one", () => {
  assert.deepEqual(formatSummary(makeResult({ findings: [], evaluated: [makeRef()] })), [
    "No violations found in 1 repository."
  ]);
  assert.deepEqual(formatSummary(failedResult), [
    "3 findings (2 errors, 1 warning) in 2 repositories.",
    "Audit could not complete for 1 repository / 1 rule evaluation."
  ]);
  assert.deepEqual(
    formatSummary(makeResult({ findings: [], cancelled: true, notStarted: [makeRef("acme", "c"), makeRef("acme", "d")] })),
    ["No violations found in 2 repositories.", "Run cancelled; 2 repositories not started."]
  );
});

test("renders findings, errors and the summary as text", () => {
  assert.equal(
    formatRunResultText(failedResult, { format: "repo", color: false }),
    [
      "acme/a: error Missing repository description [missing-description]",
      "acme/a: warning Repository size is too large (60.0 MB) [git-size]",
      "acme/b: error Missing repository description [missing-description]",
      "",
      "acme/private-repo: failed ForbiddenError: GitHub denied access (403) to https://api.github.com/repos/acme/private-repo",
      "acme/b: failed RuleEvaluationError: Rule explodes failed on acme/b: boom [explodes]",
      "",
      "3 findings (2 errors, 1 warning) in 2 repositories.",
      "Audit could not complete for 1 repository / 1 rule evaluation."
    ].join("\n")
  );
  assert.equal(
    formatRunResultText(makeResult({ findings: [] }), { format: "rule", color: false }),
    "No violations found in 2 repositories."
  );
});

test("renders the grouped result as JSON", () => {
  const parsed: unknown = JSON.parse(formatRunResultJson(failedResult, { format: "rule" }));
  assert.deepEqual(parsed, {
    format: "rule",
    groups: [
      {
        ruleId: "missing-description",
        findings: [
          {
            ruleId: "missing-description",
            repository: "acme/a",
            severity: "error",
            message: "Missing repository description",
            fixable: false
          },
          {
            ruleId: "missing-description",
            repository: "acme/b",
            severity: "error",
            message: "Missing repository description",
            fixable: false
          }
        ]
      },
      {
        ruleId: "git-size",
        findings: [
          {
            ruleId: "git-size",
            repository: "acme/a",
            severity: "warning",
            message: "Repository size is too large (60.0 MB)",
            fixable: false
          }
        ]
      }
    ],
    errors: [
      {
        scope: "repository",
        repository: "acme/private-repo",
        errorName: "ForbiddenError",
        message: "GitHub denied access (403) to https://api.github.com/repos/acme/private-repo"
      },
      {
        scope: "rule",
        repository: "acme/b",
        ruleId: "explodes",
        errorName: "RuleEvaluationError",
        message: "Rule explodes failed on acme/b: boom"
      }
    ],
    evaluated: ["acme/a", "acme/b"],
    notStarted: [],
    cancelled: false,
    selectedRules: ["missing-description", "git-size"],
    durationMs: 1200
  });
});

test("reports a failed repository listing without naming a repository", () => {
  const message = "GitHub request to https://api.github.com/user/repos?page=2 failed after 3 attempts: status 502";
  const result = makeResult({
    findings: [],
    evaluated: [makeRef("acme", "a")],
    errors: [{ scope: "selection", errorName: "TransientNetworkError", message }]
  });

  assert.equal(
    formatRunResultText(result, { format: "repo", color: false }),
    [
      `repository listing: failed TransientNetworkError: ${message}`,
      "",
      "No violations found in 1 repository.",
      "Repository listing failed; repositories after that point were not audited."
    ].join("\n")
  );
  const parsed: unknown = JSON.parse(formatRunResultJson(result, { format: "repo" }));
  assert.deepEqual(parsed, {
    format: "repo",
    groups: [],
    errors: [{ scope: "selection", errorName: "TransientNetworkError", message }],
    evaluated: ["acme/a"],
    notStarted: [],
    cancelled: false,
    selectedRules: ["missing-description", "git-size"],
    durationMs: 1200
  });
});
