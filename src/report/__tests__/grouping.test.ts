import assert from "node:assert/strict";
import { test } from "node:test";
import { flattenRepositoryGroups, flattenRuleGroups, groupByRepository, groupByRule } from "../grouping.js";
import { makeRef } from "../../__tests__/fixtures.js";
import type { Finding, Severity } from "../../types.js";

const finding = (repo: string, ruleId: string, severity: Severity = "error"): Finding => ({
  ruleId,
  repository: makeRef("acme", repo),
  severity,
  message: `${ruleId} failed`,
  fixable: false
});

const findings = [
  finding("a", "missing-description"),
  finding("a", "git-size", "warning"),
  finding("b", "missing-description"),
  finding("c", "no-wiki"),
  finding("b", "no-wiki")
];

test("groups by repository in first-appearance order", () => {
  const groups = groupByRepository({ findings });
  assert.deepEqual([...groups.keys()], ["acme/a", "acme/b", "acme/c"]);
  assert.deepEqual(
    groups.get("acme/b")?.findings.map((entry) => entry.ruleId),
    ["missing-description", "no-wiki"]
  );
});

test("lists every repository that fails a rule under that rule", () => {
  const groups = groupByRule({ findings });
  assert.deepEqual([...groups.keys()], ["missing-description", "git-size", "no-wiki"]);
  assert.deepEqual(
    groups.get("missing-description")?.map((entry) => entry.repository),
    [makeRef("acme", "a"), makeRef("acme", "b")]
  );
  assert.deepEqual(
    groups.get("no-wiki")?.map((entry) => entry.repository.name),
    ["c", "b"]
  );
});

test("both groupings partition the findings", () => {
  const byRepository = flattenRepositoryGroups(groupByRepository({ findings }));
  const byRule = flattenRuleGroups(groupByRule({ findings }));
  assert.equal(byRepository.length, findings.length);
  assert.equal(byRule.length, findings.length);
  for (const entry of findings) {
    assert.equal(byRepository.filter((candidate) => candidate === entry).length, 1);
    assert.equal(byRule.filter((candidate) => candidate === entry).length, 1);
  }
});

test("no findings means no groups", () => {
  assert.equal(groupByRepository({ findings: [] }).size, 0);
  assert.equal(groupByRule({ findings: [] }).size, 0);
});
