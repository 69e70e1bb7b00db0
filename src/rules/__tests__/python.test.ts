import assert from "node:assert/strict";
import { test } from "node:test";
import { pythonRules } from "../python.js";
import { evaluate, fails, makeJob, makePyproject, makeSnapshot, makeStep, withWorkflow } from "../../__tests__/fixtures.js";

test("missing-pyproject applies to Python repositories", () => {
  assert.equal(fails(pythonRules, "missing-pyproject", makeSnapshot({ language: "Python" })), true);
  assert.equal(
    fails(pythonRules, "missing-pyproject", makeSnapshot({ language: "Python", pyproject: makePyproject() })),
    false
  );
  assert.equal(fails(pythonRules, "missing-pyproject", makeSnapshot({ language: "Go" })), false);
});

test("a complete pyproject passes every pyproject rule", () => {
  const snapshot = makeSnapshot({ pyproject: makePyproject() });
  const pyprojectRules = pythonRules.filter((rule) => rule.id.includes("pyproject") || rule.id.startsWith("mypy"));
  for (const rule of pyprojectRules) {
    assert.deepEqual(rule.evaluate(snapshot), [], rule.id);
  }
});

test("pyproject metadata rules", () => {
  const cases: Array<[string, Parameters<typeof makePyproject>[0]]> = [
    ["missing-pyproject-project-name", { projectName: null }],
    ["pyproject-mit-license-classifier", { classifiers: [] }],
    ["pyproject-omit-license", { hasLicense: true }],
    ["pyproject-author-name", { authors: [{ name: null, email: null }] }],
    ["pyproject-omit-author-email", { authors: [{ name: "Jo Doe", email: "jo@example.com" }] }],
    ["pyproject-readme", { hasReadme: false }],
    ["missing-pyproject-requires-python", { requiresPython: null }],
    ["pyproject-dependency-lower-bound", { dependencies: ["click"] }],
    ["pyproject-optional-dependencies-name", { optionalDependencies: { test: ["pytest>=8"] } }],
    ["pyproject-depends-on-requests", { dependencies: ["requests>=2.32"] }],
    ["missing-pyproject-ruff-isort-rules", { ruffExtendSelect: ["UP"] }],
    ["missing-pyproject-ruff-pyupgrade-rules", { ruffExtendSelect: ["I"] }],
    ["mypy-strict-declared", { mypyStrict: null }],
    ["mypy-strict", { mypyStrict: false }]
  ];
  for (const [id, overrides] of cases) {
    assert.equal(fails(pythonRules, id, makeSnapshot({ pyproject: makePyproject(overrides) })), true, id);
  }
});

test("license classifier rules only apply to MIT-licensed repositories", () => {
  const snapshot = makeSnapshot({ license: null, pyproject: makePyproject({ classifiers: [], hasLicense: true }) });
  assert.equal(fails(pythonRules, "pyproject-mit-license-classifier", snapshot), false);
  assert.equal(fails(pythonRules, "pyproject-omit-license", snapshot), false);
});

test("requirements.txt rules", () => {
  const compiled = "# This file was autogenerated by uv via the following command:\n#    uv pip compile pyproject.toml\nclick==8.1.7\n\nwidget @ https://example.com/widget.tar.gz\n";
  const snapshot = makeSnapshot({ requirementsTxt: compiled, treePaths: ["requirements.txt", "uv.lock"] });
  assert.equal(fails(pythonRules, "requirements-txt-exact", snapshot), false);
  assert.equal(fails(pythonRules, "requirements-txt-uv-compiled", snapshot), false);
  assert.equal(fails(pythonRules, "prefer-uv-lock", snapshot), false);

  const loose = makeSnapshot({ requirementsTxt: "click>=8\n", treePaths: ["requirements.txt"] });
  assert.equal(fails(pythonRules, "requirements-txt-exact", loose), true);
  assert.equal(fails(pythonRules, "requirements-txt-uv-compiled", loose), true);
  assert.equal(fails(pythonRules, "prefer-uv-lock", loose), true);
});

test("missing-ruff is an error for Python repositories and a warning for stray .py files", () => {
  const python = evaluate(pythonRules, "missing-ruff", makeSnapshot({ language: "Python" }));
  assert.equal(python.length, 1);
  assert.equal(python[0].severity, "error");
  assert.equal(python[0].message, "Missing GitHub Actions workflow for ruff linting");

  const scripts = evaluate(pythonRules, "missing-ruff", makeSnapshot({ treePaths: ["scripts/build.py"] }));
  assert.equal(scripts.length, 1);
  assert.equal(scripts[0].severity, "warning");

  const linted = withWorkflow([makeJob({ steps: [makeStep({ run: "ruff check ." })] })], { language: "Python" });
  assert.deepEqual(evaluate(pythonRules, "missing-ruff", linted), []);
});

test("missing-mypy only applies to Python repositories", () => {
  assert.equal(evaluate(pythonRules, "missing-mypy", makeSnapshot({ language: "Python" })).length, 1);
  assert.deepEqual(evaluate(pythonRules, "missing-mypy", makeSnapshot({ treePaths: ["scripts/build.py"] })), []);
  const checked = withWorkflow([makeJob({ id: "mypy", steps: [makeStep({ run: "mypy ." })] })], { language: "Python" });
  assert.deepEqual(evaluate(pythonRules, "missing-mypy", checked), []);
  assert.equal(fails(pythonRules, "required-mypy-status-check", checked), true);
});
