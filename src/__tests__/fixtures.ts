import type {
  DependabotUpdate,
  Finding,
  PyprojectSummary,
  RepositoryRef,
  RepositorySnapshot,
  Workflow,
  WorkflowJob,
  WorkflowStep
} from "../types.js";
import type { Rule } from "../rules/rule.js";
import { RequestCancelledError } from "../errors/github.errors.js";
import type { FetchLike } from "../github/httpClient.js";
import type { Clock } from "../github/rateLimitHelpers.js";

export const makeRef = (owner = "acme", name = "widgets"): RepositoryRef => ({ owner, name });

/** A repository that passes every compiled-in rule. */
export const makeSnapshot = (overrides: Partial<RepositorySnapshot> = {}): RepositorySnapshot => ({
  ref: makeRef(),
  fullName: "acme/widgets",
  ownerLogin: "acme",
  visibility: "public",
  private: false,
  fork: false,
  archived: false,
  description: "Widgets for everyone",
  language: null,
  topics: ["widgets", "tools"],
  defaultBranch: "main",
  sizeKb: 1024,
  hasIssues: true,
  hasProjects: false,
  hasWiki: false,
  hasDiscussions: false,
  hasPages: false,
  allowAutoMerge: false,
  allowMergeCommit: true,
  deleteBranchOnMerge: true,
  createdAt: "2020-01-01T00:00:00Z",
  fetchedAt: "2026-01-15T00:00:00.000Z",
  license: { key: "mit", name: "MIT License", spdxId: "MIT" },
  hasReadme: true,
  defaultBranchProtection: { enabled: true, requiredStatusChecks: [], enforcementLevel: null },
  branchRules: [],
  treePaths: ["README.md", "AGENTS.md", "LICENSE"],
  treeTruncated: false,
  workflows: [],
  dependabot: null,
  pyproject: null,
  requirementsTxt: null,
  actions: { enabled: false, allowedActions: null, selectedActions: null, workflowPermissions: null },
  pagesSourceBranch: null,
  activity: { hasRecentChanges: true, hasChangesSinceRelease: true },
  ...overrides
});

export const makeStep = (overrides: Partial<WorkflowStep> = {}): WorkflowStep => ({
  name: null,
  uses: "",
  run: "",
  condition: null,
  with: {},
  env: {},
  ...overrides
});

export const makeJob = (overrides: Partial<WorkflowJob> = {}): WorkflowJob => ({
  id: "build",
  runsOn: "ubuntu-24.04",
  matrix: null,
  env: {},
  permissions: {},
  hasConcurrency: false,
  steps: [],
  ...overrides
});

export const makeWorkflow = (jobs: WorkflowJob[], overrides: Partial<Workflow> = {}): Workflow => ({
  path: ".github/workflows/ci.yml",
  name: "CI",
  env: {},
  permissions: {},
  hasConcurrency: false,
  jobs,
  parseError: null,
  ...overrides
});

/** Snapshot with one CI workflow made of the given jobs, listed in the tree too. */
export const withWorkflow = (jobs: WorkflowJob[], overrides: Partial<RepositorySnapshot> = {}): RepositorySnapshot =>
  makeSnapshot({
    treePaths: ["README.md", "AGENTS.md", "LICENSE", ".github/workflows/ci.yml"],
    workflows: [makeWorkflow(jobs)],
    ...overrides
  });

export const makePyproject = (overrides: Partial<PyprojectSummary> = {}): PyprojectSummary => ({
  projectName: "widgets",
  hasReadme: true,
  hasLicense: false,
  requiresPython: ">=3.12",
  classifiers: ["License :: OSI Approved :: MIT License"],
  authors: [{ name: "Jo Doe", email: null }],
  dependencies: ["click>=8.0"],
  optionalDependencies: { dev: ["ruff>=0.5"] },
  ruffExtendSelect: ["I", "UP"],
  mypyStrict: true,
  ...overrides
});

export const makeUpdate = (overrides: Partial<DependabotUpdate> = {}): DependabotUpdate => ({
  packageEcosystem: "github-actions",
  scheduleInterval: "weekly",
  ignoredDependencies: [],
  ...overrides
});

export const evaluate = (rules: readonly Rule[], id: string, snapshot: RepositorySnapshot): readonly Finding[] => {
  const rule = rules.find((candidate) => candidate.id === id);
  if (!rule) throw new Error(`no rule ${id}`);
  return rule.evaluate(snapshot);
};

export const fails = (rules: readonly Rule[], id: string, snapshot: RepositorySnapshot): boolean =>
  evaluate(rules, id, snapshot).length > 0;

/** Manual clock: `sleep` records the delay and advances time instead of waiting. */
export const makeClock = (startMs = 1_700_000_000_000) => {
  const sleeps: number[] = [];
  let nowMs = startMs;
  const clock: Clock = {
    now: () => nowMs,
    sleep: async (ms, signal) => {
      if (signal?.aborted) throw new RequestCancelledError();
      sleeps.push(ms);
      nowMs += ms;
    }
  };
  return { clock, sleeps, advance: (ms: number) => (nowMs += ms) };
};

export type FakeCall = { url: string; init: RequestInit };

export type FakeReply = Response | Error | ((call: FakeCall) => Response);

export const jsonResponse = (body: unknown, init: { status?: number; headers?: Record<string, string> } = {}) =>
  new Response(JSON.stringify(body), {
    status: init.status ?? 200,
    headers: { "content-type": "application/json", ...init.headers }
  });

/** Replies in order; the last reply repeats once the queue runs out. */
export const makeFetch = (replies: FakeReply[]) => {
  const calls: FakeCall[] = [];
  const queue = [...replies];
  const fetch: FetchLike = async (url, init) => {
    const call = { url, init };
    calls.push(call);
    const reply = queue.length > 1 ? queue.shift() : queue[0];
    if (reply === undefined) throw new Error(`unexpected request to ${url}`);
    if (reply instanceof Error) throw reply;
    return typeof reply === "function" ? reply(call) : reply.clone();
  };
  return { fetch, calls };
};

/** Routes by path (query string excluded); unknown paths answer 404. */
export const routeFetch = (routes: Record<string, (url: URL) => Response>) => {
  const calls: string[] = [];
  const fetch: FetchLike = async (url) => {
    const parsed = new URL(url);
    calls.push(`${parsed.pathname}${parsed.search}`);
    const route = routes[parsed.pathname];
    return route ? route(parsed) : jsonResponse({ message: "Not Found" }, { status: 404 });
  };
  return { fetch, calls };
};
