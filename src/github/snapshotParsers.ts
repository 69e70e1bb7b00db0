import { parse as parseYaml } from "yaml";
import { parse as parseToml } from "smol-toml";
import { UnexpectedPayloadError } from "../errors/github.errors.js";
import type {
  ActionsSettings,
  AllowedActions,
  BranchProtection,
  BranchRule,
  DependabotConfig,
  DependabotUpdate,
  PyprojectAuthor,
  PyprojectSummary,
  RepositoryLicense,
  RepositoryVisibility,
  SelectedActions,
  StringMap,
  Workflow,
  WorkflowJob,
  WorkflowPermissions,
  WorkflowStep
} from "../types/domain/repository.js";

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function toRecord(value: unknown): Record<string, unknown> {
  return isPlainObject(value) ? value : {};
}

function asString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function asBoolean(value: unknown, fallback = false): boolean {
  return typeof value === "boolean" ? value : fallback;
}

function asStringArray(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === "string");
}

function scalarToString(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return null;
}

/** Keeps scalar entries of a YAML mapping as strings; nulls and nested values are dropped. */
function toStringMap(value: unknown): StringMap {
  const out: Record<string, string> = {};
  for (const [key, entry] of Object.entries(toRecord(value))) {
    const text = scalarToString(entry);
    if (text !== null) out[key] = text;
  }
  return out;
}

function requireString(payload: Record<string, unknown>, key: string, context: string): string {
  const value = payload[key];
  if (typeof value !== "string") {
    throw new UnexpectedPayloadError(context, `missing string field "${key}"`);
  }
  return value;
}

export interface RepositoryPayload {
  ownerLogin: string;
  name: string;
  fullName: string;
  visibility: RepositoryVisibility;
  private: boolean;
  fork: boolean;
  archived: boolean;
  description: string | null;
  language: string | null;
  topics: string[];
  defaultBranch: string;
  sizeKb: number;
  hasIssues: boolean;
  hasProjects: boolean;
  hasWiki: boolean;
  hasDiscussions: boolean;
  hasPages: boolean;
  allowAutoMerge: boolean;
  allowMergeCommit: boolean;
  deleteBranchOnMerge: boolean;
  createdAt: string;
  license: RepositoryLicense | null;
}

function parseVisibility(value: unknown, isPrivate: boolean): RepositoryVisibility {
  if (value === "public" || value === "private" || value === "internal") return value;
  return isPrivate ? "private" : "public";
}

function parseLicense(value: unknown): RepositoryLicense | null {
  if (!isPlainObject(value)) return null;
  const key = asString(value.key);
  const name = asString(value.name);
  if (!key || !name) return null;
  return { key, name, spdxId: asString(value.spdx_id) };
}

export function parseRepositoryPayload(raw: unknown, context: string): RepositoryPayload {
  if (!isPlainObject(raw)) {
    throw new UnexpectedPayloadError(context, "expected a repository object");
  }
  const owner = toRecord(raw.owner);
  const isPrivate = asBoolean(raw.private);
  return {
    ownerLogin: requireString(owner, "login", context),
    name: requireString(raw, "name", context),
    fullName: requireString(raw, "full_name", context),
    visibility: parseVisibility(raw.visibility, isPrivate),
    private: isPrivate,
    fork: asBoolean(raw.fork),
    archived: asBoolean(raw.archived),
    description: asString(raw.description) || null,
    language: asString(raw.language),
    topics: asStringArray(raw.topics),
    defaultBranch: requireString(raw, "default_branch", context),
    sizeKb: typeof raw.size === "number" && Number.isFinite(raw.size) ? raw.size : 0,
    hasIssues: asBoolean(raw.has_issues),
    hasProjects: asBoolean(raw.has_projects),
    hasWiki: asBoolean(raw.has_wiki),
    hasDiscussions: asBoolean(raw.has_discussions),
    hasPages: asBoolean(raw.has_pages),
    allowAutoMerge: asBoolean(raw.allow_auto_merge),
    allowMergeCommit: asBoolean(raw.allow_merge_commit, true),
    deleteBranchOnMerge: asBoolean(raw.delete_branch_on_merge),
    createdAt: requireString(raw, "created_at", context),
    license: parseLicense(raw.license)
  };
}

export interface RepositoryListItem {
  ownerLogin: string;
  name: string;
  archived: boolean;
  fork: boolean;
}

export function parseRepositoryListItem(raw: unknown, context: string): RepositoryListItem {
  if (!isPlainObject(raw)) {
    throw new UnexpectedPayloadError(context, "expected a repository object");
  }
  return {
    ownerLogin: requireString(toRecord(raw.owner), "login", context),
    name: requireString(raw, "name", context),
    archived: asBoolean(raw.archived),
    fork: asBoolean(raw.fork)
  };
}

export function parseLogin(raw: unknown, context: string): string {
  return requireString(toRecord(raw), "login", context);
}

/** `GET /repos/{owner}/{repo}/branches/{branch}`: null when the branch is unprotected. */
export function parseBranchProtection(raw: unknown): BranchProtection | null {
  const branch = toRecord(raw);
  if (branch.protected !== true) return null;
  const protection = toRecord(branch.protection);
  const checks = toRecord(protection.required_status_checks);
  const contexts = asStringArray(checks.contexts);
  const checkContexts = Array.isArray(checks.checks)
    ? checks.checks.map((check) => asString(toRecord(check).context)).filter((c): c is string => Boolean(c))
    : [];
  return {
    enabled: protection.enabled !== false,
    requiredStatusChecks: [...new Set([...contexts, ...checkContexts])],
    enforcementLevel: asString(checks.enforcement_level)
  };
}

export function parseBranchRule(raw: unknown): BranchRule | null {
  const rule = toRecord(raw);
  const type = asString(rule.type);
  if (!type) return null;
  const parameters = toRecord(rule.parameters);
  const requiredStatusChecks = Array.isArray(parameters.required_status_checks)
    ? parameters.required_status_checks
        .map((check) => asString(toRecord(check).context))
        .filter((context): context is string => Boolean(context))
    : [];
  return { type, requiredStatusChecks };
}

export interface GitTree {
  paths: string[];
  truncated: boolean;
}

export function parseGitTree(raw: unknown): GitTree {
  const tree = toRecord(raw);
  const entries = Array.isArray(tree.tree) ? tree.tree : [];
  const paths: string[] = [];
  for (const entry of entries) {
    const record = toRecord(entry);
    if (record.type !== "blob") continue;
    const entryPath = asString(record.path);
    if (entryPath) paths.push(entryPath);
  }
  return { paths, truncated: tree.truncated === true };
}

function parseAllowedActions(value: unknown): AllowedActions | null {
  if (value === "all" || value === "local_only" || value === "selected") return value;
  return null;
}

export function parseActionsPermissions(raw: unknown): Pick<ActionsSettings, "enabled" | "allowedActions"> {
  const record = toRecord(raw);
  return {
    enabled: asBoolean(record.enabled),
    allowedActions: parseAllowedActions(record.allowed_actions)
  };
}

export function parseSelectedActions(raw: unknown): SelectedActions {
  const record = toRecord(raw);
  return {
    githubOwnedAllowed: asBoolean(record.github_owned_allowed),
    verifiedAllowed: asBoolean(record.verified_allowed),
    patternsAllowed: asStringArray(record.patterns_allowed)
  };
}

export function parseWorkflowPermissions(raw: unknown): WorkflowPermissions {
  const record = toRecord(raw);
  return {
    defaultWorkflowPermissions: record.default_workflow_permissions === "write" ? "write" : "read",
    canApprovePullRequestReviews: asBoolean(record.can_approve_pull_request_reviews)
  };
}

export function parsePagesSourceBranch(raw: unknown): string {
  const source = toRecord(toRecord(raw).source);
  return asString(source.branch) || "gh-pages";
}

export interface CommitSummary {
  parentCount: number;
}

export function parseCommitSummary(raw: unknown): CommitSummary {
  const record = toRecord(raw);
  return { parentCount: Array.isArray(record.parents) ? record.parents.length : 0 };
}

export function parseReleaseCreatedAt(raw: unknown): string | null {
  return asString(toRecord(raw).created_at);
}

/** `permissions: write-all` (or `read-all`) is kept under the `*` key. */
function parsePermissions(value: unknown): StringMap {
  if (typeof value === "string") return { "*": value };
  return toStringMap(value);
}

function parseRunsOn(value: unknown): string {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) return asStringArray(value).join(" ");
  const labels = toRecord(value).labels;
  if (typeof labels === "string") return labels;
  return asStringArray(labels).join(" ");
}

function parseMatrix(value: unknown): Record<string, unknown[]> | null {
  const strategy = toRecord(value);
  if (!isPlainObject(strategy.matrix)) return null;
  const matrix: Record<string, unknown[]> = {};
  for (const [key, entry] of Object.entries(strategy.matrix)) {
    if (key === "include" || key === "exclude") continue;
    if (Array.isArray(entry)) matrix[key] = entry;
  }
  return matrix;
}

function parseStep(raw: unknown): WorkflowStep {
  const step = toRecord(raw);
  return {
    name: asString(step.name),
    uses: asString(step.uses) ?? "",
    run: asString(step.run) ?? "",
    condition: step.if === undefined || step.if === null ? null : String(step.if),
    with: toStringMap(step.with),
    env: toStringMap(step.env)
  };
}

function parseJob(id: string, raw: unknown): WorkflowJob {
  const job = toRecord(raw);
  return {
    id,
    runsOn: parseRunsOn(job["runs-on"]),
    matrix: parseMatrix(job.strategy),
    env: toStringMap(job.env),
    permissions: parsePermissions(job.permissions),
    hasConcurrency: job.concurrency !== undefined && job.concurrency !== null,
    steps: Array.isArray(job.steps) ? job.steps.map(parseStep) : []
  };
}

function emptyWorkflow(filePath: string, parseError: string | null): Workflow {
  return { path: filePath, name: "", env: {}, permissions: {}, hasConcurrency: false, jobs: [], parseError };
}

/** Workflow files that fail to parse become empty workflows carrying the parse error. */
export function parseWorkflow(filePath: string, text: string): Workflow {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    return emptyWorkflow(filePath, err instanceof Error ? err.message : String(err));
  }
  if (!isPlainObject(raw)) {
    return emptyWorkflow(filePath, "workflow is not a YAML mapping");
  }
  return {
    path: filePath,
    name: asString(raw.name) ?? "",
    env: toStringMap(raw.env),
    permissions: parsePermissions(raw.permissions),
    hasConcurrency: raw.concurrency !== undefined && raw.concurrency !== null,
    jobs: Object.entries(toRecord(raw.jobs)).map(([id, job]) => parseJob(id, job)),
    parseError: null
  };
}

function parseDependabotUpdate(raw: unknown): DependabotUpdate | null {
  const update = toRecord(raw);
  const packageEcosystem = asString(update["package-ecosystem"]);
  if (!packageEcosystem) return null;
  const ignore = Array.isArray(update.ignore) ? update.ignore : [];
  return {
    packageEcosystem,
    scheduleInterval: asString(toRecord(update.schedule).interval),
    ignoredDependencies: ignore
      .map((entry) => asString(toRecord(entry)["dependency-name"]))
      .filter((name): name is string => Boolean(name))
  };
}

/** Returns null for an unparsable or empty config, which rules treat as "no Dependabot". */
export function parseDependabotConfig(filePath: string, text: string): DependabotConfig | null {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch {
    return null;
  }
  if (!isPlainObject(raw)) return null;
  const updates = Array.isArray(raw.updates) ? raw.updates : [];
  return {
    path: filePath,
    updates: updates.map(parseDependabotUpdate).filter((u): u is DependabotUpdate => u !== null)
  };
}

function parseAuthors(value: unknown): PyprojectAuthor[] {
  if (!Array.isArray(value)) return [];
  return value.map((entry) => {
    const author = toRecord(entry);
    return { name: asString(author.name) || null, email: asString(author.email) || null };
  });
}

function parseOptionalDependencies(value: unknown): Record<string, string[]> {
  const out: Record<string, string[]> = {};
  for (const [group, deps] of Object.entries(toRecord(value))) {
    out[group] = asStringArray(deps);
  }
  return out;
}

/** Returns null when the file is not valid TOML or holds no tables or keys. */
export function parsePyproject(text: string): PyprojectSummary | null {
  let raw: Record<string, unknown>;
  try {
    raw = parseToml(text);
  } catch {
    return null;
  }
  if (Object.keys(raw).length === 0) return null;
  const project = toRecord(raw.project);
  const tool = toRecord(raw.tool);
  const ruffLint = toRecord(toRecord(tool.ruff).lint);
  const mypy = toRecord(tool.mypy);
  return {
    projectName: asString(project.name),
    hasReadme: project.readme !== undefined,
    hasLicense: project.license !== undefined,
    requiresPython: asString(project["requires-python"]) || null,
    classifiers: asStringArray(project.classifiers),
    authors: parseAuthors(project.authors),
    dependencies: asStringArray(project.dependencies),
    optionalDependencies: parseOptionalDependencies(project["optional-dependencies"]),
    ruffExtendSelect: asStringArray(ruffLint["extend-select"]),
    mypyStrict: typeof mypy.strict === "boolean" ? mypy.strict : null
  };
}
