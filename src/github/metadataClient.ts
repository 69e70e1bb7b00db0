import { ForbiddenError, GitHubApiResponseError, NotFoundError } from "../errors/github.errors.js";
import type { Logger } from "../logging/logger.js";
import { noopLogger } from "../logging/logger.js";
import type {
  ActionsSettings,
  BranchRule,
  DependabotConfig,
  PyprojectSummary,
  RepositoryActivity,
  RepositoryRef,
  RepositorySnapshot,
  Workflow
} from "../types.js";
import type { GitHubHttpClient } from "./httpClient.js";
import { createRepositoryRef, encodePath, repositoryApiPath, repositoryKey } from "./repositoryRef.js";
import type { Clock } from "./rateLimitHelpers.js";
import { systemClock } from "./rateLimitHelpers.js";
import {
  type GitTree,
  type RepositoryPayload,
  parseActionsPermissions,
  parseBranchProtection,
  parseBranchRule,
  parseCommitSummary,
  parseDependabotConfig,
  parseGitTree,
  parseLogin,
  parsePagesSourceBranch,
  parsePyproject,
  parseReleaseCreatedAt,
  parseRepositoryListItem,
  parseRepositoryPayload,
  parseSelectedActions,
  parseWorkflow,
  parseWorkflowPermissions
} from "./snapshotParsers.js";

const RECENT_ACTIVITY_DAYS = 90;
const DAY_MS = 24 * 60 * 60 * 1000;
const DEPENDABOT_PATHS = [".github/dependabot.yml", ".github/dependabot.yaml"];

export type FetchSnapshotOptions = {
  signal?: AbortSignal;
};

export type ListRepositoriesOptions = {
  /** Drop archived repositories, forks and repositories owned by someone else. */
  activeOnly: boolean;
  signal?: AbortSignal;
};

export interface RepositoryMetadataSource {
  getAuthenticatedLogin(): Promise<string>;
  listRepositories(options: ListRepositoriesOptions): AsyncIterable<RepositoryRef>;
  fetchSnapshot(ref: RepositoryRef, options?: FetchSnapshotOptions): Promise<RepositorySnapshot>;
}

export type RepositoryMetadataClientOptions = {
  http: GitHubHttpClient;
  clock?: Clock;
  logger?: Logger;
};

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const entry of Object.values(value)) {
      deepFreeze(entry);
    }
  }
  return value;
}

export function isWorkflowPath(filePath: string): boolean {
  const parts = filePath.split("/");
  return (
    parts.length === 3 &&
    parts[0] === ".github" &&
    parts[1] === "workflows" &&
    /\.ya?ml$/.test(parts[2])
  );
}

async function orNull<T>(promise: Promise<T>): Promise<T | null> {
  try {
    return await promise;
  } catch (err) {
    if (err instanceof NotFoundError) return null;
    throw err;
  }
}

/** Admin-scoped endpoints answer 403 or 404 to tokens without admin rights. */
async function orNullWithoutAdmin<T>(promise: Promise<T>): Promise<T | null> {
  try {
    return await promise;
  } catch (err) {
    if (err instanceof NotFoundError || err instanceof ForbiddenError) return null;
    throw err;
  }
}

/**
 * Read-only GitHub client that turns the REST API into immutable repository snapshots.
 * Every request goes through the shared `GitHubHttpClient`, so all snapshots of a run
 * draw from the same rate-limit gate.
 */
export class RepositoryMetadataClient implements RepositoryMetadataSource {
  private readonly http: GitHubHttpClient;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private login: string | null = null;

  constructor(options: RepositoryMetadataClientOptions) {
    this.http = options.http;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? noopLogger;
  }

  async getAuthenticatedLogin(): Promise<string> {
    if (this.login) return this.login;
    const user = await this.http.getJson("/user");
    this.login = parseLogin(user, "/user");
    return this.login;
  }

  async *listRepositories(options: ListRepositoriesOptions): AsyncGenerator<RepositoryRef, void, undefined> {
    const login = options.activeOnly ? await this.getAuthenticatedLogin() : null;
    const pages = this.http.paginate("/user/repos", {
      query: { affiliation: "owner", sort: "full_name", direction: "asc" },
      signal: options.signal
    });
    for await (const raw of pages) {
      const repo = parseRepositoryListItem(raw, "/user/repos");
      if (login !== null) {
        if (repo.ownerLogin !== login) continue;
        if (repo.archived || repo.fork) continue;
      }
      yield createRepositoryRef(repo.ownerLogin, repo.name);
    }
  }

  async fetchSnapshot(ref: RepositoryRef, options: FetchSnapshotOptions = {}): Promise<RepositorySnapshot> {
    const { signal } = options;
    const key = repositoryKey(ref);
    const fetchedAtMs = this.clock.now();
    this.logger.debug(`Fetching ${key}`);

    const repoPath = repositoryApiPath(ref);
    const repo = parseRepositoryPayload(await this.http.getJson(repoPath, { signal }), repoPath);
    // Follow renames and case differences so every later request hits the canonical path.
    const canonical = createRepositoryRef(repo.ownerLogin, repo.name);

    const [hasReadme, protection, branchRules, tree, actions, pagesSourceBranch, activity] = await Promise.all([
      this.fetchHasReadme(canonical, signal),
      this.fetchDefaultBranchProtection(canonical, repo.defaultBranch, signal),
      this.fetchBranchRules(canonical, repo.defaultBranch, signal),
      this.fetchTree(canonical, repo.defaultBranch, signal),
      this.fetchActionsSettings(canonical, signal),
      repo.hasPages ? this.fetchPagesSourceBranch(canonical, signal) : Promise.resolve(null),
      repo.private ? Promise.resolve(null) : this.fetchActivity(canonical, repo, fetchedAtMs, signal)
    ]);

    const files = new Set(tree.paths);
    const workflowPaths = tree.paths.filter(isWorkflowPath).sort();
    const dependabotPath = DEPENDABOT_PATHS.find((candidate) => files.has(candidate)) ?? null;

    const [workflows, dependabot, pyproject, requirementsTxt] = await Promise.all([
      Promise.all(workflowPaths.map((filePath) => this.fetchWorkflow(canonical, repo.defaultBranch, filePath, signal))),
      dependabotPath ? this.fetchDependabot(canonical, repo.defaultBranch, dependabotPath, signal) : Promise.resolve(null),
      files.has("pyproject.toml") ? this.fetchPyproject(canonical, repo.defaultBranch, signal) : Promise.resolve(null),
      files.has("requirements.txt")
        ? this.fetchFileText(canonical, repo.defaultBranch, "requirements.txt", signal)
        : Promise.resolve(null)
    ]);

    const snapshot: RepositorySnapshot = {
      ref,
      fullName: repo.fullName,
      ownerLogin: repo.ownerLogin,
      visibility: repo.visibility,
      private: repo.private,
      fork: repo.fork,
      archived: repo.archived,
      description: repo.description,
      language: repo.language,
      topics: repo.topics,
      defaultBranch: repo.defaultBranch,
      sizeKb: repo.sizeKb,
      hasIssues: repo.hasIssues,
      hasProjects: repo.hasProjects,
      hasWiki: repo.hasWiki,
      hasDiscussions: repo.hasDiscussions,
      hasPages: repo.hasPages,
      allowAutoMerge: repo.allowAutoMerge,
      allowMergeCommit: repo.allowMergeCommit,
      deleteBranchOnMerge: repo.deleteBranchOnMerge,
      createdAt: repo.createdAt,
      fetchedAt: new Date(fetchedAtMs).toISOString(),
      license: repo.license,
      hasReadme,
      defaultBranchProtection: protection,
      branchRules,
      treePaths: tree.paths,
      treeTruncated: tree.truncated,
      workflows,
      dependabot,
      pyproject,
      requirementsTxt,
      actions,
      pagesSourceBranch,
      activity
    };
    if (tree.truncated) {
      this.logger.warn(`Git tree for ${key} is truncated; file-based rules see a partial listing.`);
    }
    return deepFreeze(snapshot);
  }

  private async fetchHasReadme(ref: RepositoryRef, signal?: AbortSignal): Promise<boolean> {
    const readme = await orNull(this.http.getJson(repositoryApiPath(ref, "/readme"), { signal }));
    return readme !== null;
  }

  private async fetchDefaultBranchProtection(ref: RepositoryRef, branch: string, signal?: AbortSignal) {
    // Empty repositories have no default branch yet.
    const raw = await orNull(
      this.http.getJson(repositoryApiPath(ref, `/branches/${encodeURIComponent(branch)}`), { signal })
    );
    return raw === null ? null : parseBranchProtection(raw);
  }

  private async fetchBranchRules(ref: RepositoryRef, branch: string, signal?: AbortSignal): Promise<BranchRule[]> {
    const rules: BranchRule[] = [];
    try {
      for await (const raw of this.http.paginate(repositoryApiPath(ref, `/rules/branches/${encodeURIComponent(branch)}`), { signal })) {
        const rule = parseBranchRule(raw);
        if (rule) rules.push(rule);
      }
    } catch (err) {
      // Rulesets are unavailable for private repositories on free plans.
      if (err instanceof NotFoundError || err instanceof ForbiddenError) return [];
      throw err;
    }
    return rules;
  }

  private async fetchTree(ref: RepositoryRef, branch: string, signal?: AbortSignal): Promise<GitTree> {
    try {
      const raw = await this.http.getJson(repositoryApiPath(ref, `/git/trees/${encodeURIComponent(branch)}`), {
        query: { recursive: 1 },
        signal
      });
      return parseGitTree(raw);
    } catch (err) {
      // 409 is GitHub's answer for an empty repository.
      if (err instanceof NotFoundError || (err instanceof GitHubApiResponseError && err.status === 409)) {
        return { paths: [], truncated: false };
      }
      throw err;
    }
  }

  private async fetchActionsSettings(ref: RepositoryRef, signal?: AbortSignal): Promise<ActionsSettings | null> {
    const rawPermissions = await orNullWithoutAdmin(
      this.http.getJson(repositoryApiPath(ref, "/actions/permissions"), { signal })
    );
    if (rawPermissions === null) return null;
    const permissions = parseActionsPermissions(rawPermissions);
    if (!permissions.enabled) {
      return { ...permissions, selectedActions: null, workflowPermissions: null };
    }
    const [selected, workflow] = await Promise.all([
      permissions.allowedActions === "selected"
        ? orNullWithoutAdmin(this.http.getJson(repositoryApiPath(ref, "/actions/permissions/selected-actions"), { signal }))
        : Promise.resolve(null),
      orNullWithoutAdmin(this.http.getJson(repositoryApiPath(ref, "/actions/permissions/workflow"), { signal }))
    ]);
    return {
      ...permissions,
      selectedActions: selected === null ? null : parseSelectedActions(selected),
      workflowPermissions: workflow === null ? null : parseWorkflowPermissions(workflow)
    };
  }

  /** The Pages source branch, but only when that branch still exists. */
  private async fetchPagesSourceBranch(ref: RepositoryRef, signal?: AbortSignal): Promise<string | null> {
    const pages = await orNullWithoutAdmin(this.http.getJson(repositoryApiPath(ref, "/pages"), { signal }));
    if (pages === null) return null;
    const branch = parsePagesSourceBranch(pages);
    const exists = await orNull(
      this.http.getJson(repositoryApiPath(ref, `/branches/${encodeURIComponent(branch)}`), { signal })
    );
    return exists === null ? null : branch;
  }

  private async fetchActivity(
    ref: RepositoryRef,
    repo: RepositoryPayload,
    nowMs: number,
    signal?: AbortSignal
  ): Promise<RepositoryActivity | null> {
    const createdAtMs = Date.parse(repo.createdAt);
    if (Number.isFinite(createdAtMs) && createdAtMs > nowMs - RECENT_ACTIVITY_DAYS * DAY_MS) {
      // New repositories are exempt from the stable-project checks; skip the commit walk.
      return null;
    }
    const recentSince = new Date(nowMs - RECENT_ACTIVITY_DAYS * DAY_MS).toISOString();
    const hasRecentChanges = await this.hasOwnerCommitsSince(ref, repo.ownerLogin, recentSince, signal);
    if (hasRecentChanges) {
      return { hasRecentChanges, hasChangesSinceRelease: true };
    }
    const release = await orNull(this.http.getJson(repositoryApiPath(ref, "/releases/latest"), { signal }));
    const releasedAt = release === null ? null : parseReleaseCreatedAt(release);
    const hasChangesSinceRelease =
      releasedAt === null ? true : await this.hasOwnerCommitsSince(ref, repo.ownerLogin, releasedAt, signal);
    return { hasRecentChanges, hasChangesSinceRelease };
  }

  /** Stops at the first non-merge commit, so usually only the first page is requested. */
  private async hasOwnerCommitsSince(
    ref: RepositoryRef,
    author: string,
    since: string,
    signal?: AbortSignal
  ): Promise<boolean> {
    const commits = this.http.paginate(repositoryApiPath(ref, "/commits"), {
      query: { since, author },
      signal
    });
    for await (const raw of commits) {
      if (parseCommitSummary(raw).parentCount <= 1) return true;
    }
    return false;
  }

  private async fetchFileText(
    ref: RepositoryRef,
    branch: string,
    filePath: string,
    signal?: AbortSignal
  ): Promise<string | null> {
    return orNull(
      this.http.getText(repositoryApiPath(ref, `/contents/${encodePath(filePath)}`), {
        query: { ref: branch },
        signal
      })
    );
  }

  private async fetchWorkflow(
    ref: RepositoryRef,
    branch: string,
    filePath: string,
    signal?: AbortSignal
  ): Promise<Workflow> {
    const text = (await this.fetchFileText(ref, branch, filePath, signal)) ?? "";
    const workflow = parseWorkflow(filePath, text);
    if (workflow.parseError) {
      this.logger.debug(`Could not parse ${filePath} in ${repositoryKey(ref)}`, { error: workflow.parseError });
    }
    return workflow;
  }

  private async fetchDependabot(
    ref: RepositoryRef,
    branch: string,
    filePath: string,
    signal?: AbortSignal
  ): Promise<DependabotConfig | null> {
    const text = await this.fetchFileText(ref, branch, filePath, signal);
    return text === null ? null : parseDependabotConfig(filePath, text);
  }

  private async fetchPyproject(ref: RepositoryRef, branch: string, signal?: AbortSignal): Promise<PyprojectSummary | null> {
    const text = await this.fetchFileText(ref, branch, "pyproject.toml", signal);
    return text === null ? null : parsePyproject(text);
  }
}
