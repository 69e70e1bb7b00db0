export interface RepositoryRef {
  readonly owner: string;
  readonly name: string;
}

export type RepositoryVisibility = "public" | "private" | "internal";

export interface RepositoryLicense {
  readonly key: string;
  readonly name: string;
  readonly spdxId: string | null;
}

export interface BranchProtection {
  readonly enabled: boolean;
  readonly requiredStatusChecks: readonly string[];
  readonly enforcementLevel: string | null;
}

/** One active rule from the rulesets that apply to the default branch. */
export interface BranchRule {
  readonly type: string;
  readonly requiredStatusChecks: readonly string[];
}

export type StringMap = Readonly<Record<string, string>>;

export interface WorkflowStep {
  readonly name: string | null;
  readonly uses: string;
  readonly run: string;
  readonly condition: string | null;
  readonly with: StringMap;
  readonly env: StringMap;
}

export interface WorkflowJob {
  readonly id: string;
  readonly runsOn: string;
  /** Only the map form of `strategy.matrix`; `include`/`exclude` lists are dropped. */
  readonly matrix: Readonly<Record<string, readonly unknown[]>> | null;
  readonly env: StringMap;
  readonly permissions: StringMap;
  readonly hasConcurrency: boolean;
  readonly steps: readonly WorkflowStep[];
}

export interface Workflow {
  readonly path: string;
  readonly name: string;
  readonly env: StringMap;
  readonly permissions: StringMap;
  readonly hasConcurrency: boolean;
  readonly jobs: readonly WorkflowJob[];
  readonly parseError: string | null;
}

export interface DependabotUpdate {
  readonly packageEcosystem: string;
  readonly scheduleInterval: string | null;
  readonly ignoredDependencies: readonly string[];
}

export interface DependabotConfig {
  readonly path: string;
  readonly updates: readonly DependabotUpdate[];
}

export interface PyprojectAuthor {
  readonly name: string | null;
  readonly email: string | null;
}

/** The parts of `pyproject.toml` the Python rules read. */
export interface PyprojectSummary {
  readonly projectName: string | null;
  readonly hasReadme: boolean;
  readonly hasLicense: boolean;
  readonly requiresPython: string | null;
  readonly classifiers: readonly string[];
  readonly authors: readonly PyprojectAuthor[];
  readonly dependencies: readonly string[];
  readonly optionalDependencies: Readonly<Record<string, readonly string[]>>;
  readonly ruffExtendSelect: readonly string[];
  readonly mypyStrict: boolean | null;
}

export type AllowedActions = "all" | "local_only" | "selected";

export interface SelectedActions {
  readonly githubOwnedAllowed: boolean;
  readonly verifiedAllowed: boolean;
  readonly patternsAllowed: readonly string[];
}

export interface WorkflowPermissions {
  readonly defaultWorkflowPermissions: "read" | "write";
  readonly canApprovePullRequestReviews: boolean;
}

export interface ActionsSettings {
  readonly enabled: boolean;
  readonly allowedActions: AllowedActions | null;
  readonly selectedActions: SelectedActions | null;
  readonly workflowPermissions: WorkflowPermissions | null;
}

export interface RepositoryActivity {
  /** Non-merge commits by the owner in the 90 days before the snapshot. */
  readonly hasRecentChanges: boolean;
  /** Non-merge commits by the owner since the latest release (true when never released). */
  readonly hasChangesSinceRelease: boolean;
}

export interface RepositorySnapshot {
  readonly ref: RepositoryRef;
  readonly fullName: string;
  readonly ownerLogin: string;
  readonly visibility: RepositoryVisibility;
  readonly private: boolean;
  readonly fork: boolean;
  readonly archived: boolean;
  readonly description: string | null;
  readonly language: string | null;
  readonly topics: readonly string[];
  readonly defaultBranch: string;
  readonly sizeKb: number;
  readonly hasIssues: boolean;
  readonly hasProjects: boolean;
  readonly hasWiki: boolean;
  readonly hasDiscussions: boolean;
  readonly hasPages: boolean;
  readonly allowAutoMerge: boolean;
  readonly allowMergeCommit: boolean;
  readonly deleteBranchOnMerge: boolean;
  readonly createdAt: string;
  readonly fetchedAt: string;
  readonly license: RepositoryLicense | null;
  readonly hasReadme: boolean;
  readonly defaultBranchProtection: BranchProtection | null;
  readonly branchRules: readonly BranchRule[];
  readonly treePaths: readonly string[];
  readonly treeTruncated: boolean;
  readonly workflows: readonly Workflow[];
  readonly dependabot: DependabotConfig | null;
  readonly pyproject: PyprojectSummary | null;
  readonly requirementsTxt: string | null;
  /** Null when the token cannot read the repository's Actions settings. */
  readonly actions: ActionsSettings | null;
  readonly pagesSourceBranch: string | null;
  readonly activity: RepositoryActivity | null;
}
