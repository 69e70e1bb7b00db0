import type {
  ActionsSettings,
  BranchProtection,
  BranchRule,
  DependabotConfig,
  DependabotUpdate,
  PyprojectSummary,
  RepositoryActivity,
  RepositoryLicense,
  RepositoryRef,
  RepositorySnapshot,
  RepositoryVisibility,
  Workflow,
  WorkflowJob,
  WorkflowStep
} from "./types/domain/repository.js";
import type { AuditErrorRecord, Finding, RunResult, Severity } from "./types/domain/finding.js";

export type {
  ActionsSettings,
  AuditErrorRecord,
  BranchProtection,
  BranchRule,
  DependabotConfig,
  DependabotUpdate,
  Finding,
  PyprojectSummary,
  RepositoryActivity,
  RepositoryLicense,
  RepositoryRef,
  RepositorySnapshot,
  RepositoryVisibility,
  RunResult,
  Severity,
  Workflow,
  WorkflowJob,
  WorkflowStep
};
