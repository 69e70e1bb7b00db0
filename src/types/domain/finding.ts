import type { RepositoryRef } from "./repository.js";

export type Severity = "error" | "warning";

export interface Finding {
  readonly ruleId: string;
  readonly repository: RepositoryRef;
  readonly severity: Severity;
  readonly message: string;
  readonly fixable: boolean;
}

export type AuditErrorRecord =
  | {
      readonly scope: "repository";
      readonly repository: RepositoryRef;
      readonly errorName: string;
      readonly message: string;
    }
  | {
      readonly scope: "rule";
      readonly repository: RepositoryRef;
      readonly ruleId: string;
      readonly errorName: string;
      readonly message: string;
    }
  | {
      /** Listing the repositories to audit failed part-way; later repositories were never selected. */
      readonly scope: "selection";
      readonly errorName: string;
      readonly message: string;
    };

export interface RunResult {
  readonly findings: readonly Finding[];
  readonly errors: readonly AuditErrorRecord[];
  /** Repositories whose snapshot was fetched and every selected rule attempted. */
  readonly evaluated: readonly RepositoryRef[];
  /** Repositories pulled from the selector but abandoned because the run was cancelled. */
  readonly notStarted: readonly RepositoryRef[];
  readonly cancelled: boolean;
  readonly selectedRules: readonly string[];
  readonly durationMs: number;
}
