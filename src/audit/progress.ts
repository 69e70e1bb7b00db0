export type AuditProgressPhase = "fetching" | "evaluated" | "failed" | "not_started";

export type AuditProgressEvent = {
  phase: AuditProgressPhase;
  repository: string;
  /** Repositories that reached a final state so far. */
  current: number;
  /** Repositories pulled from the selection so far; grows while the listing is paged. */
  total: number;
  message?: string;
};

export type AuditProgressHandler = (event: AuditProgressEvent) => void;
