/**
 * How ranked endpoints are spread over the target domains.
 *
 * - `load-balance`: a single domain receives every endpoint (up to the cap).
 * - `one-to-one`: domain i receives endpoint i and nothing else.
 */
export type ReconcilePolicy = "load-balance" | "one-to-one";

export type DomainOutcomeStatus = "updated" | "list-failed" | "skipped";

export interface DomainOutcome {
  domain: string;
  recordName: string;
  status: DomainOutcomeStatus;
  deleted: number;
  deleteFailures: number;
  created: number;
  createFailures: number;
}

export interface ReconcileSummary {
  /** True when zone credentials were missing and nothing was touched. */
  skipped: boolean;
  policy?: ReconcilePolicy;
  domains: DomainOutcome[];
}

export type RunTrigger = "manual" | "schedule";

export type RunStatus = "running" | "completed" | "failed" | "skipped";

export interface RunRecord {
  trigger: RunTrigger;
  startedAt: string;
  finishedAt?: string;
  status: RunStatus;
  message: string;
  /** Endpoints read from the result file, in rank order. */
  endpoints: string[];
}

export interface RunOutcome {
  status: RunStatus;
  message: string;
}
