/**
 * Required-check evaluation types.
 * Everything here is transient: built from one fetch, consumed by one evaluation.
 */

import type { FetchResult } from "../util/result.js";

export type RequiredCheckName = string;

/** Legacy commit status (`/commits/{sha}/status`). */
export interface StatusRecord {
  context: string;
  state: string;
}

/** Check-run (`/commits/{sha}/check-runs`). `conclusion` is null until the run completes. */
export interface CheckRunRecord {
  name: string;
  status: string;
  conclusion: string | null;
}

export type Verdict = "SUCCESS" | "FAILURE" | "PENDING";

export type BranchOutcome = "ALL_SUCCESS" | "HAS_FAILURE" | "INDETERMINATE";

export type LabelRemovalReason = "OUTSTANDING_REVIEWS" | "STATUS_CHECKS";

export type StatusAction =
  | { type: "remove_labels"; reason: LabelRemovalReason }
  | { type: "none" };

export type CheckMap = Map<string, CheckRunRecord>;
export type StatusMap = Map<string, StatusRecord>;

export interface Assessment {
  action: StatusAction;
  /** Null when no required checks were evaluated (unprotected branch, empty set, fetch failure). */
  outcome: BranchOutcome | null;
  verdicts: Map<RequiredCheckName, Verdict>;
}

export interface PullRequestRef {
  number: number;
  baseRef: string;
  headSha: string;
  mergeableState: string | null;
  labels: string[];
}

export interface BranchProtectionInfo {
  protected: boolean;
  requiredCheckNames: RequiredCheckName[];
}

export interface AssessCollaborators {
  fetchBranchProtection(branch: string): Promise<FetchResult<BranchProtectionInfo>>;
  fetchCheckRuns(sha: string): Promise<FetchResult<CheckRunRecord[]>>;
  fetchStatuses(sha: string): Promise<FetchResult<StatusRecord[]>>;
  removeLabels(pull: PullRequestRef, reason: LabelRemovalReason): Promise<void>;
}
