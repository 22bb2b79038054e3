/**
 * Branch decision engine. Folds per-check verdicts into one outcome and maps it to a label action.
 * Pure: no GitHub calls.
 */

import { resolveAll } from "./resolve.js";
import type {
  Assessment,
  BranchOutcome,
  CheckMap,
  LabelRemovalReason,
  RequiredCheckName,
  StatusAction,
  StatusMap,
  Verdict,
} from "./types.js";

export const NO_ACTION: StatusAction = { type: "none" };

export function removeLabelsAction(reason: LabelRemovalReason): StatusAction {
  return { type: "remove_labels", reason };
}

export function aggregateVerdicts(verdicts: Iterable<Verdict>): BranchOutcome {
  const seen = new Set(verdicts);
  if (seen.size === 0 || (seen.size === 1 && seen.has("SUCCESS"))) return "ALL_SUCCESS";
  if (seen.has("FAILURE")) return "HAS_FAILURE";
  return "INDETERMINATE";
}

export function outcomeToAction(outcome: BranchOutcome): StatusAction {
  switch (outcome) {
    case "ALL_SUCCESS":
      // Nothing left to wait on; whatever still blocks the PR is a review.
      return removeLabelsAction("OUTSTANDING_REVIEWS");
    case "HAS_FAILURE":
      return removeLabelsAction("STATUS_CHECKS");
    case "INDETERMINATE":
      return NO_ACTION;
  }
}

export function decideAction(
  requiredNames: RequiredCheckName[],
  checkMap: CheckMap,
  statusMap: StatusMap,
): Assessment {
  if (requiredNames.length === 0) {
    return { action: removeLabelsAction("OUTSTANDING_REVIEWS"), outcome: null, verdicts: new Map() };
  }
  const verdicts = resolveAll(requiredNames, checkMap, statusMap);
  const outcome = aggregateVerdicts(verdicts.values());
  return { action: outcomeToAction(outcome), outcome, verdicts };
}
