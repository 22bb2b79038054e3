/**
 * Required-check assessment for one pull request.
 * Any failed fetch aborts the evaluation with no label action. Never throws on fetch failures.
 */

import { log } from "../util/log.js";
import { decideAction, NO_ACTION } from "./decide.js";
import { buildCheckMap, buildStatusMap } from "./resolve.js";
import type { AssessCollaborators, Assessment, PullRequestRef } from "./types.js";

function noAction(): Assessment {
  return { action: NO_ACTION, outcome: null, verdicts: new Map() };
}

export function describeAssessment(assessment: Assessment): string {
  const { action, outcome } = assessment;
  const head = action.type === "remove_labels" ? "remove_labels " + action.reason : "none";
  return outcome ? head + " (" + outcome + ")" : head;
}

/**
 * If the PR is blocked and no required check is outstanding, something else (reviews,
 * conflicts) is blocking it and the merge labels come off. A failed required check takes
 * them off as well.
 */
export async function assessStatusAndChecks(
  pull: PullRequestRef,
  collaborators: AssessCollaborators,
): Promise<Assessment> {
  const protection = await collaborators.fetchBranchProtection(pull.baseRef);
  if (!protection.ok) return noAction();

  const required = protection.value.protected ? protection.value.requiredCheckNames : [];

  let assessment: Assessment;
  if (required.length === 0) {
    assessment = decideAction(required, new Map(), new Map());
  } else {
    const [runs, statuses] = await Promise.all([
      collaborators.fetchCheckRuns(pull.headSha),
      collaborators.fetchStatuses(pull.headSha),
    ]);
    if (!runs.ok || !statuses.ok) return noAction();
    assessment = decideAction(required, buildCheckMap(runs.value), buildStatusMap(statuses.value));
  }

  log("status", "#" + pull.number + " " + describeAssessment(assessment));
  if (assessment.action.type === "remove_labels") {
    await collaborators.removeLabels(pull, assessment.action.reason);
  }
  return assessment;
}
