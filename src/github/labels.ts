/**
 * Merge-intent label removal. Removing a label that is already gone is a no-op.
 */

import type { Octokit } from "@octokit/rest";
import { log, logFailure } from "../util/log.js";
import { statusOf } from "../util/result.js";
import type { LabelRemovalReason, PullRequestRef } from "../status/types.js";
import type { RepoContext } from "./types.js";

const REMOVAL_MESSAGES: Record<LabelRemovalReason, string> = {
  OUTSTANDING_REVIEWS: "reviews are outstanding",
  STATUS_CHECKS: "status checks failed",
};

export function removalMessage(reason: LabelRemovalReason): string {
  return REMOVAL_MESSAGES[reason];
}

/** Configured labels present on the PR, in the PR's own spelling. */
export function labelsToRemove(pull: PullRequestRef, configured: string[]): string[] {
  const wanted = new Set(configured.map((l) => l.toLowerCase()));
  return pull.labels.filter((l) => wanted.has(l.toLowerCase()));
}

export async function removeLabels(
  octokit: Octokit,
  ctx: RepoContext,
  pull: PullRequestRef,
  configured: string[],
  reason: LabelRemovalReason,
): Promise<void> {
  const targets = labelsToRemove(pull, configured);
  if (targets.length === 0) {
    log("labels", "#" + pull.number + " nothing to remove");
    return;
  }
  for (const name of targets) {
    try {
      await octokit.issues.removeLabel({
        owner: ctx.owner,
        repo: ctx.repo,
        issue_number: pull.number,
        name,
      });
      log("labels", "#" + pull.number + " removed " + name + ": " + removalMessage(reason));
    } catch (err) {
      if (statusOf(err) === 404) continue;
      logFailure("labels", "#" + pull.number + " could not remove " + name, err);
    }
  }
}
