import type { Octokit } from "@octokit/rest";
import type { AssessCollaborators } from "../status/types.js";
import { removeLabels } from "./labels.js";
import { fetchBranchProtection, fetchCheckRuns, fetchStatuses } from "./read.js";
import type { RepoContext } from "./types.js";

export { fetchBranchProtection, fetchCheckRuns, fetchStatuses, fetchPullRequest } from "./read.js";
export { removeLabels, removalMessage, labelsToRemove } from "./labels.js";
export type { RepoContext } from "./types.js";

export function createGitHubCollaborators(
  octokit: Octokit,
  ctx: RepoContext,
  labels: string[],
): AssessCollaborators {
  return {
    fetchBranchProtection: (branch) => fetchBranchProtection(octokit, ctx, branch),
    fetchCheckRuns: (sha) => fetchCheckRuns(octokit, ctx, sha),
    fetchStatuses: (sha) => fetchStatuses(octokit, ctx, sha),
    removeLabels: (pull, reason) => removeLabels(octokit, ctx, pull, labels, reason),
  };
}
