/**
 * GitHub read collaborators. Each fetch logs its own failure and returns a FetchResult. Never throws.
 */

import type { Octokit } from "@octokit/rest";
import { logFailure } from "../util/log.js";
import { fail, ok, toFetchError, type FetchResult } from "../util/result.js";
import type {
  BranchProtectionInfo,
  CheckRunRecord,
  PullRequestRef,
  StatusRecord,
} from "../status/types.js";
import type { RepoContext } from "./types.js";

const PER_PAGE = 100;

async function attempt<T>(
  operation: string,
  failureMessage: string,
  run: () => Promise<T>,
): Promise<FetchResult<T>> {
  try {
    return ok(await run());
  } catch (err) {
    logFailure("fetch", failureMessage, err);
    return fail(toFetchError(operation, err));
  }
}

export function fetchBranchProtection(
  octokit: Octokit,
  ctx: RepoContext,
  branch: string,
): Promise<FetchResult<BranchProtectionInfo>> {
  return attempt("branch-protection", "There was a problem getting the branch protections", async () => {
    const { data } = await octokit.repos.getBranch({ owner: ctx.owner, repo: ctx.repo, branch });
    if (!data.protected) return { protected: false, requiredCheckNames: [] };
    return {
      protected: true,
      requiredCheckNames: data.protection?.required_status_checks?.contexts ?? [],
    };
  });
}

export function fetchCheckRuns(
  octokit: Octokit,
  ctx: RepoContext,
  sha: string,
): Promise<FetchResult<CheckRunRecord[]>> {
  return attempt("check-runs", "There was a problem getting the check runs", async () => {
    const runs = await octokit.paginate(octokit.checks.listForRef, {
      owner: ctx.owner,
      repo: ctx.repo,
      ref: sha,
      per_page: PER_PAGE,
    });
    return runs.map((run) => ({
      name: run.name,
      status: run.status,
      conclusion: run.conclusion ?? null,
    }));
  });
}

export function fetchStatuses(
  octokit: Octokit,
  ctx: RepoContext,
  sha: string,
): Promise<FetchResult<StatusRecord[]>> {
  return attempt("statuses", "There was a problem getting the commit statuses", async () => {
    // Combined status: the latest status per context, paged until total_count is reached.
    const statuses: StatusRecord[] = [];
    for (let page = 1; ; page++) {
      const { data } = await octokit.repos.getCombinedStatusForRef({
        owner: ctx.owner,
        repo: ctx.repo,
        ref: sha,
        per_page: PER_PAGE,
        page,
      });
      for (const s of data.statuses) statuses.push({ context: s.context, state: s.state });
      if (data.statuses.length === 0 || statuses.length >= data.total_count) return statuses;
    }
  });
}

export function fetchPullRequest(
  octokit: Octokit,
  ctx: RepoContext,
  pullNumber: number,
): Promise<FetchResult<PullRequestRef>> {
  return attempt("pull-request", "There was a problem getting the pull request", async () => {
    const { data } = await octokit.pulls.get({ owner: ctx.owner, repo: ctx.repo, pull_number: pullNumber });
    return {
      number: data.number,
      baseRef: data.base.ref,
      headSha: data.head.sha,
      mergeableState: typeof data.mergeable_state === "string" ? data.mergeable_state : null,
      labels: data.labels.map((l) => l.name).filter((n): n is string => typeof n === "string"),
    };
  });
}
