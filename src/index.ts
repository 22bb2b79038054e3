export { classifyCheck, classifyStatus } from "./status/classify.js";
export { buildCheckMap, buildStatusMap, resolveAll, resolveName } from "./status/resolve.js";
export { aggregateVerdicts, decideAction, outcomeToAction } from "./status/decide.js";
export { assessStatusAndChecks, describeAssessment } from "./status/assess.js";
export { shouldAssess } from "./status/gate.js";
export type {
  Assessment,
  AssessCollaborators,
  BranchOutcome,
  BranchProtectionInfo,
  CheckRunRecord,
  LabelRemovalReason,
  PullRequestRef,
  RequiredCheckName,
  StatusAction,
  StatusRecord,
  Verdict,
} from "./status/types.js";
export { createGitHubCollaborators, fetchPullRequest, removalMessage } from "./github/index.js";
export type { RepoContext } from "./github/index.js";
export { loadAutomergeConfig, parseAutomergeConfig, type AutomergeConfig } from "./config/automergeYaml.js";
export { readEnv, type RunEnv } from "./config/env.js";
export { FetchError, type FetchResult } from "./util/result.js";
