import type { AutomergeConfig } from "../config/automergeYaml.js";
import type { PullRequestRef } from "./types.js";

/** With `onlyWhenBlocked`, only PRs GitHub reports as "blocked" are assessed. */
export function shouldAssess(pull: PullRequestRef, config: Pick<AutomergeConfig, "onlyWhenBlocked">): boolean {
  if (!config.onlyWhenBlocked) return true;
  return pull.mergeableState === "blocked";
}
