import type { CheckRunRecord, StatusRecord, Verdict } from "./types.js";

const CHECK_FAILURE_CONCLUSIONS = new Set(["failure", "action_required", "cancelled", "timed_out"]);

/**
 * Legacy status → verdict. Unknown states count as success.
 */
export function classifyStatus(item: StatusRecord): Verdict {
  switch (item.state) {
    case "failure":
    case "error":
      return "FAILURE";
    case "pending":
      return "PENDING";
    default:
      return "SUCCESS";
  }
}

/**
 * Check-run → verdict. A failing conclusion wins over the status field; any other
 * completed run (neutral, skipped, stale, ...) counts as success.
 */
export function classifyCheck(item: CheckRunRecord): Verdict {
  if (item.conclusion !== null && CHECK_FAILURE_CONCLUSIONS.has(item.conclusion)) return "FAILURE";
  if (item.status === "completed") return "SUCCESS";
  return "PENDING";
}
