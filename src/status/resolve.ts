import { classifyCheck, classifyStatus } from "./classify.js";
import type {
  CheckMap,
  CheckRunRecord,
  RequiredCheckName,
  StatusMap,
  StatusRecord,
  Verdict,
} from "./types.js";

/** Name → check-run. Repeated names: last one wins. */
export function buildCheckMap(runs: CheckRunRecord[]): CheckMap {
  const map: CheckMap = new Map();
  for (const run of runs) map.set(run.name, run);
  return map;
}

/** Context → status. Repeated contexts: last one wins. */
export function buildStatusMap(statuses: StatusRecord[]): StatusMap {
  const map: StatusMap = new Map();
  for (const status of statuses) map.set(status.context, status);
  return map;
}

/**
 * Check-runs take precedence over statuses; a name found in neither is still pending.
 */
export function resolveName(
  name: RequiredCheckName,
  checkMap: CheckMap,
  statusMap: StatusMap,
): [RequiredCheckName, Verdict] {
  const run = checkMap.get(name);
  if (run) return [name, classifyCheck(run)];
  const status = statusMap.get(name);
  if (status) return [name, classifyStatus(status)];
  return [name, "PENDING"];
}

export function resolveAll(
  names: RequiredCheckName[],
  checkMap: CheckMap,
  statusMap: StatusMap,
): Map<RequiredCheckName, Verdict> {
  return new Map(names.map((name) => resolveName(name, checkMap, statusMap)));
}
