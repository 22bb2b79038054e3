/**
 * .automerge.yml loader (v1, frozen schema).
 * Unknown keys or invalid values throw; a missing file yields the defaults.
 */

import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { parse } from "yaml";

const CONFIG_FILE = ".automerge.yml";
const ALLOWED_KEYS = new Set(["labels", "onlyWhenBlocked"]);
export const DEFAULT_LABELS: readonly string[] = ["automerge", "priority"];

export interface AutomergeConfig {
  /** Merge-intent labels removed when checks fail or reviews are outstanding. */
  labels: string[];
  /** Only evaluate PRs whose mergeable_state is "blocked". */
  onlyWhenBlocked: boolean;
}

export function defaultConfig(): AutomergeConfig {
  return { labels: [...DEFAULT_LABELS], onlyWhenBlocked: true };
}

export function parseAutomergeConfig(content: string): AutomergeConfig {
  let raw: unknown;
  try {
    raw = parse(content);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`${CONFIG_FILE}: invalid YAML: ${msg}`);
  }

  // Empty file parses to null.
  if (raw === null || raw === undefined) return defaultConfig();
  if (typeof raw !== "object" || Array.isArray(raw)) {
    throw new Error(`${CONFIG_FILE}: root must be an object`);
  }

  const obj: Record<string, unknown> = { ...raw };
  for (const key of Object.keys(obj)) {
    if (!ALLOWED_KEYS.has(key)) {
      throw new Error(`${CONFIG_FILE}: unknown key "${key}" (v1 schema is frozen)`);
    }
  }

  const config = defaultConfig();

  if (obj.labels !== undefined) {
    if (!Array.isArray(obj.labels) || obj.labels.length === 0) {
      throw new Error(`${CONFIG_FILE}: labels must be a non-empty array of label names`);
    }
    const labels: string[] = [];
    for (let i = 0; i < obj.labels.length; i++) {
      const v: unknown = obj.labels[i];
      if (typeof v !== "string" || v.trim() === "") {
        throw new Error(`${CONFIG_FILE}: labels[${i}] must be a non-empty string`);
      }
      labels.push(v.trim());
    }
    config.labels = labels;
  }

  if (obj.onlyWhenBlocked !== undefined) {
    if (typeof obj.onlyWhenBlocked !== "boolean") {
      throw new Error(`${CONFIG_FILE}: onlyWhenBlocked must be true or false`);
    }
    config.onlyWhenBlocked = obj.onlyWhenBlocked;
  }

  return config;
}

export function loadAutomergeConfig(dir: string): AutomergeConfig {
  const path = join(dir, CONFIG_FILE);
  if (!existsSync(path)) return defaultConfig();
  return parseAutomergeConfig(readFileSync(path, "utf8"));
}
