#!/usr/bin/env node
/**
 * Automerge status gate. Evaluates one PR's required checks and removes the merge labels
 * when a check failed or only reviews are left. Never breaks CI: missing env or API errors → exit(0).
 */

import { Octokit } from "@octokit/rest";
import { loadAutomergeConfig } from "../src/config/automergeYaml.js";
import { readEnv } from "../src/config/env.js";
import { createGitHubCollaborators, fetchPullRequest } from "../src/github/index.js";
import { assessStatusAndChecks, describeAssessment } from "../src/status/assess.js";
import { shouldAssess } from "../src/status/gate.js";
import { log, logFailure } from "../src/util/log.js";

const USER_AGENT = "automerge-gate/1.0";

async function main(): Promise<void> {
  const env = readEnv(process.env, process.cwd());
  if (!env) {
    log("run", "skipped (missing env)");
    return;
  }

  const config = loadAutomergeConfig(env.configDir);
  const octokit = new Octokit({ auth: env.token, baseUrl: env.apiUrl, userAgent: USER_AGENT });
  const ctx = { owner: env.owner, repo: env.repo };

  const pull = await fetchPullRequest(octokit, ctx, env.prNumber);
  if (!pull.ok) return;

  if (!shouldAssess(pull.value, config)) {
    log("run", "#" + pull.value.number + " not blocked (" + (pull.value.mergeableState ?? "unknown") + ")");
    return;
  }

  const assessment = await assessStatusAndChecks(
    pull.value,
    createGitHubCollaborators(octokit, ctx, config.labels),
  );
  log("run", "#" + pull.value.number + " done: " + describeAssessment(assessment));
}

try {
  await main();
} catch (err) {
  logFailure("run", "skipped", err);
}
process.exit(0);
