/**
 * Environment for one bot run. Missing or malformed values → null (caller skips the run).
 */

export const DEFAULT_API_URL = "https://api.github.com";

export interface RunEnv {
  token: string;
  owner: string;
  repo: string;
  prNumber: number;
  apiUrl: string;
  configDir: string;
}

type EnvSource = Record<string, string | undefined>;

function get(env: EnvSource, key: string): string {
  const v = env[key];
  if (v == null || v.trim() === "") return "";
  return v.trim();
}

export function readEnv(env: EnvSource, cwd: string): RunEnv | null {
  const token = get(env, "GITHUB_TOKEN");
  const ownerRepo = get(env, "GITHUB_REPOSITORY");
  const prRaw = get(env, "PR_NUMBER");
  if (!token || !ownerRepo || !prRaw) return null;

  const [owner, repo, ...rest] = ownerRepo.split("/");
  if (!owner || !repo || rest.length > 0) return null;

  const prNumber = Number(prRaw);
  if (!Number.isInteger(prNumber) || prNumber < 1) return null;

  return {
    token,
    owner,
    repo,
    prNumber,
    apiUrl: get(env, "GITHUB_API_URL").replace(/\/+$/, "") || DEFAULT_API_URL,
    configDir: get(env, "AUTOMERGE_CONFIG_DIR") || cwd,
  };
}
