export interface RepoContext {
  owner: string;
  repo: string;
}
