const PREFIX = "AUTOMERGE";

export function log(scope: string, message: string): void {
  console.log(PREFIX + " " + scope + ": " + message);
}

export function logFailure(scope: string, message: string, err: unknown): void {
  const detail = err instanceof Error ? err.message : String(err);
  console.log(PREFIX + " " + scope + ": " + message + " (" + detail + ")");
}
