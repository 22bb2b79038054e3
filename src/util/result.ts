/**
 * Fetch results. Collaborators never throw across the bot boundary; they return one of these.
 */

export class FetchError extends Error {
  readonly operation: string;
  readonly status: number | null;

  constructor(operation: string, message: string, status: number | null = null) {
    super(message);
    this.name = "FetchError";
    this.operation = operation;
    this.status = status;
  }
}

export type FetchResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: FetchError };

export function ok<T>(value: T): FetchResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: FetchError): FetchResult<T> {
  return { ok: false, error };
}

/** HTTP status of an Octokit request error, or null for anything else. */
export function statusOf(err: unknown): number | null {
  if (typeof err !== "object" || err === null || !("status" in err)) return null;
  const status = err.status;
  return typeof status === "number" ? status : null;
}

export function toFetchError(operation: string, err: unknown): FetchError {
  if (err instanceof FetchError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new FetchError(operation, message, statusOf(err));
}
