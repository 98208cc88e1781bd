/**
 * Failure classes of a sync run.
 *
 * ScanError and CommitError are scoped to one file and never stop a run.
 * ConsistencyError means the graph itself would be corrupted and is fatal.
 */

export class ScanError extends Error {
  readonly name = "ScanError";

  constructor(
    readonly path: string,
    message: string,
    readonly line: number | null = null
  ) {
    super(line === null ? `${path}: ${message}` : `${path}:${line}: ${message}`);
  }
}

export class CommitError extends Error {
  readonly name = "CommitError";

  constructor(
    readonly path: string,
    readonly cause: Error
  ) {
    super(`${path}: ${cause.message}`);
  }
}

export class ConsistencyError extends Error {
  readonly name = "ConsistencyError";
}
