/**
 * Error taxonomy
 *
 * Every failure the core can recover from has its own class so call sites
 * can decide between degrading and propagating by `kind`.
 */

export type WorklogErrorKind =
  | 'source_unavailable'
  | 'malformed_source_response'
  | 'summarization_failure'
  | 'store_persistence_failure'
  | 'store_read_failure'
  | 'invalid_date_range';

export abstract class WorklogError extends Error {
  abstract readonly kind: WorklogErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Credentials missing, or a network/auth failure talking to Jira or GitHub. */
export class SourceUnavailableError extends WorklogError {
  readonly kind = 'source_unavailable';
}

/** The source answered with non-JSON text or an unexpected shape. */
export class MalformedSourceResponseError extends WorklogError {
  readonly kind = 'malformed_source_response';
}

export class SummarizationError extends WorklogError {
  readonly kind = 'summarization_failure';
}

export class SnapshotPersistenceError extends WorklogError {
  readonly kind = 'store_persistence_failure';

  constructor(
    public readonly date: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class SnapshotReadError extends WorklogError {
  readonly kind = 'store_read_failure';

  constructor(
    public readonly date: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class InvalidDateRangeError extends WorklogError {
  readonly kind = 'invalid_date_range';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
