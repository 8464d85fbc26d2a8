/**
 * Typed failure descriptions returned by public core operations.
 * Core operations never throw for these conditions.
 */

/** Runner binary missing, daemon not running, or command timed out */
export interface InventoryUnavailable {
  kind: 'inventory-unavailable';
  message: string;
}

/** A single row of runner output could not be parsed */
export interface ParseError {
  kind: 'parse-error';
  line: string;
  message: string;
}

/** A single model could not be deleted */
export interface DeleteFailed {
  kind: 'delete-failed';
  name: string;
  reason: string;
}

/** Usage store flush failed after a retry; in-memory state is kept */
export interface PersistenceError {
  kind: 'persistence-error';
  message: string;
}

export type ViewerFailure = InventoryUnavailable | ParseError | DeleteFailed | PersistenceError;

export type Result<T, E extends ViewerFailure = ViewerFailure> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends ViewerFailure>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Render a failure as a one-line status message
 */
export function describeFailure(failure: ViewerFailure): string {
  switch (failure.kind) {
    case 'inventory-unavailable':
      return `Model runner unavailable: ${failure.message}`;
    case 'parse-error':
      return `Skipped unreadable row "${failure.line}": ${failure.message}`;
    case 'delete-failed':
      return `Failed to delete ${failure.name}: ${failure.reason}`;
    case 'persistence-error':
      return `Could not save usage data: ${failure.message}`;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
