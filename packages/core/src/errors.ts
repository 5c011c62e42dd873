/**
 * Error taxonomy for the assistant pipeline.
 *
 * Pipeline stages return a tagged Result instead of throwing; the only
 * place a QueryError becomes user-facing text is describeQueryError().
 */

export type QueryErrorKind =
  | 'schema_unavailable'
  | 'synthesis_failed'
  | 'sql_rejected'
  | 'execution_failed'
  | 'reply_failed'
  | 'unexpected';

export const QUERY_ERROR_KINDS: readonly QueryErrorKind[] = [
  'schema_unavailable',
  'synthesis_failed',
  'sql_rejected',
  'execution_failed',
  'reply_failed',
  'unexpected',
];

export function isQueryErrorKind(value: string): value is QueryErrorKind {
  return QUERY_ERROR_KINDS.some((kind) => kind === value);
}

export interface QueryError {
  kind: QueryErrorKind;
  /** Short machine-oriented description (rejection reason, driver message, ...) */
  message: string;
  /** The statement involved, when there is one */
  sql?: string;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: QueryError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(kind: QueryErrorKind, message: string, sql?: string): Result<T> {
  return { ok: false, error: sql === undefined ? { kind, message } : { kind, message, sql } };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Raised by the completion gateway for any failed model call. Never retried. */
export class CompletionFailedError extends Error {
  readonly transport: string;
  readonly status?: number;

  constructor(transport: string, message: string, status?: number) {
    super(`Completion failed (${transport}): ${message}`);
    this.name = 'CompletionFailedError';
    this.transport = transport;
    this.status = status;
  }
}

/** Raised by loadConfig() when the environment does not describe a usable setup. */
export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

const CONTROLLED_KINDS: QueryErrorKind[] = ['sql_rejected', 'execution_failed'];

/**
 * Convert a pipeline failure into the sentence returned to the caller.
 * Rejections and database errors are "controlled" and read as an apology
 * with the reason; everything else is reported as unexpected.
 */
export function describeQueryError(error: QueryError): string {
  if (CONTROLLED_KINDS.includes(error.kind)) {
    return `I'm sorry, there was an issue processing your request. (${error.message})`;
  }
  return `An unexpected error occurred. Please try again. (${error.message})`;
}
