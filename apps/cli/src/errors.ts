import { CompletionFailedError, ConfigError, type QueryError } from '@erp-assistant/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;
export const EXIT_CODE_POLICY = 3;

export type CliErrorCode =
  | 'INVALID_ARGS'
  | 'CONFIG_INVALID'
  | 'DB_CONN_FAILED'
  | 'DB_QUERY_FAILED'
  | 'SQL_REJECTED'
  | 'COMPLETION_FAILED'
  | 'HISTORY_NOT_FOUND'
  | 'INTERNAL_ERROR';

export type CliErrorKind = 'usage' | 'runtime' | 'policy';

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly code: CliErrorCode;
  readonly details?: unknown;

  constructor(kind: CliErrorKind, code: CliErrorCode, message: string, details?: unknown) {
    super(message);
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export function usageError(message: string, code: CliErrorCode = 'INVALID_ARGS', details?: unknown): CliError {
  return new CliError('usage', code, message, details);
}

export function runtimeError(message: string, code: CliErrorCode = 'DB_QUERY_FAILED', details?: unknown): CliError {
  return new CliError('runtime', code, message, details);
}

export function policyError(message: string, details?: unknown): CliError {
  return new CliError('policy', 'SQL_REJECTED', message, details);
}

/** Map a failed assistant reply onto the CLI taxonomy (used by `ask --strict`). */
export function fromQueryError(error: QueryError): CliError {
  const details = error.sql === undefined ? undefined : { sql: error.sql };
  switch (error.kind) {
    case 'sql_rejected':
      return policyError(error.message, details);
    case 'schema_unavailable':
      return runtimeError(error.message, 'DB_CONN_FAILED', details);
    case 'execution_failed':
      return runtimeError(error.message, 'DB_QUERY_FAILED', details);
    case 'synthesis_failed':
    case 'reply_failed':
      return runtimeError(error.message, 'COMPLETION_FAILED', details);
    case 'unexpected':
      return runtimeError(error.message, 'INTERNAL_ERROR', details);
  }
}

/** Errors raised by the core library, rewrapped so they carry an exit code. */
export function normalizeError(error: unknown): unknown {
  if (error instanceof ConfigError) {
    return usageError(error.message, 'CONFIG_INVALID', { problems: error.problems });
  }
  if (error instanceof CompletionFailedError) {
    return runtimeError(error.message, 'COMPLETION_FAILED', { transport: error.transport, status: error.status });
  }
  return error;
}

/** Exit code for anything thrown by a command, core errors included. */
export function toExitCode(rawError: unknown): number {
  const error = normalizeError(rawError);
  if (error instanceof CliError) {
    if (error.kind === 'usage') return EXIT_CODE_USAGE;
    if (error.kind === 'policy') return EXIT_CODE_POLICY;
    return EXIT_CODE_RUNTIME;
  }
  return EXIT_CODE_RUNTIME;
}
