/**
 * Execution bounds for model-written SQL.
 * The database collaborator enforces no limits of its own, so the executor does.
 */

export const SAFE_DEFAULTS = {
  /** Hard cap on rows materialized per query */
  maxRows: 1_000,
  /** Statement timeout in milliseconds */
  statementTimeoutMs: 15_000,
  /** Rows shown to the model when summarizing */
  summarySampleRows: 5,
} as const;
