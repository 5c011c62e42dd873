/**
 * Request orchestration.
 *
 *   START ── conversational ─────────────────────────▶ CONVERSATIONAL_REPLY
 *     └── SYNTHESIZE ── empty SQL ───────────────────▶ CONVERSATIONAL_REPLY
 *            └── VALIDATE ── rejected ───────────────▶ ERROR_REPLY
 *                  └── EXECUTE ── failed ────────────▶ ERROR_REPLY
 *                        └── SUMMARIZE ──────────────▶ DATA_REPLY
 *
 * Each request runs the machine once. Stages hand back Results; the single
 * conversion of a QueryError into text happens in describeQueryError().
 */

import type { AssistantConfig } from '../config.js';
import { SAFE_DEFAULTS } from '../db/defaults.js';
import type { Database, QueryLimits, SchemaCatalog } from '../db/types.js';
import { describeQueryError, errorMessage, type QueryError } from '../errors.js';
import type { CompletionGateway } from '../llm/gateway.js';
import { silentLogger, type Logger } from '../log.js';
import type { EnumRule } from '../sql/enums.js';
import { validateReadOnly } from '../sql/guard.js';
import { conversationalReply } from './conversation.js';
import { executeReadOnly } from './execute.js';
import { isConversational } from './intent.js';
import { summarizeResults } from './summarize.js';
import { synthesizeSql } from './synthesize.js';

export type ReplyRoute = 'conversational' | 'data' | 'error';

export interface AssistantReply {
  route: ReplyRoute;
  /** The text returned to the caller */
  summary: string;
  success: boolean;
  /** Statement that was validated (data and rejected replies) */
  sql?: string;
  rowCount?: number;
  truncated?: boolean;
  error?: QueryError;
}

export interface AssistantOptions {
  chatModel: string;
  sqlModel: string;
  limits: QueryLimits;
  enumRules?: readonly EnumRule[];
}

export interface AssistantDeps {
  db: Database;
  gateway: CompletionGateway;
  options: AssistantOptions;
  logger?: Logger;
}

export function optionsFromConfig(config: AssistantConfig): AssistantOptions {
  return {
    chatModel: config.chatModel,
    sqlModel: config.sqlModel,
    limits: { maxRows: config.maxRows, statementTimeoutMs: config.statementTimeoutMs },
  };
}

export const DEFAULT_LIMITS: QueryLimits = {
  maxRows: SAFE_DEFAULTS.maxRows,
  statementTimeoutMs: SAFE_DEFAULTS.statementTimeoutMs,
};

function errorReply(error: QueryError): AssistantReply {
  const reply: AssistantReply = { route: 'error', summary: describeQueryError(error), success: false, error };
  if (error.sql !== undefined) reply.sql = error.sql;
  return reply;
}

async function converse(utterance: string, deps: AssistantDeps): Promise<AssistantReply> {
  const reply = await conversationalReply(utterance, deps.gateway, { model: deps.options.chatModel });
  if (!reply.ok) return errorReply(reply.error);
  return { route: 'conversational', summary: reply.value, success: true };
}

async function runPipeline(utterance: string, deps: AssistantDeps, logger: Logger): Promise<AssistantReply> {
  if (isConversational(utterance)) {
    logger.debug('Routed as conversational');
    return converse(utterance, deps);
  }

  let catalog: SchemaCatalog;
  try {
    catalog = await deps.db.introspect();
  } catch (err: unknown) {
    logger.warn('Schema introspection failed', { error: errorMessage(err) });
    return errorReply({ kind: 'schema_unavailable', message: errorMessage(err) });
  }
  logger.debug('Schema catalog loaded', { tables: catalog.tables.length });

  const synthesized = await synthesizeSql(utterance, catalog, deps.gateway, {
    model: deps.options.sqlModel,
    enumRules: deps.options.enumRules,
  });
  if (!synthesized.ok) return errorReply(synthesized.error);

  const candidate = synthesized.value;
  if (!candidate) {
    logger.debug('No SQL produced, falling back to conversation');
    return converse(utterance, deps);
  }
  logger.debug('SQL synthesized', { sql: candidate });

  const validated = validateReadOnly(candidate, { logger });
  if (!validated.ok) {
    logger.warn('SQL rejected', { reason: validated.error.message, sql: candidate });
    return errorReply(validated.error);
  }

  const executed = await executeReadOnly(deps.db, validated.value, deps.options.limits);
  if (!executed.ok) {
    logger.warn('SQL execution failed', { error: executed.error.message });
    return errorReply(executed.error);
  }
  const result = executed.value;
  logger.debug('SQL executed', { rows: result.rowCount, truncated: result.truncated, ms: result.execMs });

  const summary = await summarizeResults(utterance, result, deps.gateway, {
    model: deps.options.chatModel,
    logger,
  });

  return {
    route: 'data',
    summary,
    success: true,
    sql: validated.value,
    rowCount: result.rowCount,
    truncated: result.truncated,
  };
}

/** Full reply record for one utterance. Never rejects. */
export async function askAssistant(utterance: string, deps: AssistantDeps): Promise<AssistantReply> {
  const logger = deps.logger ?? silentLogger;
  try {
    return await runPipeline(utterance, deps, logger);
  } catch (err: unknown) {
    logger.error('Unexpected pipeline failure', { error: errorMessage(err) });
    return errorReply({ kind: 'unexpected', message: errorMessage(err) });
  }
}

/** Caller-facing entry: the answer text for one utterance. Never rejects. */
export async function getDataResponse(utterance: string, deps: AssistantDeps): Promise<string> {
  const reply = await askAssistant(utterance, deps);
  return reply.summary;
}
