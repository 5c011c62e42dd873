/**
 * @erp-assistant/core: barrel export
 *
 * Natural-language questions in, SQL-backed answers out.
 */

// Errors and results
export {
  CompletionFailedError,
  ConfigError,
  QUERY_ERROR_KINDS,
  describeQueryError,
  errorMessage,
  fail,
  isQueryErrorKind,
  ok,
} from './errors.js';
export type { QueryError, QueryErrorKind, Result } from './errors.js';

// Configuration and logging
export {
  DEFAULT_BASE_URL,
  DEFAULT_MODEL,
  defaultHistoryPath,
  loadConfig,
  requireApiKey,
  requireDatabaseUrl,
} from './config.js';
export type { AssistantConfig, TransportStrategy } from './config.js';
export { LOG_LEVELS, createLogger, formatLogLine, silentLogger } from './log.js';
export type { LogFields, LogLevel, LogSink, Logger } from './log.js';

// Database collaborator
export type { CatalogTable, Database, QueryLimits, QueryResult, ResultRow, SchemaCatalog } from './db/types.js';
export { SAFE_DEFAULTS } from './db/defaults.js';
export { catalogFromColumnRows, renderCatalog } from './db/catalog.js';
export type { ColumnRow } from './db/catalog.js';
export { PostgresDatabase } from './db/postgres.js';

// SQL handling
export { tokenize, isSignificant, joinTokens } from './sql/lexer.js';
export type { Token, TokenKind } from './sql/lexer.js';
export { ENUM_RULES, normalizeEnumLiterals } from './sql/enums.js';
export type { EnumRule } from './sql/enums.js';
export { extractCandidateSql } from './sql/extract.js';
export { BLOCKED_FUNCTIONS, DENYLIST, validateReadOnly } from './sql/guard.js';
export type { GuardOptions } from './sql/guard.js';
export { selectVerdict } from './sql/ast.js';
export type { SelectVerdict } from './sql/ast.js';

// Completion gateway
export * from './llm/index.js';

// Assistant stages
export { CONVERSATIONAL_TRIGGERS, cleanUtterance, isConversational } from './assistant/intent.js';
export {
  GREETING_MESSAGE,
  OFF_TOPIC_MESSAGE,
  cannedReply,
  conversationalReply,
} from './assistant/conversation.js';
export { synthesizeSql } from './assistant/synthesize.js';
export type { SynthesisOptions } from './assistant/synthesize.js';
export { executeReadOnly } from './assistant/execute.js';
export { NO_DATA_MESSAGE, summarizeResults, summaryFallback } from './assistant/summarize.js';
export type { SummaryOptions } from './assistant/summarize.js';
export { DEFAULT_LIMITS, askAssistant, getDataResponse, optionsFromConfig } from './assistant/pipeline.js';
export type { AssistantDeps, AssistantOptions, AssistantReply, ReplyRoute } from './assistant/pipeline.js';

// Interaction history
export { HistoryStore } from './storage/history.js';
export type { HistoryEntry } from './storage/history.js';
