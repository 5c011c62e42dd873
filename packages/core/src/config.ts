/**
 * Environment configuration.
 * Reads process.env (or a supplied map), coerces and validates it with AJV.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { coercingAjv, formatAjvErrors } from './validation.js';
import { ConfigError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './log.js';
import { SAFE_DEFAULTS } from './db/defaults.js';

export type TransportStrategy = 'auto' | 'sdk' | 'rest';

export interface AssistantConfig {
  /** Bearer token for the completion backend */
  apiKey?: string;
  /** PostgreSQL connection string for the ERP database */
  databaseUrl?: string;
  /** OpenAI-compatible base URL of the completion backend */
  baseUrl: string;
  chatModel: string;
  sqlModel: string;
  transport: TransportStrategy;
  /** Per-call completion timeout */
  timeoutMs: number;
  maxRows: number;
  statementTimeoutMs: number;
  logLevel: LogLevel;
  historyPath: string;
}

export const DEFAULT_BASE_URL = 'https://api.groq.com/openai/v1';
export const DEFAULT_MODEL = 'llama-3.3-70b-versatile';

export function defaultHistoryPath(): string {
  return join(homedir(), '.erp-assistant', 'history.db');
}

const configSchema = {
  type: 'object',
  properties: {
    apiKey: { type: 'string', minLength: 1 },
    databaseUrl: { type: 'string', pattern: '^postgres(ql)?://' },
    baseUrl: { type: 'string', pattern: '^https?://', default: DEFAULT_BASE_URL },
    chatModel: { type: 'string', minLength: 1, default: DEFAULT_MODEL },
    sqlModel: { type: 'string', minLength: 1, default: DEFAULT_MODEL },
    transport: { type: 'string', enum: ['auto', 'sdk', 'rest'], default: 'auto' },
    timeoutMs: { type: 'integer', minimum: 1_000, maximum: 120_000, default: 30_000 },
    maxRows: { type: 'integer', minimum: 1, maximum: 100_000, default: SAFE_DEFAULTS.maxRows },
    statementTimeoutMs: {
      type: 'integer',
      minimum: 100,
      maximum: 300_000,
      default: SAFE_DEFAULTS.statementTimeoutMs,
    },
    logLevel: { type: 'string', enum: LOG_LEVELS, default: 'info' },
    historyPath: { type: 'string', minLength: 1 },
  },
  required: [],
  additionalProperties: false,
} as const;

type RawConfig = Omit<AssistantConfig, 'historyPath'> & { historyPath?: string };

const validateConfig = coercingAjv.compile<RawConfig>(configSchema);

/**
 * Build the configuration from environment variables.
 * Empty variables count as unset. Throws ConfigError listing every problem.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AssistantConfig {
  const raw: Record<string, string> = {};
  const pick = (key: keyof AssistantConfig, name: string): void => {
    const value = env[name]?.trim();
    if (value) raw[key] = value;
  };

  pick('apiKey', 'GROQ_API_KEY');
  pick('databaseUrl', 'DATABASE_URL');
  pick('baseUrl', 'ERP_ASSISTANT_BASE_URL');
  pick('chatModel', 'ERP_ASSISTANT_CHAT_MODEL');
  pick('sqlModel', 'ERP_ASSISTANT_SQL_MODEL');
  pick('transport', 'ERP_ASSISTANT_TRANSPORT');
  pick('timeoutMs', 'ERP_ASSISTANT_TIMEOUT_MS');
  pick('maxRows', 'ERP_ASSISTANT_MAX_ROWS');
  pick('statementTimeoutMs', 'ERP_ASSISTANT_STATEMENT_TIMEOUT_MS');
  pick('logLevel', 'ERP_ASSISTANT_LOG_LEVEL');
  pick('historyPath', 'ERP_ASSISTANT_HISTORY_PATH');

  // AJV coerces and fills defaults in place
  const candidate: unknown = raw;
  if (!validateConfig(candidate)) {
    throw new ConfigError(formatAjvErrors(validateConfig.errors));
  }

  return {
    ...candidate,
    baseUrl: candidate.baseUrl.replace(/\/+$/, ''),
    historyPath: candidate.historyPath ?? defaultHistoryPath(),
  };
}

export function requireApiKey(config: AssistantConfig): string {
  if (!config.apiKey) {
    throw new ConfigError(['GROQ_API_KEY is not set. Export it in your shell before asking questions.']);
  }
  return config.apiKey;
}

export function requireDatabaseUrl(config: AssistantConfig): string {
  if (!config.databaseUrl) {
    throw new ConfigError(['DATABASE_URL is not set. Point it at the ERP PostgreSQL database.']);
  }
  return config.databaseUrl;
}
