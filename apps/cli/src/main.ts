#!/usr/bin/env node

/**
 * erp-assistant CLI entrypoint.
 */

import { Command } from 'commander';
import { existsSync } from 'node:fs';
import {
  CompletionGateway,
  ConfigError,
  HistoryStore,
  SAFE_DEFAULTS,
  askAssistant,
  createLogger,
  createTransport,
  errorMessage,
  loadConfig,
  normalizeEnumLiterals,
  optionsFromConfig,
  renderCatalog,
  validateReadOnly,
  type AssistantConfig,
  type Logger,
} from '@erp-assistant/core';
import {
  EXIT_CODE_SUCCESS,
  EXIT_CODE_USAGE,
  fromQueryError,
  policyError,
  runtimeError,
  toExitCode,
  usageError,
} from './errors.js';
import {
  logLevelFor,
  outputOptionsFromCommand,
  printAnswer,
  printCommandSuccess,
  printError,
  printHuman,
  printHumanTable,
  printWarning,
  withOutputFlags,
  type OutputOptions,
} from './output.js';
import { runCommand, withExamples } from './command.js';
import { withDatabase } from './database.js';
import { truncateText } from './util/table.js';

const VERSION = '0.3.0';

// ── Helpers ──────────────────────────────────────────────────────────

function commandLogger(config: AssistantConfig, output: OutputOptions): Logger {
  return createLogger(logLevelFor(output, config.logLevel));
}

async function withHistory<T>(config: AssistantConfig, fn: (store: HistoryStore) => T): Promise<T> {
  const store = await HistoryStore.open(config.historyPath);
  try {
    return fn(store);
  } finally {
    store.close();
  }
}

function parseLimit(raw: string): number {
  const limit = Number(raw);
  if (!Number.isInteger(limit) || limit < 1 || limit > 1_000) {
    throw usageError('Invalid --limit. Expected an integer between 1 and 1000.');
  }
  return limit;
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

program
  .name('erp-assistant')
  .description('Ask questions about ERP data in plain language')
  .option('--json', 'Machine-readable JSON output', false)
  .option('--quiet', 'Only print answers and errors', false)
  .option('--verbose', 'Show generated SQL and other context', false)
  .option('--debug', 'Debug logging, internal error details and stacks', false)
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();
program.addHelpText(
  'after',
  `
Command groups:
  Setup:    doctor, schema
  Query:    ask, check
  History:  history
`,
);

// ── doctor ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('doctor')
      .description('Check configuration and environment')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const nodeVersion = process.version;
          const nodeOk = parseInt(nodeVersion.slice(1), 10) >= 20;

          let config: AssistantConfig | undefined;
          let problems: string[] = [];
          try {
            config = loadConfig();
          } catch (err: unknown) {
            if (!(err instanceof ConfigError)) throw err;
            problems = err.problems;
          }

          const payload = {
            node: { version: nodeVersion, ok: nodeOk, requiredMajor: 20 },
            configOk: problems.length === 0,
            problems,
            apiKeySet: Boolean(config?.apiKey),
            databaseUrlSet: Boolean(config?.databaseUrl),
            baseUrl: config?.baseUrl ?? null,
            chatModel: config?.chatModel ?? null,
            sqlModel: config?.sqlModel ?? null,
            transport: config?.transport ?? null,
            limits: {
              maxRows: config?.maxRows ?? SAFE_DEFAULTS.maxRows,
              statementTimeoutMs: config?.statementTimeoutMs ?? SAFE_DEFAULTS.statementTimeoutMs,
              completionTimeoutMs: config?.timeoutMs ?? null,
            },
            history: config
              ? { path: config.historyPath, exists: existsSync(config.historyPath) }
              : null,
          };

          if (problems.length > 0) {
            process.exitCode = EXIT_CODE_USAGE;
          }

          if (output.json) {
            printCommandSuccess(payload, output);
            return;
          }

          printHuman('erp-assistant doctor', output);
          printHuman('====================', output);
          printHuman('', output);
          printHuman(`Node.js:       ${nodeVersion} ${nodeOk ? '✓' : '✗ (requires >=20)'}`, output);
          for (const problem of problems) {
            printWarning(problem, output);
          }
          if (!config) return;
          printHuman(`API key:       ${config.apiKey ? 'set ✓' : 'not set (GROQ_API_KEY)'}`, output);
          printHuman(`Database URL:  ${config.databaseUrl ? 'set ✓' : 'not set (DATABASE_URL)'}`, output);
          printHuman(`Base URL:      ${config.baseUrl}`, output);
          printHuman(`Models:        chat=${config.chatModel} sql=${config.sqlModel}`, output);
          printHuman(`Transport:     ${config.transport}`, output);
          printHuman(`History:       ${config.historyPath} ${existsSync(config.historyPath) ? '(exists)' : '(will be created)'}`, output);
          printHuman('', output);
          printHuman('Limits:', output);
          printHuman(`  Max rows:           ${config.maxRows}`, output);
          printHuman(`  Statement timeout:  ${config.statementTimeoutMs}ms`, output);
          printHuman(`  Completion timeout: ${config.timeoutMs}ms`, output);
        });
      }),
  ),
  ['erp-assistant doctor', 'erp-assistant doctor --json'],
);

// ── schema ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('schema')
      .description('Show the schema catalog the model is prompted with')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const config = loadConfig();
          const catalog = await withDatabase(config, commandLogger(config, output), async (db) => {
            try {
              return await db.introspect();
            } catch (err: unknown) {
              throw runtimeError(`Schema introspection failed: ${errorMessage(err)}`, 'DB_CONN_FAILED');
            }
          });

          if (output.json) {
            printCommandSuccess(catalog, output);
            return;
          }
          if (catalog.tables.length === 0) {
            printHuman('(no tables)', output);
            return;
          }
          printAnswer(renderCatalog(catalog));
        });
      }),
  ),
  ['erp-assistant schema', 'erp-assistant schema --json'],
);

// ── ask ──────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('ask')
      .description('Ask a question: generate SQL, validate it, run it and summarize the result')
      .argument('<utterance...>', 'Question in plain language')
      .option('--no-history', 'Do not record this interaction')
      .option('--strict', 'Exit non-zero when the answer is an error reply', false)
      .action(async function (this: Command, words: string[], opts: { history: boolean; strict: boolean }) {
        await runCommand(this, async (output) => {
          const utterance = words.join(' ').trim();
          if (!utterance) {
            throw usageError('Expected a question.');
          }

          const config = loadConfig();
          const logger = commandLogger(config, output);
          const gateway = new CompletionGateway(createTransport(config, { logger }), logger);
          logger.debug('Using transport', { transport: gateway.transportKind });

          const reply = await withDatabase(config, logger, (db) =>
            askAssistant(utterance, { db, gateway, options: optionsFromConfig(config), logger }),
          );

          if (opts.history) {
            try {
              await withHistory(config, (store) => store.record(utterance, reply));
            } catch (err: unknown) {
              logger.warn('Could not record history', { error: errorMessage(err) });
            }
          }

          if (opts.strict && reply.error) {
            throw fromQueryError(reply.error);
          }

          if (output.json) {
            printCommandSuccess(reply, output);
            return;
          }

          if (output.verbose && reply.sql) {
            printHuman(`SQL: ${reply.sql}`, output);
            printHuman('', output);
          }
          printAnswer(reply.summary);
          if (reply.truncated) {
            printWarning(`Result capped at ${reply.rowCount ?? config.maxRows} rows.`, output);
          }
        });
      }),
  ),
  [
    'erp-assistant ask "How many orders were delivered last month?"',
    'erp-assistant ask --verbose "top 5 products by revenue"',
    'erp-assistant ask --json --no-history "total expenses this year"',
  ],
);

// ── check ────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('check')
      .description('Normalize and validate a SQL statement without running it')
      .argument('<sql>', 'SQL statement')
      .action(async function (this: Command, sql: string) {
        await runCommand(this, (output) => {
          const logger = createLogger(logLevelFor(output, 'warn'));
          const normalized = normalizeEnumLiterals(sql.trim());
          const verdict = validateReadOnly(normalized, { logger });

          if (!verdict.ok) {
            throw policyError(verdict.error.message, { sql: normalized });
          }

          if (output.json) {
            printCommandSuccess({ allowed: true, sql: normalized }, output);
            return;
          }
          printHuman('Allowed.', output);
          printAnswer(normalized);
        });
      }),
  ),
  [
    `erp-assistant check "SELECT count(*) FROM orders WHERE status = 'delivered'"`,
    'erp-assistant check --json "DELETE FROM orders"',
  ],
);

// ── history ─────────────────────────────────────────────────────────

const history = program.command('history').description('Interaction history');

withExamples(
  withOutputFlags(
    history
      .command('list', { isDefault: true })
      .description('List recent interactions')
      .option('--limit <n>', 'Number of items', '20')
      .action(async function (this: Command, opts: { limit: string }) {
        await runCommand(this, async (output) => {
          const limit = parseLimit(opts.limit);
          const config = loadConfig();
          const items = await withHistory(config, (store) => store.list(limit));

          if (output.json) {
            printCommandSuccess(items, output);
            return;
          }
          if (items.length === 0) {
            printHuman('No interactions yet. Use "erp-assistant ask" to ask a question.', output);
            return;
          }
          printHumanTable(
            ['id', 'asked_at', 'route', 'ok', 'rows', 'utterance'],
            items.map((item) => ({
              id: item.id.slice(0, 8),
              asked_at: item.askedAt,
              route: item.route,
              ok: item.success ? 'yes' : 'no',
              rows: item.rowCount ?? '-',
              utterance: truncateText(item.utterance, 50),
            })),
            output,
          );
        });
      }),
  ),
  ['erp-assistant history', 'erp-assistant history list --limit 50 --json'],
);

withExamples(
  withOutputFlags(
    history
      .command('show <id>')
      .description('Show one interaction')
      .action(async function (this: Command, id: string) {
        await runCommand(this, async (output) => {
          const config = loadConfig();
          const entry = await withHistory(config, (store) => {
            const fullId = store.resolveId(id);
            return fullId ? store.get(fullId) : undefined;
          });
          if (!entry) {
            throw usageError(`Interaction "${id}" not found.`, 'HISTORY_NOT_FOUND');
          }

          if (output.json) {
            printCommandSuccess(entry, output);
            return;
          }
          printHuman(`ID:         ${entry.id}`, output);
          printHuman(`Asked at:   ${entry.askedAt}`, output);
          printHuman(`Utterance:  ${entry.utterance}`, output);
          printHuman(`Route:      ${entry.route}`, output);
          printHuman(`Success:    ${entry.success ? 'yes' : 'no'}`, output);
          if (entry.sql) printHuman(`SQL:        ${entry.sql}`, output);
          if (entry.rowCount !== null) printHuman(`Row count:  ${entry.rowCount}`, output);
          if (entry.errorKind) printHuman(`Error:      ${entry.errorKind}: ${entry.errorText ?? ''}`, output);
          printHuman('\nNote: Result rows are not stored in history.', output);
        });
      }),
  ),
  ['erp-assistant history show 3f2a9c1e', 'erp-assistant history show <id> --json'],
);

// ── parse ────────────────────────────────────────────────────────────

function commanderCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    const output = outputOptionsFromCommand(program);
    const code = commanderCode(error);
    // Commander reports help, version and usage problems as CommanderError
    if (code === 'commander.helpDisplayed' || code === 'commander.version') {
      process.exitCode = EXIT_CODE_SUCCESS;
      return;
    }
    if (code?.startsWith('commander.')) {
      printError(usageError(errorMessage(error)), output);
      process.exitCode = EXIT_CODE_USAGE;
      return;
    }
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

void main();
