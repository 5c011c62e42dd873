import type { Command } from 'commander';
import type { LogLevel } from '@erp-assistant/core';
import { formatTable } from './util/table.js';
import { CliError, normalizeError } from './errors.js';

export interface OutputOptions {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  debug: boolean;
}

export function outputOptionsFromCommand(command: Command): OutputOptions {
  const opts = command.optsWithGlobals();
  return {
    json: Boolean(opts.json),
    quiet: Boolean(opts.quiet),
    verbose: Boolean(opts.verbose),
    debug: Boolean(opts.debug),
  };
}

/** Flags override the configured level: --debug shows everything, --quiet only errors. */
export function logLevelFor(output: OutputOptions, configured: LogLevel): LogLevel {
  if (output.debug) return 'debug';
  if (output.quiet) return 'error';
  return configured;
}

export function printHuman(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.log(message);
  }
}

/** The assistant's answer is printed even under --quiet. */
export function printAnswer(message: string): void {
  console.log(message);
}

export function printWarning(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.warn(`Warning: ${message}`);
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function printHumanTable(columns: string[], rows: Record<string, unknown>[], output: OutputOptions): void {
  if (output.quiet) return;
  console.log(formatTable(columns, rows));
}

export function printError(rawError: unknown, output: OutputOptions): void {
  const error = normalizeError(rawError);
  const isCliError = error instanceof CliError;
  const message = error instanceof Error ? error.message : String(error);

  if (output.json) {
    const payload: Record<string, unknown> = {
      ok: false,
      code: isCliError ? error.code : 'INTERNAL_ERROR',
      message,
    };
    if (output.debug) {
      payload.details = isCliError
        ? error.details ?? null
        : error instanceof Error
          ? { stack: error.stack }
          : { raw: String(error) };
    }
    printJson(payload);
    return;
  }

  console.error(`Error: ${message}`);
  if (isCliError && error.details !== undefined && (output.debug || output.verbose)) {
    console.error('Details:', JSON.stringify(error.details, null, 2));
  } else if (output.debug && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
}

export function printCommandSuccess(value: unknown, output: OutputOptions, humanMessage?: string): void {
  if (output.json) {
    printJson({ ok: true, data: value });
    return;
  }
  if (humanMessage && !output.quiet) {
    console.log(humanMessage);
  }
}

export function withOutputFlags(command: Command): Command {
  return command
    .option('--json', 'Machine-readable JSON output', false)
    .option('--quiet', 'Only print answers and errors', false)
    .option('--verbose', 'Show generated SQL and other context', false)
    .option('--debug', 'Debug logging, internal error details and stacks', false);
}
