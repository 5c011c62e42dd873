/**
 * Natural-language summary of a result set.
 */

import { SAFE_DEFAULTS } from '../db/defaults.js';
import type { QueryResult } from '../db/types.js';
import { silentLogger, type Logger } from '../log.js';
import { errorMessage } from '../errors.js';
import type { CompletionGateway } from '../llm/gateway.js';
import { buildSummaryMessages } from '../llm/prompt.js';

export const NO_DATA_MESSAGE = "I couldn't find any data for your request. Please try asking in a different way.";

export function summaryFallback(rowCount: number): string {
  return `Found ${rowCount} results, but couldn't summarize them due to an error.`;
}

export interface SummaryOptions {
  model: string;
  sampleSize?: number;
  logger?: Logger;
}

/** Always produces text: a gateway failure downgrades to the count-only message. */
export async function summarizeResults(
  utterance: string,
  result: QueryResult,
  gateway: CompletionGateway,
  options: SummaryOptions,
): Promise<string> {
  if (result.rowCount === 0) return NO_DATA_MESSAGE;

  const messages = buildSummaryMessages({
    utterance,
    result,
    sampleSize: options.sampleSize ?? SAFE_DEFAULTS.summarySampleRows,
  });

  try {
    return await gateway.complete(messages, { model: options.model, temperature: 0.7, maxTokens: 512 });
  } catch (err: unknown) {
    (options.logger ?? silentLogger).warn('Summary failed, using fallback', { error: errorMessage(err) });
    return summaryFallback(result.rowCount);
  }
}
