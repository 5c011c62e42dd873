/**
 * SQL synthesis: prompt the SQL model, extract the statement, normalize enum
 * literals. Validation is a separate stage.
 */

import type { SchemaCatalog } from '../db/types.js';
import { errorMessage, fail, ok, type Result } from '../errors.js';
import type { CompletionGateway } from '../llm/gateway.js';
import { buildSqlMessages } from '../llm/prompt.js';
import { ENUM_RULES, normalizeEnumLiterals, type EnumRule } from '../sql/enums.js';
import { extractCandidateSql } from '../sql/extract.js';

export interface SynthesisOptions {
  model: string;
  enumRules?: readonly EnumRule[];
}

/**
 * Value is the normalized candidate statement, or '' when the model
 * declined to produce SQL.
 */
export async function synthesizeSql(
  utterance: string,
  catalog: SchemaCatalog,
  gateway: CompletionGateway,
  options: SynthesisOptions,
): Promise<Result<string>> {
  const enumRules = options.enumRules ?? ENUM_RULES;

  let raw: string;
  try {
    raw = await gateway.complete(buildSqlMessages({ utterance, catalog, enumRules }), {
      model: options.model,
      temperature: 0.1,
      maxTokens: 1024,
    });
  } catch (err: unknown) {
    return fail('synthesis_failed', errorMessage(err));
  }

  const candidate = extractCandidateSql(raw);
  if (!candidate) return ok('');
  return ok(normalizeEnumLiterals(candidate, enumRules));
}
