/**
 * Shared AJV setup.
 * ajv ships CommonJS; under ESM its class is the module's `default` export.
 */

import AjvModule, { type ErrorObject } from 'ajv';

const Ajv = AjvModule.default;

/** Strict validator for data we only read (model responses). */
export const ajv = new Ajv({ allErrors: true });

/** Validator that coerces strings and fills defaults (environment config). */
export const coercingAjv = new Ajv({ allErrors: true, coerceTypes: true, useDefaults: true });

export function formatAjvErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors || errors.length === 0) return ['Unknown validation error'];
  return errors.map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`);
}
