import type { Static, TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

export type ValidationResult<T> = { valid: true; value: T } | { valid: false; reason: string };

/**
 * Check an untrusted value (file contents, remote response) against a schema
 *
 * The reason names the first failing path, e.g. `/mb_weight: Expected number`.
 */
export function validate<S extends TSchema>(schema: S, value: unknown): ValidationResult<Static<S>> {
  if (Value.Check(schema, value)) {
    return { valid: true, value };
  }

  const first = Value.Errors(schema, value).First();
  const reason = first ? `${first.path || '/'}: ${first.message}` : 'Invalid value';
  return { valid: false, reason };
}

/**
 * Parse a date given on the command line, in a file or by an endpoint
 *
 * Returns undefined for anything Date cannot read.
 */
export function parseDate(value: string | Date): Date | undefined {
  const date = value instanceof Date ? new Date(value.getTime()) : new Date(value.trim());
  return Number.isNaN(date.getTime()) ? undefined : date;
}
