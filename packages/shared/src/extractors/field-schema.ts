/**
 * Field Schema
 *
 * Validates field definitions once, when a profile is built. A schema is
 * the standard 13 columns in canonical order, optionally followed by the
 * quality indicator. Anything else is a configuration error.
 */

import { STANDARD_FIELDS, QUALITY_DIGIT_FIELD, type FieldName } from '../types';
import { ConfigurationError } from '../errors';
import type { FieldDefinition, FieldSchema } from './types';

export function defineFieldSchema(fields: readonly FieldDefinition[]): FieldSchema {
  if (fields.length === 0) {
    throw new ConfigurationError('Field schema is empty');
  }

  const names = fields.map(field => field.name);
  const seen = new Set<FieldName>();
  for (const name of names) {
    if (seen.has(name)) {
      throw new ConfigurationError(`Duplicate field in schema: ${name}`);
    }
    seen.add(name);
  }

  const expected: string[] = [...STANDARD_FIELDS];
  if (names.length === STANDARD_FIELDS.length + 1) {
    expected.push(QUALITY_DIGIT_FIELD);
  }
  if (names.length !== expected.length || names.some((name, i) => name !== expected[i])) {
    throw new ConfigurationError(
      `Field schema must list ${STANDARD_FIELDS.length} standard fields in canonical order` +
        ` (optionally followed by ${QUALITY_DIGIT_FIELD}); got: ${names.join(', ')}`
    );
  }

  for (const field of fields) {
    if (field.steps.length === 0 && field.defaultValue === undefined) {
      throw new ConfigurationError(`Field ${field.name} has neither strategies nor a default`);
    }
    if (field.defaultValue !== undefined && field.accept && !field.accept.test(field.defaultValue)) {
      throw new ConfigurationError(
        `Default for ${field.name} ("${field.defaultValue}") does not match ${field.accept}`
      );
    }
    for (const step of field.steps) {
      if (!Number.isInteger(step.capture) || step.capture < 0) {
        throw new ConfigurationError(
          `Field ${field.name}: strategy ${step.strategy.name} has invalid capture ${step.capture}`
        );
      }
    }
  }

  return Object.freeze({
    fields: Object.freeze([...fields]),
    names: Object.freeze(names),
  });
}
