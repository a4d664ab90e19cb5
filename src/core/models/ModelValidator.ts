// src/core/models/ModelValidator.ts

import type { z } from 'zod';
import { ValidationError } from '../../utils/errors';
import {
  ENTITY_SCHEMAS,
  DiffPayloadSchema,
  DiffResponseSchema,
  SuggestResponseSchema,
} from './schemas';
import type { EntityKind } from './types';

/**
 * Validation capability used at the (de)serialization boundaries.
 * Implementations return the typed value or throw {@link ValidationError}.
 */
export interface SchemaValidator<T> {
  readonly name: string;
  validate(input: unknown): T;
}

export class ZodSchemaValidator<S extends z.ZodTypeAny> implements SchemaValidator<z.output<S>> {
  constructor(
    readonly name: string,
    private schema: S
  ) {}

  validate(input: unknown): z.output<S> {
    const result = this.schema.safeParse(input);

    if (!result.success) {
      const issues = result.error.errors.map(
        (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
      );
      throw new ValidationError(`${this.name} failed schema validation`, issues, {
        schema: this.name,
      });
    }

    return result.data;
  }
}

export const diffPayloadValidator = new ZodSchemaValidator('DiffPayload', DiffPayloadSchema);
export const diffResponseValidator = new ZodSchemaValidator('DiffResponse', DiffResponseSchema);
export const suggestResponseValidator = new ZodSchemaValidator(
  'SuggestResponse',
  SuggestResponseSchema
);

type EntitySchemas = typeof ENTITY_SCHEMAS;

/**
 * Validate a single entity record of a known kind
 */
export function parseEntity<K extends EntityKind>(
  kind: K,
  input: unknown
): z.output<EntitySchemas[K]> {
  const validator = new ZodSchemaValidator(kind, ENTITY_SCHEMAS[kind]);
  return validator.validate(input);
}
