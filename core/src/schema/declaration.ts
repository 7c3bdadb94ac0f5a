import type { SchemaObject } from 'ajv';

import { FILTER_FIELD_TYPES } from './types.js';

// Field names are identifiers that cannot contain (or end next to) the lookup delimiter.
export const FILTER_FIELD_NAME_PATTERN = '^(?!.*__)(?!.*_$)[a-zA-Z_][a-zA-Z0-9_]*$';

// Bundled filter schema declaration schema (draft 2020-12).
export const FILTER_SCHEMA_DECLARATION_2020_12: SchemaObject = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  minProperties: 1,
  propertyNames: { pattern: FILTER_FIELD_NAME_PATTERN },
  additionalProperties: {
    type: 'object',
    properties: {
      type: { enum: [...FILTER_FIELD_TYPES] },
      values: { type: 'array', items: { type: 'string' }, minItems: 1, uniqueItems: true },
      orderable: { type: 'boolean' },
      searchable: { type: 'boolean' },
    },
    required: ['type'],
    additionalProperties: false,
    if: { type: 'object', properties: { type: { const: 'enum' } } },
    then: { type: 'object', required: ['values'] },
  },
};
