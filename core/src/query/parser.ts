import type { FilterSchema } from '../schema/registry.js';
import { UnknownFilterFieldError, UnknownLookupOperatorError } from './errors.js';
import type { RequestParams } from './params.js';
import { LOOKUP_OPERATORS, type LookupOperator, type LookupRequest, type OrderingSpec } from './types.js';

export const LOOKUP_DELIMITER = '__';

const OPERATOR_TABLE: ReadonlyMap<string, LookupOperator> = new Map(
  LOOKUP_OPERATORS.map((op): [string, LookupOperator] => [op, op]),
);

export function parseLookupKey(key: string, schema: FilterSchema): { field: string; operator: LookupOperator } {
  const parts = key.split(LOOKUP_DELIMITER);

  let field = key;
  let operator: LookupOperator = 'eq';
  if (parts.length === 2) {
    const [name, suffix] = parts;
    const op = OPERATOR_TABLE.get(suffix);
    if (!op) throw new UnknownLookupOperatorError(key, suffix);
    field = name;
    operator = op;
  }

  if (!schema.has(field)) throw new UnknownFilterFieldError(key, field);
  return { field, operator };
}

/**
 * Turns every non-reserved parameter into a lookup. Fails on the first
 * invalid key; repeated keys produce one lookup per occurrence.
 */
export function parseLookups(
  params: RequestParams,
  schema: FilterSchema,
  reserved: ReadonlySet<string>,
): LookupRequest[] {
  const out: LookupRequest[] = [];
  for (const [key, raw] of params.entries()) {
    if (reserved.has(key)) continue;
    const { field, operator } = parseLookupKey(key, schema);
    out.push({ key, field, operator, raw });
  }
  return out;
}

export function parseOrdering(value: string): OrderingSpec {
  if (value.startsWith('-')) return { field: value.slice(1), dir: 'DESC' };
  if (value.startsWith('+')) return { field: value.slice(1), dir: 'ASC' };
  return { field: value, dir: 'ASC' };
}
