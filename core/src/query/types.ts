import type { FindAttributeOptions, OrderItem, WhereOptions } from 'sequelize';

import type { FilterScalar } from '../schema/types.js';

export const LOOKUP_OPERATORS = ['eq', 'neq', 'gt', 'gte', 'lt', 'lte', 'in', 'not_in', 'regexp'] as const;

export type LookupOperator = (typeof LOOKUP_OPERATORS)[number];
export type ListOperator = 'in' | 'not_in';
export type ScalarOperator = Exclude<LookupOperator, ListOperator>;

export function isLookupOperator(v: unknown): v is LookupOperator {
  return LOOKUP_OPERATORS.some((op) => op === v);
}

export function isListOperator(op: LookupOperator): op is ListOperator {
  return op === 'in' || op === 'not_in';
}

export type LookupRequest = {
  key: string;
  field: string;
  operator: LookupOperator;
  raw: string;
};

export type ValidatedLookup =
  | { key: string; field: string; operator: ScalarOperator; value: FilterScalar }
  | { key: string; field: string; operator: ListOperator; value: FilterScalar[] };

export type SortDir = 'ASC' | 'DESC';

export type OrderingSpec = { field: string; dir: SortDir };

export type CompiledQuery = Readonly<{
  where?: WhereOptions;
  attributes?: FindAttributeOptions;
  order: readonly OrderItem[];
  offset?: number;
  limit?: number;
}>;
