import { Op, type WhereOperators, type WhereOptions } from 'sequelize';

import type { FilterScalar } from '../schema/types.js';
import type { ListOperator, ScalarOperator, ValidatedLookup } from './types.js';

const SCALAR_PREDICATES: Record<ScalarOperator, (value: FilterScalar) => WhereOperators> = {
  eq: (value) => ({ [Op.eq]: value }),
  neq: (value) => ({ [Op.ne]: value }),
  gt: (value) => ({ [Op.gt]: value }),
  gte: (value) => ({ [Op.gte]: value }),
  lt: (value) => ({ [Op.lt]: value }),
  lte: (value) => ({ [Op.lte]: value }),
  regexp: (value) => ({ [Op.regexp]: value instanceof Date ? value.toISOString() : String(value) }),
};

const LIST_PREDICATES: Record<ListOperator, (values: FilterScalar[]) => WhereOperators> = {
  in: (values) => ({ [Op.in]: values }),
  not_in: (values) => ({ [Op.notIn]: values }),
};

export function buildPredicate(lookup: ValidatedLookup): WhereOptions {
  switch (lookup.operator) {
    case 'in':
    case 'not_in':
      return { [lookup.field]: LIST_PREDICATES[lookup.operator](lookup.value) };
    default:
      return { [lookup.field]: SCALAR_PREDICATES[lookup.operator](lookup.value) };
  }
}

/** ANDs predicates onto an optional base condition; a lone condition is returned as is. */
export function conjoin(base: WhereOptions | undefined, predicates: readonly WhereOptions[]): WhereOptions | undefined {
  const parts = base !== undefined ? [base, ...predicates] : [...predicates];
  if (!parts.length) return undefined;
  if (parts.length === 1) return parts[0];
  return { [Op.and]: parts };
}
