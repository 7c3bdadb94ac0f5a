import { col, fn, type FindAttributeOptions, type OrderItem, type ProjectionAlias } from 'sequelize';

import type { Paginator } from '../pagination/paginator.js';
import type { ListQueryDefinition } from './definition.js';
import type { RequestParams } from './params.js';
import { parseLookups } from './parser.js';
import { buildPredicate, conjoin } from './predicates.js';
import type { CompiledQuery } from './types.js';

export type StageContext = {
  definition: ListQueryDefinition;
  params: RequestParams;
  paginator: Paginator;
};

export type ListQueryStage = (query: CompiledQuery, ctx: StageContext) => CompiledQuery;

function withProjection(attributes: FindAttributeOptions | undefined, projection: ProjectionAlias): FindAttributeOptions {
  if (!attributes) return { include: [projection] };
  if (Array.isArray(attributes)) return [...attributes, projection];
  return { ...attributes, include: [...(attributes.include ?? []), projection] };
}

export const filterStage: ListQueryStage = (query, { definition, params }) => {
  const lookups = parseLookups(params, definition.schema, definition.reservedKeys);
  if (!lookups.length) return query;

  const predicates = definition.schema.coerce(lookups).map(buildPredicate);
  const where = conjoin(query.where, predicates);
  return where === undefined ? query : { ...query, where };
};

export const searchStage: ListQueryStage = (query, { definition, params }) => {
  const term = params.get(definition.config.searchParam)?.trim();
  if (!term) return query;

  const fields = definition.schema.searchableFields();
  if (!fields.length) return query;

  const { similarityFn, rankAlias } = definition.config.search;
  const text = fn('concat', ...fields.map((f) => col(definition.columnFor(f.name))));
  const rank: ProjectionAlias = [fn(similarityFn, text, term), rankAlias];
  const byRank: OrderItem = [col(rankAlias), 'DESC'];

  return {
    ...query,
    attributes: withProjection(query.attributes, rank),
    order: [...query.order, byRank],
  };
};

// Appended after any ranking order, so it only breaks ties between equally ranked rows.
export const orderStage: ListQueryStage = (query, { definition, params }) => {
  const requested = params.get(definition.config.orderingParam)?.trim();
  const { field, dir } = definition.resolveOrdering(requested || definition.config.defaultOrdering);
  const item: OrderItem = [field, dir];
  return { ...query, order: [...query.order, item] };
};

export const offsetStage: ListQueryStage = (query, { paginator }) => ({ ...query, offset: paginator.offset });

export const limitStage: ListQueryStage = (query, { paginator }) => ({ ...query, limit: paginator.limit });

export const LIST_QUERY_STAGES: readonly ListQueryStage[] = [
  filterStage,
  searchStage,
  orderStage,
  offsetStage,
  limitStage,
];
