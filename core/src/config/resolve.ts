import type { SchemaObject } from 'ajv';

import { DEFAULT_PAGINATION_BOUNDS, PAGE_PARAM, PER_PAGE_PARAM } from '../pagination/paginator.js';
import { createAjv } from '../schema/ajv.js';
import { SchemaDeclarationError } from '../schema/errors.js';
import type { ListQueryConfig, ResolvedListQueryConfig } from './types.js';

const IDENT = '^[a-zA-Z_][a-zA-Z0-9_]*$';

export const LIST_QUERY_CONFIG_SCHEMA_2020_12: SchemaObject = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  properties: {
    orderingParam: { type: 'string', minLength: 1 },
    searchParam: { type: 'string', minLength: 1 },
    defaultOrdering: { type: 'string', pattern: '^[+-]?[a-zA-Z_][a-zA-Z0-9_]*$' },
    pagination: {
      type: 'object',
      properties: {
        defaultPage: { type: 'integer', minimum: 0 },
        defaultPerPage: { type: 'integer', minimum: 1 },
        maxPerPage: { type: 'integer', minimum: 1 },
      },
      required: ['defaultPage', 'defaultPerPage', 'maxPerPage'],
      additionalProperties: false,
    },
    search: {
      type: 'object',
      properties: {
        // Interpolated into SQL unquoted by Sequelize's fn().
        similarityFn: { type: 'string', pattern: IDENT },
        rankAlias: { type: 'string', pattern: IDENT },
      },
      required: ['similarityFn', 'rankAlias'],
      additionalProperties: false,
    },
  },
  required: ['orderingParam', 'searchParam', 'defaultOrdering', 'pagination', 'search'],
  additionalProperties: false,
};

export const DEFAULT_LIST_QUERY_CONFIG: ResolvedListQueryConfig = Object.freeze({
  orderingParam: 'order_by',
  searchParam: 'search',
  defaultOrdering: 'id',
  pagination: DEFAULT_PAGINATION_BOUNDS,
  search: Object.freeze({ similarityFn: 'similarity', rankAlias: 'search_rank' }),
});

const validateConfig = createAjv().compile(LIST_QUERY_CONFIG_SCHEMA_2020_12);

export function resolveListQueryConfig(cfg: ListQueryConfig = {}): ResolvedListQueryConfig {
  const d = DEFAULT_LIST_QUERY_CONFIG;
  const resolved = {
    orderingParam: cfg.orderingParam ?? d.orderingParam,
    searchParam: cfg.searchParam ?? d.searchParam,
    defaultOrdering: cfg.defaultOrdering ?? d.defaultOrdering,
    pagination: Object.freeze({ ...d.pagination, ...cfg.pagination }),
    search: Object.freeze({ ...d.search, ...cfg.search }),
  };

  if (!validateConfig(resolved)) {
    throw new SchemaDeclarationError('Invalid list query config', validateConfig.errors ?? []);
  }
  if (resolved.pagination.defaultPerPage > resolved.pagination.maxPerPage) {
    throw new SchemaDeclarationError('pagination.defaultPerPage exceeds pagination.maxPerPage', {
      defaultPerPage: resolved.pagination.defaultPerPage,
      maxPerPage: resolved.pagination.maxPerPage,
    });
  }

  const params = [resolved.orderingParam, resolved.searchParam, PAGE_PARAM, PER_PAGE_PARAM];
  if (new Set(params).size !== params.length) {
    throw new SchemaDeclarationError('Reserved parameter names must be distinct', { params });
  }

  return Object.freeze(resolved);
}
