import type { FindOptions } from 'sequelize';

import { PAGE_PARAM, PER_PAGE_PARAM, Paginator, type ResponsePage } from '../pagination/paginator.js';
import type { ListQueryDefinition } from './definition.js';
import { RequestParams, type ListQueryParams } from './params.js';
import {
  filterStage,
  limitStage,
  LIST_QUERY_STAGES,
  offsetStage,
  orderStage,
  searchStage,
  type ListQueryStage,
} from './stages.js';
import type { CompiledQuery } from './types.js';

const EMPTY_QUERY: CompiledQuery = Object.freeze({ order: [] });

/**
 * Per-request compiler. Each stage replaces the owned query with a new value
 * and returns the compiler, so stages chain; `full()` runs them all in order.
 * The compiled query is exposed for execution elsewhere.
 */
export class ListQueryCompiler {
  readonly paginator: Paginator;
  private readonly params: RequestParams;
  private query: CompiledQuery = EMPTY_QUERY;

  constructor(
    private readonly definition: ListQueryDefinition,
    params: ListQueryParams,
  ) {
    this.params = RequestParams.from(params);
    this.paginator = new Paginator(
      { page: this.params.get(PAGE_PARAM), per_page: this.params.get(PER_PAGE_PARAM) },
      definition.pagination,
    );
  }

  /** Replaces the starting query, e.g. with a caller-supplied scope. */
  inject(base: Partial<CompiledQuery>): this {
    this.query = { ...base, order: [...(base.order ?? [])] };
    return this;
  }

  filter(): this {
    return this.apply(filterStage);
  }

  search(): this {
    return this.apply(searchStage);
  }

  order(): this {
    return this.apply(orderStage);
  }

  offset(): this {
    return this.apply(offsetStage);
  }

  limit(): this {
    return this.apply(limitStage);
  }

  full(): this {
    for (const stage of LIST_QUERY_STAGES) this.apply(stage);
    this.definition.logger.debug('[listquery] compiled', {
      model: this.definition.modelName,
      offset: this.query.offset,
      limit: this.query.limit,
    });
    return this;
  }

  getQuery(): CompiledQuery {
    return this.query;
  }

  toFindOptions(): FindOptions {
    const { where, attributes, order, offset, limit } = this.query;
    return {
      ...(where !== undefined ? { where } : {}),
      ...(attributes !== undefined ? { attributes } : {}),
      order: [...order],
      ...(offset !== undefined ? { offset } : {}),
      ...(limit !== undefined ? { limit } : {}),
    };
  }

  buildResponse<T>(results: readonly T[]): ResponsePage<T> {
    return this.paginator.buildResponse(results);
  }

  private apply(stage: ListQueryStage): this {
    this.query = stage(this.query, {
      definition: this.definition,
      params: this.params,
      paginator: this.paginator,
    });
    return this;
  }
}
