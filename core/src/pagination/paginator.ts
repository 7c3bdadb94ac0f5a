import type { ValidateFunction } from 'ajv';

import { createAjv } from '../schema/ajv.js';
import { PaginationRangeError, type FilterIssue } from '../query/errors.js';

export const PAGE_PARAM = 'page';
export const PER_PAGE_PARAM = 'per_page';

export type PaginationBounds = {
  defaultPage: number;
  defaultPerPage: number;
  maxPerPage: number;
};

export const DEFAULT_PAGINATION_BOUNDS: PaginationBounds = Object.freeze({
  defaultPage: 0,
  defaultPerPage: 10,
  maxPerPage: 100,
});

export type PaginationInput = {
  page?: string;
  per_page?: string;
};

export type PaginationState = Readonly<{
  page: number;
  perPage: number;
}>;

export type ResponsePage<T> = {
  page: number;
  per_page: number;
  results: T[];
};

const ajv = createAjv({ coerceTypes: true, useDefaults: true });

// ajv would coerce blank, hex and exponent text; pagination takes plain decimal digits only.
const INTEGER_TEXT = /^-?\d+$/;

/** Compiled page/per_page validation for one set of bounds. */
export class PaginationRules {
  private readonly validate: ValidateFunction<Record<string, unknown>>;

  constructor(readonly bounds: PaginationBounds = DEFAULT_PAGINATION_BOUNDS) {
    this.validate = ajv.compile<Record<string, unknown>>({
      type: 'object',
      properties: {
        [PAGE_PARAM]: {
          type: 'integer',
          minimum: 0,
          // offset = page * per_page must stay an exact integer
          maximum: Math.floor(Number.MAX_SAFE_INTEGER / bounds.maxPerPage),
          default: bounds.defaultPage,
        },
        [PER_PAGE_PARAM]: { type: 'integer', minimum: 1, maximum: bounds.maxPerPage, default: bounds.defaultPerPage },
      },
    });
  }

  parse(input: PaginationInput): PaginationState {
    const data: Record<string, unknown> = {};
    if (input.page !== undefined) data[PAGE_PARAM] = input.page;
    if (input.per_page !== undefined) data[PER_PAGE_PARAM] = input.per_page;

    const issues: FilterIssue[] = [PAGE_PARAM, PER_PAGE_PARAM]
      .filter((key) => {
        const v = data[key];
        return typeof v === 'string' && !INTEGER_TEXT.test(v);
      })
      .map((location) => ({ location, message: 'must be integer' }));

    if (!this.validate(data)) {
      for (const e of this.validate.errors ?? []) {
        const location = e.instancePath.replace(/^\//, '') || 'root';
        if (!issues.some((i) => i.location === location)) issues.push({ location, message: e.message ?? 'is invalid' });
      }
    }
    if (issues.length) throw new PaginationRangeError(issues);

    const page = data[PAGE_PARAM];
    const perPage = data[PER_PAGE_PARAM];
    if (typeof page !== 'number' || typeof perPage !== 'number') {
      throw new PaginationRangeError([{ location: 'root', message: 'must be integer' }]);
    }
    return Object.freeze({ page, perPage });
  }
}

const DEFAULT_RULES = new PaginationRules();

export class Paginator {
  readonly page: number;
  readonly perPage: number;

  constructor(input: PaginationInput = {}, rules: PaginationRules = DEFAULT_RULES) {
    const state = rules.parse(input);
    this.page = state.page;
    this.perPage = state.perPage;
    Object.freeze(this);
  }

  get offset(): number {
    return this.page * this.perPage;
  }

  get limit(): number {
    return this.perPage;
  }

  buildResponse<T>(results: readonly T[]): ResponsePage<T> {
    return { page: this.page, per_page: this.perPage, results: [...results] };
  }
}
