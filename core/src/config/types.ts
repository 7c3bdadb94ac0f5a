import type { PaginationBounds } from '../pagination/paginator.js';

export type SearchConfig = {
  /** Database function taking `(text, query)` and returning a similarity score. */
  similarityFn: string;
  /** Alias of the computed score column. */
  rankAlias: string;
};

export type ListQueryConfig = {
  orderingParam?: string;
  searchParam?: string;
  defaultOrdering?: string;
  pagination?: Partial<PaginationBounds>;
  search?: Partial<SearchConfig>;
};

export type ResolvedListQueryConfig = Readonly<{
  orderingParam: string;
  searchParam: string;
  defaultOrdering: string;
  pagination: Readonly<PaginationBounds>;
  search: Readonly<SearchConfig>;
}>;
