export type { ListQueryConfig, ResolvedListQueryConfig, SearchConfig } from './config/types.js';
export { DEFAULT_LIST_QUERY_CONFIG, LIST_QUERY_CONFIG_SCHEMA_2020_12, resolveListQueryConfig } from './config/resolve.js';

export type { Logger } from './logging/logger.js';
export { createConsoleLogger } from './logging/logger.js';

export type { FieldDescriptor, FilterFieldSpec, FilterFieldType, FilterScalar, FilterSchemaDeclaration } from './schema/types.js';
export { FILTER_FIELD_TYPES } from './schema/types.js';
export { FILTER_FIELD_NAME_PATTERN, FILTER_SCHEMA_DECLARATION_2020_12 } from './schema/declaration.js';
export { FieldCoercer, LIST_VALUE_DELIMITER, valueSchemaFor } from './schema/coercion.js';
export { FilterSchema, defineFilterSchema } from './schema/registry.js';
export { MissingValidationContextError, SchemaDeclarationError } from './schema/errors.js';

export type {
  CompiledQuery,
  ListOperator,
  LookupOperator,
  LookupRequest,
  OrderingSpec,
  ScalarOperator,
  SortDir,
  ValidatedLookup,
} from './query/types.js';
export { LOOKUP_OPERATORS, isListOperator, isLookupOperator } from './query/types.js';
export type { FilterIssue } from './query/errors.js';
export {
  FilterRequestError,
  MalformedParameterError,
  OrderingNotPermittedError,
  PaginationRangeError,
  UnknownFilterFieldError,
  UnknownLookupOperatorError,
  UnknownOrderingFieldError,
  ValueCoercionError,
} from './query/errors.js';
export type { ListQueryParams, ParamEntry } from './query/params.js';
export { RequestParams } from './query/params.js';
export { LOOKUP_DELIMITER, parseLookupKey, parseLookups, parseOrdering } from './query/parser.js';
export { buildPredicate, conjoin } from './query/predicates.js';
export type { ListQueryStage, StageContext } from './query/stages.js';
export { LIST_QUERY_STAGES, filterStage, limitStage, offsetStage, orderStage, searchStage } from './query/stages.js';
export { ListQueryCompiler } from './query/compiler.js';
export type { ListQueryDefinitionOptions } from './query/definition.js';
export { ListQueryDefinition, defineListQuery } from './query/definition.js';

export type { PaginationBounds, PaginationInput, PaginationState, ResponsePage } from './pagination/paginator.js';
export { DEFAULT_PAGINATION_BOUNDS, PAGE_PARAM, PER_PAGE_PARAM, PaginationRules, Paginator } from './pagination/paginator.js';
