import type { Model, ModelStatic } from 'sequelize';

import { resolveListQueryConfig } from '../config/resolve.js';
import type { ListQueryConfig, ResolvedListQueryConfig } from '../config/types.js';
import { createConsoleLogger, type Logger } from '../logging/logger.js';
import { PAGE_PARAM, PER_PAGE_PARAM, PaginationRules } from '../pagination/paginator.js';
import { SchemaDeclarationError } from '../schema/errors.js';
import type { FilterSchema } from '../schema/registry.js';
import { ListQueryCompiler } from './compiler.js';
import { OrderingNotPermittedError, UnknownOrderingFieldError } from './errors.js';
import type { ListQueryParams } from './params.js';
import { parseOrdering } from './parser.js';
import type { OrderingSpec } from './types.js';

export type ListQueryDefinitionOptions = {
  model: ModelStatic<Model>;
  schema: FilterSchema;
  config?: ListQueryConfig;
  logger?: Logger;
};

function tableNameOf(model: ModelStatic<Model>): string {
  const tn = model.getTableName();
  return typeof tn === 'string' ? tn : tn.tableName;
}

/**
 * Binds a filter schema to a Sequelize model. Every declaration problem is
 * reported here, once, instead of on the first request.
 */
export class ListQueryDefinition {
  readonly model: ModelStatic<Model>;
  readonly modelName: string;
  readonly schema: FilterSchema;
  readonly config: ResolvedListQueryConfig;
  readonly logger: Logger;
  readonly reservedKeys: ReadonlySet<string>;
  readonly pagination: PaginationRules;
  private readonly columns: ReadonlyMap<string, string>;

  constructor(opts: ListQueryDefinitionOptions) {
    if (!opts.model) throw new SchemaDeclarationError("'model' is required");
    if (!opts.schema) throw new SchemaDeclarationError("'schema' is required");

    this.model = opts.model;
    this.modelName = tableNameOf(opts.model);
    this.schema = opts.schema;
    this.config = resolveListQueryConfig(opts.config);
    this.logger = opts.logger ?? createConsoleLogger();
    this.reservedKeys = new Set([this.config.orderingParam, this.config.searchParam, PAGE_PARAM, PER_PAGE_PARAM]);
    this.pagination = new PaginationRules(this.config.pagination);

    const attributes = opts.model.getAttributes();
    const columns = new Map<string, string>();
    for (const name of opts.schema.fieldNames) {
      if (this.reservedKeys.has(name)) {
        throw new SchemaDeclarationError(`Filter field '${name}' collides with a reserved parameter`, {
          model: this.modelName,
          field: name,
        });
      }
      const attr = attributes[name];
      if (!attr) {
        throw new SchemaDeclarationError(`Filter field '${name}' is not an attribute of '${this.modelName}'`, {
          model: this.modelName,
          field: name,
        });
      }
      columns.set(name, attr.field ?? name);
    }
    this.columns = columns;

    try {
      this.resolveOrdering(this.config.defaultOrdering);
    } catch (e) {
      throw new SchemaDeclarationError(`Default ordering '${this.config.defaultOrdering}' is not usable`, {
        model: this.modelName,
        cause: e,
      });
    }

    if (!opts.schema.searchableFields().length) {
      this.logger.warn('[listquery] no searchable fields, search is a no-op', { model: this.modelName });
    }

    Object.freeze(this);
  }

  columnFor(field: string): string {
    return this.columns.get(field) ?? field;
  }

  resolveOrdering(value: string): OrderingSpec {
    const spec = parseOrdering(value);
    const field = this.schema.field(spec.field);
    if (!field) throw new UnknownOrderingFieldError(this.config.orderingParam, spec.field);
    if (!field.orderable) throw new OrderingNotPermittedError(this.config.orderingParam, spec.field);
    return spec;
  }

  compiler(params: ListQueryParams): ListQueryCompiler {
    return new ListQueryCompiler(this, params);
  }
}

export function defineListQuery(opts: ListQueryDefinitionOptions): ListQueryDefinition {
  return new ListQueryDefinition(opts);
}
