import type { FilterIssue } from '../query/errors.js';
import { ValueCoercionError } from '../query/errors.js';
import type { ListOperator, LookupOperator, LookupRequest, ScalarOperator, ValidatedLookup } from '../query/types.js';
import { isListOperator, isLookupOperator } from '../query/types.js';
import { createAjv } from './ajv.js';
import { FieldCoercer, type CoercionResult } from './coercion.js';
import { FILTER_SCHEMA_DECLARATION_2020_12 } from './declaration.js';
import { MissingValidationContextError, SchemaDeclarationError } from './errors.js';
import type { FieldDescriptor, FilterSchemaDeclaration, FilterScalar } from './types.js';

const declarationAjv = createAjv();
const validateDeclaration = declarationAjv.compile(FILTER_SCHEMA_DECLARATION_2020_12);
const coercionAjv = createAjv({ coerceTypes: true });

export class FilterSchema {
  private readonly descriptors: ReadonlyMap<string, FieldDescriptor>;
  private readonly coercers: ReadonlyMap<string, FieldCoercer>;

  constructor(declaration: FilterSchemaDeclaration) {
    if (!validateDeclaration(declaration)) {
      throw new SchemaDeclarationError('Invalid filter schema declaration', validateDeclaration.errors ?? []);
    }

    const descriptors = new Map<string, FieldDescriptor>();
    const coercers = new Map<string, FieldCoercer>();
    for (const [name, spec] of Object.entries(declaration)) {
      const descriptor: FieldDescriptor = Object.freeze({
        name,
        type: spec.type,
        ...(spec.values ? { values: Object.freeze([...spec.values]) } : {}),
        orderable: spec.orderable ?? true,
        searchable: spec.searchable ?? true,
      });
      descriptors.set(name, descriptor);
      coercers.set(name, new FieldCoercer(descriptor, coercionAjv));
    }

    this.descriptors = descriptors;
    this.coercers = coercers;
    Object.freeze(this);
  }

  get fieldNames(): string[] {
    return [...this.descriptors.keys()];
  }

  has(name: string): boolean {
    return this.descriptors.has(name);
  }

  field(name: string): FieldDescriptor | undefined {
    return this.descriptors.get(name);
  }

  searchableFields(): FieldDescriptor[] {
    return [...this.descriptors.values()].filter((f) => f.searchable);
  }

  validate(field: string, operator: ListOperator, raw: string): FilterScalar[];
  validate(field: string, operator: ScalarOperator, raw: string): FilterScalar;
  validate(field: string, operator: LookupOperator, raw: string): FilterScalar | FilterScalar[];
  validate(field: string, operator: LookupOperator, raw: string): FilterScalar | FilterScalar[] {
    const coercer = this.coercerFor(field, operator);
    const result: CoercionResult<FilterScalar | FilterScalar[]> = isListOperator(operator)
      ? coercer.coerceList(raw)
      : coercer.coerceScalar(raw);
    if (!result.ok) throw new ValueCoercionError(result.issues);
    return operator === 'regexp' ? raw : result.value;
  }

  /** Coerces every lookup, reporting all failures in one `ValueCoercionError`. */
  coerce(lookups: readonly LookupRequest[]): ValidatedLookup[] {
    const out: ValidatedLookup[] = [];
    const issues: FilterIssue[] = [];

    for (const lookup of lookups) {
      const coercer = this.coercerFor(lookup.field, lookup.operator);
      const { key, field } = lookup;
      if (isListOperator(lookup.operator)) {
        const res = coercer.coerceList(lookup.raw);
        if (res.ok) out.push({ key, field, operator: lookup.operator, value: res.value });
        else issues.push(...res.issues);
      } else {
        const res = coercer.coerceScalar(lookup.raw);
        if (!res.ok) {
          issues.push(...res.issues);
          continue;
        }
        // A pattern is matched against column text, so it keeps the client's spelling.
        const value = lookup.operator === 'regexp' ? lookup.raw : res.value;
        out.push({ key, field, operator: lookup.operator, value });
      }
    }

    if (issues.length) throw new ValueCoercionError(issues);
    return out;
  }

  private coercerFor(field: string, operator: unknown): FieldCoercer {
    const coercer = this.coercers.get(field);
    if (!coercer) throw new SchemaDeclarationError(`Field '${field}' is not declared`, { field });
    if (!isLookupOperator(operator)) throw new MissingValidationContextError(field);
    return coercer;
  }
}

export function defineFilterSchema(declaration: FilterSchemaDeclaration): FilterSchema {
  return new FilterSchema(declaration);
}
