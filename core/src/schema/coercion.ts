import type { SchemaObject, ValidateFunction } from 'ajv';
import type { Ajv2020 } from 'ajv/dist/2020.js';

import type { FilterIssue } from '../query/errors.js';
import { SchemaDeclarationError } from './errors.js';
import type { FieldDescriptor, FilterFieldType, FilterScalar } from './types.js';

const VALUE_SCHEMAS = {
  string: { type: 'string' },
  text: { type: 'string' },
  int: { type: 'integer' },
  integer: { type: 'integer' },
  // Kept as a string: values beyond 2^53 must reach the store intact.
  bigint: { type: 'string', pattern: '^-?\\d+$' },
  float: { type: 'number' },
  decimal: { type: 'number' },
  number: { type: 'number' },
  boolean: { type: 'boolean' },
  date: { type: 'string', format: 'date' },
  datetime: { type: 'string', format: 'date-time' },
  uuid: { type: 'string', format: 'uuid' },
} satisfies Record<Exclude<FilterFieldType, 'enum'>, SchemaObject>;

export const LIST_VALUE_DELIMITER = ',';

export function valueSchemaFor(field: FieldDescriptor): SchemaObject {
  if (field.type === 'enum') return { type: 'string', enum: [...(field.values ?? [])] };
  return VALUE_SCHEMAS[field.type];
}

export type CoercionResult<T> = { ok: true; value: T } | { ok: false; issues: FilterIssue[] };

type Wrapped = { value: unknown };

type TextRule = { pattern: RegExp; message: string };

const INTEGER_TEXT: TextRule = { pattern: /^-?\d+$/, message: 'must be integer' };
const NUMBER_TEXT: TextRule = { pattern: /^-?\d+(\.\d+)?$/, message: 'must be number' };

// ajv coerces anything `Number()` accepts (blank, hex, exponent); numeric text is checked first.
const TEXT_RULES: Partial<Record<FilterFieldType, TextRule>> = {
  int: INTEGER_TEXT,
  integer: INTEGER_TEXT,
  float: NUMBER_TEXT,
  decimal: NUMBER_TEXT,
  number: NUMBER_TEXT,
};

const UNREPRESENTABLE_DATE = 'must match format "date-time"';

function locate(field: string, instancePath: string): string {
  // '/value' for scalars, '/value/<index>' for list items
  const [, , index] = instancePath.split('/');
  return index === undefined ? field : `${field}[${index}]`;
}

/**
 * Single-field validation unit. Both validators are compiled once, when the
 * owning schema is defined, and coerce the raw query-string text in place.
 */
export class FieldCoercer {
  private readonly scalar: ValidateFunction<Wrapped>;
  private readonly list: ValidateFunction<Wrapped>;
  private readonly textRule: TextRule | undefined;

  constructor(
    private readonly field: FieldDescriptor,
    ajv: Ajv2020,
  ) {
    const item = valueSchemaFor(field);
    this.scalar = ajv.compile<Wrapped>({
      type: 'object',
      properties: { value: item },
      required: ['value'],
    });
    this.list = ajv.compile<Wrapped>({
      type: 'object',
      properties: { value: { type: 'array', items: item } },
      required: ['value'],
    });
    this.textRule = TEXT_RULES[field.type];
  }

  coerceScalar(raw: string): CoercionResult<FilterScalar> {
    const textIssues = this.checkText([raw], () => this.field.name);
    if (textIssues.length) return { ok: false, issues: textIssues };

    const data: Wrapped = { value: raw };
    if (!this.scalar(data)) return { ok: false, issues: this.issues(this.scalar) };
    const value = this.finalize(data.value);
    if (value === undefined) return { ok: false, issues: [{ location: this.field.name, message: UNREPRESENTABLE_DATE }] };
    return { ok: true, value };
  }

  coerceList(raw: string): CoercionResult<FilterScalar[]> {
    const tokens = raw.split(LIST_VALUE_DELIMITER);
    const at = (i: number) => `${this.field.name}[${i}]`;
    const textIssues = this.checkText(tokens, at);
    if (textIssues.length) return { ok: false, issues: textIssues };

    const data: Wrapped = { value: tokens };
    if (!this.list(data)) return { ok: false, issues: this.issues(this.list) };
    const items: unknown[] = Array.isArray(data.value) ? data.value : [];
    const values: FilterScalar[] = [];
    const issues: FilterIssue[] = [];
    items.forEach((item, i) => {
      const value = this.finalize(item);
      if (value === undefined) issues.push({ location: at(i), message: UNREPRESENTABLE_DATE });
      else values.push(value);
    });
    return issues.length ? { ok: false, issues } : { ok: true, value: values };
  }

  private checkText(tokens: readonly string[], at: (i: number) => string): FilterIssue[] {
    const rule = this.textRule;
    if (!rule) return [];
    const issues: FilterIssue[] = [];
    tokens.forEach((token, i) => {
      if (!rule.pattern.test(token)) issues.push({ location: at(i), message: rule.message });
    });
    return issues;
  }

  private issues(validate: ValidateFunction<Wrapped>): FilterIssue[] {
    return (validate.errors ?? []).map((e) => ({
      location: locate(this.field.name, e.instancePath),
      message: e.message ?? 'is invalid',
    }));
  }

  // undefined: a datetime ajv accepts but Date cannot represent (e.g. a leap second)
  private finalize(v: unknown): FilterScalar | undefined {
    if (this.field.type === 'datetime' && typeof v === 'string') {
      const date = new Date(v);
      return Number.isNaN(date.getTime()) ? undefined : date;
    }
    if (typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean') return v;
    throw new SchemaDeclarationError(`Field '${this.field.name}' produced a non-scalar value`, {
      field: this.field.name,
    });
  }
}
