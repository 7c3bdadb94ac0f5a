export type FilterIssue = {
  location: string;
  message: string;
};

export class FilterRequestError extends Error {
  readonly code: string;
  readonly status = 400;
  readonly issues: FilterIssue[];

  constructor(message: string, opts: { code: string; issues: FilterIssue[] }) {
    super(message);
    this.name = 'FilterRequestError';
    this.code = opts.code;
    this.issues = opts.issues;
  }
}

export class MalformedParameterError extends FilterRequestError {
  constructor(key: string) {
    const message = `Parameter '${key}' must be a string`;
    super(message, { code: 'malformed_parameter', issues: [{ location: key, message }] });
    this.name = 'MalformedParameterError';
  }
}

export class UnknownLookupOperatorError extends FilterRequestError {
  readonly operator: string;

  constructor(key: string, operator: string) {
    const message = `Unknown lookup '${operator}'`;
    super(message, { code: 'unknown_lookup_operator', issues: [{ location: key, message }] });
    this.name = 'UnknownLookupOperatorError';
    this.operator = operator;
  }
}

export class UnknownFilterFieldError extends FilterRequestError {
  readonly field: string;

  constructor(key: string, field: string) {
    const message = `Unknown filtering field '${field}'`;
    super(message, { code: 'unknown_filter_field', issues: [{ location: key, message }] });
    this.name = 'UnknownFilterFieldError';
    this.field = field;
  }
}

export class ValueCoercionError extends FilterRequestError {
  constructor(issues: FilterIssue[]) {
    super('Invalid filter values', { code: 'value_coercion_error', issues });
    this.name = 'ValueCoercionError';
  }
}

export class PaginationRangeError extends FilterRequestError {
  constructor(issues: FilterIssue[]) {
    super('Invalid pagination', { code: 'pagination_range_error', issues });
    this.name = 'PaginationRangeError';
  }
}

export class UnknownOrderingFieldError extends FilterRequestError {
  readonly field: string;

  constructor(param: string, field: string) {
    const message = `Unknown ordering field '${field}'`;
    super(message, { code: 'unknown_ordering_field', issues: [{ location: param, message }] });
    this.name = 'UnknownOrderingFieldError';
    this.field = field;
  }
}

export class OrderingNotPermittedError extends FilterRequestError {
  readonly field: string;

  constructor(param: string, field: string) {
    const message = `Ordering by '${field}' is not permitted`;
    super(message, { code: 'ordering_not_permitted', issues: [{ location: param, message }] });
    this.name = 'OrderingNotPermittedError';
    this.field = field;
  }
}
