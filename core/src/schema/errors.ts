export class SchemaDeclarationError extends Error {
  readonly code = 'schema_declaration_error';
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = 'SchemaDeclarationError';
    this.details = details;
  }
}

// Raised when coercion runs without the operator that decides scalar vs list parsing.
export class MissingValidationContextError extends Error {
  readonly code = 'missing_validation_context';
  readonly field: string;

  constructor(field: string) {
    super(`Lookup operator is required to validate '${field}'`);
    this.name = 'MissingValidationContextError';
    this.field = field;
  }
}
