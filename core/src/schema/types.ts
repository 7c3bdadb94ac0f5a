export const FILTER_FIELD_TYPES = [
  'string',
  'text',
  'int',
  'integer',
  'bigint',
  'float',
  'decimal',
  'number',
  'boolean',
  'date',
  'datetime',
  'uuid',
  'enum',
] as const;

export type FilterFieldType = (typeof FILTER_FIELD_TYPES)[number];

export type FilterFieldSpec = {
  type: FilterFieldType;
  /** Allowed values, required for `enum`. */
  values?: readonly string[];
  orderable?: boolean;
  searchable?: boolean;
};

export type FilterSchemaDeclaration = Record<string, FilterFieldSpec>;

export type FieldDescriptor = Readonly<{
  name: string;
  type: FilterFieldType;
  values?: readonly string[];
  orderable: boolean;
  searchable: boolean;
}>;

export type FilterScalar = string | number | boolean | Date;
