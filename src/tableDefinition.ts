import type {
  ColumnDefinition,
  IndexDefinition,
  LogicalType,
  TableDefinition,
  TemporalStrategyType,
} from './model';
import { InvalidDeclarationError, UnsupportedTypeError } from './errors';
import { isKnownNativeType, logicalTypeOf, normalizeNativeType, typeModifiers } from './typeNormalizer';

export interface ColumnInput {
  readonly name: string;
  readonly type: LogicalType;
  /** Overrides the type derived from `type`, e.g. `varchar(50)`. */
  readonly nativeType?: string;
  /** Defaults to true. */
  readonly nullable?: boolean;
  readonly default?: string | null;
  readonly maxLength?: number;
  readonly precision?: number;
  readonly scale?: number;
}

export interface IndexInput {
  /** Defaults to `idx_<table>_<columns>`. */
  readonly name?: string;
  readonly columns: readonly string[];
  readonly unique?: boolean;
  readonly method?: string;
  readonly predicate?: string | null;
}

export interface TableInput {
  readonly schema?: string;
  readonly name: string;
  readonly columns: readonly ColumnInput[];
  readonly indexes?: readonly IndexInput[];
  /** Defaults to `none`. */
  readonly strategy?: TemporalStrategyType;
  /** Defaults to true. */
  readonly multiTenant?: boolean;
  /** Defaults to true. */
  readonly softDelete?: boolean;
}

/** PostgreSQL truncates longer identifiers, which would break re-sync. */
const MAX_IDENTIFIER_LENGTH = 63;

const LOGICAL_TYPES: readonly LogicalType[] = [
  'integer', 'bigint', 'smallint', 'decimal', 'float', 'boolean', 'string',
  'text', 'timestamp', 'timestamptz', 'date', 'json', 'uuid', 'text_array',
];

export function isLogicalType(value: string): value is LogicalType {
  return LOGICAL_TYPES.some(t => t === value);
}

export const SYSTEM_COLUMNS: ReadonlySet<string> = new Set([
  'id',
  'tenant_id',
  'version',
  'valid_from',
  'valid_to',
  'created_at',
  'updated_at',
  'created_by',
  'updated_by',
  'deleted_at',
  'deleted_by',
]);

/**
 * Columns of a table that hold business data, as opposed to the columns
 * maintained by the temporal strategy.
 */
export function businessColumns(table: TableDefinition): ColumnDefinition[] {
  return table.columns.filter(c => !SYSTEM_COLUMNS.has(c.name));
}

function nativeTypeFor(input: ColumnInput): string {
  switch (input.type) {
    case 'integer': return 'integer';
    case 'bigint': return 'bigint';
    case 'smallint': return 'smallint';
    case 'decimal': return `numeric(${input.precision ?? 15},${input.scale ?? 2})`;
    case 'float': return 'double precision';
    case 'boolean': return 'boolean';
    case 'string': return `varchar(${input.maxLength ?? 255})`;
    case 'text': return 'text';
    case 'timestamp': return 'timestamp';
    case 'timestamptz': return 'timestamptz';
    case 'date': return 'date';
    case 'json': return 'jsonb';
    case 'uuid': return 'uuid';
    case 'text_array': return 'text[]';
  }
}

function systemColumn(
  name: string,
  type: LogicalType,
  nativeType: string,
  nullable: boolean,
  defaultValue: string | null = null,
): ColumnDefinition {
  return { name, type, nativeType, nullable, default: defaultValue };
}

function checkIdentifier(tableName: string, kind: string, name: string): void {
  if (name.length === 0) {
    throw new InvalidDeclarationError(tableName, `${kind} name is empty`);
  }
  if (name.length > MAX_IDENTIFIER_LENGTH) {
    throw new InvalidDeclarationError(tableName, `${kind} name "${name}" exceeds ${MAX_IDENTIFIER_LENGTH} characters`);
  }
}

function resolveColumn(tableName: string, input: ColumnInput): ColumnDefinition {
  checkIdentifier(tableName, 'column', input.name);
  if (!isLogicalType(input.type)) {
    throw new UnsupportedTypeError(tableName, input.name, String(input.type));
  }

  let nativeType = nativeTypeFor(input);
  if (input.nativeType !== undefined) {
    if (!isKnownNativeType(input.nativeType)) {
      throw new UnsupportedTypeError(tableName, input.name, input.nativeType);
    }
    if (logicalTypeOf(input.nativeType) !== input.type) {
      throw new InvalidDeclarationError(
        tableName,
        `column "${input.name}" declares type ${input.type} but native type ${input.nativeType}`,
      );
    }
    nativeType = input.nativeType;
  }

  const normalized = normalizeNativeType(nativeType);
  return {
    name: input.name,
    type: input.type,
    nativeType: normalized,
    nullable: input.nullable ?? true,
    default: input.default ?? null,
    ...typeModifiers(normalized),
  };
}

/**
 * Expand a business table declaration into a full TableDefinition: the
 * columns and indexes required by its temporal strategy, tenancy and soft
 * delete are added around the declared ones.
 */
export function defineTable(input: TableInput): TableDefinition {
  const schema = input.schema ?? 'public';
  const name = input.name;
  const strategy = input.strategy ?? 'none';
  const multiTenant = input.multiTenant ?? true;
  const softDelete = input.softDelete ?? true;

  checkIdentifier(name, 'schema', schema);
  checkIdentifier(name, 'table', name);

  const declared = input.columns.map(c => resolveColumn(name, c));
  const seen = new Set<string>();
  for (const column of declared) {
    if (SYSTEM_COLUMNS.has(column.name)) {
      throw new InvalidDeclarationError(name, `column "${column.name}" is maintained by the engine`);
    }
    if (seen.has(column.name)) {
      throw new InvalidDeclarationError(name, `column "${column.name}" is declared twice`);
    }
    seen.add(column.name);
  }

  const columns: ColumnDefinition[] = [systemColumn('id', 'uuid', 'uuid', false)];
  if (multiTenant) {
    columns.push(systemColumn('tenant_id', 'uuid', 'uuid', false));
  }
  if (strategy === 'scd2') {
    columns.push(
      systemColumn('version', 'integer', 'integer', false, '1'),
      systemColumn('valid_from', 'timestamptz', 'timestamptz', false, 'now()'),
      systemColumn('valid_to', 'timestamptz', 'timestamptz', true),
    );
  }
  columns.push(...declared);
  columns.push(
    systemColumn('created_at', 'timestamptz', 'timestamptz', false, 'now()'),
    systemColumn('updated_at', 'timestamptz', 'timestamptz', false, 'now()'),
    systemColumn('created_by', 'uuid', 'uuid', true),
    systemColumn('updated_by', 'uuid', 'uuid', true),
  );
  if (softDelete) {
    columns.push(
      systemColumn('deleted_at', 'timestamptz', 'timestamptz', true),
      systemColumn('deleted_by', 'uuid', 'uuid', true),
    );
  }

  const columnNames = new Set(columns.map(c => c.name));
  const indexes: IndexDefinition[] = [
    ...systemIndexes(name, strategy, multiTenant, softDelete),
    ...(input.indexes ?? []).map(idx => resolveIndex(name, idx, columnNames)),
  ];

  const indexNames = new Set<string>();
  for (const index of indexes) {
    checkIdentifier(name, 'index', index.name);
    if (indexNames.has(index.name)) {
      throw new InvalidDeclarationError(name, `index "${index.name}" is declared twice`);
    }
    indexNames.add(index.name);
  }

  return {
    schema,
    name,
    columns,
    primaryKey: strategy === 'scd2' ? ['id', 'version'] : ['id'],
    indexes,
    strategy,
    multiTenant,
    softDelete,
  };
}

function resolveIndex(tableName: string, input: IndexInput, columnNames: ReadonlySet<string>): IndexDefinition {
  if (input.columns.length === 0) {
    throw new InvalidDeclarationError(tableName, 'index without columns');
  }
  for (const column of input.columns) {
    if (!columnNames.has(column)) {
      throw new InvalidDeclarationError(tableName, `index references unknown column "${column}"`);
    }
  }
  return {
    name: input.name ?? `idx_${tableName}_${input.columns.join('_')}`,
    tableName,
    columns: [...input.columns],
    unique: input.unique ?? false,
    method: input.method ?? 'btree',
    predicate: input.predicate ?? null,
  };
}

function index(
  tableName: string,
  name: string,
  columns: readonly string[],
  options: { unique?: boolean; predicate?: string | null } = {},
): IndexDefinition {
  return {
    name,
    tableName,
    columns,
    unique: options.unique ?? false,
    method: 'btree',
    predicate: options.predicate ?? null,
  };
}

function systemIndexes(
  tableName: string,
  strategy: TemporalStrategyType,
  multiTenant: boolean,
  softDelete: boolean,
): IndexDefinition[] {
  const indexes: IndexDefinition[] = [];

  if (multiTenant) {
    indexes.push(index(tableName, `idx_${tableName}_tenant_id`, ['tenant_id']));
    // tenant + created_at is the common listing pattern
    indexes.push(index(tableName, `idx_${tableName}_tenant_id_created`, ['tenant_id', 'created_at'], {
      predicate: softDelete ? 'deleted_at IS NULL' : null,
    }));
  }

  if (softDelete) {
    indexes.push(index(tableName, `idx_${tableName}_not_deleted`, ['deleted_at'], {
      predicate: 'deleted_at IS NULL',
    }));
  }

  if (strategy === 'scd2') {
    // At most one current version per record id
    indexes.push(index(tableName, `idx_${tableName}_current`, ['id'], {
      unique: true,
      predicate: 'valid_to IS NULL',
    }));
    indexes.push(index(tableName, `idx_${tableName}_valid_period`, ['valid_from', 'valid_to']));
  }

  return indexes;
}

/**
 * The field-level audit table kept beside a copy_on_change table.
 */
export function auditTableFor(table: TableDefinition): TableDefinition {
  const name = `${table.name}_audit`;
  checkIdentifier(table.name, 'audit table', name);

  const columns: ColumnDefinition[] = [
    systemColumn('audit_id', 'uuid', 'uuid', false),
    systemColumn('record_id', 'uuid', 'uuid', false),
  ];
  if (table.multiTenant) {
    columns.push(systemColumn('tenant_id', 'uuid', 'uuid', false));
  }
  columns.push(
    { ...systemColumn('field_name', 'string', 'varchar(255)', false), maxLength: 255 },
    systemColumn('old_value', 'json', 'jsonb', true),
    systemColumn('new_value', 'json', 'jsonb', true),
    { ...systemColumn('operation', 'string', 'varchar(10)', false), maxLength: 10 },
    systemColumn('changed_at', 'timestamptz', 'timestamptz', false, 'now()'),
    systemColumn('changed_by', 'uuid', 'uuid', true),
    systemColumn('transaction_id', 'uuid', 'uuid', true),
    systemColumn('metadata', 'json', 'jsonb', true),
  );

  const indexes = [
    index(name, `idx_${name}_changed_at`, ['changed_at']),
    index(name, `idx_${name}_record_field`, ['record_id', 'field_name']),
  ];
  if (table.multiTenant) {
    indexes.push(index(name, `idx_${name}_tenant_id`, ['tenant_id']));
  }

  return {
    schema: table.schema,
    name,
    columns,
    primaryKey: ['audit_id'],
    indexes,
    strategy: 'none',
    multiTenant: false,
    softDelete: false,
  };
}
