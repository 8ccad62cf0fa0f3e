/**
 * Core data model types for temporal-schema.
 *
 * Design principle: Immutable, readonly types. No methods that mutate.
 */

// === Schema Types ===

export type LogicalType =
  | 'integer'
  | 'bigint'
  | 'smallint'
  | 'decimal'
  | 'float'
  | 'boolean'
  | 'string'
  | 'text'
  | 'timestamp'
  | 'timestamptz'
  | 'date'
  | 'json'
  | 'uuid'
  | 'text_array';

/** Logical type of an introspected column whose native type has no mapping. */
export type IntrospectedType = LogicalType | 'unknown';

export type TemporalStrategyType = 'none' | 'copy_on_change' | 'scd2';

export interface ColumnDefinition {
  readonly name: string;
  readonly type: IntrospectedType;
  /** PostgreSQL spelling, e.g. `varchar(255)` or `double precision`. */
  readonly nativeType: string;
  readonly nullable: boolean;
  /** Raw SQL default expression. */
  readonly default: string | null;
  readonly maxLength?: number;
  readonly precision?: number;
  readonly scale?: number;
}

export interface IndexDefinition {
  readonly name: string;
  readonly tableName: string;
  readonly columns: readonly string[];
  readonly unique: boolean;
  readonly method: string;
  readonly predicate: string | null;
}

export interface TableDefinition {
  readonly schema: string;
  readonly name: string;
  readonly columns: readonly ColumnDefinition[];
  readonly primaryKey: readonly string[];
  readonly indexes: readonly IndexDefinition[];
  readonly strategy: TemporalStrategyType;
  readonly multiTenant: boolean;
  readonly softDelete: boolean;
}

// === Change Types ===

export type SchemaChange =
  | AddTableChange
  | DropTableChange
  | AddColumnChange
  | DropColumnChange
  | AlterColumnChange
  | AddIndexChange
  | DropIndexChange;

export interface AddTableChange {
  readonly type: 'add_table';
  readonly table: TableDefinition;
}

export interface DropTableChange {
  readonly type: 'drop_table';
  readonly table: TableDefinition;
}

export interface AddColumnChange {
  readonly type: 'add_column';
  readonly table: TableDefinition;
  readonly column: ColumnDefinition;
}

export interface DropColumnChange {
  readonly type: 'drop_column';
  readonly table: TableDefinition;
  readonly column: ColumnDefinition;
}

export interface AlterColumnChange {
  readonly type: 'alter_column';
  readonly table: TableDefinition;
  readonly from: ColumnDefinition;
  readonly to: ColumnDefinition;
}

export interface AddIndexChange {
  readonly type: 'add_index';
  readonly table: TableDefinition;
  readonly index: IndexDefinition;
}

export interface DropIndexChange {
  readonly type: 'drop_index';
  readonly table: TableDefinition;
  readonly index: IndexDefinition;
  /** Set when the index is dropped only to be recreated under a new definition. */
  readonly rebuild?: boolean;
}

export type ChangeSafety = 'safe' | 'destructive' | 'blocked';

// === Record Types ===

export type Row = Readonly<Record<string, unknown>>;

export type AuditOperation = 'insert' | 'update' | 'delete';

export interface AuditEntry {
  readonly auditId: string;
  readonly recordId: string;
  readonly tenantId: string | null;
  readonly fieldName: string;
  readonly oldValue: unknown;
  readonly newValue: unknown;
  readonly operation: AuditOperation;
  readonly changedAt: Date;
  readonly changedBy: string | null;
  readonly transactionId: string | null;
  readonly metadata: unknown;
}

export interface FieldComparison {
  readonly old: unknown;
  readonly new: unknown;
  readonly changed: boolean;
}

// === Helpers ===

export function qualifiedTableName(table: Pick<TableDefinition, 'schema' | 'name'>): string {
  return `${table.schema}.${table.name}`;
}

export function findColumn(table: TableDefinition, name: string): ColumnDefinition | undefined {
  return table.columns.find(c => c.name === name);
}

export function hasColumn(table: TableDefinition, name: string): boolean {
  return findColumn(table, name) !== undefined;
}

export function describeChange(change: SchemaChange): string {
  const table = qualifiedTableName(change.table);
  switch (change.type) {
    case 'add_table':
    case 'drop_table':
      return `${change.type} ${table}`;
    case 'add_column':
    case 'drop_column':
      return `${change.type} ${table}.${change.column.name}`;
    case 'alter_column':
      return `${change.type} ${table}.${change.to.name}`;
    case 'add_index':
    case 'drop_index':
      return `${change.type} ${table} ${change.index.name}`;
  }
}
