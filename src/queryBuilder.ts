import type { ColumnDefinition, IndexDefinition, Row, SchemaChange, TableDefinition } from './model';
import { findColumn } from './model';
import { ValidationBypassError } from './errors';
import { normalizeColumn } from './typeNormalizer';

export interface SqlStatement {
  sql: string;
  params: unknown[];
}

/**
 * Escape a PostgreSQL identifier (table or column name).
 * Doubles any embedded double-quotes to prevent SQL injection.
 *
 * Every identifier is quoted, so reserved words such as `order`, `limit` or
 * `user` are valid column names in every statement.
 */
export function escapeIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function qualifiedName(table: Pick<TableDefinition, 'schema' | 'name'>): string {
  return `${escapeIdentifier(table.schema)}.${escapeIdentifier(table.name)}`;
}

// === Value coercion ===

interface DecimalLike {
  toString(): string;
}

function isDecimalLike(value: object): value is DecimalLike {
  return typeof value.toString === 'function' && value.toString !== Object.prototype.toString;
}

function toFloat(table: TableDefinition, column: ColumnDefinition, value: unknown): number {
  let result: number;
  if (typeof value === 'number') {
    result = value;
  } else if (typeof value === 'bigint') {
    result = Number(value);
  } else if (typeof value === 'string' && value.trim() !== '') {
    result = Number(value);
  } else if (typeof value === 'object' && value !== null && isDecimalLike(value)) {
    result = Number(value.toString());
  } else {
    throw new ValidationBypassError(table.name, column.name, `expected a number, got ${typeof value}`);
  }
  if (!Number.isFinite(result)) {
    throw new ValidationBypassError(table.name, column.name, `"${String(value)}" is not a finite number`);
  }
  return result;
}

/**
 * Convert a value to what the driver accepts for the column: decimals
 * bound for a floating-point column become numbers and structured values for
 * a json column become JSON text. Other values pass unchanged.
 */
export function coerceValue(table: TableDefinition, column: ColumnDefinition, value: unknown): unknown {
  if (value === null || value === undefined) return null;
  switch (column.type) {
    case 'float':
      return toFloat(table, column, value);
    case 'json':
      return JSON.stringify(value);
    default:
      return value;
  }
}

/**
 * Coerce every field of a payload. Fields that are not columns of the table
 * are rejected before any SQL is built.
 */
export function coerceRow(table: TableDefinition, row: Row): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [field, value] of Object.entries(row)) {
    if (value === undefined) continue;
    const column = findColumn(table, field);
    if (column === undefined) {
      throw new ValidationBypassError(table.name, field, 'no such column');
    }
    result[field] = coerceValue(table, column, value);
  }
  return result;
}

// === DML ===

export type Condition =
  | { readonly column: string; readonly op: '=' | '<' | '<=' | '>' | '>='; readonly value: unknown }
  | { readonly column: string; readonly op: 'is null' | 'is not null' }
  | RawCondition;

/**
 * Trusted SQL built by the engine itself. `render` receives a binder that
 * appends a parameter and returns its placeholder.
 */
export interface RawCondition {
  readonly render: (bind: (value: unknown) => string) => string;
}

export interface SelectOptions {
  readonly where?: readonly Condition[];
  readonly orderBy?: readonly { readonly column: string; readonly direction?: 'asc' | 'desc' }[];
  readonly limit?: number;
  readonly offset?: number;
  readonly forUpdate?: boolean;
  readonly columns?: readonly string[];
}

/**
 * Equality filters as conditions; a null value matches `IS NULL`.
 */
export function equalityConditions(filters: Row): Condition[] {
  return Object.entries(filters).map(([column, value]): Condition =>
    value === null ? { column, op: 'is null' } : { column, op: '=', value },
  );
}

function renderWhere(conditions: readonly Condition[], params: unknown[]): string {
  if (conditions.length === 0) return '';
  const bind = (value: unknown): string => {
    params.push(value);
    return `$${params.length}`;
  };
  const parts = conditions.map(condition => {
    if ('render' in condition) {
      return `(${condition.render(bind)})`;
    }
    const column = escapeIdentifier(condition.column);
    switch (condition.op) {
      case 'is null':
        return `${column} IS NULL`;
      case 'is not null':
        return `${column} IS NOT NULL`;
      default:
        return `${column} ${condition.op} ${bind(condition.value)}`;
    }
  });
  return ` WHERE ${parts.join(' AND ')}`;
}

export function buildInsert(table: TableDefinition, row: Row): SqlStatement {
  const columns = Object.keys(row);
  const placeholders = columns.map((_, i) => `$${i + 1}`);
  const params = columns.map(col => row[col]);

  const sql = `INSERT INTO ${qualifiedName(table)} (${columns.map(c => escapeIdentifier(c)).join(', ')}) VALUES (${placeholders.join(', ')}) RETURNING *`;

  return { sql, params };
}

export function buildUpdate(table: TableDefinition, values: Row, where: readonly Condition[]): SqlStatement {
  const setCols = Object.keys(values);
  const params: unknown[] = [];

  // SET clause
  const setClause = setCols.map(col => {
    params.push(values[col]);
    return `${escapeIdentifier(col)} = $${params.length}`;
  }).join(', ');

  const sql = `UPDATE ${qualifiedName(table)} SET ${setClause}${renderWhere(where, params)} RETURNING *`;

  return { sql, params };
}

export function buildDelete(table: TableDefinition, where: readonly Condition[]): SqlStatement {
  const params: unknown[] = [];
  const sql = `DELETE FROM ${qualifiedName(table)}${renderWhere(where, params)} RETURNING *`;
  return { sql, params };
}

export function buildSelect(table: TableDefinition, options: SelectOptions = {}): SqlStatement {
  const params: unknown[] = [];
  const columns = options.columns ? options.columns.map(c => escapeIdentifier(c)).join(', ') : '*';
  let sql = `SELECT ${columns} FROM ${qualifiedName(table)}${renderWhere(options.where ?? [], params)}`;

  if (options.orderBy && options.orderBy.length > 0) {
    const order = options.orderBy
      .map(o => `${escapeIdentifier(o.column)} ${o.direction === 'desc' ? 'DESC' : 'ASC'}`)
      .join(', ');
    sql += ` ORDER BY ${order}`;
  }
  if (options.limit !== undefined) {
    params.push(options.limit);
    sql += ` LIMIT $${params.length}`;
  }
  if (options.offset !== undefined && options.offset > 0) {
    params.push(options.offset);
    sql += ` OFFSET $${params.length}`;
  }
  if (options.forUpdate) {
    sql += ' FOR UPDATE';
  }

  return { sql, params };
}

export function buildCount(table: TableDefinition, where: readonly Condition[]): SqlStatement {
  const params: unknown[] = [];
  const sql = `SELECT COUNT(*)::int AS count FROM ${qualifiedName(table)}${renderWhere(where, params)}`;
  return { sql, params };
}

// === DDL ===

function renderColumn(column: ColumnDefinition): string {
  let sql = `${escapeIdentifier(column.name)} ${column.nativeType}`;
  if (!column.nullable) sql += ' NOT NULL';
  if (column.default !== null) sql += ` DEFAULT ${column.default}`;
  return sql;
}

export function renderCreateTable(table: TableDefinition): string {
  const lines = table.columns.map(renderColumn);
  if (table.primaryKey.length > 0) {
    lines.push(`PRIMARY KEY (${table.primaryKey.map(c => escapeIdentifier(c)).join(', ')})`);
  }
  return `CREATE TABLE ${qualifiedName(table)} (\n  ${lines.join(',\n  ')}\n)`;
}

export function renderCreateIndex(table: TableDefinition, index: IndexDefinition): string {
  const unique = index.unique ? 'UNIQUE ' : '';
  const columns = index.columns.map(c => escapeIdentifier(c)).join(', ');
  const where = index.predicate ? ` WHERE ${index.predicate}` : '';
  return `CREATE ${unique}INDEX ${escapeIdentifier(index.name)} ON ${qualifiedName(table)} USING ${index.method} (${columns})${where}`;
}

export function renderDropIndex(table: TableDefinition, index: IndexDefinition): string {
  return `DROP INDEX ${escapeIdentifier(table.schema)}.${escapeIdentifier(index.name)}`;
}

export function renderAddColumn(table: TableDefinition, column: ColumnDefinition): string {
  return `ALTER TABLE ${qualifiedName(table)} ADD COLUMN ${renderColumn(column)}`;
}

export function renderDropColumn(table: TableDefinition, column: ColumnDefinition): string {
  return `ALTER TABLE ${qualifiedName(table)} DROP COLUMN ${escapeIdentifier(column.name)}`;
}

/**
 * One statement per aspect that differs between `from` and `to`.
 */
export function renderAlterColumn(table: TableDefinition, from: ColumnDefinition, to: ColumnDefinition): string[] {
  const current = normalizeColumn(from);
  const desired = normalizeColumn(to);
  const prefix = `ALTER TABLE ${qualifiedName(table)} ALTER COLUMN ${escapeIdentifier(to.name)}`;
  const statements: string[] = [];
  if (current.nativeType !== desired.nativeType) {
    statements.push(`${prefix} TYPE ${to.nativeType}`);
  }
  if (current.default !== desired.default) {
    statements.push(to.default === null ? `${prefix} DROP DEFAULT` : `${prefix} SET DEFAULT ${to.default}`);
  }
  if (current.nullable !== desired.nullable) {
    statements.push(`${prefix} ${to.nullable ? 'DROP' : 'SET'} NOT NULL`);
  }
  return statements;
}

export function renderDropTable(table: TableDefinition): string {
  return `DROP TABLE ${qualifiedName(table)}`;
}

/**
 * Render the DDL for one change. An added table brings its indexes along.
 */
export function renderChange(change: SchemaChange): string[] {
  switch (change.type) {
    case 'add_table':
      return [
        renderCreateTable(change.table),
        ...change.table.indexes.map(index => renderCreateIndex(change.table, index)),
      ];
    case 'drop_table':
      return [renderDropTable(change.table)];
    case 'add_column':
      return [renderAddColumn(change.table, change.column)];
    case 'drop_column':
      return [renderDropColumn(change.table, change.column)];
    case 'alter_column':
      return renderAlterColumn(change.table, change.from, change.to);
    case 'add_index':
      return [renderCreateIndex(change.table, change.index)];
    case 'drop_index':
      return [renderDropIndex(change.table, change.index)];
  }
}
