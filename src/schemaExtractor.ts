import type { ColumnDefinition, IndexDefinition, TableDefinition } from './model';
import type { DbClient } from './connection';
import { logicalTypeOf, typeModifiers } from './typeNormalizer';

/**
 * Extract the live table definitions of the given PostgreSQL schemas.
 *
 * Strategy, tenancy and soft delete are not stored in the catalog; they are
 * inferred from the system columns present.
 */
export async function extractSchema(client: DbClient, schemaNames: readonly string[] = ['public']): Promise<TableDefinition[]> {
  const tables: TableDefinition[] = [];
  for (const schemaName of [...new Set(schemaNames)].sort()) {
    tables.push(...await extractTables(client, schemaName));
  }
  return tables;
}

async function extractTables(client: DbClient, schemaName: string): Promise<TableDefinition[]> {
  // Get all tables
  const tablesResult = await client.query<{ table_name: string }>(`
    SELECT table_name
    FROM information_schema.tables
    WHERE table_schema = $1
      AND table_type = 'BASE TABLE'
    ORDER BY table_name
  `, [schemaName]);

  const tables: TableDefinition[] = [];

  for (const { table_name } of tablesResult.rows) {
    const columns = await extractColumns(client, schemaName, table_name);
    const primaryKey = await extractPrimaryKey(client, schemaName, table_name);
    const indexes = await extractIndexes(client, schemaName, table_name);
    const columnNames = new Set(columns.map(c => c.name));

    tables.push({
      schema: schemaName,
      name: table_name,
      columns,
      primaryKey,
      indexes,
      strategy: columnNames.has('valid_to') && columnNames.has('version') ? 'scd2' : 'none',
      multiTenant: columnNames.has('tenant_id'),
      softDelete: columnNames.has('deleted_at'),
    });
  }

  return tables;
}

async function extractColumns(client: DbClient, schemaName: string, tableName: string): Promise<ColumnDefinition[]> {
  const result = await client.query<{
    column_name: string;
    native_type: string;
    not_null: boolean;
    column_default: string | null;
  }>(`
    SELECT
      a.attname AS column_name,
      format_type(a.atttypid, a.atttypmod) AS native_type,
      a.attnotnull AS not_null,
      pg_get_expr(d.adbin, d.adrelid) AS column_default
    FROM pg_attribute a
    JOIN pg_class c ON c.oid = a.attrelid
    JOIN pg_namespace n ON n.oid = c.relnamespace
    LEFT JOIN pg_attrdef d ON d.adrelid = a.attrelid AND d.adnum = a.attnum
    WHERE n.nspname = $1
      AND c.relname = $2
      AND a.attnum > 0
      AND NOT a.attisdropped
    ORDER BY a.attnum
  `, [schemaName, tableName]);

  return result.rows.map(row => ({
    name: row.column_name,
    type: logicalTypeOf(row.native_type),
    nativeType: row.native_type,
    nullable: !row.not_null,
    default: row.column_default,
    ...typeModifiers(row.native_type),
  }));
}

async function extractPrimaryKey(client: DbClient, schemaName: string, tableName: string): Promise<string[]> {
  const result = await client.query<{ column_name: string }>(`
    SELECT a.attname as column_name
    FROM pg_index i
    JOIN pg_attribute a ON a.attrelid = i.indrelid AND a.attnum = ANY(i.indkey)
    JOIN pg_class c ON c.oid = i.indrelid
    JOIN pg_namespace n ON n.oid = c.relnamespace
    WHERE i.indisprimary
      AND n.nspname = $1
      AND c.relname = $2
    ORDER BY array_position(i.indkey, a.attnum)
  `, [schemaName, tableName]);

  return result.rows.map(r => r.column_name);
}

async function extractIndexes(client: DbClient, schemaName: string, tableName: string): Promise<IndexDefinition[]> {
  const result = await client.query<{
    index_name: string;
    index_method: string;
    is_unique: boolean;
    predicate: string | null;
    columns: string | string[];
  }>(`
    SELECT
      ic.relname AS index_name,
      am.amname AS index_method,
      ix.indisunique AS is_unique,
      pg_get_expr(ix.indpred, ix.indrelid) AS predicate,
      ARRAY(
        SELECT a.attname::text
        FROM unnest(ix.indkey::int2[]) WITH ORDINALITY AS cols(col, ord)
        JOIN pg_attribute a ON a.attrelid = ix.indrelid AND a.attnum = cols.col
        ORDER BY cols.ord
      ) AS columns
    FROM pg_index ix
    JOIN pg_class tc ON tc.oid = ix.indrelid
    JOIN pg_class ic ON ic.oid = ix.indexrelid
    JOIN pg_namespace n ON n.oid = tc.relnamespace
    JOIN pg_am am ON am.oid = ic.relam
    WHERE n.nspname = $1
      AND tc.relname = $2
      AND NOT ix.indisprimary
    ORDER BY ic.relname
  `, [schemaName, tableName]);

  return result.rows.map(row => ({
    name: row.index_name,
    tableName,
    columns: parsePostgresArray(row.columns),
    unique: row.is_unique,
    method: row.index_method,
    predicate: row.predicate,
  }));
}

/**
 * Parse a PostgreSQL array string like "{a,b,c}" into a JavaScript array.
 * Handles the case where the driver returns arrays as strings.
 */
export function parsePostgresArray(value: string | string[]): string[] {
  if (Array.isArray(value)) {
    return value;
  }
  // PostgreSQL array format: {element1,element2,...}
  if (value.startsWith('{') && value.endsWith('}')) {
    const inner = value.slice(1, -1);
    if (inner === '') return [];
    return inner.split(',').map(item => item.replace(/^"(.*)"$/, '$1').replace(/\\(.)/g, '$1'));
  }
  return [value];
}
