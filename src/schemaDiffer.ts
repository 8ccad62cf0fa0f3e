import type {
  ChangeSafety,
  ColumnDefinition,
  IndexDefinition,
  SchemaChange,
  TableDefinition,
} from './model';
import { qualifiedTableName } from './model';
import { normalizeColumn, normalizeIndex, normalizeNativeType } from './typeNormalizer';

/**
 * Compute the structural changes that turn the introspected schema into the
 * declared one.
 *
 * Tables only present in the introspected schema are reported as
 * `drop_table` candidates when they live in a schema that has declared
 * tables; whether they are applied is the manager's decision.
 */
export function diffSchemas(
  declared: readonly TableDefinition[],
  introspected: readonly TableDefinition[],
): SchemaChange[] {
  const changes: SchemaChange[] = [];

  const declaredByName = new Map(declared.map(t => [qualifiedTableName(t), t]));
  const introspectedByName = new Map(introspected.map(t => [qualifiedTableName(t), t]));
  const declaredSchemas = new Set(declared.map(t => t.schema));

  for (const [name, table] of declaredByName) {
    const current = introspectedByName.get(name);
    if (current === undefined) {
      changes.push({ type: 'add_table', table });
    } else {
      changes.push(...diffTable(table, current));
    }
  }

  for (const [name, table] of introspectedByName) {
    if (!declaredByName.has(name) && declaredSchemas.has(table.schema)) {
      changes.push({ type: 'drop_table', table });
    }
  }

  return sortChanges(changes);
}

function diffTable(declared: TableDefinition, current: TableDefinition): SchemaChange[] {
  const changes: SchemaChange[] = [];

  const currentColumns = new Map(current.columns.map(c => [c.name, c]));
  const declaredColumns = new Map(declared.columns.map(c => [c.name, c]));

  for (const column of declared.columns) {
    const existing = currentColumns.get(column.name);
    if (existing === undefined) {
      changes.push({ type: 'add_column', table: declared, column });
    } else if (!columnsEqual(column, existing)) {
      changes.push({ type: 'alter_column', table: declared, from: existing, to: column });
    }
  }

  for (const column of current.columns) {
    if (!declaredColumns.has(column.name)) {
      changes.push({ type: 'drop_column', table: declared, column });
    }
  }

  const currentIndexes = new Map(current.indexes.map(i => [i.name, i]));
  const declaredIndexes = new Map(declared.indexes.map(i => [i.name, i]));

  for (const index of declared.indexes) {
    const existing = currentIndexes.get(index.name);
    if (existing === undefined) {
      changes.push({ type: 'add_index', table: declared, index });
    } else if (!indexesEqual(index, existing)) {
      // Redefined: rebuild under the same name
      changes.push({ type: 'drop_index', table: declared, index: existing, rebuild: true });
      changes.push({ type: 'add_index', table: declared, index });
    }
  }

  for (const index of current.indexes) {
    if (!declaredIndexes.has(index.name)) {
      changes.push({ type: 'drop_index', table: declared, index });
    }
  }

  return changes;
}

export function columnsEqual(a: ColumnDefinition, b: ColumnDefinition): boolean {
  const na = normalizeColumn(a);
  const nb = normalizeColumn(b);
  return na.name === nb.name
    && na.nativeType === nb.nativeType
    && na.default === nb.default
    && na.nullable === nb.nullable;
}

export function indexesEqual(a: IndexDefinition, b: IndexDefinition): boolean {
  const na = normalizeIndex(a);
  const nb = normalizeIndex(b);
  return na.name === nb.name
    && na.unique === nb.unique
    && na.method === nb.method
    && na.predicate === nb.predicate
    && na.columns.length === nb.columns.length
    && na.columns.every((column, i) => column === nb.columns[i]);
}

// === Ordering ===

const CHANGE_ORDER: Record<SchemaChange['type'], number> = {
  add_table: 0,
  add_column: 1,
  alter_column: 2,
  drop_index: 3,
  add_index: 4,
  drop_column: 5,
  drop_table: 6,
};

function changeSubject(change: SchemaChange): string {
  switch (change.type) {
    case 'add_table':
    case 'drop_table':
      return '';
    case 'add_column':
    case 'drop_column':
      return change.column.name;
    case 'alter_column':
      return change.to.name;
    case 'add_index':
    case 'drop_index':
      return change.index.name;
  }
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Stable order: table name, then change kind, then column or index name.
 * The sort is stable, so a redefined index keeps its drop before its add.
 */
export function sortChanges(changes: readonly SchemaChange[]): SchemaChange[] {
  return [...changes].sort((a, b) =>
    compareStrings(qualifiedTableName(a.table), qualifiedTableName(b.table))
    || CHANGE_ORDER[a.type] - CHANGE_ORDER[b.type]
    || compareStrings(changeSubject(a), changeSubject(b)),
  );
}

// === Safety ===

const INTEGER_RANK: ReadonlyMap<string, number> = new Map([
  ['smallint', 1],
  ['integer', 2],
  ['bigint', 3],
]);

interface TypeShape {
  readonly base: string;
  readonly args: readonly number[];
}

function typeShape(nativeType: string): TypeShape {
  const normalized = normalizeNativeType(nativeType);
  const match = /^([^(]+)(?:\(([^)]*)\))?(.*)$/.exec(normalized);
  if (!match) return { base: normalized, args: [] };
  const args = match[2] ? match[2].split(',').map(n => Number.parseInt(n, 10)) : [];
  return { base: `${match[1]}${match[3]}`, args };
}

/**
 * Whether existing values of `from` always fit in `to`, so the change needs
 * no manual data migration.
 */
export function isSafeTypeChange(fromType: string, toType: string): boolean {
  const from = typeShape(fromType);
  const to = typeShape(toType);

  if (normalizeNativeType(fromType) === normalizeNativeType(toType)) return true;

  const fromRank = INTEGER_RANK.get(from.base);
  const toRank = INTEGER_RANK.get(to.base);
  if (fromRank !== undefined && toRank !== undefined) return toRank >= fromRank;
  if (fromRank !== undefined && (to.base === 'double precision' || to.base === 'numeric')) {
    // numeric(p,s) must keep enough integer digits for a bigint
    return to.args.length === 0 || to.args[0] - (to.args[1] ?? 0) >= 19;
  }

  if (from.base === 'real' && to.base === 'double precision') return true;

  const textual = new Set(['varchar', 'text']);
  if (textual.has(from.base) && textual.has(to.base)) {
    if (to.base === 'text' || to.args.length === 0) return true;
    return from.base === 'varchar' && from.args.length > 0 && to.args[0] >= from.args[0];
  }

  if (from.base === 'numeric' && to.base === 'numeric') {
    if (to.args.length === 0) return true;
    if (from.args.length === 0) return false;
    const [fromPrecision, fromScale = 0] = from.args;
    const [toPrecision, toScale = 0] = to.args;
    return toScale >= fromScale && toPrecision - toScale >= fromPrecision - fromScale;
  }

  if (from.base === 'timestamp' && to.base === 'timestamptz') return true;
  if (from.base === 'json' && to.base === 'jsonb') return true;

  return false;
}

/**
 * `destructive` changes remove structure the declarations no longer name and
 * need an explicit allowance; `blocked` changes would need a manual data
 * migration and are never applied. Rebuilding a redefined index is safe.
 */
export function classifyChange(change: SchemaChange): ChangeSafety {
  switch (change.type) {
    case 'drop_table':
    case 'drop_column':
      return 'destructive';
    case 'drop_index':
      return change.rebuild === true ? 'safe' : 'destructive';
    case 'alter_column':
      return isSafeTypeChange(change.from.nativeType, change.to.nativeType) ? 'safe' : 'blocked';
    default:
      return 'safe';
  }
}
