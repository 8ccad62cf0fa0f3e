import { v4 as uuidv4 } from 'uuid';
import type { Row, TableDefinition, TemporalStrategyType } from '../model';
import { hasColumn } from '../model';
import type { DbClient } from '../connection';
import { UnsupportedOperationError } from '../errors';
import type { Condition } from '../queryBuilder';
import { buildInsert, buildSelect, buildUpdate, coerceRow } from '../queryBuilder';

/**
 * Who is writing, on behalf of which tenant, and when.
 */
export interface WriteContext {
  readonly tenantId: string | null;
  readonly actor: string | null;
  readonly now: Date;
  readonly metadata: Readonly<Record<string, unknown>> | null;
}

export interface ReadOptions {
  readonly asOf?: Date;
  readonly includeDeleted?: boolean;
}

/**
 * A temporal strategy owns how a table's rows are written and which rows a
 * read sees. Every mutation runs on a client that is already inside a
 * transaction.
 */
export abstract class TemporalStrategy {
  abstract readonly type: TemporalStrategyType;

  constructor(readonly table: TableDefinition) {}

  abstract create(tx: DbClient, context: WriteContext, values: Row): Promise<Row>;

  /** Throws RecordNotFoundError when there is no live record. */
  abstract update(tx: DbClient, context: WriteContext, id: string, changes: Row): Promise<Row>;

  /** False when there was nothing to delete. */
  abstract delete(tx: DbClient, context: WriteContext, id: string, force: boolean): Promise<boolean>;

  abstract restore(tx: DbClient, context: WriteContext, id: string): Promise<Row>;

  /** Conditions restricting every statement to the tenant. */
  scopeConditions(tenantId: string | null): Condition[] {
    if (!this.table.multiTenant || tenantId === null) return [];
    return [{ column: 'tenant_id', op: '=', value: tenantId }];
  }

  /** Conditions selecting the rows a read sees. */
  visibleConditions(options: ReadOptions = {}): Condition[] {
    if (options.asOf !== undefined) {
      throw new UnsupportedOperationError('asOf', this.type);
    }
    return this.table.softDelete && !options.includeDeleted
      ? [{ column: 'deleted_at', op: 'is null' }]
      : [];
  }

  protected async insertRow(tx: DbClient, values: Row): Promise<Row> {
    const { sql, params } = buildInsert(this.table, coerceRow(this.table, values));
    const result = await tx.query<Row>(sql, params);
    return firstRow(result.rows, sql);
  }

  protected async updateRows(tx: DbClient, values: Row, where: readonly Condition[]): Promise<Row[]> {
    const { sql, params } = buildUpdate(this.table, coerceRow(this.table, values), where);
    const result = await tx.query<Row>(sql, params);
    return result.rows;
  }

  protected async selectOne(tx: DbClient, where: readonly Condition[], forUpdate = false): Promise<Row | null> {
    const { sql, params } = buildSelect(this.table, { where, limit: 1, forUpdate });
    const result = await tx.query<Row>(sql, params);
    return result.rows[0] ?? null;
  }

  /**
   * The live row of a record, optionally including a soft-deleted one.
   */
  protected findCurrent(
    tx: DbClient,
    context: Pick<WriteContext, 'tenantId'>,
    id: string,
    options: { includeDeleted?: boolean; forUpdate?: boolean } = {},
  ): Promise<Row | null> {
    return this.selectOne(tx, [
      { column: 'id', op: '=', value: id },
      ...this.scopeConditions(context.tenantId),
      ...this.visibleConditions({ includeDeleted: options.includeDeleted }),
    ], options.forUpdate);
  }

  /** System values of a new record, merged under the business values. */
  protected newRecord(context: WriteContext, values: Row): Record<string, unknown> {
    const record: Record<string, unknown> = { ...values, id: recordIdOf(values) };
    if (this.table.multiTenant) {
      record.tenant_id = context.tenantId;
    }
    record.created_at = context.now;
    record.updated_at = context.now;
    record.created_by = context.actor;
    record.updated_by = context.actor;
    return record;
  }

  protected touched(context: WriteContext): Record<string, unknown> {
    return { updated_at: context.now, updated_by: context.actor };
  }

  protected deletionMark(context: WriteContext): Record<string, unknown> {
    const mark: Record<string, unknown> = { deleted_at: context.now };
    if (hasColumn(this.table, 'deleted_by')) {
      mark.deleted_by = context.actor;
    }
    return mark;
  }
}

function recordIdOf(values: Row): string {
  const id = values.id;
  return typeof id === 'string' && id !== '' ? id : uuidv4();
}

export function firstRow(rows: readonly Row[], statement: string): Row {
  const [row] = rows;
  if (row === undefined) {
    throw new Error(`Statement returned no row: ${statement}`);
  }
  return row;
}
