import type { FieldComparison, Row, TemporalStrategyType } from '../model';
import type { DbClient } from '../connection';
import { OptimisticConflictError, RecordNotFoundError, isUniqueViolation } from '../errors';
import type { Condition } from '../queryBuilder';
import { buildDelete, buildSelect, escapeIdentifier } from '../queryBuilder';
import { SYSTEM_COLUMNS, businessColumns } from '../tableDefinition';
import { valuesEqual } from '../valueEquality';
import type { ReadOptions, WriteContext } from './base';
import { TemporalStrategy, firstRow } from './base';

/**
 * Slowly changing dimension, type 2: every update closes the current
 * version and inserts the next one, so the full history stays queryable.
 *
 * A version is current while `valid_to` is null; its validity window is
 * `[valid_from, valid_to)`. Concurrent updates are detected optimistically:
 * closing a version is conditional on its number, and the unique index on
 * current versions rejects a second current row.
 */
export class Scd2Strategy extends TemporalStrategy {
  readonly type: TemporalStrategyType = 'scd2';

  override visibleConditions(options: ReadOptions = {}): Condition[] {
    const { asOf } = options;
    if (asOf === undefined) {
      return [
        { column: 'valid_to', op: 'is null' },
        ...(this.table.softDelete && !options.includeDeleted ? [{ column: 'deleted_at', op: 'is null' } as const] : []),
      ];
    }

    const conditions: Condition[] = [
      { column: 'valid_from', op: '<=', value: asOf },
      { render: bind => `${escapeIdentifier('valid_to')} IS NULL OR ${escapeIdentifier('valid_to')} > ${bind(asOf)}` },
    ];
    if (this.table.softDelete && !options.includeDeleted) {
      conditions.push({
        render: bind => `${escapeIdentifier('deleted_at')} IS NULL OR ${escapeIdentifier('deleted_at')} > ${bind(asOf)}`,
      });
    }
    return conditions;
  }

  create(tx: DbClient, context: WriteContext, values: Row): Promise<Row> {
    return this.insertRow(tx, {
      ...this.newRecord(context, values),
      version: 1,
      valid_from: context.now,
      valid_to: null,
    });
  }

  async update(tx: DbClient, context: WriteContext, id: string, changes: Row): Promise<Row> {
    const current = await this.findCurrent(tx, context, id);
    if (current === null) {
      throw new RecordNotFoundError(this.table.name, id);
    }
    const version = versionOf(current);

    // The next window may not start before the current one
    const validFrom = current.valid_from instanceof Date && current.valid_from > context.now
      ? current.valid_from
      : context.now;

    const closed = await this.updateRows(tx, { valid_to: validFrom }, [
      { column: 'id', op: '=', value: id },
      { column: 'version', op: '=', value: version },
      { column: 'valid_to', op: 'is null' },
      ...this.scopeConditions(context.tenantId),
    ]);
    if (closed.length === 0) {
      throw new OptimisticConflictError(this.table.name, id, version);
    }

    const next: Record<string, unknown> = {};
    for (const column of this.table.columns) {
      if (column.name in current) {
        next[column.name] = current[column.name];
      }
    }
    for (const [field, value] of Object.entries(changes)) {
      if (value !== undefined && !SYSTEM_COLUMNS.has(field)) {
        next[field] = value;
      }
    }
    Object.assign(next, this.touched(context), {
      version: version + 1,
      valid_from: validFrom,
      valid_to: null,
    });

    try {
      return await this.insertRow(tx, next);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new OptimisticConflictError(this.table.name, id, version, { cause: error });
      }
      throw error;
    }
  }

  async delete(tx: DbClient, context: WriteContext, id: string, force: boolean): Promise<boolean> {
    if (this.table.softDelete && !force) {
      const rows = await this.updateRows(tx, { ...this.deletionMark(context), ...this.touched(context) }, [
        { column: 'id', op: '=', value: id },
        ...this.scopeConditions(context.tenantId),
        ...this.visibleConditions(),
      ]);
      return rows.length > 0;
    }

    // Removes the record entirely, history included
    const { sql, params } = buildDelete(this.table, [
      { column: 'id', op: '=', value: id },
      ...this.scopeConditions(context.tenantId),
    ]);
    const result = await tx.query<Row>(sql, params);
    return result.rows.length > 0;
  }

  async restore(tx: DbClient, context: WriteContext, id: string): Promise<Row> {
    const current = await this.findCurrent(tx, context, id, { includeDeleted: true, forUpdate: true });
    if (current === null) {
      throw new RecordNotFoundError(this.table.name, id);
    }
    if (current.deleted_at === null) {
      return current;
    }
    const rows = await this.updateRows(tx, { deleted_at: null, deleted_by: null, ...this.touched(context) }, [
      { column: 'id', op: '=', value: id },
      { column: 'valid_to', op: 'is null' },
      ...this.scopeConditions(context.tenantId),
    ]);
    return firstRow(rows, 'restore');
  }

  async getVersion(client: DbClient, tenantId: string | null, id: string, version: number): Promise<Row | null> {
    return this.selectOne(client, [
      { column: 'id', op: '=', value: id },
      { column: 'version', op: '=', value: version },
      ...this.scopeConditions(tenantId),
    ]);
  }

  /**
   * Every version of a record, oldest first. Soft deletion does not hide
   * history.
   */
  async getVersionHistory(client: DbClient, tenantId: string | null, id: string): Promise<Row[]> {
    const { sql, params } = buildSelect(this.table, {
      where: [{ column: 'id', op: '=', value: id }, ...this.scopeConditions(tenantId)],
      orderBy: [{ column: 'version' }],
    });
    const result = await client.query<Row>(sql, params);
    return result.rows;
  }

  async compareVersions(
    client: DbClient,
    tenantId: string | null,
    id: string,
    from: number,
    to: number,
  ): Promise<Record<string, FieldComparison>> {
    const older = await this.getVersion(client, tenantId, id, from);
    if (older === null) {
      throw new RecordNotFoundError(this.table.name, `${id} version ${from}`);
    }
    const newer = await this.getVersion(client, tenantId, id, to);
    if (newer === null) {
      throw new RecordNotFoundError(this.table.name, `${id} version ${to}`);
    }

    const comparison: Record<string, FieldComparison> = {};
    for (const column of businessColumns(this.table)) {
      const oldValue = older[column.name] ?? null;
      const newValue = newer[column.name] ?? null;
      comparison[column.name] = {
        old: oldValue,
        new: newValue,
        changed: !valuesEqual(oldValue, newValue, column.type),
      };
    }
    return comparison;
  }
}

function versionOf(row: Row): number {
  const version = Number(row.version);
  if (!Number.isInteger(version)) {
    throw new Error(`Row ${String(row.id)} has no version`);
  }
  return version;
}
