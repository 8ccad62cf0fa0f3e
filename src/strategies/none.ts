import type { Row, TemporalStrategyType } from '../model';
import type { DbClient } from '../connection';
import { RecordNotFoundError } from '../errors';
import type { Condition } from '../queryBuilder';
import { buildDelete } from '../queryBuilder';
import type { WriteContext } from './base';
import { TemporalStrategy, firstRow } from './base';

/**
 * Plain CRUD: rows are updated in place and no history is kept.
 */
export class NoneStrategy extends TemporalStrategy {
  readonly type: TemporalStrategyType = 'none';

  create(tx: DbClient, context: WriteContext, values: Row): Promise<Row> {
    return this.insertRow(tx, this.newRecord(context, values));
  }

  async update(tx: DbClient, context: WriteContext, id: string, changes: Row): Promise<Row> {
    const rows = await this.updateRows(tx, { ...changes, ...this.touched(context) }, [
      { column: 'id', op: '=', value: id },
      ...this.scopeConditions(context.tenantId),
      ...this.visibleConditions(),
    ]);
    const [row] = rows;
    if (row === undefined) {
      throw new RecordNotFoundError(this.table.name, id);
    }
    return row;
  }

  async delete(tx: DbClient, context: WriteContext, id: string, force: boolean): Promise<boolean> {
    const where: Condition[] = [{ column: 'id', op: '=', value: id }, ...this.scopeConditions(context.tenantId)];

    if (this.table.softDelete && !force) {
      const rows = await this.updateRows(tx, { ...this.deletionMark(context), ...this.touched(context) }, [
        ...where,
        ...this.visibleConditions(),
      ]);
      return rows.length > 0;
    }

    const { sql, params } = buildDelete(this.table, where);
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
      ...this.scopeConditions(context.tenantId),
    ]);
    return firstRow(rows, 'restore');
  }
}
