import { v4 as uuidv4 } from 'uuid';
import type { AuditEntry, AuditOperation, Row, TableDefinition, TemporalStrategyType } from '../model';
import { findColumn } from '../model';
import type { DbClient } from '../connection';
import { RecordNotFoundError } from '../errors';
import type { Condition } from '../queryBuilder';
import { buildDelete, buildInsert, buildSelect, coerceRow } from '../queryBuilder';
import { SYSTEM_COLUMNS, auditTableFor } from '../tableDefinition';
import { toJsonValue, valuesEqual } from '../valueEquality';
import type { WriteContext } from './base';
import { TemporalStrategy, firstRow } from './base';

/** Field name of the audit entry written when a row is removed. */
export const WHOLE_RECORD = '*';

interface FieldChange {
  readonly field: string;
  readonly oldValue: unknown;
  readonly newValue: unknown;
}

/**
 * In-place updates with a field-level audit trail in `<table>_audit`.
 *
 * Every mutation locks the row, writes it, and records one audit entry per
 * changed field. Entries written by one call share a transaction id.
 */
export class CopyOnChangeStrategy extends TemporalStrategy {
  readonly type: TemporalStrategyType = 'copy_on_change';
  readonly auditTable: TableDefinition;

  constructor(table: TableDefinition) {
    super(table);
    this.auditTable = auditTableFor(table);
  }

  async create(tx: DbClient, context: WriteContext, values: Row): Promise<Row> {
    const row = await this.insertRow(tx, this.newRecord(context, values));
    const changes = Object.keys(values)
      .filter(field => !SYSTEM_COLUMNS.has(field) && values[field] !== undefined)
      .map(field => ({ field, oldValue: null, newValue: row[field] }));
    await this.writeAudit(tx, context, String(row.id), 'insert', changes);
    return row;
  }

  async update(tx: DbClient, context: WriteContext, id: string, changes: Row): Promise<Row> {
    const current = await this.findCurrent(tx, context, id, { forUpdate: true });
    if (current === null) {
      throw new RecordNotFoundError(this.table.name, id);
    }

    const changed: Record<string, unknown> = {};
    for (const [field, value] of Object.entries(changes)) {
      if (value === undefined) continue;
      const column = findColumn(this.table, field);
      if (!valuesEqual(current[field], value, column?.type)) {
        changed[field] = value;
      }
    }
    if (Object.keys(changed).length === 0) {
      return current;
    }

    const rows = await this.updateRows(tx, { ...changed, ...this.touched(context) }, this.recordConditions(context, id));
    const row = firstRow(rows, 'update');
    await this.writeAudit(tx, context, id, 'update', Object.keys(changed).map(field => ({
      field,
      oldValue: current[field],
      newValue: row[field],
    })));
    return row;
  }

  async delete(tx: DbClient, context: WriteContext, id: string, force: boolean): Promise<boolean> {
    const soft = this.table.softDelete && !force;
    const current = await this.findCurrent(tx, context, id, { forUpdate: true, includeDeleted: !soft });
    if (current === null) {
      return false;
    }

    if (soft) {
      const rows = await this.updateRows(tx, { ...this.deletionMark(context), ...this.touched(context) }, this.recordConditions(context, id));
      const row = firstRow(rows, 'delete');
      await this.writeAudit(tx, context, id, 'delete', [
        { field: 'deleted_at', oldValue: null, newValue: row.deleted_at },
      ]);
      return true;
    }

    const { sql, params } = buildDelete(this.table, this.recordConditions(context, id));
    await tx.query(sql, params);
    await this.writeAudit(tx, context, id, 'delete', [
      { field: WHOLE_RECORD, oldValue: snapshot(current), newValue: null },
    ]);
    return true;
  }

  async restore(tx: DbClient, context: WriteContext, id: string): Promise<Row> {
    const current = await this.findCurrent(tx, context, id, { forUpdate: true, includeDeleted: true });
    if (current === null) {
      throw new RecordNotFoundError(this.table.name, id);
    }
    if (current.deleted_at === null) {
      return current;
    }

    const rows = await this.updateRows(tx, { deleted_at: null, deleted_by: null, ...this.touched(context) }, this.recordConditions(context, id));
    const row = firstRow(rows, 'restore');
    await this.writeAudit(tx, context, id, 'update', [
      { field: 'deleted_at', oldValue: current.deleted_at, newValue: null },
    ]);
    return row;
  }

  /**
   * Audit entries of a record, oldest first.
   */
  async getAuditHistory(client: DbClient, tenantId: string | null, recordId: string, field?: string): Promise<AuditEntry[]> {
    const where: Condition[] = [{ column: 'record_id', op: '=', value: recordId }];
    if (this.table.multiTenant && tenantId !== null) {
      where.push({ column: 'tenant_id', op: '=', value: tenantId });
    }
    if (field !== undefined) {
      where.push({ column: 'field_name', op: '=', value: field });
    }
    const { sql, params } = buildSelect(this.auditTable, {
      where,
      orderBy: [{ column: 'changed_at' }, { column: 'field_name' }, { column: 'audit_id' }],
    });
    const result = await client.query<Row>(sql, params);
    return result.rows.map(toAuditEntry);
  }

  private recordConditions(context: WriteContext, id: string): Condition[] {
    return [{ column: 'id', op: '=', value: id }, ...this.scopeConditions(context.tenantId)];
  }

  private async writeAudit(
    tx: DbClient,
    context: WriteContext,
    recordId: string,
    operation: AuditOperation,
    changes: readonly FieldChange[],
  ): Promise<void> {
    const transactionId = uuidv4();
    for (const change of changes) {
      const entry: Record<string, unknown> = {
        audit_id: uuidv4(),
        record_id: recordId,
        field_name: change.field,
        old_value: change.oldValue === null || change.oldValue === undefined ? null : toJsonValue(change.oldValue),
        new_value: change.newValue === null || change.newValue === undefined ? null : toJsonValue(change.newValue),
        operation,
        changed_at: context.now,
        changed_by: context.actor,
        transaction_id: transactionId,
        metadata: context.metadata,
      };
      if (this.table.multiTenant) {
        entry.tenant_id = context.tenantId;
      }
      const { sql, params } = buildInsert(this.auditTable, coerceRow(this.auditTable, entry));
      await tx.query(sql, params);
    }
  }
}

function snapshot(row: Row): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [field, value] of Object.entries(row)) {
    result[field] = toJsonValue(value);
  }
  return result;
}

function toAuditEntry(row: Row): AuditEntry {
  return {
    auditId: String(row.audit_id),
    recordId: String(row.record_id),
    tenantId: typeof row.tenant_id === 'string' ? row.tenant_id : null,
    fieldName: String(row.field_name),
    oldValue: row.old_value ?? null,
    newValue: row.new_value ?? null,
    operation: toAuditOperation(row.operation),
    changedAt: row.changed_at instanceof Date ? row.changed_at : new Date(String(row.changed_at)),
    changedBy: typeof row.changed_by === 'string' ? row.changed_by : null,
    transactionId: typeof row.transaction_id === 'string' ? row.transaction_id : null,
    metadata: row.metadata ?? null,
  };
}

function toAuditOperation(value: unknown): AuditOperation {
  if (value === 'insert' || value === 'update' || value === 'delete') {
    return value;
  }
  throw new Error(`Unknown audit operation: ${String(value)}`);
}
