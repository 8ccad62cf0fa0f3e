import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { PGlite } from '@electric-sql/pglite';
import { RecordNotFoundError } from '../errors';
import { SchemaManager } from '../schemaManager';
import { defineTable } from '../tableDefinition';
import { TemporalRepository } from '../temporalRepository';
import { WHOLE_RECORD } from './copyOnChange';

const TENANT = '00000000-0000-0000-0000-00000000000a';
const ACTOR = '00000000-0000-0000-0000-0000000000f1';

const products = defineTable({
  name: 'products',
  strategy: 'copy_on_change',
  columns: [
    { name: 'name', type: 'string', nullable: false },
    { name: 'price', type: 'decimal', precision: 10, scale: 2 },
  ],
});

const counters = defineTable({
  name: 'counters',
  strategy: 'copy_on_change',
  columns: [
    { name: 'counter', type: 'bigint' },
    { name: 'label', type: 'string' },
  ],
});

function at(seconds: number): Date {
  return new Date(Date.UTC(2024, 0, 1, 0, 0, seconds));
}

describe('CopyOnChangeStrategy', () => {
  let db: PGlite;
  let repo: TemporalRepository;

  beforeEach(async () => {
    db = new PGlite();
    await new SchemaManager(db).syncSchema([products, counters]);
    let tick = 0;
    repo = new TemporalRepository(db, products, { tenantId: TENANT, clock: () => at(++tick) });
  });

  afterEach(async () => {
    await db.close();
  });

  test('create writes one insert entry per field', async () => {
    const created = await repo.create({ name: 'Widget', price: '19.99' }, { actor: ACTOR, metadata: { source: 'import' } });
    const id = String(created.id);

    const history = await repo.getAuditHistory(id);
    expect(history).toHaveLength(2);
    expect(history[0]).toMatchObject({
      recordId: id,
      tenantId: TENANT,
      fieldName: 'name',
      oldValue: null,
      newValue: 'Widget',
      operation: 'insert',
      changedAt: at(1),
      changedBy: ACTOR,
      metadata: { source: 'import' },
    });
    expect(history[1]).toMatchObject({ fieldName: 'price', oldValue: null, newValue: '19.99' });
    expect(history[0].transactionId).toBe(history[1].transactionId);
    expect(history[0].auditId).not.toBe(history[1].auditId);
  });

  test('update records only the fields that changed', async () => {
    const id = String((await repo.create({ name: 'Widget', price: '19.99' })).id);

    const updated = await repo.update(id, { name: 'Widget', price: 24.99 }, { actor: ACTOR });
    expect(updated).toMatchObject({ price: '24.99', updated_at: at(2), updated_by: ACTOR });

    const history = await repo.getFieldHistory(id, 'price');
    expect(history.map(e => [e.operation, e.oldValue, e.newValue])).toEqual([
      ['insert', null, '19.99'],
      ['update', '19.99', '24.99'],
    ]);
    expect(history[0].transactionId).not.toBe(history[1].transactionId);
    expect(await repo.getFieldHistory(id, 'name')).toHaveLength(1);
  });

  test('an update without changes writes nothing', async () => {
    const id = String((await repo.create({ name: 'Widget', price: '19.99' })).id);

    const unchanged = await repo.update(id, { price: 19.99, name: 'Widget' });
    expect(unchanged.updated_at).toEqual(at(1));
    expect(await repo.getAuditHistory(id)).toHaveLength(2);
  });

  test('changes that only differ beyond number precision or in spelling are recorded', async () => {
    const counterRepo = new TemporalRepository(db, counters, { tenantId: TENANT, clock: () => at(30) });
    const id = String((await counterRepo.create({ counter: '9007199254740993', label: '2024-01-01T00:00:00Z' })).id);

    const updated = await counterRepo.update(id, { counter: '9007199254740992', label: '2024-01-01T00:00:00.000Z' });
    expect(updated).toMatchObject({ counter: 9007199254740992n, label: '2024-01-01T00:00:00.000Z' });

    const history = await counterRepo.getAuditHistory(id);
    expect(history.filter(e => e.operation === 'update').map(e => [e.fieldName, e.oldValue, e.newValue])).toEqual([
      ['counter', '9007199254740993', '9007199254740992'],
      ['label', '2024-01-01T00:00:00Z', '2024-01-01T00:00:00.000Z'],
    ]);

    const unchanged = await counterRepo.update(id, { counter: 9007199254740992n, label: '2024-01-01T00:00:00.000Z' });
    expect(unchanged.counter).toBe(9007199254740992n);
    expect(await counterRepo.getAuditHistory(id)).toHaveLength(4);
  });

  test('delete, restore and force delete are audited', async () => {
    const id = String((await repo.create({ name: 'Widget', price: '19.99' })).id);

    expect(await repo.delete(id)).toBe(true);
    expect(await repo.get(id)).toBeNull();
    await expect(repo.update(id, { price: 1 })).rejects.toThrow(RecordNotFoundError);

    await repo.restore(id);
    expect((await repo.get(id))?.deleted_at).toBeNull();

    expect(await repo.delete(id, { force: true })).toBe(true);
    expect(await repo.get(id, { includeDeleted: true })).toBeNull();
    expect(await repo.delete(id, { force: true })).toBe(false);

    const history = await repo.getAuditHistory(id);
    expect(history.map(e => [e.fieldName, e.operation, e.oldValue, e.newValue])).toEqual([
      ['name', 'insert', null, 'Widget'],
      ['price', 'insert', null, '19.99'],
      ['deleted_at', 'delete', null, '2024-01-01T00:00:02.000Z'],
      ['deleted_at', 'update', '2024-01-01T00:00:02.000Z', null],
      [WHOLE_RECORD, 'delete', expect.objectContaining({ id, name: 'Widget', price: '19.99', tenant_id: TENANT }), null],
    ]);
  });

  test('audit history is scoped to the tenant', async () => {
    const id = String((await repo.create({ name: 'Widget' })).id);
    const other = new TemporalRepository(db, products, { tenantId: '00000000-0000-0000-0000-00000000000b' });

    expect(await other.getAuditHistory(id)).toEqual([]);
    expect((await repo.getAuditHistory(id)).map(e => e.fieldName)).toEqual(['name']);
  });

  test('asOf reads are refused', async () => {
    await expect(repo.get(TENANT, { asOf: at(1) })).rejects.toThrow('asOf() is not available for the copy_on_change strategy');
  });
});
