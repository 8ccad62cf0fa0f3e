import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { PGlite } from '@electric-sql/pglite';
import type { DbClient, DbConnection } from './connection';
import {
  RecordNotFoundError,
  TenantIsolationError,
  UnsupportedOperationError,
  ValidationBypassError,
} from './errors';
import { SchemaManager } from './schemaManager';
import { defineTable } from './tableDefinition';
import { TemporalRepository, createRepository } from './temporalRepository';

const TENANT_A = '00000000-0000-0000-0000-00000000000a';
const TENANT_B = '00000000-0000-0000-0000-00000000000b';
const ACTOR = '00000000-0000-0000-0000-0000000000f1';
const MISSING = '00000000-0000-0000-0000-000000000999';

const notes = defineTable({
  name: 'notes',
  columns: [
    { name: 'title', type: 'string', nullable: false },
    { name: 'body', type: 'text' },
    { name: 'amount', type: 'float' },
    { name: 'details', type: 'json' },
  ],
});

const orders = defineTable({
  name: 'orders',
  multiTenant: false,
  softDelete: false,
  columns: [
    { name: 'limit', type: 'integer' },
    { name: 'order', type: 'text' },
    { name: 'user', type: 'text' },
    { name: 'select', type: 'boolean' },
  ],
});

function steppingClock(start = '2024-01-01T00:00:00Z'): () => Date {
  let time = Date.parse(start);
  return () => {
    time += 1000;
    return new Date(time);
  };
}

describe('TemporalRepository', () => {
  let db: PGlite;
  let repo: TemporalRepository;

  beforeEach(async () => {
    db = new PGlite();
    await new SchemaManager(db).syncSchema([notes, orders]);
    repo = new TemporalRepository(db, notes, { tenantId: TENANT_A, clock: steppingClock() });
  });

  afterEach(async () => {
    await db.close();
  });

  describe('none strategy', () => {
    test('creates, reads and updates in place', async () => {
      const created = await repo.create({ title: 'First', body: 'hello' }, { actor: ACTOR });

      expect(typeof created.id).toBe('string');
      expect(created).toMatchObject({
        tenant_id: TENANT_A,
        title: 'First',
        body: 'hello',
        created_by: ACTOR,
        updated_by: ACTOR,
        deleted_at: null,
        created_at: new Date('2024-01-01T00:00:01Z'),
      });

      const id = String(created.id);
      expect(await repo.get(id)).toEqual(created);

      const updated = await repo.update(id, { title: 'Second' });
      expect(updated).toMatchObject({
        id,
        title: 'Second',
        body: 'hello',
        created_by: ACTOR,
        updated_by: null,
        created_at: new Date('2024-01-01T00:00:01Z'),
        updated_at: new Date('2024-01-01T00:00:02Z'),
      });
      expect(await repo.count()).toBe(1);
    });

    test('keeps a caller-supplied id and ignores other system fields', async () => {
      const id = '00000000-0000-0000-0000-000000000123';
      const created = await repo.create({ id, title: 'Mine', created_at: new Date(0), created_by: TENANT_B }, { actor: ACTOR });

      expect(created.id).toBe(id);
      expect(created.created_at).toEqual(new Date('2024-01-01T00:00:01Z'));
      expect(created.created_by).toBe(ACTOR);
    });

    test('soft delete hides a record until it is restored', async () => {
      const id = String((await repo.create({ title: 'Temp' })).id);

      expect(await repo.delete(id, { actor: ACTOR })).toBe(true);
      expect(await repo.get(id)).toBeNull();
      expect(await repo.count()).toBe(0);
      expect(await repo.count({}, { includeDeleted: true })).toBe(1);
      expect(await repo.get(id, { includeDeleted: true })).toMatchObject({
        deleted_at: new Date('2024-01-01T00:00:02Z'),
        deleted_by: ACTOR,
      });
      expect(await repo.delete(id)).toBe(false);

      const restored = await repo.restore(id);
      expect(restored).toMatchObject({ id, deleted_at: null, deleted_by: null });
      expect(await repo.get(id)).not.toBeNull();

      // Restoring a live record changes nothing
      expect(await repo.restore(id)).toEqual(restored);
    });

    test('force delete removes the row', async () => {
      const id = String((await repo.create({ title: 'Gone' })).id);

      expect(await repo.delete(id, { force: true })).toBe(true);
      expect(await repo.get(id, { includeDeleted: true })).toBeNull();
      expect(await repo.delete(id, { force: true })).toBe(false);
    });

    test('lists with equality filters in creation order', async () => {
      await repo.create({ title: 'a', body: 'x' });
      await repo.create({ title: 'b', body: 'y' });
      await repo.create({ title: 'c', body: 'x' });

      expect((await repo.list()).map(r => r.title)).toEqual(['a', 'b', 'c']);
      expect((await repo.list({ body: 'x' })).map(r => r.title)).toEqual(['a', 'c']);
      expect((await repo.list({ body: null })).map(r => r.title)).toEqual([]);
      expect((await repo.list({}, { limit: 1, offset: 1 })).map(r => r.title)).toEqual(['b']);
      expect(await repo.count({ body: 'x' })).toBe(2);
    });

    test('stores decimal input in float columns and round-trips json', async () => {
      const created = await repo.create({ title: 'Priced', amount: '19.99', details: { tags: ['a'], n: 1 } });

      expect(created.amount).toBe(19.99);
      expect(created.details).toEqual({ tags: ['a'], n: 1 });
    });

    test('quotes reserved words used as column names', async () => {
      const plain = createRepository(db, orders);
      const created = await plain.create({ limit: 5, order: 'asc', user: 'u1', select: true });

      const rows = await plain.list({}, { limit: 100 });
      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({ id: created.id, limit: 5, order: 'asc', user: 'u1', select: true });
      expect((await plain.list({ user: 'u1', select: true })).map(r => r.id)).toEqual([created.id]);

      const updated = await plain.update(String(created.id), { limit: 7, order: 'desc', user: 'u2', select: false });
      expect(updated).toMatchObject({ id: created.id, limit: 7, order: 'desc', user: 'u2', select: false });

      expect((await plain.list({ limit: 7 }, { limit: 100 })).map(r => r.id)).toEqual([created.id]);
      expect(await plain.list({ limit: 5 })).toEqual([]);
      expect(await plain.count({ order: 'desc', select: false })).toBe(1);
      expect(await plain.get(String(created.id))).toMatchObject({ limit: 7, order: 'desc', user: 'u2', select: false });
    });
  });

  describe('tenant isolation', () => {
    test('a multi-tenant table needs a tenant', () => {
      expect(() => new TemporalRepository(db, notes)).toThrow(TenantIsolationError);
      expect(() => new TemporalRepository(db, notes)).toThrow('notes is multi-tenant: a tenantId is required');
      expect(() => new TemporalRepository(db, orders)).not.toThrow();
    });

    test('rejects payloads and filters for another tenant', async () => {
      await expect(repo.create({ title: 'x', tenant_id: TENANT_B })).rejects.toThrow(TenantIsolationError);
      await expect(repo.list({ tenant_id: TENANT_B })).rejects.toThrow(TenantIsolationError);
      expect(await repo.count()).toBe(0);

      await repo.create({ title: 'own', tenant_id: TENANT_A });
      expect((await repo.list({ tenant_id: TENANT_A })).map(r => r.title)).toEqual(['own']);
    });

    test('records of one tenant are invisible to another', async () => {
      const other = new TemporalRepository(db, notes, { tenantId: TENANT_B });
      const id = String((await repo.create({ title: 'secret' })).id);

      expect(await other.get(id)).toBeNull();
      expect(await other.list()).toEqual([]);
      expect(await other.count()).toBe(0);
      await expect(other.update(id, { title: 'stolen' })).rejects.toThrow(RecordNotFoundError);
      expect(await other.delete(id)).toBe(false);
      await expect(other.restore(id)).rejects.toThrow(RecordNotFoundError);

      expect((await repo.get(id))?.title).toBe('secret');
    });
  });

  describe('errors', () => {
    test('rejects unknown fields and bad values', async () => {
      await expect(repo.create({ title: 'x', nope: 1 })).rejects.toThrow('Invalid value for notes.nope: no such column');
      await expect(repo.create({ id: 5, title: 'x' })).rejects.toThrow('Invalid value for notes.id: id must be a uuid string');
      await expect(repo.create({ title: 'x', amount: 'lots' })).rejects.toThrow(ValidationBypassError);
      await expect(repo.list({ nope: 1 })).rejects.toThrow('Invalid value for notes.nope: unknown filter column');
      await expect(repo.list({}, { limit: -1 })).rejects.toThrow(ValidationBypassError);
      expect(await repo.count()).toBe(0);
    });

    test('updating a missing record fails', async () => {
      await expect(repo.update(MISSING, { title: 'x' })).rejects.toThrow(`Record ${MISSING} not found in notes`);
    });

    test('strategy-specific operations are refused', async () => {
      await expect(repo.getVersion(MISSING, 1)).rejects.toThrow('getVersion() is not available for the none strategy');
      await expect(repo.getVersionHistory(MISSING)).rejects.toThrow(UnsupportedOperationError);
      await expect(repo.compareVersions(MISSING, 1, 2)).rejects.toThrow(UnsupportedOperationError);
      await expect(repo.getAuditHistory(MISSING)).rejects.toThrow('getAuditHistory() is not available for the none strategy');
      await expect(repo.getFieldHistory(MISSING, 'title')).rejects.toThrow(UnsupportedOperationError);
      await expect(repo.get(MISSING, { asOf: new Date() })).rejects.toThrow('asOf() is not available for the none strategy');
    });

    test('restore needs soft delete', async () => {
      const plain = createRepository(db, orders);
      const id = String((await plain.create({ order: 'x' })).id);

      await expect(plain.restore(id)).rejects.toThrow(
        'restore() is not available for the none (soft delete disabled) strategy',
      );
      expect(await plain.delete(id)).toBe(true);
      expect(await plain.get(id)).toBeNull();
    });
  });

  describe('cancellation', () => {
    test('an aborted signal stops a call before it starts', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(repo.create({ title: 'x' }, { signal: controller.signal })).rejects.toMatchObject({ name: 'AbortError' });
      await expect(repo.list({}, { signal: controller.signal })).rejects.toMatchObject({ name: 'AbortError' });
      expect(await repo.count()).toBe(0);
    });

    test('aborting inside the transaction rolls it back', async () => {
      const controller = new AbortController();
      const connection: DbConnection = {
        query<T>(sql: string, params?: unknown[]) {
          return db.query<T>(sql, params);
        },
        transaction<T>(fn: (tx: DbClient) => Promise<T>) {
          return db.transaction(tx => fn({
            async query<U>(sql: string, params?: unknown[]) {
              const result = await tx.query<U>(sql, params);
              controller.abort();
              return result;
            },
          }));
        },
      };
      const aborting = new TemporalRepository(connection, notes, { tenantId: TENANT_A });

      await expect(aborting.create({ title: 'x' }, { signal: controller.signal })).rejects.toMatchObject({ name: 'AbortError' });
      expect(await repo.count()).toBe(0);
    });
  });
});
