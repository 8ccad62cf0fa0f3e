import { describe, test, expect } from 'vitest';
import { auditTableFor, businessColumns, defineTable } from './tableDefinition';
import { InvalidDeclarationError, UnsupportedTypeError } from './errors';

describe('defineTable', () => {
  test('adds system columns around business columns', () => {
    const table = defineTable({
      name: 'products',
      columns: [
        { name: 'name', type: 'string', nullable: false },
        { name: 'price', type: 'decimal', precision: 10, scale: 2 },
      ],
    });

    expect(table.columns.map(c => `${c.name} ${c.nativeType}${c.nullable ? '' : ' not null'}`)).toEqual([
      'id uuid not null',
      'tenant_id uuid not null',
      'name varchar(255) not null',
      'price numeric(10,2)',
      'created_at timestamptz not null',
      'updated_at timestamptz not null',
      'created_by uuid',
      'updated_by uuid',
      'deleted_at timestamptz',
      'deleted_by uuid',
    ]);
    expect(table.primaryKey).toEqual(['id']);
    expect(table.strategy).toBe('none');
    expect(table.schema).toBe('public');
    expect(table.columns.find(c => c.name === 'price')).toMatchObject({ type: 'decimal', precision: 10, scale: 2 });
  });

  test('scd2 tables get version columns and a composite key', () => {
    const table = defineTable({
      name: 'policies',
      strategy: 'scd2',
      multiTenant: false,
      softDelete: false,
      columns: [{ name: 'title', type: 'text' }],
    });

    expect(table.columns.map(c => c.name)).toEqual([
      'id', 'version', 'valid_from', 'valid_to', 'title',
      'created_at', 'updated_at', 'created_by', 'updated_by',
    ]);
    expect(table.columns.find(c => c.name === 'version')?.default).toBe('1');
    expect(table.primaryKey).toEqual(['id', 'version']);
    expect(table.indexes.map(i => ({ name: i.name, columns: i.columns, unique: i.unique, predicate: i.predicate }))).toEqual([
      { name: 'idx_policies_current', columns: ['id'], unique: true, predicate: 'valid_to IS NULL' },
      { name: 'idx_policies_valid_period', columns: ['valid_from', 'valid_to'], unique: false, predicate: null },
    ]);
  });

  test('system indexes follow tenancy and soft delete', () => {
    const table = defineTable({ name: 'notes', columns: [{ name: 'body', type: 'text' }] });

    expect(table.indexes.map(i => [i.name, i.columns.join(','), i.predicate])).toEqual([
      ['idx_notes_tenant_id', 'tenant_id', null],
      ['idx_notes_tenant_id_created', 'tenant_id,created_at', 'deleted_at IS NULL'],
      ['idx_notes_not_deleted', 'deleted_at', 'deleted_at IS NULL'],
    ]);
  });

  test('names declared indexes after their columns', () => {
    const table = defineTable({
      name: 'notes',
      multiTenant: false,
      softDelete: false,
      columns: [{ name: 'slug', type: 'string', maxLength: 80 }],
      indexes: [{ columns: ['slug'], unique: true }],
    });

    expect(table.indexes).toEqual([{
      name: 'idx_notes_slug',
      tableName: 'notes',
      columns: ['slug'],
      unique: true,
      method: 'btree',
      predicate: null,
    }]);
    expect(table.columns.find(c => c.name === 'slug')?.nativeType).toBe('varchar(80)');
  });

  test('accepts a native type that matches the logical type', () => {
    const table = defineTable({
      name: 'readings',
      columns: [{ name: 'value', type: 'float', nativeType: 'FLOAT8' }],
    });
    expect(table.columns.find(c => c.name === 'value')?.nativeType).toBe('double precision');
  });

  test('rejects invalid declarations', () => {
    expect(() => defineTable({ name: 't', columns: [{ name: 'id', type: 'uuid' }] }))
      .toThrow(InvalidDeclarationError);
    expect(() => defineTable({ name: 't', columns: [{ name: 'a', type: 'text' }, { name: 'a', type: 'text' }] }))
      .toThrow('column "a" is declared twice');
    expect(() => defineTable({ name: 't', columns: [], indexes: [{ columns: ['missing'] }] }))
      .toThrow('index references unknown column "missing"');
    expect(() => defineTable({ name: 'x'.repeat(64), columns: [] }))
      .toThrow('exceeds 63 characters');
    expect(() => defineTable({ name: 't', columns: [{ name: 'a', type: 'integer', nativeType: 'text' }] }))
      .toThrow(InvalidDeclarationError);
    expect(() => defineTable({ name: 't', columns: [{ name: 'a', type: 'text', nativeType: 'tsvector' }] }))
      .toThrow(UnsupportedTypeError);
  });
});

describe('businessColumns', () => {
  test('excludes system columns', () => {
    const table = defineTable({
      name: 'products',
      strategy: 'scd2',
      columns: [{ name: 'name', type: 'string' }, { name: 'price', type: 'float' }],
    });
    expect(businessColumns(table).map(c => c.name)).toEqual(['name', 'price']);
  });
});

describe('auditTableFor', () => {
  test('describes the field-level audit table', () => {
    const audit = auditTableFor(defineTable({
      name: 'products',
      strategy: 'copy_on_change',
      columns: [{ name: 'price', type: 'decimal' }],
    }));

    expect(audit.name).toBe('products_audit');
    expect(audit.primaryKey).toEqual(['audit_id']);
    expect(audit.columns.map(c => `${c.name} ${c.nativeType}`)).toEqual([
      'audit_id uuid',
      'record_id uuid',
      'tenant_id uuid',
      'field_name varchar(255)',
      'old_value jsonb',
      'new_value jsonb',
      'operation varchar(10)',
      'changed_at timestamptz',
      'changed_by uuid',
      'transaction_id uuid',
      'metadata jsonb',
    ]);
    expect(audit.indexes.map(i => i.name)).toEqual([
      'idx_products_audit_changed_at',
      'idx_products_audit_record_field',
      'idx_products_audit_tenant_id',
    ]);
  });

  test('omits the tenant column for single-tenant tables', () => {
    const audit = auditTableFor(defineTable({
      name: 'settings',
      strategy: 'copy_on_change',
      multiTenant: false,
      columns: [{ name: 'value', type: 'text' }],
    }));
    expect(audit.columns.some(c => c.name === 'tenant_id')).toBe(false);
    expect(audit.indexes.map(i => i.name)).toEqual([
      'idx_settings_audit_changed_at',
      'idx_settings_audit_record_field',
    ]);
  });
});
