import type { AuditEntry, FieldComparison, Row, TableDefinition } from './model';
import { hasColumn } from './model';
import type { DbClient, DbConnection } from './connection';
import { runInTransaction, withSignal } from './connection';
import {
  TenantIsolationError,
  UnsupportedOperationError,
  ValidationBypassError,
  errorMessage,
} from './errors';
import type { LogMeta, Logger } from './logger';
import { createLogger } from './logger';
import type { Condition } from './queryBuilder';
import { buildCount, buildSelect, coerceRow, equalityConditions } from './queryBuilder';
import type { ReadOptions, TemporalStrategy, WriteContext } from './strategies';
import { CopyOnChangeStrategy, Scd2Strategy, createStrategy } from './strategies';
import { SYSTEM_COLUMNS } from './tableDefinition';

export const DEFAULT_LIST_LIMIT = 100;

export interface RepositoryOptions {
  /** Required for multi-tenant tables. */
  readonly tenantId?: string | null;
  readonly clock?: () => Date;
  readonly logger?: Logger;
}

export interface CallOptions {
  readonly signal?: AbortSignal;
}

export interface MutationOptions extends CallOptions {
  /** User id recorded in `created_by`, `updated_by`, `deleted_by` and audit entries. */
  readonly actor?: string | null;
  /** Stored with audit entries. */
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export interface DeleteOptions extends MutationOptions {
  /** Remove the row instead of marking it deleted. */
  readonly force?: boolean;
}

export interface GetOptions extends CallOptions, ReadOptions {}

export interface ListOptions extends GetOptions {
  readonly limit?: number;
  readonly offset?: number;
}

export interface CountOptions extends CallOptions {
  readonly includeDeleted?: boolean;
}

/**
 * Tenant-scoped CRUD over one table, with the history semantics of the
 * table's temporal strategy.
 */
export class TemporalRepository {
  private readonly _strategy: TemporalStrategy;
  private readonly _tenantId: string | null;
  private readonly _clock: () => Date;
  private readonly _logger: Logger;

  constructor(
    private readonly _connection: DbConnection,
    readonly table: TableDefinition,
    options: RepositoryOptions = {}
  ) {
    if (table.multiTenant && !options.tenantId) {
      throw new TenantIsolationError(`${table.name} is multi-tenant: a tenantId is required`, { table: table.name });
    }
    this._strategy = createStrategy(table);
    this._tenantId = table.multiTenant ? options.tenantId ?? null : null;
    this._clock = options.clock ?? (() => new Date());
    this._logger = options.logger ?? createLogger('repository');
  }

  get strategy(): TemporalStrategy {
    return this._strategy;
  }

  // === Mutations ===

  create(record: Row, options: MutationOptions = {}): Promise<Row> {
    return this._mutate('create', {}, options, (tx, context) =>
      this._strategy.create(tx, context, this._payload(record, true)));
  }

  update(id: string, record: Row, options: MutationOptions = {}): Promise<Row> {
    return this._mutate('update', { id }, options, (tx, context) =>
      this._strategy.update(tx, context, id, this._payload(record, false)));
  }

  delete(id: string, options: DeleteOptions = {}): Promise<boolean> {
    return this._mutate('delete', { id, force: options.force ?? false }, options, (tx, context) =>
      this._strategy.delete(tx, context, id, options.force ?? false));
  }

  restore(id: string, options: MutationOptions = {}): Promise<Row> {
    return this._mutate('restore', { id }, options, (tx, context) => {
      if (!this.table.softDelete) {
        throw new UnsupportedOperationError('restore', `${this._strategy.type} (soft delete disabled)`);
      }
      return this._strategy.restore(tx, context, id);
    });
  }

  // === Reads ===

  get(id: string, options: GetOptions = {}): Promise<Row | null> {
    return this._read('get', { id }, options.signal, async client => {
      const { sql, params } = buildSelect(this.table, {
        where: [
          { column: 'id', op: '=', value: id },
          ...this._scope(),
          ...this._strategy.visibleConditions(options),
        ],
        limit: 1,
      });
      const result = await client.query<Row>(sql, params);
      return result.rows[0] ?? null;
    });
  }

  /**
   * Records matching equality filters, ordered by creation.
   */
  list(filters: Row = {}, options: ListOptions = {}): Promise<Row[]> {
    return this._read('list', { filters }, options.signal, async client => {
      const limit = options.limit ?? DEFAULT_LIST_LIMIT;
      const offset = options.offset ?? 0;
      if (!Number.isInteger(limit) || limit < 0 || !Number.isInteger(offset) || offset < 0) {
        throw new ValidationBypassError(this.table.name, 'limit', 'limit and offset must be non-negative integers');
      }
      const { sql, params } = buildSelect(this.table, {
        where: [
          ...this._scope(),
          ...this._strategy.visibleConditions(options),
          ...this._filters(filters),
        ],
        orderBy: [{ column: 'created_at' }, { column: 'id' }],
        limit,
        offset,
      });
      const result = await client.query<Row>(sql, params);
      return result.rows;
    });
  }

  count(filters: Row = {}, options: CountOptions = {}): Promise<number> {
    return this._read('count', { filters }, options.signal, async client => {
      const { sql, params } = buildCount(this.table, [
        ...this._scope(),
        ...this._strategy.visibleConditions({ includeDeleted: options.includeDeleted }),
        ...this._filters(filters),
      ]);
      const result = await client.query<{ count: number }>(sql, params);
      return result.rows[0]?.count ?? 0;
    });
  }

  // === Versions (scd2) ===

  async getVersion(id: string, version: number, options: CallOptions = {}): Promise<Row | null> {
    const strategy = this._scd2('getVersion');
    return this._read('getVersion', { id, version }, options.signal, client =>
      strategy.getVersion(client, this._tenantId, id, version));
  }

  async getVersionHistory(id: string, options: CallOptions = {}): Promise<Row[]> {
    const strategy = this._scd2('getVersionHistory');
    return this._read('getVersionHistory', { id }, options.signal, client =>
      strategy.getVersionHistory(client, this._tenantId, id));
  }

  async compareVersions(id: string, from: number, to: number, options: CallOptions = {}): Promise<Record<string, FieldComparison>> {
    const strategy = this._scd2('compareVersions');
    return this._read('compareVersions', { id, from, to }, options.signal, client =>
      strategy.compareVersions(client, this._tenantId, id, from, to));
  }

  // === Audit (copy_on_change) ===

  async getAuditHistory(id: string, options: CallOptions = {}): Promise<AuditEntry[]> {
    const strategy = this._audited('getAuditHistory');
    return this._read('getAuditHistory', { id }, options.signal, client =>
      strategy.getAuditHistory(client, this._tenantId, id));
  }

  async getFieldHistory(id: string, field: string, options: CallOptions = {}): Promise<AuditEntry[]> {
    const strategy = this._audited('getFieldHistory');
    return this._read('getFieldHistory', { id, field }, options.signal, client =>
      strategy.getAuditHistory(client, this._tenantId, id, field));
  }

  // === Internals ===

  private _scd2(operation: string): Scd2Strategy {
    if (!(this._strategy instanceof Scd2Strategy)) {
      throw new UnsupportedOperationError(operation, this._strategy.type);
    }
    return this._strategy;
  }

  private _audited(operation: string): CopyOnChangeStrategy {
    if (!(this._strategy instanceof CopyOnChangeStrategy)) {
      throw new UnsupportedOperationError(operation, this._strategy.type);
    }
    return this._strategy;
  }

  private _scope(): Condition[] {
    return this._strategy.scopeConditions(this._tenantId);
  }

  private _checkTenant(value: unknown): void {
    if (!this.table.multiTenant || value === undefined || value === null) return;
    if (value !== this._tenantId) {
      throw new TenantIsolationError(`Record belongs to another tenant than ${this._tenantId ?? 'none'}`, {
        table: this.table.name,
        tenantId: this._tenantId,
      });
    }
  }

  /**
   * Business fields of a payload. System fields are maintained by the
   * strategy and ignored, except `id` on create.
   */
  private _payload(record: Row, keepId: boolean): Record<string, unknown> {
    this._checkTenant(record.tenant_id);
    const payload: Record<string, unknown> = {};
    for (const [field, value] of Object.entries(record)) {
      if (value === undefined) continue;
      if (field === 'id' && keepId) {
        if (typeof value !== 'string') {
          throw new ValidationBypassError(this.table.name, field, 'id must be a uuid string');
        }
        payload.id = value;
        continue;
      }
      if (SYSTEM_COLUMNS.has(field)) continue;
      payload[field] = value;
    }
    // Rejects unknown fields and bad values before any statement is built
    coerceRow(this.table, payload);
    return payload;
  }

  private _filters(filters: Row): Condition[] {
    const rest: Record<string, unknown> = {};
    for (const [field, value] of Object.entries(filters)) {
      if (value === undefined) continue;
      if (field === 'tenant_id' && this.table.multiTenant) {
        this._checkTenant(value);
        continue;
      }
      if (!hasColumn(this.table, field)) {
        throw new ValidationBypassError(this.table.name, field, 'unknown filter column');
      }
      rest[field] = value;
    }
    return equalityConditions(coerceRow(this.table, rest));
  }

  private async _mutate<T>(
    operation: string,
    details: LogMeta,
    options: MutationOptions,
    fn: (tx: DbClient, context: WriteContext) => Promise<T>,
  ): Promise<T> {
    try {
      const context: WriteContext = {
        tenantId: this._tenantId,
        actor: options.actor ?? null,
        now: this._clock(),
        metadata: options.metadata ?? null,
      };
      const result = await runInTransaction(this._connection, tx => fn(tx, context), options.signal);
      this._logger.debug(`${operation} succeeded`, { table: this.table.name, ...details });
      return result;
    } catch (error) {
      this._logFailure(operation, details, error);
      throw error;
    }
  }

  private async _read<T>(
    operation: string,
    details: LogMeta,
    signal: AbortSignal | undefined,
    fn: (client: DbClient) => Promise<T>,
  ): Promise<T> {
    try {
      signal?.throwIfAborted();
      return await fn(withSignal(this._connection, signal));
    } catch (error) {
      this._logFailure(operation, details, error);
      throw error;
    }
  }

  private _logFailure(operation: string, details: LogMeta, error: unknown): void {
    this._logger.error(`${operation} failed`, {
      table: this.table.name,
      tenantId: this._tenantId,
      ...details,
      error: errorMessage(error),
    });
  }
}

export function createRepository(
  connection: DbConnection,
  table: TableDefinition,
  options: RepositoryOptions = {},
): TemporalRepository {
  return new TemporalRepository(connection, table, options);
}
