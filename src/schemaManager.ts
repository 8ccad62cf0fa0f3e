import type { SchemaChange, TableDefinition } from './model';
import { describeChange, qualifiedTableName } from './model';
import type { DbConnection } from './connection';
import { runInTransaction } from './connection';
import type { DdlFailure } from './errors';
import { DdlApplicationError, SchemaConflictError } from './errors';
import type { Logger } from './logger';
import { createLogger } from './logger';
import { escapeIdentifier, renderChange } from './queryBuilder';
import { classifyChange, diffSchemas } from './schemaDiffer';
import { extractSchema } from './schemaExtractor';
import { auditTableFor } from './tableDefinition';

export interface SchemaManagerOptions {
  readonly logger?: Logger;
}

export interface PlanOptions {
  /** Destructive changes count as applicable instead of skipped. */
  readonly allowDestructive?: boolean;
  readonly signal?: AbortSignal;
}

export interface SyncOptions extends PlanOptions {
  readonly dryRun?: boolean;
  /** Required with `allowDestructive`; logged with each destructive change. */
  readonly reason?: string;
}

export interface SchemaPlan {
  /** Declared tables plus the auxiliary tables their strategies need. */
  readonly tables: readonly TableDefinition[];
  /** Every difference, in application order. */
  readonly changes: readonly SchemaChange[];
  readonly applicable: readonly SchemaChange[];
  /** Destructive changes held back for lack of an allowance. */
  readonly skipped: readonly SchemaChange[];
  /** Changes that need a manual data migration. */
  readonly blocked: readonly SchemaChange[];
}

/**
 * Declared tables plus the audit tables of copy_on_change tables.
 */
export function expandModels(models: readonly TableDefinition[]): TableDefinition[] {
  const tables = new Map<string, TableDefinition>();
  for (const model of models) {
    tables.set(qualifiedTableName(model), model);
  }
  for (const model of models) {
    if (model.strategy === 'copy_on_change') {
      const audit = auditTableFor(model);
      const name = qualifiedTableName(audit);
      if (!tables.has(name)) {
        tables.set(name, audit);
      }
    }
  }
  return [...tables.values()];
}

export function planStatements(changes: readonly SchemaChange[]): string[] {
  return changes.flatMap(renderChange);
}

/**
 * SchemaManager reconciles declared tables with the live database.
 *
 * It is a maintenance operation: concurrent syncs against the same database
 * must be serialized by the caller.
 */
export class SchemaManager {
  private readonly _logger: Logger;

  constructor(
    private readonly _connection: DbConnection,
    options: SchemaManagerOptions = {}
  ) {
    this._logger = options.logger ?? createLogger('schema-manager');
  }

  /**
   * Introspect once and compute the changes, without touching the schema.
   */
  async planSchema(models: readonly TableDefinition[], options: PlanOptions = {}): Promise<SchemaPlan> {
    options.signal?.throwIfAborted();
    const tables = expandModels(models);
    const schemas = [...new Set(tables.map(t => t.schema))];
    const introspected = await extractSchema(this._connection, schemas);
    options.signal?.throwIfAborted();

    const changes = diffSchemas(tables, introspected);
    const applicable: SchemaChange[] = [];
    const skipped: SchemaChange[] = [];
    const blocked: SchemaChange[] = [];

    for (const change of changes) {
      const safety = classifyChange(change);
      if (safety === 'blocked') {
        blocked.push(change);
      } else if (safety === 'destructive' && !options.allowDestructive) {
        skipped.push(change);
      } else {
        applicable.push(change);
      }
    }

    return { tables, changes, applicable, skipped, blocked };
  }

  /**
   * Bring the database in line with `models`. Returns the number of changes
   * applied, or that would be applied when `dryRun` is set.
   */
  async syncSchema(models: readonly TableDefinition[], options: SyncOptions = {}): Promise<number> {
    const reason = options.reason?.trim() ?? '';
    if (options.allowDestructive && reason === '' && !options.dryRun) {
      throw new SchemaConflictError('Destructive changes require a reason', []);
    }

    const plan = await this.planSchema(models, options);

    for (const change of plan.skipped) {
      this._logger.warn('Skipping destructive change', { change: describeChange(change) });
    }

    if (options.dryRun) {
      for (const change of plan.applicable) {
        this._logger.info('Would apply', { change: describeChange(change) });
      }
      for (const change of plan.blocked) {
        this._logger.warn('Blocked change', { change: describeChange(change) });
      }
      return plan.applicable.length;
    }

    if (plan.blocked.length > 0) {
      throw new SchemaConflictError(
        `${plan.blocked.length} change(s) need a manual data migration: ${plan.blocked.map(describeChange).join(', ')}`,
        plan.blocked,
      );
    }

    return this._apply(plan.applicable, reason, options.signal);
  }

  /**
   * Apply changes table by table, each table in its own transaction. A
   * failure rolls back and stops its table only.
   */
  private async _apply(changes: readonly SchemaChange[], reason: string, signal?: AbortSignal): Promise<number> {
    const byTable = new Map<string, SchemaChange[]>();
    for (const change of changes) {
      const name = qualifiedTableName(change.table);
      const group = byTable.get(name) ?? [];
      group.push(change);
      byTable.set(name, group);
    }

    const failures: DdlFailure[] = [];
    let applied = 0;

    for (const [table, group] of byTable) {
      const progress: { change?: SchemaChange; statement?: string } = {};
      try {
        await runInTransaction(this._connection, async tx => {
          for (const change of group) {
            progress.change = change;
            if (change.type === 'add_table' && change.table.schema !== 'public') {
              progress.statement = `CREATE SCHEMA IF NOT EXISTS ${escapeIdentifier(change.table.schema)}`;
              await tx.query(progress.statement);
            }
            if (classifyChange(change) === 'destructive') {
              this._logger.warn('Applying destructive change', { change: describeChange(change), reason });
            }
            for (const statement of renderChange(change)) {
              progress.statement = statement;
              this._logger.debug('Executing DDL', { table, statement });
              await tx.query(statement);
            }
          }
        }, signal);
        applied += group.length;
        this._logger.info('Applied schema changes', { table, count: group.length });
      } catch (error) {
        if (signal?.aborted || progress.change === undefined) {
          throw error;
        }
        this._logger.error('Schema change failed', {
          table,
          change: describeChange(progress.change),
          error: error instanceof Error ? error.message : String(error),
        });
        failures.push({
          table,
          change: progress.change,
          statement: progress.statement ?? '',
          cause: error,
        });
      }
    }

    const [first, ...rest] = failures;
    if (first !== undefined) {
      throw new DdlApplicationError([first, ...rest]);
    }

    return applied;
  }
}
