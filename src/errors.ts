import type { SchemaChange } from './model';
import { describeChange } from './model';

export type ErrorCode =
  | 'SCHEMA_CONFLICT'
  | 'DDL_APPLICATION_FAILURE'
  | 'OPTIMISTIC_CONFLICT'
  | 'UNSUPPORTED_TYPE'
  | 'VALIDATION_BYPASS'
  | 'TENANT_ISOLATION'
  | 'NOT_FOUND'
  | 'INVALID_DECLARATION'
  | 'UNSUPPORTED_OPERATION';

export class StorageError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/**
 * Declared and live schema disagree in a way no automatic change may resolve.
 */
export class SchemaConflictError extends StorageError {
  readonly changes: readonly SchemaChange[];

  constructor(message: string, changes: readonly SchemaChange[]) {
    super('SCHEMA_CONFLICT', message, { changes: changes.map(describeChange) });
    this.changes = changes;
  }
}

export interface DdlFailure {
  readonly table: string;
  readonly change: SchemaChange;
  readonly statement: string;
  readonly cause: unknown;
}

/**
 * A schema change failed. Changes for the failed table were rolled back;
 * other tables were applied.
 */
export class DdlApplicationError extends StorageError {
  readonly table: string;
  readonly change: SchemaChange;
  readonly failures: readonly DdlFailure[];

  constructor(failures: readonly [DdlFailure, ...DdlFailure[]]) {
    const [first] = failures;
    const suffix = failures.length > 1 ? ` (${failures.length - 1} more table(s) failed)` : '';
    super(
      'DDL_APPLICATION_FAILURE',
      `Failed to apply ${describeChange(first.change)}: ${errorMessage(first.cause)}${suffix}`,
      { table: first.table, statement: first.statement },
      { cause: first.cause },
    );
    this.table = first.table;
    this.change = first.change;
    this.failures = failures;
  }
}

export class OptimisticConflictError extends StorageError {
  constructor(table: string, id: string, expectedVersion: number, options?: { cause?: unknown }) {
    super(
      'OPTIMISTIC_CONFLICT',
      `Concurrent update of ${table} ${id}: version ${expectedVersion} is no longer current, retry with fresh data`,
      { table, id, expectedVersion },
      options,
    );
  }
}

export class UnsupportedTypeError extends StorageError {
  constructor(table: string, column: string, type: string) {
    super('UNSUPPORTED_TYPE', `Column ${table}.${column} has unsupported type "${type}"`, { table, column, type });
  }
}

export class ValidationBypassError extends StorageError {
  constructor(table: string, field: string, reason: string) {
    super('VALIDATION_BYPASS', `Invalid value for ${table}.${field}: ${reason}`, { table, field });
  }
}

export class TenantIsolationError extends StorageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('TENANT_ISOLATION', message, details);
  }
}

export class RecordNotFoundError extends StorageError {
  constructor(table: string, id: string) {
    super('NOT_FOUND', `Record ${id} not found in ${table}`, { table, id });
  }
}

export class InvalidDeclarationError extends StorageError {
  constructor(table: string, message: string) {
    super('INVALID_DECLARATION', `Invalid declaration of ${table}: ${message}`, { table });
  }
}

export class UnsupportedOperationError extends StorageError {
  constructor(operation: string, strategy: string) {
    super('UNSUPPORTED_OPERATION', `${operation}() is not available for the ${strategy} strategy`, { operation, strategy });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * SQLSTATE 23505, as reported by both node-postgres and PGlite.
 */
export function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === '23505';
}
