// Core data model
export type {
  LogicalType,
  IntrospectedType,
  TemporalStrategyType,
  ColumnDefinition,
  IndexDefinition,
  TableDefinition,
  SchemaChange,
  AddTableChange,
  DropTableChange,
  AddColumnChange,
  DropColumnChange,
  AlterColumnChange,
  AddIndexChange,
  DropIndexChange,
  ChangeSafety,
  Row,
  AuditOperation,
  AuditEntry,
  FieldComparison,
} from './model';
export { qualifiedTableName, findColumn, hasColumn, describeChange } from './model';

// Table declarations
export type { ColumnInput, IndexInput, TableInput } from './tableDefinition';
export { defineTable, auditTableFor, businessColumns, isLogicalType, SYSTEM_COLUMNS } from './tableDefinition';
export { parseModelFile, loadModelFile } from './modelFile';
export type { ModelFile } from './modelFile';

// Normalization and diffing
export {
  normalizeNativeType,
  normalizeDefault,
  normalizePredicate,
  normalizeColumn,
  normalizeIndex,
  logicalTypeOf,
} from './typeNormalizer';
export { extractSchema } from './schemaExtractor';
export { diffSchemas, sortChanges, classifyChange, isSafeTypeChange, columnsEqual, indexesEqual } from './schemaDiffer';

// SQL generation
export type { SqlStatement, Condition, RawCondition, SelectOptions } from './queryBuilder';
export {
  escapeIdentifier,
  qualifiedName,
  coerceValue,
  coerceRow,
  buildInsert,
  buildUpdate,
  buildDelete,
  buildSelect,
  buildCount,
  renderChange,
} from './queryBuilder';

// Schema management
export type { SchemaManagerOptions, PlanOptions, SyncOptions, SchemaPlan } from './schemaManager';
export { SchemaManager, expandModels, planStatements } from './schemaManager';

// Connections
export type { DbClient, DbConnection, OpenedConnection, PgPool, PgPoolClient } from './connection';
export { pgConnection, openConnection, runInTransaction } from './connection';

// Repository
export type {
  RepositoryOptions,
  CallOptions,
  MutationOptions,
  DeleteOptions,
  GetOptions,
  ListOptions,
  CountOptions,
} from './temporalRepository';
export { TemporalRepository, createRepository, DEFAULT_LIST_LIMIT } from './temporalRepository';
export type { ReadOptions, WriteContext } from './strategies';
export {
  TemporalStrategy,
  NoneStrategy,
  CopyOnChangeStrategy,
  Scd2Strategy,
  createStrategy,
  WHOLE_RECORD,
} from './strategies';

// Errors
export type { ErrorCode, DdlFailure } from './errors';
export {
  StorageError,
  SchemaConflictError,
  DdlApplicationError,
  OptimisticConflictError,
  UnsupportedTypeError,
  ValidationBypassError,
  TenantIsolationError,
  RecordNotFoundError,
  InvalidDeclarationError,
  UnsupportedOperationError,
  isUniqueViolation,
} from './errors';

// Ambient
export type { Logger, LogLevel, LogMeta } from './logger';
export { createLogger } from './logger';
export type { Config } from './config';
export { loadConfig } from './config';
