// Core data model
export type {
  ReferentialAction,
  Relation,
  MappingOptions,
  PolymorphicMapping,
  ReferencedTable,
  RelationDeclaration,
  RelationTarget,
  MappingDeclaration,
  KeyValue,
  ActiveKeyState,
  UnsetState,
  ResolvedState,
  ConflictState,
  DdlKind,
  DdlStatement,
  CompiledConstraintSet,
} from './model';

export { createPolymorphicMapping, declaredColumns, findRelation } from './model';

// Errors
export {
  InvalidMappingError,
  UnsupportedMappingError,
  DanglingReferenceError,
  isExclusivityViolation,
  CHECK_VIOLATION,
  MYSQL_USER_SIGNAL,
} from './errors';

// Logging
export type { Logger, LogContext } from './logger';
export { consoleLogger, silentLogger } from './logger';

// Constraint compilation
export type { CompileOptions } from './constraintCompiler';
export { compile, compileAdd, compileRemove } from './constraintCompiler';

export type {
  ExclusivityTrigger,
  TriggerEvent,
  TriggerCheck,
  ExactlyOneCheck,
  UniqueActiveValueCheck,
} from './triggerGenerator';
export { buildExclusivityTrigger } from './triggerGenerator';

export type { Dialect, DialectName, ForeignKeySpec, IndexSpec } from './dialect';
export { postgresDialect, mysqlDialect, getDialect, isDialectName, escapeIdentifier } from './dialect';

export { foreignKeyName, indexName, triggerName, triggerFunctionName } from './naming';

// Runtime resolution
export type { AttributeReader, AttributeSource } from './resolver';
export { resolve, toAttributeReader } from './resolver';

export type { Entity, EntityStore } from './entityStore';
export { SqlEntityStore } from './entityStore';

export { AssociationAccessor } from './associationAccessor';

export type { ValidationIssue, ValidationResult, ValidationSink } from './exclusivityValidator';
export { ExclusivityValidator, EXCLUSIVE_ASSOCIATION_CODE } from './exclusivityValidator';

export type { ExclusiveAssociation, AssociationDefinitionOptions } from './association';
export { defineExclusiveAssociation, AssociationRegistry } from './association';

// Database
export type { DbClient, TableObjects } from './catalog';
export { readTableObjects, readFunctionNames } from './catalog';

export type {
  SchemaExecutor,
  MigrationDirection,
  MigratorOptions,
  ObjectStatus,
  MappingStatus,
} from './migrator';
export { ConstraintMigrator, clientExecutor, previewMigration } from './migrator';

// Mapping file
export type { MappingFileMetadata, MappingFileFormat, ParsedMappingFile } from './mappingFile';
export { parseMappingFile, loadMappingFile, serializeMappingFile } from './mappingFile';
