import type {
  CompiledConstraintSet,
  DdlStatement,
  PolymorphicMapping,
  ReferencedTable,
  Relation,
} from './model';
import type { Dialect, DialectName, ForeignKeySpec, IndexSpec } from './dialect';
import { getDialect } from './dialect';
import { UnsupportedMappingError } from './errors';
import { foreignKeyName, indexName } from './naming';
import { buildExclusivityTrigger } from './triggerGenerator';

export interface CompileOptions {
  /** Defaults to `postgres`. */
  readonly dialect?: DialectName | Dialect;
  /**
   * Keys of the referenced tables, as declared by the caller.
   * When given, every relation must target a single-column primary or unique key.
   */
  readonly referencedTables?: readonly ReferencedTable[];
}

interface RelationObjects {
  readonly foreignKey: ForeignKeySpec;
  readonly index: IndexSpec | undefined;
}

function relationObjects(mapping: PolymorphicMapping, relation: Relation): RelationObjects {
  const indexed = mapping.options.preexistingIndexes.includes(relation.column);
  return {
    foreignKey: {
      table: mapping.ownerTable,
      name: foreignKeyName(mapping, relation),
      column: relation.column,
      referencedTable: relation.referencedTable,
      referencedColumn: relation.referencedColumn,
      onDelete: mapping.options.onDelete,
    },
    index: indexed
      ? undefined
      : { table: mapping.ownerTable, name: indexName(mapping, relation), column: relation.column },
  };
}

function isSingleColumnKey(key: readonly string[], column: string): boolean {
  return key.length === 1 && key[0] === column;
}

function checkReferencedKeys(
  mapping: PolymorphicMapping,
  referencedTables: readonly ReferencedTable[]
): string[] {
  const problems: string[] = [];
  for (const relation of mapping.relations) {
    const target = referencedTables.find(t => t.name === relation.referencedTable);
    if (!target) {
      problems.push(`referenced table "${relation.referencedTable}" is not declared`);
      continue;
    }
    const keys = [target.primaryKey, ...(target.uniqueKeys ?? [])];
    if (!keys.some(key => isSingleColumnKey(key, relation.referencedColumn))) {
      problems.push(
        `${relation.referencedTable}.${relation.referencedColumn} is not a primary or unique key, so ${relation.column} cannot reference it`
      );
    }
  }
  return problems;
}

/**
 * Refuse the whole mapping up front so neither direction ever yields a partial list.
 */
function assertCompilable(
  mapping: PolymorphicMapping,
  dialect: Dialect,
  statements: readonly DdlStatement[],
  options: CompileOptions
): void {
  const identifiers = new Set<string>([mapping.ownerTable, mapping.primaryKey]);
  for (const relation of mapping.relations) {
    identifiers.add(relation.column);
    identifiers.add(relation.referencedTable);
    identifiers.add(relation.referencedColumn);
  }
  for (const statement of statements) {
    identifiers.add(statement.name);
  }

  const problems: string[] = [];
  for (const identifier of identifiers) {
    const problem = dialect.identifierProblem(identifier);
    if (problem) problems.push(problem);
  }
  if (options.referencedTables) {
    problems.push(...checkReferencedKeys(mapping, options.referencedTables));
  }

  if (problems.length > 0) {
    throw new UnsupportedMappingError(mapping.ownerTable, problems.join('; '));
  }
}

function renderAdd(mapping: PolymorphicMapping, dialect: Dialect): DdlStatement[] {
  const statements: DdlStatement[] = [];
  for (const relation of mapping.relations) {
    const { foreignKey, index } = relationObjects(mapping, relation);
    const indexStatement = index ? [dialect.createIndex(index)] : [];
    const foreignKeyStatement = dialect.addForeignKey(foreignKey);
    if (dialect.indexBeforeForeignKey) {
      statements.push(...indexStatement, foreignKeyStatement);
    } else {
      statements.push(foreignKeyStatement, ...indexStatement);
    }
  }
  statements.push(...dialect.createTrigger(buildExclusivityTrigger(mapping)));
  return statements;
}

function renderRemove(mapping: PolymorphicMapping, dialect: Dialect): DdlStatement[] {
  const reversed = [...mapping.relations].reverse().map(r => relationObjects(mapping, r));
  return [
    ...dialect.dropTrigger(buildExclusivityTrigger(mapping)),
    ...reversed.map(o => dialect.dropForeignKey(o.foreignKey)),
    ...reversed.flatMap(o => (o.index ? [dialect.dropIndex(o.index)] : [])),
  ];
}

/**
 * DDL that materializes the mapping: per relation a foreign key and an index,
 * then the exclusivity trigger.
 * @throws UnsupportedMappingError if the target engine cannot express the mapping
 */
export function compileAdd(mapping: PolymorphicMapping, options: CompileOptions = {}): DdlStatement[] {
  const dialect = getDialect(options.dialect);
  const statements = renderAdd(mapping, dialect);
  assertCompilable(mapping, dialect, statements, options);
  return statements;
}

/**
 * DDL that drops exactly what `compileAdd` creates for the same mapping:
 * trigger, then foreign keys, then indexes.
 * Derived from the mapping alone, not from a record of a previous `compileAdd`.
 * @throws UnsupportedMappingError if the target engine cannot express the mapping
 */
export function compileRemove(mapping: PolymorphicMapping, options: CompileOptions = {}): DdlStatement[] {
  const dialect = getDialect(options.dialect);
  // The dropped objects are the ones the add side names.
  assertCompilable(mapping, dialect, renderAdd(mapping, dialect), options);
  return renderRemove(mapping, dialect);
}

export function compile(mapping: PolymorphicMapping, options: CompileOptions = {}): CompiledConstraintSet {
  return {
    addStatements: compileAdd(mapping, options),
    removeStatements: compileRemove(mapping, options),
  };
}
