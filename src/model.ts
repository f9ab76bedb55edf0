/**
 * Core data model types for exclusive polymorphic associations.
 *
 * Design principle: Immutable, readonly types. No methods that mutate.
 */

import { InvalidMappingError } from './errors';

// === Mapping Types ===

/**
 * Referential actions allowed on the generated foreign keys.
 * SET NULL and SET DEFAULT are left out: they rewrite the active column,
 * which the exclusivity trigger then rejects.
 */
export type ReferentialAction = 'CASCADE' | 'RESTRICT' | 'NO ACTION';

export interface Relation {
  readonly column: string;
  readonly referencedTable: string;
  readonly referencedColumn: string;
}

export interface MappingOptions {
  /** Reject a row whose active value is already used by another row in the same column. */
  readonly uniqueAcrossColumns: boolean;
  readonly indexNamePrefix?: string;
  readonly foreignKeyNamePrefix?: string;
  /** Relation columns that already carry an index; none is added or removed for them. */
  readonly preexistingIndexes: readonly string[];
  readonly onDelete: ReferentialAction;
}

export interface PolymorphicMapping {
  readonly ownerTable: string;
  /** Name of the polymorphic association itself, e.g. `subject`. */
  readonly role: string;
  readonly primaryKey: string;
  readonly relations: readonly Relation[];
  readonly options: MappingOptions;
}

/**
 * Keys a caller declares for a referenced table.
 * Lets the compiler refuse foreign keys the engine would not accept.
 */
export interface ReferencedTable {
  readonly name: string;
  readonly primaryKey: readonly string[];
  readonly uniqueKeys?: readonly (readonly string[])[];
}

// === Declaration Types ===

export interface RelationDeclaration {
  readonly column: string;
  readonly referencedTable: string;
  readonly referencedColumn?: string;
}

/**
 * `"employees"`, `"employees.id"` (table, then column) or `{ table, column }`.
 * Schema-qualified table names are not supported.
 */
export type RelationTarget = string | { readonly table: string; readonly column?: string };

export interface MappingDeclaration {
  readonly ownerTable: string;
  readonly role: string;
  readonly primaryKey?: string;
  readonly relations: readonly RelationDeclaration[] | Readonly<Record<string, RelationTarget>>;
  readonly options?: Partial<MappingOptions>;
}

// === Runtime Types ===

/** Any value a foreign-key column holds when it is set. */
export type KeyValue = NonNullable<unknown>;

export type ActiveKeyState = UnsetState | ResolvedState | ConflictState;

export interface UnsetState {
  readonly type: 'unset';
}

export interface ResolvedState {
  readonly type: 'resolved';
  readonly column: string;
  readonly value: KeyValue;
}

export interface ConflictState {
  readonly type: 'conflict';
  /** The set columns, in declaration order. */
  readonly columns: readonly string[];
}

// === Helpers ===

const DEFAULT_KEY = 'id';

function isRelationList(
  relations: MappingDeclaration['relations']
): relations is readonly RelationDeclaration[] {
  return Array.isArray(relations);
}

function normalizeRelations(relations: MappingDeclaration['relations']): RelationDeclaration[] {
  if (isRelationList(relations)) {
    return [...relations];
  }
  return Object.entries(relations).map(([column, target]) => {
    if (typeof target === 'string') {
      const dot = target.indexOf('.');
      return dot === -1
        ? { column, referencedTable: target }
        : { column, referencedTable: target.slice(0, dot), referencedColumn: target.slice(dot + 1) };
    }
    return { column, referencedTable: target.table, referencedColumn: target.column };
  });
}

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === '';
}

// Identifiers are quoted whole, so a schema prefix cannot be expressed.
function isQualified(value: string | undefined): boolean {
  return value !== undefined && value.includes('.');
}

/**
 * Build a validated, frozen mapping.
 * @throws InvalidMappingError listing every problem with the declaration
 */
export function createPolymorphicMapping(declaration: MappingDeclaration): PolymorphicMapping {
  const issues: string[] = [];
  const primaryKey = declaration.primaryKey ?? DEFAULT_KEY;
  const declared = normalizeRelations(declaration.relations);
  const options: Partial<MappingOptions> = declaration.options ?? {};

  if (isBlank(declaration.ownerTable)) issues.push('owner table must not be blank');
  if (isBlank(declaration.role)) issues.push('role must not be blank');
  if (isBlank(primaryKey)) issues.push('primary key must not be blank');
  if (isQualified(declaration.ownerTable)) {
    issues.push(`owner table "${declaration.ownerTable}" must not contain "."`);
  }
  if (isQualified(primaryKey)) issues.push(`primary key "${primaryKey}" must not contain "."`);

  if (declared.length < 2) {
    issues.push(`at least 2 relations are required, got ${declared.length}`);
    if (options.uniqueAcrossColumns) {
      issues.push('uniqueAcrossColumns needs at least 2 relations');
    }
  }

  const seen = new Set<string>();
  declared.forEach((relation, index) => {
    if (isBlank(relation.column)) {
      issues.push(`relation #${index + 1}: column must not be blank`);
    } else if (seen.has(relation.column)) {
      issues.push(`duplicate column "${relation.column}"`);
    } else {
      seen.add(relation.column);
    }
    if (relation.column === primaryKey) {
      issues.push(`column "${relation.column}" is the primary key of ${declaration.ownerTable}`);
    }
    if (isBlank(relation.referencedTable)) {
      issues.push(`relation #${index + 1}: referenced table must not be blank`);
    }
    if (relation.referencedColumn !== undefined && isBlank(relation.referencedColumn)) {
      issues.push(`relation #${index + 1}: referenced column must not be blank`);
    }
    for (const [label, value] of [
      ['column', relation.column],
      ['referenced table', relation.referencedTable],
      ['referenced column', relation.referencedColumn],
    ] as const) {
      if (isQualified(value)) {
        issues.push(`relation #${index + 1}: ${label} "${value}" must not contain "."`);
      }
    }
  });

  if (options.indexNamePrefix !== undefined && isBlank(options.indexNamePrefix)) {
    issues.push('index name prefix must not be blank');
  }
  if (options.foreignKeyNamePrefix !== undefined && isBlank(options.foreignKeyNamePrefix)) {
    issues.push('foreign key name prefix must not be blank');
  }
  for (const column of options.preexistingIndexes ?? []) {
    if (!seen.has(column)) {
      issues.push(`preexisting index on "${column}" does not name a declared column`);
    }
  }

  if (issues.length > 0) {
    const subject = isBlank(declaration.ownerTable)
      ? 'unnamed table'
      : `${declaration.ownerTable}.${declaration.role}`;
    throw new InvalidMappingError(subject, issues);
  }

  const relations = declared.map(relation => Object.freeze({
    column: relation.column,
    referencedTable: relation.referencedTable,
    referencedColumn: relation.referencedColumn ?? DEFAULT_KEY,
  }));

  return Object.freeze({
    ownerTable: declaration.ownerTable,
    role: declaration.role,
    primaryKey,
    relations: Object.freeze(relations),
    options: Object.freeze({
      uniqueAcrossColumns: options.uniqueAcrossColumns ?? false,
      indexNamePrefix: options.indexNamePrefix,
      foreignKeyNamePrefix: options.foreignKeyNamePrefix,
      preexistingIndexes: Object.freeze([...(options.preexistingIndexes ?? [])]),
      onDelete: options.onDelete ?? 'NO ACTION',
    }),
  });
}

/** Declared foreign-key columns, in declaration order. */
export function declaredColumns(mapping: PolymorphicMapping): readonly string[] {
  return mapping.relations.map(r => r.column);
}

export function findRelation(mapping: PolymorphicMapping, column: string): Relation | undefined {
  return mapping.relations.find(r => r.column === column);
}

// === Compiled DDL Types ===

export type DdlKind = 'foreignKey' | 'index' | 'function' | 'trigger';

export interface DdlStatement {
  readonly kind: DdlKind;
  /** Name of the database object the statement creates or drops. */
  readonly name: string;
  readonly sql: string;
}

export interface CompiledConstraintSet {
  readonly addStatements: readonly DdlStatement[];
  /** Structural inverse of `addStatements`: trigger, then foreign keys, then indexes. */
  readonly removeStatements: readonly DdlStatement[];
}
