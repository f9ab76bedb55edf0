import type { ActiveKeyState, KeyValue, PolymorphicMapping, Relation } from './model';
import { declaredColumns, findRelation } from './model';
import type { AttributeReader } from './resolver';
import { resolve } from './resolver';
import type { Entity, EntityStore } from './entityStore';
import { DanglingReferenceError } from './errors';
import type { Logger } from './logger';
import { consoleLogger } from './logger';
import { singularize } from './naming';

/**
 * Read-only view of one entity's exclusive association.
 * Every call re-reads the current attribute values; nothing is cached.
 */
export class AssociationAccessor<TEntity = Entity> {
  constructor(
    private readonly _mapping: PolymorphicMapping,
    private readonly _reader: AttributeReader,
    private readonly _store: EntityStore<TEntity>,
    private readonly _logger: Logger = consoleLogger
  ) { }

  get mapping(): PolymorphicMapping {
    return this._mapping;
  }

  state(): ActiveKeyState {
    return resolve(this._mapping, this._reader);
  }

  /**
   * The referenced entity when exactly one key is set; null when none or several are.
   * @throws DanglingReferenceError if the active key points at a missing row
   */
  async activeAssociation(): Promise<TEntity | null> {
    const state = this.state();
    if (state.type !== 'resolved') {
      return null;
    }

    const relation = this._relationFor(state.column);
    const entity = await this._store.fetchById(relation.referencedTable, state.value, relation.referencedColumn);
    if (entity === undefined) {
      const error = new DanglingReferenceError(
        this._mapping.ownerTable,
        relation.column,
        relation.referencedTable,
        state.value
      );
      this._logger.error(error.message, {
        ownerTable: error.ownerTable,
        column: error.column,
        referencedTable: error.referencedTable,
      });
      throw error;
    }
    return entity;
  }

  activeKey(): string | null {
    const state = this.state();
    return state.type === 'resolved' ? state.column : null;
  }

  activeRelation(): Relation | null {
    const column = this.activeKey();
    return column === null ? null : this._relationFor(column);
  }

  /** `{ [activeColumn]: value }` for lookups of rows pointing at the same target; `{}` otherwise. */
  activeQueryCondition(): Record<string, KeyValue> {
    const state = this.state();
    return state.type === 'resolved' ? { [state.column]: state.value } : {};
  }

  declaredKeys(): readonly string[] {
    return declaredColumns(this._mapping);
  }

  /** Short names of the referenced tables, then the role name. */
  declaredRelationNames(): readonly string[] {
    return [
      ...this._mapping.relations.map(r => singularize(r.referencedTable)),
      this._mapping.role,
    ];
  }

  private _relationFor(column: string): Relation {
    const relation = findRelation(this._mapping, column);
    if (!relation) {
      // resolve() only ever reports declared columns
      throw new Error(`Column "${column}" is not declared on ${this._mapping.ownerTable}.${this._mapping.role}`);
    }
    return relation;
  }
}
