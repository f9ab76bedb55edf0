import type { PolymorphicMapping } from './model';
import type { AttributeSource } from './resolver';
import { toAttributeReader } from './resolver';
import type { Entity, EntityStore } from './entityStore';
import type { Logger } from './logger';
import { AssociationAccessor } from './associationAccessor';
import { ExclusivityValidator } from './exclusivityValidator';
import { InvalidMappingError } from './errors';

export interface AssociationDefinitionOptions<TEntity> {
  readonly store: EntityStore<TEntity>;
  readonly logger?: Logger;
}

/**
 * A mapping bound to the collaborators an entity type needs at runtime.
 */
export interface ExclusiveAssociation<TEntity = Entity> {
  readonly mapping: PolymorphicMapping;
  readonly validator: ExclusivityValidator;
  accessorFor(values: AttributeSource): AssociationAccessor<TEntity>;
}

export function defineExclusiveAssociation<TEntity = Entity>(
  mapping: PolymorphicMapping,
  options: AssociationDefinitionOptions<TEntity>
): ExclusiveAssociation<TEntity> {
  return {
    mapping,
    validator: new ExclusivityValidator(mapping),
    accessorFor: values => new AssociationAccessor(mapping, toAttributeReader(values), options.store, options.logger),
  };
}

/**
 * Explicit registration of exclusive associations per entity type.
 */
export class AssociationRegistry<TEntity = Entity> {
  private readonly _byEntity = new Map<string, Map<string, ExclusiveAssociation<TEntity>>>();

  register(entityType: string, association: ExclusiveAssociation<TEntity>): this {
    let roles = this._byEntity.get(entityType);
    if (!roles) {
      roles = new Map();
      this._byEntity.set(entityType, roles);
    }
    const role = association.mapping.role;
    if (roles.has(role)) {
      throw new InvalidMappingError(`${entityType}.${role}`, [`role "${role}" is already registered`]);
    }
    roles.set(role, association);
    return this;
  }

  get(entityType: string, role: string): ExclusiveAssociation<TEntity> | undefined {
    return this._byEntity.get(entityType)?.get(role);
  }

  require(entityType: string, role: string): ExclusiveAssociation<TEntity> {
    const association = this.get(entityType, role);
    if (!association) {
      throw new Error(`No exclusive association "${role}" registered for ${entityType}`);
    }
    return association;
  }

  forEntity(entityType: string): readonly ExclusiveAssociation<TEntity>[] {
    return [...(this._byEntity.get(entityType)?.values() ?? [])];
  }

  /** Every mapping, in registration order; what a migration compiles. */
  mappings(): readonly PolymorphicMapping[] {
    return [...this._byEntity.values()].flatMap(roles => [...roles.values()].map(a => a.mapping));
  }
}
