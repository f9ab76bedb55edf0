import type { PolymorphicMapping, Relation } from './model';

// Every name is derived from the mapping alone.

export function foreignKeyName(mapping: PolymorphicMapping, relation: Relation): string {
  const prefix = mapping.options.foreignKeyNamePrefix;
  return prefix ? `${prefix}_${relation.column}` : `${mapping.ownerTable}_${relation.column}_fkey`;
}

export function indexName(mapping: PolymorphicMapping, relation: Relation): string {
  const prefix = mapping.options.indexNamePrefix;
  return prefix ? `${prefix}_${relation.column}` : `index_${mapping.ownerTable}_on_${relation.column}`;
}

export function triggerName(mapping: PolymorphicMapping): string {
  return `${mapping.ownerTable}_${mapping.role}_exclusive`;
}

export function triggerFunctionName(mapping: PolymorphicMapping): string {
  return `${triggerName(mapping)}_check`;
}

/**
 * Short, human-facing name for a referenced table.
 * "employees" → "employee", "companies" → "company", "addresses" → "address"
 */
export function singularize(base: string): string {
  if (/[^aeiou]ies$/.test(base)) {
    return base.slice(0, -3) + 'y';
  }
  if (/(ss|x|ch|sh)es$/.test(base)) {
    return base.slice(0, -2);
  }
  if (base.endsWith('s') && !base.endsWith('ss')) {
    return base.slice(0, -1);
  }
  return base;
}
