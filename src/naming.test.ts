import { describe, test, expect } from 'vitest';
import { foreignKeyName, indexName, singularize, triggerFunctionName, triggerName } from './naming';
import { createPolymorphicMapping } from './model';

describe('naming', () => {
  const mapping = createPolymorphicMapping({
    ownerTable: 'comments',
    role: 'subject',
    relations: { employee_id: 'employees', product_id: 'products' },
  });
  const [employee] = mapping.relations;

  test('default names', () => {
    expect(foreignKeyName(mapping, employee)).toBe('comments_employee_id_fkey');
    expect(indexName(mapping, employee)).toBe('index_comments_on_employee_id');
    expect(triggerName(mapping)).toBe('comments_subject_exclusive');
    expect(triggerFunctionName(mapping)).toBe('comments_subject_exclusive_check');
  });

  test('prefixes are joined with an underscore', () => {
    const prefixed = createPolymorphicMapping({
      ...mapping,
      relations: mapping.relations,
      options: { foreignKeyNamePrefix: 'fk', indexNamePrefix: 'ix' },
    });

    expect(foreignKeyName(prefixed, employee)).toBe('fk_employee_id');
    expect(indexName(prefixed, employee)).toBe('ix_employee_id');
  });
});

describe('singularize', () => {
  test.each([
    ['employees', 'employee'],
    ['companies', 'company'],
    ['addresses', 'address'],
    ['boxes', 'box'],
    ['branches', 'branch'],
    ['glass', 'glass'],
    ['person', 'person'],
    ['keys', 'key'],
  ])('%s -> %s', (table, expected) => {
    expect(singularize(table)).toBe(expected);
  });
});
