import { describe, test, expect } from 'vitest';
import { buildExclusivityTrigger } from './triggerGenerator';
import { createPolymorphicMapping } from './model';

describe('buildExclusivityTrigger', () => {
  test('checks exactly one of the declared columns', () => {
    const mapping = createPolymorphicMapping({
      ownerTable: 'comments',
      role: 'subject',
      relations: { employee_id: 'employees', product_id: 'products', order_id: 'orders' },
    });

    expect(buildExclusivityTrigger(mapping)).toEqual({
      table: 'comments',
      name: 'comments_subject_exclusive',
      functionName: 'comments_subject_exclusive_check',
      timing: 'before',
      events: ['insert', 'update'],
      checks: [
        {
          type: 'exactlyOne',
          columns: ['employee_id', 'product_id', 'order_id'],
          message: 'comments: exactly one of (employee_id, product_id, order_id) must be set',
        },
      ],
    });
  });

  test('adds a unique-value check after the exclusivity check', () => {
    const mapping = createPolymorphicMapping({
      ownerTable: 'tags',
      role: 'target',
      primaryKey: 'tag_id',
      relations: { post_id: 'posts', page_id: 'pages' },
      options: { uniqueAcrossColumns: true },
    });

    const { checks } = buildExclusivityTrigger(mapping);

    expect(checks.map(c => c.type)).toEqual(['exactlyOne', 'uniqueActiveValue']);
    expect(checks[1]).toEqual({
      type: 'uniqueActiveValue',
      table: 'tags',
      primaryKey: 'tag_id',
      columns: [
        { column: 'post_id', message: 'active value is already used by another row: tags.post_id' },
        { column: 'page_id', message: 'active value is already used by another row: tags.page_id' },
      ],
    });
  });
});
