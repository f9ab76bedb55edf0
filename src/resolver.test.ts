import { describe, test, expect } from 'vitest';
import { resolve, toAttributeReader } from './resolver';
import { createPolymorphicMapping } from './model';

const mapping = createPolymorphicMapping({
  ownerTable: 'comments',
  role: 'subject',
  relations: { employee_id: 'employees', product_id: 'products', order_id: 'orders' },
});

const columns = ['employee_id', 'product_id', 'order_id'];

function subsets<T>(items: readonly T[]): T[][] {
  return items.reduce<T[][]>((acc, item) => [...acc, ...acc.map(s => [...s, item])], [[]]);
}

describe('resolve', () => {
  test.each(subsets(columns).map((set): [string, string[]] => [set.join(',') || '(none)', set]))(
    'set columns: %s',
    (_label, set) => {
      const values = Object.fromEntries(columns.map((c, i) => [c, set.includes(c) ? i + 10 : null]));
      const state = resolve(mapping, values);

      if (set.length === 0) {
        expect(state).toEqual({ type: 'unset' });
      } else if (set.length === 1) {
        expect(state).toEqual({ type: 'resolved', column: set[0], value: columns.indexOf(set[0]) + 10 });
      } else {
        expect(state).toEqual({ type: 'conflict', columns: columns.filter(c => set.includes(c)) });
      }
    }
  );

  test('absent and undefined count as unset', () => {
    expect(resolve(mapping, { product_id: undefined })).toEqual({ type: 'unset' });
    expect(resolve(mapping, {})).toEqual({ type: 'unset' });
  });

  test('zero, empty string and false are set values', () => {
    expect(resolve(mapping, { employee_id: 0 })).toEqual({ type: 'resolved', column: 'employee_id', value: 0 });
    expect(resolve(mapping, { order_id: '' })).toEqual({ type: 'resolved', column: 'order_id', value: '' });
    expect(resolve(mapping, { employee_id: false, order_id: 3 })).toEqual({
      type: 'conflict',
      columns: ['employee_id', 'order_id'],
    });
  });

  test('ignores undeclared columns', () => {
    expect(resolve(mapping, { author_id: 4, product_id: 9 })).toEqual({
      type: 'resolved',
      column: 'product_id',
      value: 9,
    });
  });

  test('conflict columns follow declaration order, not input order', () => {
    expect(resolve(mapping, { order_id: 1, employee_id: 2 })).toEqual({
      type: 'conflict',
      columns: ['employee_id', 'order_id'],
    });
  });

  test('reads maps and attribute readers', () => {
    expect(resolve(mapping, new Map([['order_id', 'ord-1']]))).toEqual({
      type: 'resolved',
      column: 'order_id',
      value: 'ord-1',
    });

    const dirty = new Map<string, unknown>([['employee_id', 5]]);
    const reader = { currentValue: (column: string) => dirty.get(column) };
    expect(resolve(mapping, reader)).toEqual({ type: 'resolved', column: 'employee_id', value: 5 });

    dirty.set('employee_id', null);
    dirty.set('product_id', 6);
    expect(resolve(mapping, reader)).toEqual({ type: 'resolved', column: 'product_id', value: 6 });
  });
});

describe('toAttributeReader', () => {
  test('does not read inherited properties of records', () => {
    const reader = toAttributeReader({ employee_id: 1 });

    expect(reader.currentValue('employee_id')).toBe(1);
    expect(reader.currentValue('toString')).toBeUndefined();
  });

  test('returns readers unchanged', () => {
    const reader = { currentValue: () => 1 };

    expect(toAttributeReader(reader)).toBe(reader);
  });
});
