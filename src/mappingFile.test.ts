import { describe, test, expect } from 'vitest';
import { parseMappingFile, serializeMappingFile } from './mappingFile';
import { InvalidMappingError } from './errors';

function issuesOf(json: string): readonly string[] {
  try {
    parseMappingFile(json);
  } catch (error) {
    if (error instanceof InvalidMappingError) return error.issues;
    throw error;
  }
  throw new Error('expected InvalidMappingError');
}

describe('parseMappingFile', () => {
  test('builds mappings and keeps metadata', () => {
    const parsed = parseMappingFile(JSON.stringify({
      $schema: './mappings.schema.json',
      dialect: 'mysql',
      mappings: [
        {
          ownerTable: 'comments',
          role: 'subject',
          relations: { employee_id: 'employees', product_id: 'products.sku' },
          options: { onDelete: 'CASCADE' },
        },
      ],
    }));

    expect(parsed.metadata).toEqual({ $schema: './mappings.schema.json', dialect: 'mysql' });
    expect(parsed.mappings).toHaveLength(1);
    expect(parsed.mappings[0].relations).toEqual([
      { column: 'employee_id', referencedTable: 'employees', referencedColumn: 'id' },
      { column: 'product_id', referencedTable: 'products', referencedColumn: 'sku' },
    ]);
    expect(parsed.mappings[0].options.onDelete).toBe('CASCADE');
  });

  test('reports schema violations with their location', () => {
    expect(issuesOf(JSON.stringify({
      mappings: [{ ownerTable: 'comments', relations: { employee_id: 'employees', product_id: 'products' } }],
    }))).toEqual(["/mappings/0 must have required property 'role'"]);

    expect(issuesOf(JSON.stringify({ dialect: 'oracle', mappings: [] }))).toEqual([
      '/dialect must be equal to one of the allowed values',
    ]);

    expect(issuesOf('{}')).toEqual(["/ must have required property 'mappings'"]);
  });

  test('reports mapping problems per mapping', () => {
    const json = JSON.stringify({
      mappings: [
        { ownerTable: 'comments', role: 'subject', relations: { employee_id: 'employees', product_id: 'products' } },
        { ownerTable: 'tags', role: 'target', relations: { post_id: 'posts' } },
      ],
    });

    expect(() => parseMappingFile(json)).toThrow(
      'Invalid polymorphic mapping for mapping file: /mappings/1 at least 2 relations are required, got 1'
    );
  });

  test('rejects malformed JSON', () => {
    const [issue] = issuesOf('{ "mappings": [');

    expect(issue.startsWith('invalid JSON: ')).toBe(true);
  });
});

describe('serializeMappingFile', () => {
  test('writes the canonical form that parses back to the same mappings', () => {
    const { mappings } = parseMappingFile(JSON.stringify({
      mappings: [{ ownerTable: 'comments', role: 'subject', relations: { employee_id: 'employees', product_id: 'products' } }],
    }));

    const json = serializeMappingFile(mappings, { dialect: 'postgres' });

    expect(JSON.parse(json)).toEqual({
      dialect: 'postgres',
      mappings: [
        {
          ownerTable: 'comments',
          role: 'subject',
          primaryKey: 'id',
          relations: [
            { column: 'employee_id', referencedTable: 'employees', referencedColumn: 'id' },
            { column: 'product_id', referencedTable: 'products', referencedColumn: 'id' },
          ],
          options: { uniqueAcrossColumns: false, preexistingIndexes: [], onDelete: 'NO ACTION' },
        },
      ],
    });
    expect(parseMappingFile(json).mappings).toEqual(mappings);
  });
});
