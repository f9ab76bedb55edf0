import type { KeyValue } from './model';
import type { DbClient } from './catalog';
import { escapeIdentifier } from './dialect';

export type Entity = Readonly<Record<string, unknown>>;

/**
 * Host capability to load a referenced row.
 * Resolves `undefined` when no row matches.
 */
export interface EntityStore<TEntity = Entity> {
  fetchById(referencedTable: string, id: KeyValue, referencedColumn: string): Promise<TEntity | undefined>;
}

/**
 * EntityStore over a Postgres client (pg.Client or PGlite).
 */
export class SqlEntityStore implements EntityStore {
  constructor(private readonly _client: DbClient) { }

  async fetchById(referencedTable: string, id: KeyValue, referencedColumn: string): Promise<Entity | undefined> {
    const result = await this._client.query<Entity>(
      `SELECT * FROM ${escapeIdentifier(referencedTable)} WHERE ${escapeIdentifier(referencedColumn)} = $1 LIMIT 1`,
      [id]
    );
    return result.rows[0];
  }
}
