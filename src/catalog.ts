/**
 * Database client interface - compatible with both pg.Client and PGlite
 */
export interface DbClient {
  query<T = unknown>(sql: string, params?: unknown[]): Promise<{ rows: T[] }>;
}

/**
 * Constraint objects currently attached to one table.
 */
export interface TableObjects {
  /** Foreign key constraint names. */
  readonly foreignKeys: readonly string[];
  readonly indexes: readonly string[];
  readonly triggers: readonly string[];
}

/**
 * Read the foreign keys, indexes and user triggers of a PostgreSQL table.
 * Used to report on declared mappings; never to infer one.
 */
export async function readTableObjects(
  client: DbClient,
  tableName: string,
  schemaName = 'public'
): Promise<TableObjects> {
  const foreignKeys = await readForeignKeys(client, schemaName, tableName);
  const indexes = await readIndexes(client, schemaName, tableName);
  const triggers = await readTriggers(client, schemaName, tableName);

  return { foreignKeys, indexes, triggers };
}

/**
 * Names of the functions defined in a schema.
 */
export async function readFunctionNames(client: DbClient, schemaName = 'public'): Promise<string[]> {
  const result = await client.query<{ proname: string }>(`
    SELECT p.proname
    FROM pg_proc p
    JOIN pg_namespace n ON n.oid = p.pronamespace
    WHERE n.nspname = $1
    ORDER BY p.proname
  `, [schemaName]);

  return result.rows.map(r => r.proname);
}

async function readIndexes(client: DbClient, schemaName: string, tableName: string): Promise<string[]> {
  const result = await client.query<{ indexname: string }>(`
    SELECT indexname
    FROM pg_indexes
    WHERE schemaname = $1 AND tablename = $2
    ORDER BY indexname
  `, [schemaName, tableName]);

  return result.rows.map(r => r.indexname);
}

async function readTriggers(client: DbClient, schemaName: string, tableName: string): Promise<string[]> {
  const result = await client.query<{ tgname: string }>(`
    SELECT t.tgname
    FROM pg_trigger t
    JOIN pg_class c ON c.oid = t.tgrelid
    JOIN pg_namespace n ON n.oid = c.relnamespace
    WHERE NOT t.tgisinternal
      AND n.nspname = $1
      AND c.relname = $2
    ORDER BY t.tgname
  `, [schemaName, tableName]);

  return result.rows.map(r => r.tgname);
}

async function readForeignKeys(client: DbClient, schemaName: string, tableName: string): Promise<string[]> {
  const result = await client.query<{ conname: string }>(`
    SELECT c.conname
    FROM pg_constraint c
    JOIN pg_class cl ON cl.oid = c.conrelid
    JOIN pg_namespace n ON n.oid = cl.relnamespace
    WHERE c.contype = 'f'
      AND n.nspname = $1
      AND cl.relname = $2
    ORDER BY c.conname
  `, [schemaName, tableName]);

  return result.rows.map(r => r.conname);
}
