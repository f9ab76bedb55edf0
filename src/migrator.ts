import { Client } from "pg";
import type { QueryResultRow } from "pg";
import { PGlite } from "@electric-sql/pglite";
import type { DdlKind, DdlStatement, PolymorphicMapping, ReferencedTable } from "./model";
import type { DbClient, TableObjects } from "./catalog";
import { readFunctionNames, readTableObjects } from "./catalog";
import { compileAdd, compileRemove } from "./constraintCompiler";
import type { Logger } from "./logger";
import { consoleLogger } from "./logger";

/**
 * Applies one DDL statement; the migration transaction belongs to the caller.
 */
export interface SchemaExecutor {
	execute(statement: DdlStatement): Promise<void>;
}

export function clientExecutor(client: DbClient): SchemaExecutor {
	return {
		async execute(statement) {
			await client.query(statement.sql);
		},
	};
}

export type MigrationDirection = "up" | "down";

export interface MigratorOptions {
	readonly logger?: Logger;
	/** Declared keys of the referenced tables, passed to the compiler. */
	readonly referencedTables?: readonly ReferencedTable[];
	readonly schemaName?: string;
}

export interface ObjectStatus {
	readonly kind: DdlKind;
	readonly name: string;
	readonly present: boolean;
}

export interface MappingStatus {
	readonly ownerTable: string;
	readonly role: string;
	/** `applied` when every object exists, `absent` when none does. */
	readonly state: "applied" | "absent" | "partial";
	readonly objects: readonly ObjectStatus[];
}

/**
 * PostgreSQL statements `up`/`down` would run; needs no database.
 * `down` walks the mappings in reverse.
 */
export function previewMigration(
	mappings: readonly PolymorphicMapping[],
	direction: MigrationDirection,
	referencedTables?: readonly ReferencedTable[]
): DdlStatement[] {
	const compileOptions = { dialect: "postgres" as const, referencedTables };
	if (direction === "up") {
		return mappings.flatMap(m => compileAdd(m, compileOptions));
	}
	return [...mappings].reverse().flatMap(m => compileRemove(m, compileOptions));
}

/**
 * Runs compiled constraint sets against a PostgreSQL database.
 */
export class ConstraintMigrator {
	private readonly _logger: Logger;

	private constructor(
		private readonly _client: DbClient,
		private readonly _closeClient: () => Promise<void>,
		private readonly _options: MigratorOptions
	) {
		this._logger = _options.logger ?? consoleLogger;
	}

	/**
	 * Connection string formats:
	 * - `pglite:` or `pglite::memory:` - In-memory PGLite database
	 * - `pglite:/path/to/dir` - PGLite database persisted to filesystem
	 * - `postgresql://...` or other - PostgreSQL connection string
	 */
	static async connect(connectionString: string, options: MigratorOptions = {}): Promise<ConstraintMigrator> {
		if (connectionString.startsWith("pglite:")) {
			const pglitePath = connectionString.slice("pglite:".length);
			const db = new PGlite(pglitePath || undefined);
			return new ConstraintMigrator(db, () => db.close(), options);
		}

		const client = new Client({ connectionString });
		await client.connect();
		const db: DbClient = {
			query: async <T,>(sql: string, params?: unknown[]) => client.query<T & QueryResultRow>(sql, params),
		};
		return new ConstraintMigrator(db, () => client.end(), options);
	}

	/**
	 * Wrap an existing client; closing the migrator leaves it open.
	 */
	static fromClient(client: DbClient, options: MigratorOptions = {}): ConstraintMigrator {
		return new ConstraintMigrator(client, async () => { }, options);
	}

	preview(mappings: readonly PolymorphicMapping[], direction: MigrationDirection): DdlStatement[] {
		return previewMigration(mappings, direction, this._options.referencedTables);
	}

	async up(mappings: readonly PolymorphicMapping[]): Promise<DdlStatement[]> {
		return this._run(this.preview(mappings, "up"));
	}

	async down(mappings: readonly PolymorphicMapping[]): Promise<DdlStatement[]> {
		return this._run(this.preview(mappings, "down"));
	}

	/**
	 * Which of the objects a mapping declares exist in the database.
	 */
	async status(mapping: PolymorphicMapping): Promise<MappingStatus> {
		const schemaName = this._options.schemaName ?? "public";
		const tableObjects = await readTableObjects(this._client, mapping.ownerTable, schemaName);
		const functions = await readFunctionNames(this._client, schemaName);

		const objects = compileAdd(mapping, { dialect: "postgres" }).map(statement => ({
			kind: statement.kind,
			name: statement.name,
			present: isPresent(statement, tableObjects, functions),
		}));
		const presentCount = objects.filter(o => o.present).length;

		return {
			ownerTable: mapping.ownerTable,
			role: mapping.role,
			state: presentCount === objects.length ? "applied" : presentCount === 0 ? "absent" : "partial",
			objects,
		};
	}

	async close(): Promise<void> {
		await this._closeClient();
	}

	/**
	 * Execute in one transaction - rolls back on any error.
	 */
	private async _run(statements: DdlStatement[]): Promise<DdlStatement[]> {
		if (statements.length === 0) {
			return statements;
		}

		const executor = clientExecutor(this._client);
		await this._client.query("BEGIN");

		try {
			for (const statement of statements) {
				this._logger.info("executing DDL", { kind: statement.kind, name: statement.name });
				await executor.execute(statement);
			}
			await this._client.query("COMMIT");
		} catch (error) {
			this._logger.error("DDL failed, rolling back", {
				error: error instanceof Error ? error.message : String(error),
			});
			await this._client.query("ROLLBACK");
			throw error;
		}

		return statements;
	}
}

function isPresent(statement: DdlStatement, tableObjects: TableObjects, functions: readonly string[]): boolean {
	switch (statement.kind) {
		case "foreignKey":
			return tableObjects.foreignKeys.includes(statement.name);
		case "index":
			return tableObjects.indexes.includes(statement.name);
		case "trigger":
			return tableObjects.triggers.includes(statement.name);
		case "function":
			return functions.includes(statement.name);
	}
}
