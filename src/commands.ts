import { Command } from "commander";
import type { DdlStatement } from "./model";
import type { DialectName } from "./dialect";
import { isDialectName } from "./dialect";
import { compileAdd, compileRemove } from "./constraintCompiler";
import { loadMappingFile, type ParsedMappingFile } from "./mappingFile";
import { ConstraintMigrator, previewMigration, type MigrationDirection } from "./migrator";
import { consoleLogger, silentLogger } from "./logger";

interface ConnectionOptions {
	connection?: string;
	file: string;
	dryRun?: boolean;
	verbose?: boolean;
}

function printStatements(statements: readonly DdlStatement[]): void {
	for (const statement of statements) {
		console.log(statement.sql);
	}
}

function resolveDialect(option: string | undefined, file: ParsedMappingFile): DialectName {
	const name = option ?? file.metadata.dialect ?? "postgres";
	if (!isDialectName(name)) {
		throw new Error(`Unknown dialect "${name}". Expected postgres or mysql.`);
	}
	return name;
}

function requireConnection(options: ConnectionOptions): string {
	if (!options.connection) {
		throw new Error("No connection string. Pass -c or set DATABASE_URL.");
	}
	return options.connection;
}

/**
 * Print the error and flag the process as failed instead of throwing out of commander.
 */
function run<T extends unknown[]>(action: (...args: T) => Promise<void>): (...args: T) => Promise<void> {
	return async (...args) => {
		try {
			await action(...args);
		} catch (error) {
			console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
			process.exitCode = 1;
		}
	};
}

async function migrate(direction: MigrationDirection, options: ConnectionOptions): Promise<void> {
	const file = loadMappingFile(options.file);
	if (resolveDialect(undefined, file) !== "postgres") {
		throw new Error("Migrations only run against PostgreSQL; use the sql command for other dialects.");
	}

	if (options.dryRun) {
		printStatements(previewMigration(file.mappings, direction));
		return;
	}

	const migrator = await ConstraintMigrator.connect(requireConnection(options), {
		logger: options.verbose ? consoleLogger : silentLogger,
	});
	try {
		const statements = direction === "up"
			? await migrator.up(file.mappings)
			: await migrator.down(file.mappings);
		console.log(`Applied ${statements.length} statement(s).`);
	} finally {
		await migrator.close();
	}
}

export function createProgram(): Command {
	const program = new Command();

	program
		.name("exclusive-arc")
		.description("Enforce exactly-one-of-N polymorphic foreign keys")
		.version("1.0.0");

	program
		.command("sql")
		.description("Print the DDL for the mappings in a file")
		.requiredOption("-f, --file <file>", "Mapping file")
		.option("--down", "Print the statements that remove the constraints")
		.option("--dialect <name>", "postgres or mysql (defaults to the file's dialect)")
		.action(run(async (options: { file: string; down?: boolean; dialect?: string }) => {
			const file = loadMappingFile(options.file);
			const dialect = resolveDialect(options.dialect, file);
			const statements = options.down
				? [...file.mappings].reverse().flatMap(m => compileRemove(m, { dialect }))
				: file.mappings.flatMap(m => compileAdd(m, { dialect }));
			printStatements(statements);
		}));

	for (const direction of ["up", "down"] as const) {
		program
			.command(direction)
			.description(direction === "up"
				? "Add the constraints for the mappings in a file"
				: "Remove the constraints for the mappings in a file")
			.option("-c, --connection <string>", "PostgreSQL connection string", process.env.DATABASE_URL)
			.requiredOption("-f, --file <file>", "Mapping file")
			.option("--dry-run", "Print the statements without running them")
			.option("-v, --verbose", "Log every executed statement")
			.action(run((options: ConnectionOptions) => migrate(direction, options)));
	}

	program
		.command("status")
		.description("Show which constraint objects of each mapping exist")
		.option("-c, --connection <string>", "PostgreSQL connection string", process.env.DATABASE_URL)
		.requiredOption("-f, --file <file>", "Mapping file")
		.action(run(async (options: ConnectionOptions) => {
			const file = loadMappingFile(options.file);
			const migrator = await ConstraintMigrator.connect(requireConnection(options), { logger: silentLogger });
			try {
				for (const mapping of file.mappings) {
					const status = await migrator.status(mapping);
					console.log(`${status.ownerTable}.${status.role}: ${status.state}`);
					if (status.state === "partial") {
						for (const object of status.objects.filter(o => !o.present)) {
							console.log(`  missing ${object.kind} ${object.name}`);
						}
					}
				}
			} finally {
				await migrator.close();
			}
		}));

	return program;
}
