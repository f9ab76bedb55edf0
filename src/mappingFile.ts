import * as fs from "fs";
import Ajv from "ajv";
import type { MappingDeclaration, PolymorphicMapping } from "./model";
import { createPolymorphicMapping } from "./model";
import type { DialectName } from "./dialect";
import { InvalidMappingError } from "./errors";
import mappingFileSchema from "./mappingFile.schema.json";

/**
 * Metadata fields that can appear at the top level of a mapping file.
 */
export interface MappingFileMetadata {
	$schema?: string;
	dialect?: DialectName;
}

/**
 * The full format of a mapping file.
 */
export interface MappingFileFormat extends MappingFileMetadata {
	mappings: MappingDeclaration[];
}

export interface ParsedMappingFile {
	readonly mappings: readonly PolymorphicMapping[];
	readonly metadata: MappingFileMetadata;
}

const ajv = new Ajv({ strict: false, allErrors: true });
const validateFormat = ajv.compile<MappingFileFormat>(mappingFileSchema);

/**
 * Parse and validate a mapping file.
 * Structure is checked against the JSON schema first, then each mapping is built.
 * @throws InvalidMappingError listing every problem found
 */
export function parseMappingFile(json: string): ParsedMappingFile {
	let obj: unknown;
	try {
		obj = JSON.parse(json);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new InvalidMappingError("mapping file", [`invalid JSON: ${message}`]);
	}

	if (!validateFormat(obj)) {
		const issues = (validateFormat.errors ?? []).map(e => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`);
		throw new InvalidMappingError("mapping file", issues);
	}

	const mappings: PolymorphicMapping[] = [];
	const issues: string[] = [];
	obj.mappings.forEach((declaration, index) => {
		try {
			mappings.push(createPolymorphicMapping(declaration));
		} catch (error) {
			if (!(error instanceof InvalidMappingError)) throw error;
			issues.push(...error.issues.map(issue => `/mappings/${index} ${issue}`));
		}
	});
	if (issues.length > 0) {
		throw new InvalidMappingError("mapping file", issues);
	}

	const metadata: MappingFileMetadata = {};
	if (obj.$schema !== undefined) metadata.$schema = obj.$schema;
	if (obj.dialect !== undefined) metadata.dialect = obj.dialect;

	return { mappings, metadata };
}

export function loadMappingFile(inputPath: string): ParsedMappingFile {
	return parseMappingFile(fs.readFileSync(inputPath, "utf-8"));
}

/**
 * Serialize mappings to the canonical file form (relations as arrays, options spelled out).
 */
export function serializeMappingFile(
	mappings: readonly PolymorphicMapping[],
	metadata: MappingFileMetadata = {}
): string {
	const obj: MappingFileFormat = {
		...metadata,
		mappings: mappings.map(m => ({
			ownerTable: m.ownerTable,
			role: m.role,
			primaryKey: m.primaryKey,
			relations: m.relations.map(r => ({ ...r })),
			options: { ...m.options, preexistingIndexes: [...m.options.preexistingIndexes] },
		})),
	};

	return JSON.stringify(obj, null, 2);
}
