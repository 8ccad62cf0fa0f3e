import * as fs from "fs";
import { z } from "zod";
import type { TableDefinition } from "./model";
import type { TableInput } from "./tableDefinition";
import { defineTable } from "./tableDefinition";

const logicalTypeSchema = z.enum([
	"integer", "bigint", "smallint", "decimal", "float", "boolean", "string",
	"text", "timestamp", "timestamptz", "date", "json", "uuid", "text_array",
]);

const columnSchema = z.object({
	name: z.string().min(1),
	type: logicalTypeSchema,
	nativeType: z.string().min(1).optional(),
	nullable: z.boolean().optional(),
	default: z.string().nullable().optional(),
	maxLength: z.number().int().positive().optional(),
	precision: z.number().int().positive().optional(),
	scale: z.number().int().nonnegative().optional(),
}).strict();

const indexSchema = z.object({
	name: z.string().min(1).optional(),
	columns: z.array(z.string().min(1)).min(1),
	unique: z.boolean().optional(),
	method: z.string().min(1).optional(),
	predicate: z.string().nullable().optional(),
}).strict();

const tableSchema = z.object({
	schema: z.string().min(1).optional(),
	name: z.string().min(1),
	columns: z.array(columnSchema),
	indexes: z.array(indexSchema).optional(),
	strategy: z.enum(["none", "copy_on_change", "scd2"]).optional(),
	multiTenant: z.boolean().optional(),
	softDelete: z.boolean().optional(),
}).strict();

const modelFileSchema = z.object({
	$schema: z.string().optional(),
	/** Schema for tables that do not name one. */
	schema: z.string().min(1).optional(),
	tables: z.array(tableSchema),
}).strict();

export type ModelFile = z.infer<typeof modelFileSchema>;

/**
 * Parse the JSON text of a model file into table definitions.
 */
export function parseModelFile(json: string, defaultSchema?: string): TableDefinition[] {
	let raw: unknown;
	try {
		raw = JSON.parse(json);
	} catch (error) {
		throw new Error(`Model file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
	}

	const result = modelFileSchema.safeParse(raw);
	if (!result.success) {
		const problems = result.error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
		throw new Error(`Invalid model file: ${problems.join("; ")}`);
	}

	const fileSchema = result.data.schema ?? defaultSchema;
	return result.data.tables.map((table): TableDefinition => {
		const input: TableInput = { ...table, schema: table.schema ?? fileSchema };
		return defineTable(input);
	});
}

export function loadModelFile(path: string, defaultSchema?: string): TableDefinition[] {
	return parseModelFile(fs.readFileSync(path, "utf-8"), defaultSchema);
}
