import { Command, CommanderError } from "commander";
import * as readline from "readline";
import { fileURLToPath } from "url";
import { loadConfig } from "./config";
import { openConnection } from "./connection";
import { StorageError } from "./errors";
import { createLogger } from "./logger";
import type { SchemaChange } from "./model";
import { describeChange } from "./model";
import { loadModelFile } from "./modelFile";
import type { SchemaPlan } from "./schemaManager";
import { SchemaManager, planStatements } from "./schemaManager";

export interface CliOutput {
	log(line: string): void;
	error(line: string): void;
}

const consoleOutput: CliOutput = {
	log: (line) => console.log(line),
	error: (line) => console.error(line),
};

async function confirm(message: string): Promise<boolean> {
	const rl = readline.createInterface({
		input: process.stdin,
		output: process.stdout,
	});

	return new Promise((resolve) => {
		rl.question(`${message} (y/N) `, (answer) => {
			rl.close();
			resolve(answer.toLowerCase() === "y" || answer.toLowerCase() === "yes");
		});
	});
}

function printChanges(out: CliOutput, title: string, changes: readonly SchemaChange[]): void {
	if (changes.length === 0) return;
	out.log(title);
	for (const change of changes) {
		out.log(`  ${describeChange(change)}`);
	}
}

function printPlan(out: CliOutput, plan: SchemaPlan): void {
	printChanges(out, "Changes to apply:", plan.applicable);
	printChanges(out, "Skipped (destructive, needs --allow-destructive):", plan.skipped);
	printChanges(out, "Blocked (needs a manual data migration):", plan.blocked);
	out.log(`Total: ${plan.applicable.length} change(s) to apply`);
}

interface ConnectionOptions {
	connection?: string;
	file: string;
	schema?: string;
}

function resolveTarget(options: ConnectionOptions): { connectionString: string; schema: string } {
	const config = loadConfig();
	const connectionString = options.connection ?? config.databaseUrl;
	if (connectionString === undefined) {
		throw new Error("No connection string: pass --connection or set DATABASE_URL");
	}
	return { connectionString, schema: options.schema ?? config.schema };
}

export function createProgram(out: CliOutput = consoleOutput): Command {
	const program = new Command();
	const logger = createLogger("cli");

	// Inherited by subcommands
	program
		.exitOverride()
		.configureOutput({
			writeOut: (text) => out.log(text.trimEnd()),
			writeErr: (text) => out.error(text.trimEnd()),
		});

	program
		.name("temporal-schema")
		.description("Synchronize PostgreSQL tables with temporal model declarations")
		.version("0.1.0");

	program
		.command("plan")
		.description("Show the schema changes a sync would make")
		.option("-c, --connection <string>", "PostgreSQL connection string (or pglite:<dir>)")
		.requiredOption("-f, --file <file>", "JSON model file")
		.option("-s, --schema <name>", "Schema for tables that do not name one")
		.option("--allow-destructive", "Count destructive changes as applicable")
		.option("--sql", "Output SQL statements instead of change summary")
		.action(async (options: ConnectionOptions & { allowDestructive?: boolean; sql?: boolean }) => {
			const target = resolveTarget(options);
			const models = loadModelFile(options.file, target.schema);
			const { connection, close } = await openConnection(target.connectionString);
			try {
				const manager = new SchemaManager(connection, { logger });
				const plan = await manager.planSchema(models, { allowDestructive: options.allowDestructive });
				if (plan.changes.length === 0) {
					out.log("Schema is up to date.");
					return;
				}

				if (options.sql) {
					for (const statement of planStatements(plan.applicable)) {
						out.log(`${statement};`);
					}
				} else {
					printPlan(out, plan);
				}
			} finally {
				await close();
			}
		});

	program
		.command("sync")
		.description("Apply schema changes (interactive by default)")
		.option("-c, --connection <string>", "PostgreSQL connection string (or pglite:<dir>)")
		.requiredOption("-f, --file <file>", "JSON model file")
		.option("-s, --schema <name>", "Schema for tables that do not name one")
		.option("--allow-destructive", "Also drop tables and columns that are no longer declared")
		.option("--reason <text>", "Why destructive changes are allowed (required with --allow-destructive)")
		.option("--dry-run", "Report the number of changes without applying them")
		.option("-y, --yes", "Skip confirmation prompt")
		.action(async (options: ConnectionOptions & {
			allowDestructive?: boolean;
			reason?: string;
			dryRun?: boolean;
			yes?: boolean;
		}) => {
			const target = resolveTarget(options);
			const models = loadModelFile(options.file, target.schema);
			const { connection, close } = await openConnection(target.connectionString);
			try {
				const manager = new SchemaManager(connection, { logger });
				const plan = await manager.planSchema(models, { allowDestructive: options.allowDestructive });
				if (plan.changes.length === 0) {
					out.log("Schema is up to date.");
					return;
				}

				printPlan(out, plan);

				if (options.dryRun) {
					const count = await manager.syncSchema(models, { dryRun: true, allowDestructive: options.allowDestructive });
					out.log(`Dry run: ${count} change(s) would be applied.`);
					return;
				}

				if (!options.yes) {
					const confirmed = await confirm("\nApply these changes?");
					if (!confirmed) {
						out.log("Aborted.");
						return;
					}
				}

				const applied = await manager.syncSchema(models, {
					allowDestructive: options.allowDestructive,
					reason: options.reason,
				});
				out.log(`Applied ${applied} change(s).`);
			} finally {
				await close();
			}
		});

	return program;
}

/**
 * Run the CLI with node-style argv and return the exit code.
 */
export async function runCli(argv: readonly string[], out: CliOutput = consoleOutput): Promise<number> {
	const program = createProgram(out);
	try {
		await program.parseAsync([...argv]);
		return 0;
	} catch (error) {
		if (error instanceof CommanderError) {
			// Commander already printed its message
			return error.exitCode;
		}
		const message = error instanceof StorageError
			? `${error.code}: ${error.message}`
			: error instanceof Error ? error.message : String(error);
		out.error(`Error: ${message}`);
		return 1;
	}
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
	runCli(process.argv).then((code) => {
		process.exitCode = code;
	}, (error: unknown) => {
		console.error(error);
		process.exitCode = 1;
	});
}
