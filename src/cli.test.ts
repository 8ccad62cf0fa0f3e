import { describe, test, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type { CliOutput } from "./cli";
import { runCli } from "./cli";

interface Captured {
	readonly lines: string[];
	readonly errors: string[];
	readonly out: CliOutput;
}

function capture(): Captured {
	const lines: string[] = [];
	const errors: string[] = [];
	return {
		lines,
		errors,
		out: {
			log: (line) => lines.push(line),
			error: (line) => errors.push(line),
		},
	};
}

function itemsModel(priceType: "float" | "decimal"): string {
	return JSON.stringify({
		tables: [{
			name: "items",
			multiTenant: false,
			softDelete: false,
			columns: [{ name: "price", type: priceType }],
		}],
	});
}

describe("CLI", () => {
	let dir: string;
	let modelPath: string;
	let connection: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "temporal-schema-cli-"));
		modelPath = path.join(dir, "model.json");
		connection = `pglite:${path.join(dir, "db")}`;
		fs.writeFileSync(modelPath, itemsModel("float"));
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	async function run(...args: string[]): Promise<Captured & { code: number }> {
		const captured = capture();
		const code = await runCli(["node", "temporal-schema", ...args], captured.out);
		return { ...captured, code };
	}

	test("plan lists the changes a sync would make", async () => {
		const result = await run("plan", "-c", connection, "-f", modelPath);

		expect(result.code).toBe(0);
		expect(result.lines).toEqual([
			"Changes to apply:",
			"  add_table public.items",
			"Total: 1 change(s) to apply",
		]);
	});

	test("plan --sql prints the DDL", async () => {
		const result = await run("plan", "-c", connection, "-f", modelPath, "--sql");

		expect(result.code).toBe(0);
		expect(result.lines).toEqual([[
			'CREATE TABLE "public"."items" (',
			'  "id" uuid NOT NULL,',
			'  "price" double precision,',
			'  "created_at" timestamptz NOT NULL DEFAULT now(),',
			'  "updated_at" timestamptz NOT NULL DEFAULT now(),',
			'  "created_by" uuid,',
			'  "updated_by" uuid,',
			'  PRIMARY KEY ("id")',
			");",
		].join("\n")]);
	});

	test("sync applies the changes once", async () => {
		const first = await run("sync", "-c", connection, "-f", modelPath, "-y");
		expect(first.code).toBe(0);
		expect(first.lines).toEqual([
			"Changes to apply:",
			"  add_table public.items",
			"Total: 1 change(s) to apply",
			"Applied 1 change(s).",
		]);

		const second = await run("sync", "-c", connection, "-f", modelPath, "-y");
		expect(second.lines).toEqual(["Schema is up to date."]);
	});

	test("sync --dry-run leaves the database alone", async () => {
		const dryRun = await run("sync", "-c", connection, "-f", modelPath, "--dry-run");
		expect(dryRun.code).toBe(0);
		expect(dryRun.lines[dryRun.lines.length - 1]).toBe("Dry run: 1 change(s) would be applied.");

		const plan = await run("plan", "-c", connection, "-f", modelPath);
		expect(plan.lines).toContain("  add_table public.items");
	});

	test("reports blocked changes with the error code", async () => {
		await run("sync", "-c", connection, "-f", modelPath, "-y");
		fs.writeFileSync(modelPath, itemsModel("decimal"));

		const result = await run("sync", "-c", connection, "-f", modelPath, "-y");
		expect(result.code).toBe(1);
		expect(result.lines).toEqual([
			"Blocked (needs a manual data migration):",
			"  alter_column public.items.price",
			"Total: 0 change(s) to apply",
		]);
		expect(result.errors).toEqual([
			"Error: SCHEMA_CONFLICT: 1 change(s) need a manual data migration: alter_column public.items.price",
		]);
	});

	test("requires a connection string", async () => {
		const saved = process.env.DATABASE_URL;
		delete process.env.DATABASE_URL;
		try {
			const result = await run("plan", "-f", modelPath);
			expect(result.code).toBe(1);
			expect(result.errors).toEqual(["Error: No connection string: pass --connection or set DATABASE_URL"]);
		} finally {
			if (saved !== undefined) process.env.DATABASE_URL = saved;
		}
	});

	test("usage errors come from commander", async () => {
		const missing = await run("plan", "-c", connection);
		expect(missing.code).toBe(1);
		expect(missing.errors).toEqual(["error: required option '-f, --file <file>' not specified"]);

		const version = await run("--version");
		expect(version.code).toBe(0);
		expect(version.lines).toEqual(["0.1.0"]);
	});
});
