import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import type { Table } from "./types.js";

const NEEDS_QUOTING = /[",\r\n]/;

export function csvEscape(value: unknown): string {
	if (value === null || value === undefined) return "";
	const text = String(value);
	return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** Render a table as CSV: header line first, one line per row, `\n` endings. */
export function toCsv<Row>(
	table: Table<Row>
): string {
	const lines = [table.columns.map(csvEscape).join(",")];
	for (const row of table.rows) {
		lines.push(table.columns.map((column) => csvEscape(row[column])).join(","));
	}
	return `${lines.join("\n")}\n`;
}

/** Write the table to `path`, replacing any existing file. Returns the absolute path. */
export function writeTable<Row>(
	table: Table<Row>,
	path: string
): string {
	const outPath = resolve(path);
	const outDir = dirname(outPath);
	if (!existsSync(outDir)) mkdirSync(outDir, { recursive: true });
	writeFileSync(outPath, toCsv(table), "utf-8");
	return outPath;
}
