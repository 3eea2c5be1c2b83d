// Report formatting helpers

import { existsSync, readFileSync } from "node:fs";
import { parse } from "csv-parse/sync";
import { InputValidationError } from "../errors.js";

export const RULE = "=".repeat(65);
export const THIN_RULE = "-".repeat(65);

const usd = new Intl.NumberFormat("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 });
const count = new Intl.NumberFormat("en-US");

// 1234.5 -> "$1,234.50", -3 -> "-$3.00"
export function formatUsd(value: number): string {
	return `${value < 0 ? "-" : ""}$${usd.format(Math.abs(value))}`;
}

export function formatCount(value: number): string {
	return count.format(value);
}

export function percent(part: number, whole: number): string {
	return whole > 0 ? ((part / whole) * 100).toFixed(1) : "0.0";
}

// Header-keyed records; every value is a trimmed string
export function parseCsvRecords(text: string): unknown {
	return parse(text, {
		columns: true,
		skip_empty_lines: true,
		trim: true,
		relax_column_count: true,
		bom: true,
	});
}

export function readDataFile(path: string): string {
	if (!existsSync(path)) {
		throw new InputValidationError("file", path, `Data file not found: ${path}`);
	}
	return readFileSync(path, "utf-8");
}
