// Command-line argument helpers shared by the entry points

import { InputValidationError } from "../errors.js";

export interface ArgSpec {
	readonly booleans?: readonly string[]; // --name
	readonly values?: readonly string[]; // --name VALUE or --name=VALUE
}

export interface ParsedArgs {
	readonly positionals: readonly string[];
	readonly flags: ReadonlySet<string>;
	readonly values: ReadonlyMap<string, string>;
}

export function parseArgs(argv: readonly string[], spec: ArgSpec = {}): ParsedArgs {
	const booleans = spec.booleans ?? [];
	const valueNames = spec.values ?? [];
	const positionals: string[] = [];
	const flags = new Set<string>();
	const values = new Map<string, string>();

	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (token === undefined) continue;
		if (token === "--") {
			positionals.push(...argv.slice(i + 1));
			break;
		}
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}

		let name = token.slice(2);
		let value: string | undefined;
		const eq = name.indexOf("=");
		if (eq >= 0) {
			value = name.slice(eq + 1);
			name = name.slice(0, eq);
		}

		if (booleans.includes(name)) {
			if (value !== undefined) {
				throw new InputValidationError(name, value, `Option --${name} does not take a value`);
			}
			flags.add(name);
		} else if (valueNames.includes(name)) {
			if (value === undefined) {
				value = argv[i + 1];
				i++;
			}
			if (value === undefined || value === "") {
				throw new InputValidationError(name, value, `Option --${name} needs a value`);
			}
			values.set(name, value);
		} else {
			throw new InputValidationError(name, token, `Unknown option --${name}`);
		}
	}

	return { positionals, flags, values };
}

export function readNumber(raw: string, field: string): number {
	const parsed = Number(raw);
	if (raw.trim() === "" || !Number.isFinite(parsed)) {
		throw new InputValidationError(field, raw, `${field} must be a number, got "${raw}"`);
	}
	return parsed;
}

export function readInteger(raw: string, field: string): number {
	const parsed = readNumber(raw, field);
	if (!Number.isInteger(parsed)) {
		throw new InputValidationError(field, raw, `${field} must be a whole number, got "${raw}"`);
	}
	return parsed;
}

export function readIntegerOption(args: ParsedArgs, name: string, fallback: number, min = 0): number {
	const raw = args.values.get(name);
	if (raw === undefined) return fallback;
	const parsed = readInteger(raw, name);
	if (parsed < min) {
		throw new InputValidationError(name, raw, `--${name} must be at least ${min}, got ${parsed}`);
	}
	return parsed;
}
