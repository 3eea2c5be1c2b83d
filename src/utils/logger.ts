// Simple logger with millisecond precision
// Format: timestamp [LEVEL] module: message
// Console gets the operator view, the file sink keeps the full audit trail

import { appendFileSync } from "node:fs";

type LogOutput = (message: string) => void;
export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

export function parseLogLevel(raw: string | undefined, fallback: LogLevel): LogLevel {
	const value = (raw ?? "").trim().toLowerCase();
	return value === "debug" || value === "info" || value === "warn" || value === "error" ? value : fallback;
}

let outputFn: LogOutput = (msg) => console.log(msg);
let errorFn: LogOutput = (msg) => console.error(msg);
let minLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL, "info");

let fileOutput: LogOutput | null = null;
let fileLevel: LogLevel = "debug";

function timestamp(): string {
	return new Date().toISOString();
}

function formatArg(a: unknown): string {
	if (a instanceof Error) {
		return a.stack || a.message;
	}
	if (typeof a === "object" && a !== null) {
		return JSON.stringify(a, (_key, value: unknown) =>
			typeof value === "bigint" ? value.toString() : value,
		);
	}
	return String(a);
}

function format(level: string, module: string, message: string, ...args: unknown[]): string {
	const argStr = args.length > 0 ? ` ${args.map(formatArg).join(" ")}` : "";
	return `${timestamp()} [${level}] ${module}: ${message}${argStr}`;
}

function emit(level: LogLevel, module: string, message: string, args: unknown[]): void {
	const toConsole = LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[minLevel];
	const toFile = fileOutput !== null && LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[fileLevel];
	if (!toConsole && !toFile) return;

	const line = format(level.toUpperCase(), module, message, ...args);
	if (toConsole) {
		(level === "error" ? errorFn : outputFn)(line);
	}
	if (toFile && fileOutput) {
		fileOutput(line);
	}
}

export interface LoggingOptions {
	readonly file?: string;
	readonly consoleLevel?: LogLevel;
	readonly fileLevel?: LogLevel;
}

// Append-only audit file; written synchronously so nothing is lost on exit
export function configureLogging(options: LoggingOptions): void {
	if (options.consoleLevel) {
		minLevel = options.consoleLevel;
	}
	fileLevel = options.fileLevel ?? "debug";
	const file = options.file;
	fileOutput = file ? (line) => appendFileSync(file, `${line}\n`) : null;
}

export interface Logger {
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
	debug(message: string, ...args: unknown[]): void;
}

export function createLogger(module: string): Logger {
	return {
		info: (message, ...args) => emit("info", module, message, args),
		warn: (message, ...args) => emit("warn", module, message, args),
		error: (message, ...args) => emit("error", module, message, args),
		debug: (message, ...args) => emit("debug", module, message, args),
	};
}

const root = createLogger("desk");

export const log = {
	...root,

	setOutput(fn: LogOutput): void {
		outputFn = fn;
		errorFn = fn;
	},

	setFileOutput(fn: LogOutput | null, level: LogLevel = "debug"): void {
		fileOutput = fn;
		fileLevel = level;
	},

	setLevel(level: LogLevel): void {
		minLevel = level;
	},

	// Execution specific logs - INFO level with category prefix
	order(
		action: string,
		symbol: string,
		side: string,
		type: string,
		quantity: string,
		price?: string,
	): void {
		const priceStr = price ? ` @ ${price}` : "";
		emit("info", "orders", `ORDER ${action}: ${side} ${type} ${quantity} ${symbol}${priceStr}`, []);
	},

	fill(module: string, side: string, quantity: string, price: string, orderId: string): void {
		emit("info", module, `FILL: ${side} ${quantity} @ ${price} (order ${orderId})`, []);
	},

	banner(title: string): void {
		const width = Math.max(title.length + 8, 39);
		const pad = width - title.length;
		const left = Math.floor(pad / 2);
		outputFn(`
╔${"═".repeat(width)}╗
║${" ".repeat(left)}${title}${" ".repeat(pad - left)}║
╚${"═".repeat(width)}╝
`);
	},

	config(cfg: Record<string, unknown>): void {
		outputFn(format("INFO", "config", "CONFIG:"));
		for (const [key, value] of Object.entries(cfg)) {
			outputFn(`  ${key}: ${formatArg(value)}`);
		}
	},

	shutdown(): void {
		emit("info", "desk", "Shutting down... open orders stay live", []);
	},
};
