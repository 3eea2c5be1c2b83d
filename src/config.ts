// Runtime configuration - read once from the environment, then passed around

import { InputValidationError } from "./errors.js";
import { type LogLevel, parseLogLevel } from "./utils/logger.js";

export interface TradingConfig {
	readonly apiKey: string;
	readonly apiSecret: string;
	readonly testnet: boolean; // Route to the futures testnet
	readonly dryRun: boolean; // Use the in-process simulated venue
	readonly quoteAsset: string; // Margin asset, symbols must end with it
	readonly logFile: string; // Append-only audit log
	readonly consoleLogLevel: LogLevel;
	readonly requestTimeoutMs: number; // Per REST call
	readonly recvWindowMs: number;
	readonly ocoPollIntervalMs: number;
	readonly ocoMaxMonitorMs: number; // OCO gives up watching after this
	readonly gridPollIntervalMs: number;
	readonly gridMaxConsecutiveFailures: number;
	readonly transientRetryDelayMs: number; // Wait before retrying a rate-limited or dropped call
}

export const DEFAULT_CONFIG: TradingConfig = {
	apiKey: "",
	apiSecret: "",
	testnet: true,
	dryRun: false,
	quoteAsset: "USDT",
	logFile: "bot.log",
	consoleLogLevel: "info",
	requestTimeoutMs: 10000,
	recvWindowMs: 5000,
	ocoPollIntervalMs: 5000,
	ocoMaxMonitorMs: 24 * 60 * 60 * 1000, // 24 hours
	gridPollIntervalMs: 10000,
	gridMaxConsecutiveFailures: 3,
	transientRetryDelayMs: 5000,
};

const PLACEHOLDER_KEYS = ["your_api_key_here", "your_api_secret_here"];

export type Env = Readonly<Record<string, string | undefined>>;

function parseEnvNumber(env: Env, name: string, fallback: number): number {
	const raw = env[name];
	if (!raw) return fallback;
	const parsed = Number(raw);
	return Number.isFinite(parsed) ? parsed : fallback;
}

function parseEnvBoolean(env: Env, name: string, fallback: boolean): boolean {
	const raw = env[name];
	if (!raw) return fallback;
	const value = raw.trim().toLowerCase();
	if (["1", "true", "yes", "on"].includes(value)) return true;
	if (["0", "false", "no", "off"].includes(value)) return false;
	return fallback;
}

export function loadConfig(env: Env = process.env): TradingConfig {
	return Object.freeze({
		apiKey: (env.BINANCE_API_KEY ?? "").trim(),
		apiSecret: (env.BINANCE_API_SECRET ?? "").trim(),
		testnet: parseEnvBoolean(env, "USE_TESTNET", DEFAULT_CONFIG.testnet),
		dryRun: parseEnvBoolean(env, "DRY_RUN", DEFAULT_CONFIG.dryRun),
		quoteAsset: (env.QUOTE_ASSET ?? DEFAULT_CONFIG.quoteAsset).trim().toUpperCase(),
		logFile: env.LOG_FILE ?? DEFAULT_CONFIG.logFile,
		consoleLogLevel: parseLogLevel(env.LOG_LEVEL, DEFAULT_CONFIG.consoleLogLevel),
		requestTimeoutMs: parseEnvNumber(env, "REQUEST_TIMEOUT_MS", DEFAULT_CONFIG.requestTimeoutMs),
		recvWindowMs: parseEnvNumber(env, "RECV_WINDOW_MS", DEFAULT_CONFIG.recvWindowMs),
		ocoPollIntervalMs: parseEnvNumber(env, "OCO_POLL_MS", DEFAULT_CONFIG.ocoPollIntervalMs),
		ocoMaxMonitorMs: parseEnvNumber(env, "OCO_MAX_MONITOR_MS", DEFAULT_CONFIG.ocoMaxMonitorMs),
		gridPollIntervalMs: parseEnvNumber(env, "GRID_POLL_MS", DEFAULT_CONFIG.gridPollIntervalMs),
		gridMaxConsecutiveFailures: parseEnvNumber(
			env,
			"GRID_MAX_FAILURES",
			DEFAULT_CONFIG.gridMaxConsecutiveFailures,
		),
		transientRetryDelayMs: parseEnvNumber(env, "RETRY_DELAY_MS", DEFAULT_CONFIG.transientRetryDelayMs),
	});
}

export function validateConfig(config: TradingConfig): void {
	if (!config.dryRun) {
		if (!config.apiKey || PLACEHOLDER_KEYS.includes(config.apiKey)) {
			throw new InputValidationError("BINANCE_API_KEY", "", "BINANCE_API_KEY is required (or set DRY_RUN=true)");
		}
		if (!config.apiSecret || PLACEHOLDER_KEYS.includes(config.apiSecret)) {
			throw new InputValidationError(
				"BINANCE_API_SECRET",
				"",
				"BINANCE_API_SECRET is required (or set DRY_RUN=true)",
			);
		}
	}
	if (!config.quoteAsset) {
		throw new InputValidationError("QUOTE_ASSET", config.quoteAsset, "QUOTE_ASSET must not be empty");
	}
	const intervals: Array<[string, number]> = [
		["REQUEST_TIMEOUT_MS", config.requestTimeoutMs],
		["RECV_WINDOW_MS", config.recvWindowMs],
		["OCO_POLL_MS", config.ocoPollIntervalMs],
		["OCO_MAX_MONITOR_MS", config.ocoMaxMonitorMs],
		["GRID_POLL_MS", config.gridPollIntervalMs],
		["RETRY_DELAY_MS", config.transientRetryDelayMs],
	];
	for (const [name, value] of intervals) {
		if (value < 0) {
			throw new InputValidationError(name, value, `${name} must not be negative`);
		}
	}
	if (!Number.isInteger(config.gridMaxConsecutiveFailures) || config.gridMaxConsecutiveFailures < 1) {
		throw new InputValidationError(
			"GRID_MAX_FAILURES",
			config.gridMaxConsecutiveFailures,
			"GRID_MAX_FAILURES must be a positive integer",
		);
	}
}

function maskKey(key: string): string {
	return key ? `${key.slice(0, 4)}****` : "(not set)";
}

// Safe to print: credentials are masked
export function describeConfig(config: TradingConfig): Record<string, unknown> {
	return {
		venue: config.dryRun
			? "simulated (dry run)"
			: config.testnet
				? "Binance futures testnet"
				: "Binance futures PRODUCTION",
		apiKey: maskKey(config.apiKey),
		quoteAsset: config.quoteAsset,
		logFile: config.logFile,
		requestTimeoutMs: config.requestTimeoutMs,
		ocoPollIntervalMs: config.ocoPollIntervalMs,
		gridPollIntervalMs: config.gridPollIntervalMs,
		gridMaxConsecutiveFailures: config.gridMaxConsecutiveFailures,
	};
}
