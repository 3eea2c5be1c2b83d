// Process plumbing for the entry points: config, logging, signals, exit codes

import { type Env, loadConfig, type TradingConfig, validateConfig } from "../config.js";
import { describeError, InputValidationError, TradingError } from "../errors.js";
import { configureLogging, log } from "../utils/logger.js";

// Console and audit file are set up before main runs, so argument errors are logged too
function startLogging(env: Env): void {
	const config = loadConfig(env);
	configureLogging({ file: config.logFile, consoleLevel: config.consoleLogLevel, fileLevel: "debug" });
}

export function bootstrap(title: string): TradingConfig {
	const config = loadConfig();
	log.banner(title);
	validateConfig(config);
	return config;
}

// First signal stops the loops cooperatively, a second one exits at once.
// beforeAbort runs on the first signal, ahead of the abort.
export function registerShutdownHandlers(beforeAbort?: () => void): AbortSignal {
	const controller = new AbortController();
	const shutdown = (): void => {
		if (controller.signal.aborted) {
			log.warn("Second interrupt, exiting now");
			process.exit(130);
		}
		if (beforeAbort) {
			beforeAbort();
		} else {
			log.shutdown();
		}
		controller.abort();
	};
	process.on("SIGINT", shutdown);
	process.on("SIGTERM", shutdown);
	return controller.signal;
}

export function usage(lines: readonly string[]): number {
	for (const line of lines) {
		console.error(line);
	}
	return 1;
}

function reportFailure(err: unknown): void {
	if (err instanceof InputValidationError) {
		log.error(`Invalid input: ${err.message}`);
	} else if (err instanceof TradingError) {
		log.error(`Failed: ${describeError(err)}`);
		log.debug("Failure detail:", err);
	} else {
		log.error("Fatal error:", err);
	}
}

// Resolves to the process exit code; every failure is logged first
export async function runMain(main: () => Promise<number>, env: Env = process.env): Promise<number> {
	try {
		startLogging(env);
		return await main();
	} catch (err) {
		reportFailure(err);
		return 1;
	}
}

export function runCli(main: () => Promise<number>): void {
	runMain(main).then(
		(code) => process.exit(code),
		(err: unknown) => {
			console.error("Fatal error:", err);
			process.exit(1);
		},
	);
}
