// CLI entry point for grid trading

import "dotenv/config";
import { gridConfigFrom } from "../bots/grid/config.js";
import { GridExecutor } from "../bots/grid/index.js";
import { createGateway } from "../exchange/index.js";
import { log } from "../utils/logger.js";
import { parseArgs, readInteger } from "./args.js";
import { gridExitCode } from "./outcomes.js";
import { bootstrap, registerShutdownHandlers, runCli, usage } from "./runtime.js";

const USAGE = [
	"Usage: npm run grid -- <SYMBOL> <LOWER_PRICE> <UPPER_PRICE> <LEVELS> <QUANTITY_PER_LEVEL>",
	"                       [--no-monitor] [--cancel-on-exit]",
	"Example: npm run grid -- BTCUSDT 58000 62000 10 0.001",
	"Ctrl+C stops monitoring and leaves the grid orders live, or cancels them with --cancel-on-exit.",
];

async function main(): Promise<number> {
	const args = parseArgs(process.argv.slice(2), { booleans: ["no-monitor", "cancel-on-exit"] });
	const [symbol, lower, upper, levels, quantity] = args.positionals;
	if (args.positionals.length !== 5 || !symbol || !lower || !upper || !levels || !quantity) {
		return usage(USAGE);
	}
	const levelCount = readInteger(levels, "levelCount");

	const config = bootstrap("GRID TRADING");
	const gateway = createGateway(config);
	const cancelOnExit = args.flags.has("cancel-on-exit");
	const signal = registerShutdownHandlers(
		cancelOnExit
			? () => {
					log.warn("Interrupted, cancelling every open grid order");
					executor.cancelAll();
				}
			: undefined,
	);
	const executor = new GridExecutor(gateway, gridConfigFrom(config), { signal });

	const result = await executor.execute({
		symbol: symbol.toUpperCase(),
		lowerPrice: lower,
		upperPrice: upper,
		levelCount,
		quantityPerLevel: quantity,
		monitor: !args.flags.has("no-monitor"),
	});

	log.config({
		outcome: result.outcome,
		ordersPlaced: result.ordersPlaced,
		fills: result.fills.length,
		rearmed: result.rearmed.length,
		skippedRearms: result.skippedRearms.length,
		liveOrders: result.levels.filter((l) => l.order).length,
		lastError: result.lastError?.message ?? "none",
	});
	return gridExitCode(result);
}

runCli(main);
