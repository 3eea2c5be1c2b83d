// CLI entry point for TWAP execution

import "dotenv/config";
import { twapConfigFrom } from "../bots/twap/config.js";
import { TwapExecutor } from "../bots/twap/index.js";
import { createGateway } from "../exchange/index.js";
import { log } from "../utils/logger.js";
import { parseArgs, readInteger, readNumber } from "./args.js";
import { twapExitCode } from "./outcomes.js";
import { bootstrap, registerShutdownHandlers, runCli, usage } from "./runtime.js";

const USAGE = [
	"Usage: npm run twap -- <SYMBOL> <BUY|SELL> <TOTAL_QUANTITY> <DURATION_SECONDS> <CHUNKS>",
	"Example: npm run twap -- BTCUSDT BUY 0.01 600 5",
];

async function main(): Promise<number> {
	const args = parseArgs(process.argv.slice(2));
	const [symbol, side, quantity, duration, chunks] = args.positionals;
	if (args.positionals.length !== 5 || !symbol || !side || !quantity || !duration || !chunks) {
		return usage(USAGE);
	}
	const durationSeconds = readNumber(duration, "durationSeconds");
	const chunkCount = readInteger(chunks, "chunkCount");

	const config = bootstrap("TWAP EXECUTION");
	const gateway = createGateway(config);
	const signal = registerShutdownHandlers();
	const executor = new TwapExecutor(gateway, twapConfigFrom(config), { signal });

	const result = await executor.execute({
		symbol: symbol.toUpperCase(),
		side: side.toUpperCase(),
		quantity,
		durationSeconds,
		chunkCount,
	});

	log.config({
		requested: result.requestedQuantity.toFixed(),
		executed: result.executedQuantity.toFixed(),
		averagePrice: result.averagePrice?.toFixed(2) ?? "n/a",
		chunksCompleted: `${result.chunksCompleted}/${result.plan.chunkCount}`,
		failedChunks: result.failures.map((f) => f.index + 1).join(", ") || "none",
		interrupted: result.aborted,
	});
	return twapExitCode(result);
}

runCli(main);
