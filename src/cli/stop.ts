// CLI entry point for stop-limit orders

import "dotenv/config";
import { createGateway } from "../exchange/index.js";
import { formatHandle, placeStopLimitOrder } from "../sdk/orders.js";
import { log } from "../utils/logger.js";
import { parseArgs } from "./args.js";
import { bootstrap, runCli, usage } from "./runtime.js";

const USAGE = [
	"Usage: npm run stop -- <SYMBOL> <BUY|SELL> <QUANTITY> <STOP_PRICE> <LIMIT_PRICE> [--reduce-only]",
	"Example: npm run stop -- BTCUSDT SELL 0.001 58000 57900",
	"SELL stops sit below the market with the limit at or below the stop; BUY mirrors it.",
];

async function main(): Promise<number> {
	const args = parseArgs(process.argv.slice(2), { booleans: ["reduce-only"] });
	const [symbol, side, quantity, stopPrice, limitPrice] = args.positionals;
	if (args.positionals.length !== 5 || !symbol || !side || !quantity || !stopPrice || !limitPrice) {
		return usage(USAGE);
	}

	const config = bootstrap("STOP-LIMIT ORDER");
	const gateway = createGateway(config);
	const order = await placeStopLimitOrder(
		gateway,
		{
			symbol: symbol.toUpperCase(),
			side: side.toUpperCase(),
			quantity,
			stopPrice,
			limitPrice,
			reduceOnly: args.flags.has("reduce-only") || undefined,
		},
		config.quoteAsset,
	);

	log.info(`Done: ${formatHandle(order)}`);
	return 0;
}

runCli(main);
