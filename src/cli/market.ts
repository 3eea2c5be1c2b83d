// CLI entry point for market orders

import "dotenv/config";
import { createGateway } from "../exchange/index.js";
import { formatHandle, placeMarketOrder } from "../sdk/orders.js";
import { log } from "../utils/logger.js";
import { parseArgs } from "./args.js";
import { bootstrap, runCli, usage } from "./runtime.js";

const USAGE = [
	"Usage: npm run market -- <SYMBOL> <BUY|SELL> <QUANTITY> [--reduce-only]",
	"Example: npm run market -- BTCUSDT BUY 0.001",
];

async function main(): Promise<number> {
	const args = parseArgs(process.argv.slice(2), { booleans: ["reduce-only"] });
	const [symbol, side, quantity] = args.positionals;
	if (args.positionals.length !== 3 || !symbol || !side || !quantity) return usage(USAGE);

	const config = bootstrap("MARKET ORDER");
	const gateway = createGateway(config);
	const order = await placeMarketOrder(
		gateway,
		{
			symbol: symbol.toUpperCase(),
			side: side.toUpperCase(),
			quantity,
			reduceOnly: args.flags.has("reduce-only") || undefined,
		},
		config.quoteAsset,
	);

	log.info(`Done: ${formatHandle(order)}`);
	return 0;
}

runCli(main);
