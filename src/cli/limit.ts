// CLI entry point for limit orders

import "dotenv/config";
import { createGateway } from "../exchange/index.js";
import { formatHandle, placeLimitOrder } from "../sdk/orders.js";
import { log } from "../utils/logger.js";
import { parseArgs } from "./args.js";
import { bootstrap, runCli, usage } from "./runtime.js";

const USAGE = [
	"Usage: npm run limit -- <SYMBOL> <BUY|SELL> <QUANTITY> <PRICE> [--tif GTC|IOC|FOK] [--reduce-only]",
	"Example: npm run limit -- BTCUSDT SELL 0.001 65000 --tif GTC",
];

async function main(): Promise<number> {
	const args = parseArgs(process.argv.slice(2), { booleans: ["reduce-only"], values: ["tif"] });
	const [symbol, side, quantity, price] = args.positionals;
	if (args.positionals.length !== 4 || !symbol || !side || !quantity || !price) return usage(USAGE);

	const config = bootstrap("LIMIT ORDER");
	const gateway = createGateway(config);
	const order = await placeLimitOrder(
		gateway,
		{
			symbol: symbol.toUpperCase(),
			side: side.toUpperCase(),
			quantity,
			price,
			timeInForce: (args.values.get("tif") ?? "GTC").toUpperCase(),
			reduceOnly: args.flags.has("reduce-only") || undefined,
		},
		config.quoteAsset,
	);

	log.info(`Done: ${formatHandle(order)}`);
	return 0;
}

runCli(main);
