// CLI entry point to cancel every open order on a symbol

import "dotenv/config";
import { createGateway } from "../exchange/index.js";
import { log } from "../utils/logger.js";
import { validateSymbol } from "../validation.js";
import { parseArgs } from "./args.js";
import { bootstrap, runCli, usage } from "./runtime.js";

const USAGE = ["Usage: npm run cancel-all -- <SYMBOL>", "Example: npm run cancel-all -- BTCUSDT"];

async function main(): Promise<number> {
	const args = parseArgs(process.argv.slice(2));
	const [raw] = args.positionals;
	if (args.positionals.length !== 1 || !raw) return usage(USAGE);

	const config = bootstrap("CANCEL ALL");
	const symbol = validateSymbol(raw.toUpperCase(), config.quoteAsset);
	const gateway = createGateway(config);

	const open = await gateway.getOpenOrders(symbol);
	if (open.length === 0) {
		log.info(`No open ${symbol} orders`);
		return 0;
	}
	await gateway.cancelAllOpenOrders(symbol);
	log.info(`Cancelled ${open.length} open ${symbol} orders: ${open.map((o) => `#${o.orderId}`).join(", ")}`);
	return 0;
}

runCli(main);
