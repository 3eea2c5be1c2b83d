// CLI entry point for account and market status

import "dotenv/config";
import { describeConfig } from "../config.js";
import { createGateway } from "../exchange/index.js";
import { formatHandle } from "../sdk/orders.js";
import { log } from "../utils/logger.js";
import { validateSymbol } from "../validation.js";
import { parseArgs } from "./args.js";
import { bootstrap, runCli, usage } from "./runtime.js";

const USAGE = ["Usage: npm run status -- [SYMBOL]", "Example: npm run status -- BTCUSDT"];

async function main(): Promise<number> {
	const args = parseArgs(process.argv.slice(2));
	if (args.positionals.length > 1) return usage(USAGE);

	const config = bootstrap("ACCOUNT STATUS");
	log.config(describeConfig(config));
	const gateway = createGateway(config);

	const balance = await gateway.getBalance(config.quoteAsset);
	if (balance) {
		log.info(
			`${balance.asset} balance ${balance.balance.toFixed(2)}, available ${balance.availableBalance.toFixed(2)}`,
		);
	} else {
		log.warn(`No ${config.quoteAsset} balance on the account`);
	}

	const [raw] = args.positionals;
	if (raw) {
		const symbol = validateSymbol(raw.toUpperCase(), config.quoteAsset);
		const [price, rules, open] = [
			await gateway.getCurrentPrice(symbol),
			await gateway.getSymbolRules(symbol),
			await gateway.getOpenOrders(symbol),
		];
		log.info(
			`${symbol} ${price.toFixed()} (tick ${rules.tickSize.toFixed()}, ` +
				`step ${rules.stepSize.toFixed()}, min qty ${rules.minQty.toFixed()})`,
		);
		log.info(`${open.length} open orders`);
		for (const order of open) {
			log.info(`  ${formatHandle(order)}`);
		}
	}
	return 0;
}

runCli(main);
