// CLI entry point for OCO (take-profit + stop-loss) pairs

import "dotenv/config";
import { ocoConfigFrom } from "../bots/oco/config.js";
import { OcoCoordinator } from "../bots/oco/index.js";
import { createGateway } from "../exchange/index.js";
import { log } from "../utils/logger.js";
import { parseArgs } from "./args.js";
import { ocoExitCode } from "./outcomes.js";
import { bootstrap, registerShutdownHandlers, runCli, usage } from "./runtime.js";

const USAGE = [
	"Usage: npm run oco -- <SYMBOL> <BUY|SELL> <QUANTITY> <TAKE_PROFIT> <STOP_LOSS> [--no-monitor]",
	"Example: npm run oco -- BTCUSDT SELL 0.001 65000 58000",
	"SIDE is the side of both exit orders: SELL closes a long, BUY closes a short.",
];

async function main(): Promise<number> {
	const args = parseArgs(process.argv.slice(2), { booleans: ["no-monitor"] });
	const [symbol, side, quantity, takeProfitPrice, stopLossPrice] = args.positionals;
	if (args.positionals.length !== 5 || !symbol || !side || !quantity || !takeProfitPrice || !stopLossPrice) {
		return usage(USAGE);
	}

	const config = bootstrap("OCO ORDER");
	const gateway = createGateway(config);
	const signal = registerShutdownHandlers();
	const coordinator = new OcoCoordinator(gateway, ocoConfigFrom(config), { signal });

	const result = await coordinator.execute({
		symbol: symbol.toUpperCase(),
		side: side.toUpperCase(),
		quantity,
		takeProfitPrice,
		stopLossPrice,
		monitor: !args.flags.has("no-monitor"),
	});

	const { takeProfit, stopLoss } = result.pair;
	switch (result.outcome) {
		case "placed":
			log.info(
				`OCO live: TP #${takeProfit.orderId}, SL #${stopLoss.orderId} ` +
					"(not monitored, cancel the other leg yourself)",
			);
			break;
		case "filled":
			log.info(`OCO resolved by ${result.resolvedLeg} at ${result.fillPrice.toFixed()}`);
			break;
		case "leg-terminated":
			log.error(`OCO ${result.leg} ended ${result.legStatus}, pair closed without a fill`);
			break;
		case "aborted":
		case "timeout":
			log.warn(`OCO ${result.outcome}: TP #${takeProfit.orderId} and SL #${stopLoss.orderId} are still live`);
			break;
	}
	return ocoExitCode(result);
}

runCli(main);
