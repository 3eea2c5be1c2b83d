// CLI entry point for the trade history report

import "dotenv/config";
import { DEFAULT_TRADE_HISTORY_FILE, loadTradeHistory, renderTradeReport } from "../analysis/tradeHistory.js";
import { parseArgs, readIntegerOption } from "./args.js";
import { runCli, usage } from "./runtime.js";

const USAGE = [
	"Usage: npm run history -- [--file PATH] [--coin COIN] [--top N]",
	"Example: npm run history -- --coin BTC --top 5",
];

async function main(): Promise<number> {
	const args = parseArgs(process.argv.slice(2), { values: ["file", "coin", "top"] });
	if (args.positionals.length > 0) return usage(USAGE);
	const top = readIntegerOption(args, "top", 10, 1);

	const trades = loadTradeHistory(args.values.get("file") ?? DEFAULT_TRADE_HISTORY_FILE);
	const lines = renderTradeReport(trades, { coin: args.values.get("coin"), top });
	process.stdout.write(`${lines.join("\n")}\n`);
	return 0;
}

runCli(main);
