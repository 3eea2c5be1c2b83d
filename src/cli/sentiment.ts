// CLI entry point for the Fear & Greed sentiment report

import "dotenv/config";
import { DEFAULT_FEAR_GREED_FILE, loadFearGreed, renderSentimentReport } from "../analysis/fearGreed.js";
import { parseArgs, readIntegerOption } from "./args.js";
import { runCli, usage } from "./runtime.js";

const USAGE = [
	"Usage: npm run sentiment -- [--file PATH] [--latest N] [--signal]",
	"Example: npm run sentiment -- --latest 30 --signal",
];

async function main(): Promise<number> {
	const args = parseArgs(process.argv.slice(2), { booleans: ["signal"], values: ["file", "latest"] });
	if (args.positionals.length > 0) return usage(USAGE);
	const latest = readIntegerOption(args, "latest", 0, 0);

	const data = loadFearGreed(args.values.get("file") ?? DEFAULT_FEAR_GREED_FILE);
	const lines = renderSentimentReport(data, { latest, signal: args.flags.has("signal") });
	process.stdout.write(`${lines.join("\n")}\n`);
	return 0;
}

runCli(main);
