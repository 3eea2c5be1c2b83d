// Trade history CSV: overall and per-coin performance

import { countBy, groupBy, orderBy, sumBy, uniqBy } from "lodash-es";
import { z } from "zod";
import type { Side } from "../types.js";
import { createLogger } from "../utils/logger.js";
import { formatCount, formatUsd, parseCsvRecords, RULE, readDataFile, THIN_RULE } from "./format.js";

const log = createLogger("history");

export const DEFAULT_TRADE_HISTORY_FILE = "historical_data.csv";

export interface Trade {
	readonly coin: string;
	readonly price: number;
	readonly sizeTokens: number;
	readonly sizeUsd: number;
	readonly side: Side | "";
	readonly timestamp: string;
	readonly direction: string;
	readonly closedPnl: number;
	readonly fee: number;
	readonly orderId: string;
}

export interface OverallStats {
	readonly totalTrades: number;
	readonly uniqueCoins: number;
	readonly totalVolumeUsd: number;
	readonly realizedPnl: number;
	readonly totalFees: number;
	readonly netPnl: number;
	readonly buyTrades: number;
	readonly sellTrades: number;
}

export interface CoinStats {
	readonly coin: string;
	readonly trades: number;
	readonly volumeUsd: number;
	readonly realizedPnl: number;
	readonly fees: number;
	readonly netPnl: number;
	readonly winRate: number; // Profitable closes over all closes, in percent
	readonly avgTradeUsd: number;
}

// Blank numeric cells count as zero; text that is not a number drops the row
const numeric = z.preprocess((v) => (v === "" || v === undefined ? 0 : v), z.coerce.number().finite());
const text = z.string().optional().default("");

const tradeRowSchema = z.object({
	Coin: text,
	"Execution Price": numeric,
	"Size Tokens": numeric,
	"Size USD": numeric,
	Side: text,
	"Timestamp IST": text,
	Direction: text,
	"Closed PnL": numeric,
	Fee: numeric,
	"Order ID": text,
});

export function parseTradeHistory(csvText: string): Trade[] {
	const records = z.array(z.unknown()).parse(parseCsvRecords(csvText));
	const trades: Trade[] = [];
	let skipped = 0;

	for (const record of records) {
		const row = tradeRowSchema.safeParse(record);
		if (!row.success) {
			skipped++;
			continue;
		}
		const side = row.data.Side.toUpperCase();
		trades.push({
			coin: row.data.Coin,
			price: row.data["Execution Price"],
			sizeTokens: row.data["Size Tokens"],
			sizeUsd: row.data["Size USD"],
			side: side === "BUY" || side === "SELL" ? side : "",
			timestamp: row.data["Timestamp IST"],
			direction: row.data.Direction,
			closedPnl: row.data["Closed PnL"],
			fee: row.data.Fee,
			orderId: row.data["Order ID"],
		});
	}

	if (skipped > 0) {
		log.warn(`Skipped ${skipped} malformed rows`);
	}
	return trades;
}

export function loadTradeHistory(path: string = DEFAULT_TRADE_HISTORY_FILE): Trade[] {
	const trades = parseTradeHistory(readDataFile(path));
	log.info(`Loaded ${trades.length} trades from ${path}`);
	return trades;
}

export function analyzeOverall(trades: readonly Trade[]): OverallStats {
	const sides = countBy(trades, (t) => t.side);
	const realizedPnl = sumBy(trades, (t) => t.closedPnl);
	const totalFees = sumBy(trades, (t) => t.fee);
	return {
		totalTrades: trades.length,
		uniqueCoins: uniqBy(trades, (t) => t.coin).length,
		totalVolumeUsd: sumBy(trades, (t) => t.sizeUsd),
		realizedPnl,
		totalFees,
		netPnl: realizedPnl - totalFees,
		buyTrades: sides.BUY ?? 0,
		sellTrades: sides.SELL ?? 0,
	};
}

// Sorted by volume, largest first
export function analyzeByCoin(trades: readonly Trade[]): CoinStats[] {
	const stats = Object.entries(groupBy(trades, (t) => t.coin)).map(([coin, coinTrades]): CoinStats => {
		const volumeUsd = sumBy(coinTrades, (t) => t.sizeUsd);
		const realizedPnl = sumBy(coinTrades, (t) => t.closedPnl);
		const fees = sumBy(coinTrades, (t) => t.fee);
		const closes = coinTrades.filter((t) => t.closedPnl !== 0);
		const wins = closes.filter((t) => t.closedPnl > 0);
		return {
			coin,
			trades: coinTrades.length,
			volumeUsd,
			realizedPnl,
			fees,
			netPnl: realizedPnl - fees,
			winRate: closes.length > 0 ? (wins.length / closes.length) * 100 : 0,
			avgTradeUsd: coinTrades.length > 0 ? volumeUsd / coinTrades.length : 0,
		};
	});
	return orderBy(stats, [(s) => s.volumeUsd], ["desc"]);
}

export interface TradeReportOptions {
	readonly coin?: string;
	readonly top?: number;
}

// Coin left-aligned, numbers right-aligned
const COLUMN_WIDTHS = [10, 8, 14, 14, 7, 12];

function tableRow(cells: readonly string[]): string {
	const padded = cells.map((cell, i) =>
		i === 0 ? cell.padEnd(COLUMN_WIDTHS[0] ?? 0) : cell.padStart(COLUMN_WIDTHS[i] ?? 0),
	);
	return `  ${padded.join(" ")}`;
}

export function renderTradeReport(trades: readonly Trade[], options: TradeReportOptions = {}): string[] {
	const top = options.top ?? 10;
	const coin = options.coin;
	const selected = coin ? trades.filter((t) => t.coin.toUpperCase() === coin.toUpperCase()) : trades;
	if (selected.length === 0) {
		return [coin ? `No trades found for coin: ${coin}` : "No trades found"];
	}

	const overall = analyzeOverall(selected);
	const coins = analyzeByCoin(selected).slice(0, top);

	const lines = [RULE, "  Historical Trade Analysis Report", RULE];
	if (coin) lines.push(`  Filter         : ${coin}`);
	lines.push(
		`  Total Trades   : ${formatCount(overall.totalTrades)}`,
		`  Unique Coins   : ${overall.uniqueCoins}`,
		`  Total Volume   : ${formatUsd(overall.totalVolumeUsd)}`,
		`  Realized PnL   : ${formatUsd(overall.realizedPnl)}`,
		`  Total Fees     : ${formatUsd(overall.totalFees)}`,
		`  Net PnL        : ${formatUsd(overall.netPnl)}`,
		`  Buy/Sell Split : ${overall.buyTrades} / ${overall.sellTrades}`,
		"",
		THIN_RULE,
		`  Top ${coins.length} Coins by Volume`,
		THIN_RULE,
		tableRow(["Coin", "Trades", "Volume", "Net PnL", "Win%", "Avg Trade"]),
	);
	for (const s of coins) {
		lines.push(
			tableRow([
				s.coin,
				formatCount(s.trades),
				formatUsd(s.volumeUsd),
				formatUsd(s.netPnl),
				`${s.winRate.toFixed(1)}%`,
				formatUsd(s.avgTradeUsd),
			]),
		);
	}
	lines.push(RULE);
	return lines;
}
