// Fear & Greed index CSV: sentiment statistics and a contrarian signal

import { countBy, maxBy, meanBy, minBy, orderBy } from "lodash-es";
import { z } from "zod";
import { createLogger } from "../utils/logger.js";
import { parseCsvRecords, percent, RULE, readDataFile, THIN_RULE } from "./format.js";

const log = createLogger("sentiment");

export const DEFAULT_FEAR_GREED_FILE = "fear_greed_index.csv";

export const EXTREME_FEAR_THRESHOLD = 25;
export const FEAR_THRESHOLD = 45;
export const GREED_THRESHOLD = 55;
export const EXTREME_GREED_THRESHOLD = 75;

const CLASSIFICATIONS = ["Extreme Fear", "Fear", "Neutral", "Greed", "Extreme Greed"] as const;
export type SentimentLabel = (typeof CLASSIFICATIONS)[number];

export type ContrarianSignal = "BUY" | "ACCUMULATE" | "NEUTRAL" | "CAUTION" | "SELL";

const SIGNAL_TEXT: Record<ContrarianSignal, string> = {
	BUY: "BUY SIGNAL - market is in Extreme Fear (potential bottom)",
	ACCUMULATE: "ACCUMULATE - market is fearful (cautious buying)",
	NEUTRAL: "NEUTRAL - no clear sentiment-based signal",
	CAUTION: "CAUTION - market is greedy (consider taking profits)",
	SELL: "SELL SIGNAL - market is in Extreme Greed (potential top)",
};

export interface SentimentReading {
	readonly date: string;
	readonly value: number;
	readonly classification: string;
}

export interface SentimentStats {
	readonly periodStart: string;
	readonly periodEnd: string;
	readonly totalDays: number;
	readonly average: number;
	readonly min: number;
	readonly max: number;
	readonly latest: SentimentReading;
	readonly extremeFearDays: number;
	readonly extremeGreedDays: number;
	readonly distribution: Readonly<Record<string, number>>;
}

const readingSchema = z.object({
	date: z.string().min(1),
	value: z.string().min(1).pipe(z.coerce.number().int().min(0).max(100)),
	classification: z.string().optional().default(""),
});

export function sentimentLabel(value: number): SentimentLabel {
	if (value < EXTREME_FEAR_THRESHOLD) return "Extreme Fear";
	if (value < FEAR_THRESHOLD) return "Fear";
	if (value < GREED_THRESHOLD) return "Neutral";
	if (value < EXTREME_GREED_THRESHOLD) return "Greed";
	return "Extreme Greed";
}

// Contrarian: buy into fear, sell into greed
export function contrarianSignal(value: number): ContrarianSignal {
	if (value < EXTREME_FEAR_THRESHOLD) return "BUY";
	if (value < FEAR_THRESHOLD) return "ACCUMULATE";
	if (value < GREED_THRESHOLD) return "NEUTRAL";
	if (value < EXTREME_GREED_THRESHOLD) return "CAUTION";
	return "SELL";
}

// Sorted by date ascending
export function parseFearGreed(csvText: string): SentimentReading[] {
	const records = z.array(z.unknown()).parse(parseCsvRecords(csvText));
	const readings: SentimentReading[] = [];
	for (const record of records) {
		const row = readingSchema.safeParse(record);
		if (row.success) readings.push(row.data);
	}
	if (readings.length < records.length) {
		log.warn(`Skipped ${records.length - readings.length} malformed rows`);
	}
	return orderBy(readings, [(r) => r.date], ["asc"]);
}

export function loadFearGreed(path: string = DEFAULT_FEAR_GREED_FILE): SentimentReading[] {
	const readings = parseFearGreed(readDataFile(path));
	log.info(`Loaded ${readings.length} Fear & Greed entries from ${path}`);
	return readings;
}

// latest > 0 restricts the window to the most recent readings
export function analyzeSentiment(data: readonly SentimentReading[], latest = 0): SentimentStats | null {
	const window = latest > 0 ? data.slice(-latest) : data;
	const first = window[0];
	const last = window[window.length - 1];
	if (!first || !last) return null;

	return {
		periodStart: first.date,
		periodEnd: last.date,
		totalDays: window.length,
		average: meanBy(window, (r) => r.value),
		min: minBy(window, (r) => r.value)?.value ?? last.value,
		max: maxBy(window, (r) => r.value)?.value ?? last.value,
		latest: last,
		extremeFearDays: window.filter((r) => r.value < EXTREME_FEAR_THRESHOLD).length,
		extremeGreedDays: window.filter((r) => r.value >= EXTREME_GREED_THRESHOLD).length,
		distribution: countBy(window, (r) => r.classification),
	};
}

export interface SentimentReportOptions {
	readonly latest?: number;
	readonly signal?: boolean;
}

export function renderSentimentReport(
	data: readonly SentimentReading[],
	options: SentimentReportOptions = {},
): string[] {
	const stats = analyzeSentiment(data, options.latest ?? 0);
	if (!stats) {
		return ["No data to analyze."];
	}
	const { latest, totalDays } = stats;

	const lines = [
		RULE,
		"  Crypto Fear & Greed Index Report",
		RULE,
		`  Latest Reading : ${latest.value}/100 - ${sentimentLabel(latest.value)}`,
		`  Date           : ${latest.date}`,
		`  Period         : ${stats.periodStart} -> ${stats.periodEnd}`,
		`  Total Days     : ${totalDays}`,
		"",
		THIN_RULE,
		"  Statistics",
		THIN_RULE,
		`  Average        : ${stats.average.toFixed(1)}/100`,
		`  Min            : ${stats.min}/100`,
		`  Max            : ${stats.max}/100`,
		`  Extreme Fear   : ${stats.extremeFearDays} days (${percent(stats.extremeFearDays, totalDays)}%)`,
		`  Extreme Greed  : ${stats.extremeGreedDays} days (${percent(stats.extremeGreedDays, totalDays)}%)`,
		"",
		THIN_RULE,
		"  Sentiment Distribution",
		THIN_RULE,
	];

	for (const label of CLASSIFICATIONS) {
		const n = stats.distribution[label] ?? 0;
		const pct = percent(n, totalDays);
		const bar = "#".repeat(Math.floor(Number(pct) / 2));
		lines.push(`  ${label.padEnd(14)} ${String(n).padStart(5)} (${pct.padStart(5)}%) ${bar}`);
	}

	if (options.signal) {
		lines.push(
			"",
			THIN_RULE,
			"  Contrarian Trading Signal",
			THIN_RULE,
			`  ${SIGNAL_TEXT[contrarianSignal(latest.value)]}`,
		);
	}

	lines.push("", THIN_RULE, "  Recent 7-Day Trend", THIN_RULE);
	for (const r of data.slice(-7)) {
		const bar = "|".repeat(Math.floor(r.value / 5));
		lines.push(`  ${r.date}  ${String(r.value).padStart(3)}/100  ${bar}  ${r.classification}`);
	}
	lines.push(RULE);
	return lines;
}
