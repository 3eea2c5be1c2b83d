// GridExecutor configuration

import type { TradingConfig } from "../../config.js";

export interface GridConfig {
	readonly quoteAsset: string;
	readonly pollIntervalMs: number; // Between sweeps over the pending orders
	readonly maxConsecutiveFailures: number; // Failed sweeps in a row before giving up
}

export const DEFAULT_GRID_CONFIG: GridConfig = {
	quoteAsset: "USDT",
	pollIntervalMs: 10000,
	maxConsecutiveFailures: 3,
};

export function gridConfigFrom(config: TradingConfig): GridConfig {
	return {
		quoteAsset: config.quoteAsset,
		pollIntervalMs: config.gridPollIntervalMs,
		maxConsecutiveFailures: config.gridMaxConsecutiveFailures,
	};
}
