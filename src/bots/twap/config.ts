// TwapExecutor configuration

import type { TradingConfig } from "../../config.js";

export interface TwapConfig {
	readonly quoteAsset: string;
	readonly retryDelayMs: number; // Before resubmitting a chunk after a transient failure
	readonly minIntervalWarnMs: number; // Intervals below this get a warning
}

export const DEFAULT_TWAP_CONFIG: TwapConfig = {
	quoteAsset: "USDT",
	retryDelayMs: 5000,
	minIntervalWarnMs: 1000,
};

export function twapConfigFrom(config: TradingConfig): TwapConfig {
	return {
		...DEFAULT_TWAP_CONFIG,
		quoteAsset: config.quoteAsset,
		retryDelayMs: config.transientRetryDelayMs,
	};
}
