// OcoCoordinator configuration

import type { TradingConfig } from "../../config.js";

export interface OcoConfig {
	readonly quoteAsset: string;
	readonly pollIntervalMs: number; // Between status checks of both legs
	readonly maxMonitorMs: number; // Stop watching after this, orders stay live
}

export const DEFAULT_OCO_CONFIG: OcoConfig = {
	quoteAsset: "USDT",
	pollIntervalMs: 5000,
	maxMonitorMs: 24 * 60 * 60 * 1000, // 24 hours
};

export function ocoConfigFrom(config: TradingConfig): OcoConfig {
	return {
		quoteAsset: config.quoteAsset,
		pollIntervalMs: config.ocoPollIntervalMs,
		maxMonitorMs: config.ocoMaxMonitorMs,
	};
}
