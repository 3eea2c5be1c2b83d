import type { TradingConfig } from "../config.js";
import { createFuturesClient } from "../sdk/client.js";
import { log } from "../utils/logger.js";
import { BinanceGateway } from "./binance.js";
import { SimulatedExchange } from "./simulated.js";
import type { ExchangeGateway } from "./types.js";

export type { ExchangeGateway } from "./types.js";

export function createGateway(config: TradingConfig): ExchangeGateway {
	if (config.dryRun) {
		log.warn("DRY_RUN enabled - orders go to the simulated venue, nothing reaches Binance");
		return new SimulatedExchange({ volatility: 25, balances: { [config.quoteAsset]: 10000 } });
	}
	return new BinanceGateway(createFuturesClient(config), config.testnet);
}
