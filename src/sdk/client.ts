import { USDMClient } from "binance";
import type { TradingConfig } from "../config.js";
import type { FuturesRestClient } from "../exchange/binance.js";
import { log } from "../utils/logger.js";

const ENDPOINTS = {
	testnet: "https://testnet.binancefuture.com",
	production: "https://fapi.binance.com",
};

export function createFuturesClient(config: TradingConfig): FuturesRestClient {
	if (config.testnet) {
		log.info(`Connecting to Binance USDT-M futures testnet (${ENDPOINTS.testnet})...`);
	} else {
		log.warn(`Connecting to Binance USDT-M futures PRODUCTION (${ENDPOINTS.production}) - real funds at risk`);
	}

	const client = new USDMClient(
		{
			api_key: config.apiKey,
			api_secret: config.apiSecret,
			recvWindow: config.recvWindowMs,
		},
		{ timeout: config.requestTimeoutMs },
		config.testnet,
	);

	return {
		submitNewOrder: (params) => client.submitNewOrder(params),
		getOrder: (params) => client.getOrder(params),
		cancelOrder: (params) => client.cancelOrder(params),
		cancelAllOpenOrders: (params) => client.cancelAllOpenOrders(params),
		getAllOpenOrders: (params) => client.getAllOpenOrders(params),
		getSymbolPriceTicker: (params) => client.getSymbolPriceTicker(params),
		getBalance: () => client.getBalance(),
		getExchangeInfo: () => client.getExchangeInfo(),
	};
}
