// Order builders and single-order placement with validation up front

import type Decimal from "decimal.js";
import type { ExchangeGateway } from "../exchange/types.js";
import type { OrderHandle, OrderRequest, Side, TimeInForce } from "../types.js";
import { createLogger, log as rootLog } from "../utils/logger.js";
import {
	validatePrice,
	validateQuantity,
	validateSide,
	validateStopLimitPrices,
	validateStopPrice,
	validateSymbol,
	validateTimeInForce,
} from "../validation.js";

const log = createLogger("orders");

// Limit prices further than this from the market get a warning
export const PRICE_DEVIATION_WARN = 0.5;

export interface MarketOrderParams {
	readonly symbol: string;
	readonly side: string;
	readonly quantity: Decimal.Value;
	readonly reduceOnly?: boolean;
}

export interface LimitOrderParams extends MarketOrderParams {
	readonly price: Decimal.Value;
	readonly timeInForce?: string;
}

export interface StopLimitOrderParams extends MarketOrderParams {
	readonly stopPrice: Decimal.Value;
	readonly limitPrice: Decimal.Value;
}

export function buildMarketOrder(
	symbol: string,
	side: Side,
	quantity: Decimal,
	reduceOnly?: boolean,
): OrderRequest {
	return { symbol, side, type: "MARKET", quantity, reduceOnly };
}

export function buildLimitOrder(
	symbol: string,
	side: Side,
	quantity: Decimal,
	price: Decimal,
	timeInForce: TimeInForce = "GTC",
	reduceOnly?: boolean,
): OrderRequest {
	return { symbol, side, type: "LIMIT", quantity, price, timeInForce, reduceOnly };
}

export function buildStopLimitOrder(
	symbol: string,
	side: Side,
	quantity: Decimal,
	stopPrice: Decimal,
	limitPrice: Decimal,
	reduceOnly?: boolean,
): OrderRequest {
	return {
		symbol,
		side,
		type: "STOP",
		quantity,
		price: limitPrice,
		stopPrice,
		timeInForce: "GTC",
		reduceOnly,
	};
}

export function buildStopMarketOrder(
	symbol: string,
	side: Side,
	quantity: Decimal,
	stopPrice: Decimal,
): OrderRequest {
	return { symbol, side, type: "STOP_MARKET", quantity, stopPrice };
}

export function buildTakeProfitMarketOrder(
	symbol: string,
	side: Side,
	quantity: Decimal,
	stopPrice: Decimal,
): OrderRequest {
	return { symbol, side, type: "TAKE_PROFIT_MARKET", quantity, stopPrice };
}

// e.g. "SELL STOP 0.001 BTCUSDT stop=58000 limit=57900 GTC"
export function formatOrder(request: OrderRequest): string {
	const parts = [request.side, request.type, request.quantity.toFixed(), request.symbol];
	if (request.stopPrice) parts.push(`stop=${request.stopPrice.toFixed()}`);
	if (request.price) parts.push(`limit=${request.price.toFixed()}`);
	if (request.timeInForce) parts.push(request.timeInForce);
	if (request.reduceOnly) parts.push("reduce-only");
	return parts.join(" ");
}

export function formatHandle(order: OrderHandle): string {
	const avg = order.executedQty.isZero() ? "" : ` avg=${order.avgPrice.toFixed()}`;
	const progress = `${order.executedQty.toFixed()}/${order.quantity.toFixed()}`;
	return `#${order.orderId} ${order.side} ${order.type} ${order.status} ${progress}${avg}`;
}

export async function submitOrder(gateway: ExchangeGateway, request: OrderRequest): Promise<OrderHandle> {
	log.info(`Submitting ${formatOrder(request)}`);
	const order = await gateway.placeOrder(request);
	rootLog.order(
		"ACCEPTED",
		order.symbol,
		order.side,
		order.type,
		order.quantity.toFixed(),
		(order.price ?? order.stopPrice)?.toFixed(),
	);
	log.info(`Order ${formatHandle(order)}`);
	return order;
}

// Reference price for logs only; a failed lookup does not block the order
async function referencePrice(gateway: ExchangeGateway, symbol: string): Promise<Decimal | null> {
	try {
		return await gateway.getCurrentPrice(symbol);
	} catch (err) {
		log.warn(`Could not fetch ${symbol} price:`, err);
		return null;
	}
}

export async function placeMarketOrder(
	gateway: ExchangeGateway,
	params: MarketOrderParams,
	quoteAsset = "USDT",
): Promise<OrderHandle> {
	const symbol = validateSymbol(params.symbol, quoteAsset);
	const side = validateSide(params.side);
	const quantity = validateQuantity(params.quantity);

	const market = await referencePrice(gateway, symbol);
	if (market) {
		log.info(
			`${symbol} at ${market.toFixed()}, est. notional ${market.mul(quantity).toFixed(2)} ${quoteAsset}`,
		);
	}
	return submitOrder(gateway, buildMarketOrder(symbol, side, quantity, params.reduceOnly));
}

export async function placeLimitOrder(
	gateway: ExchangeGateway,
	params: LimitOrderParams,
	quoteAsset = "USDT",
): Promise<OrderHandle> {
	const symbol = validateSymbol(params.symbol, quoteAsset);
	const side = validateSide(params.side);
	const quantity = validateQuantity(params.quantity);
	const price = validatePrice(params.price);
	const timeInForce = validateTimeInForce(params.timeInForce ?? "GTC");

	const market = await referencePrice(gateway, symbol);
	if (market) {
		const deviation = price.sub(market).abs().div(market);
		if (deviation.gt(PRICE_DEVIATION_WARN)) {
			log.warn(
				`Limit price ${price.toFixed()} is ${deviation.mul(100).toFixed(1)}% away from market ${market.toFixed()}`,
			);
		}
	}
	return submitOrder(gateway, buildLimitOrder(symbol, side, quantity, price, timeInForce, params.reduceOnly));
}

export async function placeStopLimitOrder(
	gateway: ExchangeGateway,
	params: StopLimitOrderParams,
	quoteAsset = "USDT",
): Promise<OrderHandle> {
	const symbol = validateSymbol(params.symbol, quoteAsset);
	const side = validateSide(params.side);
	const quantity = validateQuantity(params.quantity);
	const stopPrice = validatePrice(params.stopPrice, "stopPrice");
	const limitPrice = validatePrice(params.limitPrice, "limitPrice");
	validateStopLimitPrices(side, stopPrice, limitPrice);

	const market = await gateway.getCurrentPrice(symbol);
	validateStopPrice(stopPrice, market, side);
	log.info(`${symbol} at ${market.toFixed()}, stop ${stopPrice.toFixed()} limit ${limitPrice.toFixed()}`);

	return submitOrder(
		gateway,
		buildStopLimitOrder(symbol, side, quantity, stopPrice, limitPrice, params.reduceOnly),
	);
}
