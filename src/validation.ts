// Input validators - pure, run before anything reaches the venue

import Decimal from "decimal.js";
import { InputValidationError } from "./errors.js";
import {
	type OrderRequest,
	PRICED_TYPES,
	SIDES,
	type Side,
	TIME_IN_FORCE,
	type TimeInForce,
	TRIGGERED_TYPES,
} from "./types.js";

const SYMBOL_PATTERN = /^[A-Z0-9]+$/;

function toDecimal(value: Decimal.Value, field: string): Decimal {
	let parsed: Decimal;
	try {
		parsed = new Decimal(value);
	} catch {
		throw new InputValidationError(field, value, `${field} must be a number, got "${value}"`);
	}
	if (!parsed.isFinite()) {
		throw new InputValidationError(field, value, `${field} must be finite, got "${value}"`);
	}
	return parsed;
}

function positive(value: Decimal.Value, field: string): Decimal {
	const parsed = toDecimal(value, field);
	if (parsed.lte(0)) {
		throw new InputValidationError(field, value, `${field} must be greater than 0, got ${parsed.toString()}`);
	}
	return parsed;
}

export function validateSymbol(symbol: string, quoteAsset = "USDT"): string {
	if (!SYMBOL_PATTERN.test(symbol)) {
		throw new InputValidationError("symbol", symbol, `Symbol must be uppercase alphanumeric, got "${symbol}"`);
	}
	if (!symbol.endsWith(quoteAsset) || symbol.length <= quoteAsset.length) {
		throw new InputValidationError(
			"symbol",
			symbol,
			`Symbol must be a ${quoteAsset}-margined pair such as BTC${quoteAsset}, got "${symbol}"`,
		);
	}
	return symbol;
}

export function validateSide(side: string): Side {
	const match = SIDES.find((s) => s === side);
	if (!match) {
		throw new InputValidationError("side", side, `Side must be BUY or SELL, got "${side}"`);
	}
	return match;
}

export function validateQuantity(quantity: Decimal.Value): Decimal {
	return positive(quantity, "quantity");
}

export function validatePrice(price: Decimal.Value, field = "price"): Decimal {
	return positive(price, field);
}

// A stop protects the position: SELL stops sit below the market, BUY stops above
export function validateStopPrice(stop: Decimal.Value, market: Decimal.Value, side: string): Decimal {
	const stopPrice = validatePrice(stop, "stopPrice");
	const marketPrice = validatePrice(market, "marketPrice");
	const s = validateSide(side);

	if (s === "SELL" && !stopPrice.lt(marketPrice)) {
		throw new InputValidationError(
			"stopPrice",
			stop,
			`SELL stop price ${stopPrice} must be below market price ${marketPrice}`,
		);
	}
	if (s === "BUY" && !stopPrice.gt(marketPrice)) {
		throw new InputValidationError(
			"stopPrice",
			stop,
			`BUY stop price ${stopPrice} must be above market price ${marketPrice}`,
		);
	}
	return stopPrice;
}

// Mirror of validateStopPrice: take-profits trigger on the favourable side
export function validateTakeProfitPrice(
	takeProfit: Decimal.Value,
	market: Decimal.Value,
	side: string,
): Decimal {
	const tp = validatePrice(takeProfit, "takeProfitPrice");
	const marketPrice = validatePrice(market, "marketPrice");
	const s = validateSide(side);

	if (s === "SELL" && !tp.gt(marketPrice)) {
		throw new InputValidationError(
			"takeProfitPrice",
			takeProfit,
			`SELL take-profit ${tp} must be above market price ${marketPrice}`,
		);
	}
	if (s === "BUY" && !tp.lt(marketPrice)) {
		throw new InputValidationError(
			"takeProfitPrice",
			takeProfit,
			`BUY take-profit ${tp} must be below market price ${marketPrice}`,
		);
	}
	return tp;
}

export function validateTimeInForce(tif: string): TimeInForce {
	const match = TIME_IN_FORCE.find((t) => t === tif);
	if (!match) {
		throw new InputValidationError("timeInForce", tif, `Time in force must be GTC, IOC or FOK, got "${tif}"`);
	}
	return match;
}

// SELL limit at or below the stop, BUY limit at or above it
export function validateStopLimitPrices(side: Side, stop: Decimal, limit: Decimal): void {
	if (side === "SELL" && limit.gt(stop)) {
		throw new InputValidationError(
			"limitPrice",
			limit.toString(),
			`SELL limit price ${limit} must be at or below stop price ${stop}`,
		);
	}
	if (side === "BUY" && limit.lt(stop)) {
		throw new InputValidationError(
			"limitPrice",
			limit.toString(),
			`BUY limit price ${limit} must be at or above stop price ${stop}`,
		);
	}
}

export function validateOcoPrices(side: Side, takeProfit: Decimal, stopLoss: Decimal): void {
	if (side === "SELL" && !takeProfit.gt(stopLoss)) {
		throw new InputValidationError(
			"takeProfitPrice",
			takeProfit.toString(),
			`For SELL, take-profit ${takeProfit} must be above stop-loss ${stopLoss}`,
		);
	}
	if (side === "BUY" && !stopLoss.gt(takeProfit)) {
		throw new InputValidationError(
			"stopLossPrice",
			stopLoss.toString(),
			`For BUY, stop-loss ${stopLoss} must be above take-profit ${takeProfit}`,
		);
	}
}

export function validateGridBounds(lower: Decimal, upper: Decimal, levelCount: number): void {
	if (!Number.isInteger(levelCount) || levelCount < 2) {
		throw new InputValidationError("levelCount", levelCount, `Grid needs at least 2 levels, got ${levelCount}`);
	}
	if (!lower.lt(upper)) {
		throw new InputValidationError(
			"upperPrice",
			upper.toString(),
			`Upper price ${upper} must be above lower price ${lower}`,
		);
	}
}

export function validateTwapParams(durationSeconds: number, chunkCount: number): void {
	if (!Number.isInteger(chunkCount) || chunkCount < 1) {
		throw new InputValidationError(
			"chunkCount",
			chunkCount,
			`Chunk count must be a positive integer, got ${chunkCount}`,
		);
	}
	if (!Number.isFinite(durationSeconds) || durationSeconds < 0) {
		throw new InputValidationError(
			"durationSeconds",
			durationSeconds,
			`Duration must be zero or more seconds, got ${durationSeconds}`,
		);
	}
}

// price iff the type rests with a limit, stopPrice iff it waits for a trigger
export function assertRequestShape(request: OrderRequest): void {
	const needsPrice = PRICED_TYPES.includes(request.type);
	const needsStop = TRIGGERED_TYPES.includes(request.type);

	if (needsPrice && !request.price) {
		throw new InputValidationError("price", undefined, `${request.type} order requires a price`);
	}
	if (!needsPrice && request.price) {
		throw new InputValidationError(
			"price",
			request.price.toString(),
			`${request.type} order does not take a price`,
		);
	}
	if (needsStop && !request.stopPrice) {
		throw new InputValidationError("stopPrice", undefined, `${request.type} order requires a stop price`);
	}
	if (!needsStop && request.stopPrice) {
		throw new InputValidationError(
			"stopPrice",
			request.stopPrice.toString(),
			`${request.type} order does not take a stop price`,
		);
	}
	if (request.quantity.lte(0)) {
		throw new InputValidationError("quantity", request.quantity.toString(), "quantity must be greater than 0");
	}
}
