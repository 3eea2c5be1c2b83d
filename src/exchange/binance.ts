// Binance USDT-M futures gateway over the REST client

import Decimal from "decimal.js";
import { z } from "zod";
import { GatewayError, InputValidationError, InvalidSymbolError, isRetryable } from "../errors.js";
import type {
	Balance,
	CancelResult,
	OrderHandle,
	OrderRequest,
	OrderStatus,
	OrderType,
	Side,
	SymbolRules,
	TimeInForce,
} from "../types.js";
import { PRICED_TYPES } from "../types.js";
import { createLogger } from "../utils/logger.js";
import { assertRequestShape } from "../validation.js";
import { toGatewayError } from "./binanceErrors.js";
import { settleCancel } from "./cancel.js";
import type { ExchangeGateway } from "./types.js";

const log = createLogger("binance");

export interface FuturesOrderParams {
	symbol: string;
	side: Side;
	type: OrderType;
	quantity: string;
	price?: string;
	stopPrice?: string;
	timeInForce?: TimeInForce;
	reduceOnly?: "true" | "false";
	newOrderRespType?: "ACK" | "RESULT";
}

interface OrderRef {
	symbol: string;
	orderId: number;
}

// The slice of the futures REST client this gateway talks to.
// Responses are untrusted and parsed here.
export interface FuturesRestClient {
	submitNewOrder(params: FuturesOrderParams): Promise<unknown>;
	getOrder(params: OrderRef): Promise<unknown>;
	cancelOrder(params: OrderRef): Promise<unknown>;
	cancelAllOpenOrders(params: { symbol: string }): Promise<unknown>;
	getAllOpenOrders(params: { symbol: string }): Promise<unknown>;
	getSymbolPriceTicker(params: { symbol: string }): Promise<unknown>;
	getBalance(): Promise<unknown>;
	getExchangeInfo(): Promise<unknown>;
}

const decimalSchema = z.union([z.string(), z.number()]).transform((v) => new Decimal(v));

const orderSchema = z.object({
	orderId: z.union([z.number(), z.string()]).transform(String),
	symbol: z.string(),
	status: z.string(),
	side: z.enum(["BUY", "SELL"]),
	type: z.string(),
	origType: z.string().optional(),
	origQty: decimalSchema,
	executedQty: decimalSchema,
	avgPrice: decimalSchema.optional(),
	price: decimalSchema.optional(),
	stopPrice: decimalSchema.optional(),
	updateTime: z.number().optional(),
});

type VenueOrder = z.output<typeof orderSchema>;

const tickerSchema = z.object({ symbol: z.string(), price: decimalSchema });

const balancesSchema = z.array(
	z.object({
		asset: z.string(),
		balance: decimalSchema,
		availableBalance: decimalSchema,
	}),
);

const filterSchema = z
	.object({
		filterType: z.string(),
		stepSize: z.string().optional(),
		minQty: z.string().optional(),
		tickSize: z.string().optional(),
	})
	.passthrough();

const exchangeInfoSchema = z.object({
	symbols: z.array(
		z.object({
			symbol: z.string(),
			status: z.string().optional(),
			filters: z.array(filterSchema),
		}),
	),
});

const STATUS_MAP: Record<string, OrderStatus> = {
	NEW: "NEW",
	PARTIALLY_FILLED: "PARTIALLY_FILLED",
	FILLED: "FILLED",
	CANCELED: "CANCELED",
	REJECTED: "REJECTED",
	EXPIRED: "EXPIRED",
	EXPIRED_IN_MATCH: "EXPIRED",
	PENDING_CANCEL: "NEW",
	NEW_INSURANCE: "FILLED",
	NEW_ADL: "FILLED",
};

const TYPE_MAP: Record<string, OrderType> = {
	MARKET: "MARKET",
	LIMIT: "LIMIT",
	STOP: "STOP",
	STOP_MARKET: "STOP_MARKET",
	TAKE_PROFIT: "TAKE_PROFIT",
	TAKE_PROFIT_MARKET: "TAKE_PROFIT_MARKET",
};

function nonZero(value: Decimal | undefined): Decimal | undefined {
	return value && !value.isZero() ? value : undefined;
}

function toHandle(order: VenueOrder): OrderHandle {
	const status = STATUS_MAP[order.status];
	if (!status) {
		throw new GatewayError(`Unrecognised order status ${order.status} for order ${order.orderId}`);
	}
	// Triggered conditionals report type MARKET; origType keeps what was placed
	const rawType = order.origType ?? order.type;
	const type = TYPE_MAP[rawType];
	if (!type) {
		throw new GatewayError(`Unsupported order type ${rawType} for order ${order.orderId}`);
	}
	return {
		orderId: order.orderId,
		symbol: order.symbol,
		side: order.side,
		type,
		status,
		quantity: order.origQty,
		executedQty: order.executedQty,
		avgPrice: order.avgPrice ?? new Decimal(0),
		price: nonZero(order.price),
		stopPrice: nonZero(order.stopPrice),
		updateTime: order.updateTime ?? Date.now(),
	};
}

export function toOrderParams(request: OrderRequest): FuturesOrderParams {
	const params: FuturesOrderParams = {
		symbol: request.symbol,
		side: request.side,
		type: request.type,
		quantity: request.quantity.toFixed(),
	};
	if (request.price) params.price = request.price.toFixed();
	if (request.stopPrice) params.stopPrice = request.stopPrice.toFixed();
	if (PRICED_TYPES.includes(request.type)) {
		params.timeInForce = request.timeInForce ?? "GTC";
	}
	if (request.reduceOnly !== undefined) {
		params.reduceOnly = request.reduceOnly ? "true" : "false";
	}
	// The default ACK response carries no execution details
	if (request.type === "MARKET") {
		params.newOrderRespType = "RESULT";
	}
	return params;
}

function toVenueOrderId(orderId: string): number {
	const id = Number(orderId);
	if (!Number.isSafeInteger(id) || id <= 0) {
		throw new InputValidationError("orderId", orderId, `Order id must be a positive integer, got "${orderId}"`);
	}
	return id;
}

export class BinanceGateway implements ExchangeGateway {
	readonly name: string;
	private rulesCache: Map<string, SymbolRules> | null = null;

	constructor(
		private readonly client: FuturesRestClient,
		testnet: boolean,
	) {
		this.name = testnet ? "binance-testnet" : "binance";
	}

	async placeOrder(request: OrderRequest): Promise<OrderHandle> {
		assertRequestShape(request);
		const params = toOrderParams(request);
		const raw = await this.call("placeOrder", () => this.client.submitNewOrder(params));
		return toHandle(this.parse("placeOrder", orderSchema, raw));
	}

	async getOrderStatus(symbol: string, orderId: string): Promise<OrderHandle> {
		const ref = { symbol, orderId: toVenueOrderId(orderId) };
		const raw = await this.call("getOrderStatus", () => this.client.getOrder(ref));
		return toHandle(this.parse("getOrderStatus", orderSchema, raw));
	}

	async cancelOrder(symbol: string, orderId: string): Promise<CancelResult> {
		const ref = { symbol, orderId: toVenueOrderId(orderId) };
		return settleCancel(orderId, async () => {
			const raw = await this.call("cancelOrder", () => this.client.cancelOrder(ref));
			return toHandle(this.parse("cancelOrder", orderSchema, raw));
		});
	}

	async cancelAllOpenOrders(symbol: string): Promise<void> {
		await this.call("cancelAllOpenOrders", () => this.client.cancelAllOpenOrders({ symbol }));
	}

	async getOpenOrders(symbol: string): Promise<OrderHandle[]> {
		const raw = await this.call("getOpenOrders", () => this.client.getAllOpenOrders({ symbol }));
		const orders = this.parse("getOpenOrders", z.array(orderSchema), raw);
		const handles: OrderHandle[] = [];
		for (const order of orders) {
			const rawType = order.origType ?? order.type;
			if (!TYPE_MAP[rawType]) {
				log.warn(`Skipping open order ${order.orderId} of unsupported type ${rawType}`);
				continue;
			}
			handles.push(toHandle(order));
		}
		return handles;
	}

	async getCurrentPrice(symbol: string): Promise<Decimal> {
		const raw = await this.call("getCurrentPrice", () => this.client.getSymbolPriceTicker({ symbol }));
		return this.parse("getCurrentPrice", tickerSchema, raw).price;
	}

	async getBalance(asset: string): Promise<Balance | null> {
		const raw = await this.call("getBalance", () => this.client.getBalance());
		const balances = this.parse("getBalance", balancesSchema, raw);
		return balances.find((b) => b.asset === asset) ?? null;
	}

	async getSymbolRules(symbol: string): Promise<SymbolRules> {
		if (!this.rulesCache) {
			const raw = await this.call("getSymbolRules", () => this.client.getExchangeInfo());
			const info = this.parse("getSymbolRules", exchangeInfoSchema, raw);
			const cache = new Map<string, SymbolRules>();
			for (const s of info.symbols) {
				const lot = s.filters.find((f) => f.filterType === "LOT_SIZE");
				const priceFilter = s.filters.find((f) => f.filterType === "PRICE_FILTER");
				if (!lot?.stepSize || !priceFilter?.tickSize) continue;
				cache.set(s.symbol, {
					symbol: s.symbol,
					stepSize: new Decimal(lot.stepSize),
					tickSize: new Decimal(priceFilter.tickSize),
					minQty: new Decimal(lot.minQty ?? lot.stepSize),
				});
			}
			this.rulesCache = cache;
			log.debug(`Loaded trading rules for ${cache.size} symbols`);
		}
		const rules = this.rulesCache.get(symbol);
		if (!rules) {
			throw new InvalidSymbolError(`Symbol ${symbol} is not listed on ${this.name}`, -1121);
		}
		return rules;
	}

	private async call(op: string, fn: () => Promise<unknown>): Promise<unknown> {
		log.debug(`${op} ->`);
		try {
			const result = await fn();
			log.debug(`${op} <-`, result);
			return result;
		} catch (err) {
			const mapped = toGatewayError(err, op);
			if (isRetryable(mapped)) {
				log.warn(`${op} failed (retryable): ${mapped.message}`);
			} else {
				log.error(`${op} failed: ${mapped.message}`);
			}
			throw mapped;
		}
	}

	private parse<S extends z.ZodTypeAny>(op: string, schema: S, raw: unknown): z.output<S> {
		const result = schema.safeParse(raw);
		if (!result.success) {
			log.error(`${op}: unexpected response shape`, result.error.issues);
			throw new GatewayError(`${op}: unexpected response from venue`, undefined, { cause: result.error });
		}
		return result.data;
	}
}
