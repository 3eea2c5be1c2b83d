// In-memory venue for dry runs and tests. Resting orders are matched
// against the mid price whenever someone looks at the book.

import Decimal from "decimal.js";
import { InvalidSymbolError, NotFoundError } from "../errors.js";
import type {
	Balance,
	CancelResult,
	OrderHandle,
	OrderRequest,
	SymbolRules,
} from "../types.js";
import { isTerminal } from "../types.js";
import { createLogger } from "../utils/logger.js";
import { assertRequestShape } from "../validation.js";
import { settleCancel } from "./cancel.js";
import type { ExchangeGateway } from "./types.js";

const log = createLogger("simulated");

type GatewayOp = Exclude<keyof ExchangeGateway, "name">;

export interface SimulatedExchangeOptions {
	readonly midPrice?: Decimal.Value;
	readonly volatility?: Decimal.Value; // Max random drift per look, in price units
	readonly stepSize?: Decimal.Value;
	readonly tickSize?: Decimal.Value;
	readonly minQty?: Decimal.Value;
	readonly symbols?: readonly string[]; // Unknown symbols are rejected when set
	readonly balances?: Readonly<Record<string, Decimal.Value>>;
	readonly random?: () => number;
	readonly now?: () => number;
}

export class SimulatedExchange implements ExchangeGateway {
	readonly name = "simulated";
	private midPrice: Decimal;
	private readonly volatility: Decimal;
	private readonly orders = new Map<string, OrderHandle>();
	private readonly failures = new Map<GatewayOp, Error[]>();
	private nextOrderId = 1000;

	constructor(private readonly options: SimulatedExchangeOptions = {}) {
		this.midPrice = new Decimal(options.midPrice ?? 64000);
		this.volatility = new Decimal(options.volatility ?? 0);
	}

	// Scripting hooks

	setPrice(price: Decimal.Value): void {
		this.midPrice = new Decimal(price);
	}

	// Queue an error for the next call of op
	failNext(op: GatewayOp, error: Error): void {
		const queue = this.failures.get(op) ?? [];
		queue.push(error);
		this.failures.set(op, queue);
	}

	// Force a (partial) fill regardless of price
	fillOrder(orderId: string, price?: Decimal.Value, quantity?: Decimal.Value): OrderHandle {
		const order = this.requireOrder(orderId);
		const fillQty = quantity === undefined ? order.quantity : new Decimal(quantity);
		return this.applyFill(order, new Decimal(price ?? order.price ?? this.midPrice), fillQty);
	}

	// Mark an order as ended by the venue (expiry, rejection, manual cancel)
	endOrder(orderId: string, status: "CANCELED" | "EXPIRED" | "REJECTED"): void {
		const order = this.requireOrder(orderId);
		this.orders.set(orderId, { ...order, status, updateTime: this.now() });
	}

	listOrders(): OrderHandle[] {
		return [...this.orders.values()];
	}

	// ExchangeGateway

	async placeOrder(request: OrderRequest): Promise<OrderHandle> {
		this.maybeFail("placeOrder");
		this.requireSymbol(request.symbol);
		assertRequestShape(request);

		const orderId = String(this.nextOrderId++);
		const order: OrderHandle = {
			orderId,
			symbol: request.symbol,
			side: request.side,
			type: request.type,
			status: "NEW",
			quantity: request.quantity,
			executedQty: new Decimal(0),
			avgPrice: new Decimal(0),
			price: request.price,
			stopPrice: request.stopPrice,
			updateTime: this.now(),
		};
		this.orders.set(orderId, order);
		log.debug(`placed ${order.side} ${order.type} ${order.quantity} ${order.symbol} as ${orderId}`);

		if (request.type === "MARKET") {
			return this.applyFill(order, this.midPrice, order.quantity);
		}
		return order;
	}

	async getOrderStatus(symbol: string, orderId: string): Promise<OrderHandle> {
		this.maybeFail("getOrderStatus");
		this.drift();
		this.matchResting();
		const order = this.orders.get(orderId);
		if (!order || order.symbol !== symbol) {
			throw new NotFoundError(`Order ${orderId} does not exist`, -2013);
		}
		return order;
	}

	async cancelOrder(symbol: string, orderId: string): Promise<CancelResult> {
		return settleCancel(orderId, async () => {
			this.maybeFail("cancelOrder");
			const order = this.orders.get(orderId);
			if (!order || order.symbol !== symbol || isTerminal(order.status)) {
				throw new NotFoundError(`Unknown order ${orderId}`, -2011);
			}
			const canceled: OrderHandle = { ...order, status: "CANCELED", updateTime: this.now() };
			this.orders.set(orderId, canceled);
			return canceled;
		});
	}

	async cancelAllOpenOrders(symbol: string): Promise<void> {
		this.maybeFail("cancelAllOpenOrders");
		for (const order of this.orders.values()) {
			if (order.symbol === symbol && !isTerminal(order.status)) {
				this.orders.set(order.orderId, { ...order, status: "CANCELED", updateTime: this.now() });
			}
		}
	}

	async getOpenOrders(symbol: string): Promise<OrderHandle[]> {
		this.maybeFail("getOpenOrders");
		this.matchResting();
		return [...this.orders.values()].filter((o) => o.symbol === symbol && !isTerminal(o.status));
	}

	async getCurrentPrice(symbol: string): Promise<Decimal> {
		this.maybeFail("getCurrentPrice");
		this.requireSymbol(symbol);
		this.drift();
		this.matchResting();
		return this.midPrice;
	}

	async getBalance(asset: string): Promise<Balance | null> {
		this.maybeFail("getBalance");
		const amount = this.options.balances?.[asset];
		if (amount === undefined) return null;
		const balance = new Decimal(amount);
		return { asset, balance, availableBalance: balance };
	}

	async getSymbolRules(symbol: string): Promise<SymbolRules> {
		this.maybeFail("getSymbolRules");
		this.requireSymbol(symbol);
		return {
			symbol,
			stepSize: new Decimal(this.options.stepSize ?? "0.001"),
			tickSize: new Decimal(this.options.tickSize ?? "0.1"),
			minQty: new Decimal(this.options.minQty ?? "0.001"),
		};
	}

	// Internals

	private now(): number {
		return (this.options.now ?? Date.now)();
	}

	private maybeFail(op: GatewayOp): void {
		const error = this.failures.get(op)?.shift();
		if (error) throw error;
	}

	private requireSymbol(symbol: string): void {
		const known = this.options.symbols;
		if (known && !known.includes(symbol)) {
			throw new InvalidSymbolError(`Invalid symbol ${symbol}`, -1121);
		}
	}

	private requireOrder(orderId: string): OrderHandle {
		const order = this.orders.get(orderId);
		if (!order) {
			throw new NotFoundError(`Order ${orderId} does not exist`, -2013);
		}
		return order;
	}

	private drift(): void {
		if (this.volatility.isZero()) return;
		const random = this.options.random ?? Math.random;
		const tick = new Decimal(this.options.tickSize ?? "0.1");
		const moved = this.midPrice.add(this.volatility.mul(random() - 0.5));
		this.midPrice = Decimal.max(tick, moved.div(tick).round().mul(tick));
	}

	private applyFill(order: OrderHandle, price: Decimal, quantity: Decimal): OrderHandle {
		const executedQty = Decimal.min(order.quantity, order.executedQty.add(quantity));
		const notional = order.avgPrice.mul(order.executedQty).add(price.mul(executedQty.sub(order.executedQty)));
		const filled: OrderHandle = {
			...order,
			status: executedQty.gte(order.quantity) ? "FILLED" : "PARTIALLY_FILLED",
			executedQty,
			avgPrice: executedQty.isZero() ? new Decimal(0) : notional.div(executedQty),
			updateTime: this.now(),
		};
		this.orders.set(order.orderId, filled);
		return filled;
	}

	private matchResting(): void {
		const mid = this.midPrice;
		for (const order of [...this.orders.values()]) {
			if (isTerminal(order.status) || order.type === "MARKET") continue;
			const remaining = order.quantity.sub(order.executedQty);
			const buy = order.side === "BUY";

			switch (order.type) {
				case "LIMIT":
					if (order.price && (buy ? mid.lte(order.price) : mid.gte(order.price))) {
						this.applyFill(order, order.price, remaining);
					}
					break;
				case "STOP":
				case "STOP_MARKET":
					if (order.stopPrice && (buy ? mid.gte(order.stopPrice) : mid.lte(order.stopPrice))) {
						this.applyFill(order, order.type === "STOP" && order.price ? order.price : mid, remaining);
					}
					break;
				case "TAKE_PROFIT":
				case "TAKE_PROFIT_MARKET":
					if (order.stopPrice && (buy ? mid.lte(order.stopPrice) : mid.gte(order.stopPrice))) {
						this.applyFill(order, order.type === "TAKE_PROFIT" && order.price ? order.price : mid, remaining);
					}
					break;
			}
		}
	}
}
