import Decimal from "decimal.js";
import { describe, expect, it } from "vitest";
import { InputValidationError, InvalidSymbolError, NetworkError, NotFoundError } from "../errors.js";
import type { OrderRequest } from "../types.js";
import { SimulatedExchange } from "./simulated.js";

const d = (v: Decimal.Value): Decimal => new Decimal(v);

function request(overrides: Partial<OrderRequest>): OrderRequest {
	return { symbol: "BTCUSDT", side: "BUY", type: "MARKET", quantity: d("0.002"), ...overrides };
}

describe("SimulatedExchange", () => {
	it("fills market orders at the mid price with sequential ids", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const first = await venue.placeOrder(request({}));
		const second = await venue.placeOrder(request({ side: "SELL" }));

		expect(first.orderId).toBe("1000");
		expect(second.orderId).toBe("1001");
		expect(first.status).toBe("FILLED");
		expect(first.executedQty.toFixed()).toBe("0.002");
		expect(first.avgPrice.toFixed()).toBe("60000");
	});

	it("fills a resting limit once the price crosses it", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const order = await venue.placeOrder(request({ type: "LIMIT", price: d(59000), timeInForce: "GTC" }));
		expect(order.status).toBe("NEW");
		expect((await venue.getOrderStatus("BTCUSDT", order.orderId)).status).toBe("NEW");

		venue.setPrice(58900);
		const filled = await venue.getOrderStatus("BTCUSDT", order.orderId);
		expect(filled.status).toBe("FILLED");
		expect(filled.avgPrice.toFixed()).toBe("59000");
	});

	it("triggers stop and take-profit market orders at the mid", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const stop = await venue.placeOrder(request({ side: "SELL", type: "STOP_MARKET", stopPrice: d(58000) }));
		const takeProfit = await venue.placeOrder(
			request({ side: "SELL", type: "TAKE_PROFIT_MARKET", stopPrice: d(65000) }),
		);

		venue.setPrice(57990);
		const stopped = await venue.getOrderStatus("BTCUSDT", stop.orderId);
		expect(stopped.status).toBe("FILLED");
		expect(stopped.avgPrice.toFixed()).toBe("57990");
		expect((await venue.getOrderStatus("BTCUSDT", takeProfit.orderId)).status).toBe("NEW");

		venue.setPrice(65000);
		const taken = await venue.getOrderStatus("BTCUSDT", takeProfit.orderId);
		expect(taken.status).toBe("FILLED");
		expect(taken.avgPrice.toFixed()).toBe("65000");
	});

	it("fills stop-limit orders at their limit price", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const order = await venue.placeOrder(
			request({ side: "SELL", type: "STOP", stopPrice: d(58000), price: d(57900), timeInForce: "GTC" }),
		);
		venue.setPrice(58000);
		const filled = await venue.getOrderStatus("BTCUSDT", order.orderId);
		expect(filled.status).toBe("FILLED");
		expect(filled.avgPrice.toFixed()).toBe("57900");
	});

	it("reports cancels of finished or unknown orders as already resolved", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const order = await venue.placeOrder(request({ type: "LIMIT", price: d(59000), timeInForce: "GTC" }));

		const first = await venue.cancelOrder("BTCUSDT", order.orderId);
		expect(first.kind).toBe("canceled");
		expect(first.kind === "canceled" && first.order.status).toBe("CANCELED");

		expect(await venue.cancelOrder("BTCUSDT", order.orderId)).toEqual({ kind: "already-resolved", orderId: "1000" });
		expect(await venue.cancelOrder("BTCUSDT", "42")).toEqual({ kind: "already-resolved", orderId: "42" });
	});

	it("folds a scripted cancel failure into a failed result", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const order = await venue.placeOrder(request({ type: "LIMIT", price: d(59000), timeInForce: "GTC" }));
		const error = new NetworkError("connection reset");
		venue.failNext("cancelOrder", error);

		expect(await venue.cancelOrder("BTCUSDT", order.orderId)).toEqual({ kind: "failed", orderId: "1000", error });
		expect((await venue.cancelOrder("BTCUSDT", order.orderId)).kind).toBe("canceled");
	});

	it("throws scripted failures once, in order", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const first = new NetworkError("first");
		const second = new NetworkError("second");
		venue.failNext("placeOrder", first);
		venue.failNext("placeOrder", second);

		await expect(venue.placeOrder(request({}))).rejects.toBe(first);
		await expect(venue.placeOrder(request({}))).rejects.toBe(second);
		expect((await venue.placeOrder(request({}))).orderId).toBe("1000");
	});

	it("rejects unknown orders and malformed requests", async () => {
		const venue = new SimulatedExchange();
		await expect(venue.getOrderStatus("BTCUSDT", "999")).rejects.toBeInstanceOf(NotFoundError);
		await expect(venue.placeOrder(request({ type: "LIMIT" }))).rejects.toBeInstanceOf(InputValidationError);
		expect(venue.listOrders()).toHaveLength(0);
	});

	it("rejects symbols outside the configured list", async () => {
		const venue = new SimulatedExchange({ symbols: ["BTCUSDT"] });
		await expect(venue.getSymbolRules("ETHUSDT")).rejects.toBeInstanceOf(InvalidSymbolError);
		const rules = await venue.getSymbolRules("BTCUSDT");
		expect([rules.stepSize.toFixed(), rules.tickSize.toFixed(), rules.minQty.toFixed()]).toEqual([
			"0.001",
			"0.1",
			"0.001",
		]);
	});

	it("reports configured balances only", async () => {
		const venue = new SimulatedExchange({ balances: { USDT: 10000 } });
		const balance = await venue.getBalance("USDT");
		expect(balance?.availableBalance.toFixed()).toBe("10000");
		expect(await venue.getBalance("BNB")).toBeNull();
	});

	it("cancels every open order on a symbol", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		await venue.placeOrder(request({ type: "LIMIT", price: d(59000), timeInForce: "GTC" }));
		await venue.placeOrder(request({ side: "SELL", type: "LIMIT", price: d(61000), timeInForce: "GTC" }));
		expect(await venue.getOpenOrders("BTCUSDT")).toHaveLength(2);

		await venue.cancelAllOpenOrders("BTCUSDT");
		expect(await venue.getOpenOrders("BTCUSDT")).toHaveLength(0);
		expect(venue.listOrders().map((o) => o.status)).toEqual(["CANCELED", "CANCELED"]);
	});

	it("applies forced partial fills", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const order = await venue.placeOrder(request({ quantity: d("0.004"), type: "LIMIT", price: d(59000), timeInForce: "GTC" }));
		const partial = venue.fillOrder(order.orderId, 59000, "0.001");
		expect(partial.status).toBe("PARTIALLY_FILLED");
		expect(partial.executedQty.toFixed()).toBe("0.001");
		expect(venue.fillOrder(order.orderId).status).toBe("FILLED");
	});

	it("drifts the price by the injected random source", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000, volatility: 10, random: () => 1 });
		expect((await venue.getCurrentPrice("BTCUSDT")).toFixed()).toBe("60005");
	});
});
