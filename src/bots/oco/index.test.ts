import { describe, expect, it, vi } from "vitest";
import { ocoExitCode } from "../../cli/outcomes.js";
import { AuthError, InputValidationError, InsufficientBalanceError, NetworkError } from "../../errors.js";
import { SimulatedExchange } from "../../exchange/simulated.js";
import type { Sleep } from "../../utils/poll.js";
import { DEFAULT_OCO_CONFIG } from "./config.js";
import { OcoCoordinator, type OcoParams } from "./index.js";

const PARAMS: OcoParams = {
	symbol: "BTCUSDT",
	side: "SELL",
	quantity: "0.001",
	takeProfitPrice: "65000",
	stopLossPrice: "58000",
};

function scriptedSleep(onSleep: (call: number) => void = () => {}): { sleep: Sleep; calls: number[] } {
	const calls: number[] = [];
	return {
		calls,
		sleep: async (ms) => {
			calls.push(ms);
			onSleep(calls.length);
		},
	};
}

describe("OcoCoordinator", () => {
	it("cancels the stop-loss once the take-profit fills", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const cancel = vi.spyOn(venue, "cancelOrder");
		const status = vi.spyOn(venue, "getOrderStatus");
		const fake = scriptedSleep((call) => {
			if (call === 2) venue.setPrice(65000);
		});
		const oco = new OcoCoordinator(venue, DEFAULT_OCO_CONFIG, { sleep: fake.sleep, now: () => 0 });

		const result = await oco.execute(PARAMS);

		expect(result.outcome).toBe("filled");
		if (result.outcome !== "filled") return;
		expect(result.resolvedLeg).toBe("takeProfit");
		expect(result.fillPrice.toFixed()).toBe("65000");
		expect(result.cancel?.kind).toBe("canceled");
		expect(result.pair.state).toBe("RESOLVED");
		expect(result.pair.takeProfit.orderId).toBe("1000");
		expect(result.pair.takeProfit.status).toBe("FILLED");
		expect(result.pair.stopLoss.status).toBe("CANCELED");

		expect(cancel).toHaveBeenCalledTimes(1);
		expect(cancel).toHaveBeenCalledWith("BTCUSDT", "1001");
		expect(status).toHaveBeenCalledTimes(6);
		expect(fake.calls).toEqual([5000, 5000]);
		expect(ocoExitCode(result)).toBe(0);
	});

	it("cancels the take-profit once the stop-loss fills", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const fake = scriptedSleep(() => venue.setPrice(57000));
		const oco = new OcoCoordinator(venue, DEFAULT_OCO_CONFIG, { sleep: fake.sleep, now: () => 0 });

		const result = await oco.execute(PARAMS);

		expect(result.outcome).toBe("filled");
		if (result.outcome !== "filled") return;
		expect(result.resolvedLeg).toBe("stopLoss");
		expect(result.fillPrice.toFixed()).toBe("57000");
		expect(result.pair.takeProfit.status).toBe("CANCELED");
	});

	it("places both legs without monitoring when asked", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const fake = scriptedSleep();
		const oco = new OcoCoordinator(venue, DEFAULT_OCO_CONFIG, { sleep: fake.sleep });

		const result = await oco.execute({ ...PARAMS, monitor: false });

		expect(result.outcome).toBe("placed");
		expect(result.pair.state).toBe("ACTIVE");
		expect(venue.listOrders().map((o) => [o.type, o.status, o.stopPrice?.toFixed()])).toEqual([
			["TAKE_PROFIT_MARKET", "NEW", "65000"],
			["STOP_MARKET", "NEW", "58000"],
		]);
		expect(fake.calls).toEqual([]);
	});

	it("rejects inverted prices before touching the venue", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const price = vi.spyOn(venue, "getCurrentPrice");
		const oco = new OcoCoordinator(venue, DEFAULT_OCO_CONFIG);

		await expect(oco.execute({ ...PARAMS, takeProfitPrice: "58000", stopLossPrice: "65000" })).rejects.toBeInstanceOf(
			InputValidationError,
		);
		expect(price).not.toHaveBeenCalled();
		expect(venue.listOrders()).toHaveLength(0);
	});

	it("rejects a stop-loss the market has already passed", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const oco = new OcoCoordinator(venue, DEFAULT_OCO_CONFIG);

		await expect(oco.execute({ ...PARAMS, stopLossPrice: "61000" })).rejects.toBeInstanceOf(InputValidationError);
		expect(venue.listOrders()).toHaveLength(0);
	});

	it("rolls back the take-profit when the stop-loss cannot be placed", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const place = venue.placeOrder.bind(venue);
		vi.spyOn(venue, "placeOrder").mockImplementation(async (request) => {
			if (request.type === "STOP_MARKET") throw new InsufficientBalanceError("Margin is insufficient.", -2019);
			return place(request);
		});
		const oco = new OcoCoordinator(venue, DEFAULT_OCO_CONFIG);

		await expect(oco.execute(PARAMS)).rejects.toBeInstanceOf(InsufficientBalanceError);
		expect(venue.listOrders().map((o) => [o.orderId, o.status])).toEqual([["1000", "CANCELED"]]);
	});

	it("keeps polling through transient errors", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		venue.failNext("getOrderStatus", new NetworkError("connection reset"));
		const fake = scriptedSleep(() => venue.setPrice(65000));
		const oco = new OcoCoordinator(venue, DEFAULT_OCO_CONFIG, { sleep: fake.sleep, now: () => 0 });

		const result = await oco.execute(PARAMS);

		expect(result.outcome).toBe("filled");
		expect(fake.calls).toEqual([5000]);
	});

	it("gives up on errors that will not go away", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		venue.failNext("getOrderStatus", new AuthError("Invalid API-key, IP, or permissions for action.", -2015));
		const oco = new OcoCoordinator(venue, DEFAULT_OCO_CONFIG, { sleep: scriptedSleep().sleep, now: () => 0 });

		await expect(oco.execute(PARAMS)).rejects.toBeInstanceOf(AuthError);
	});

	it("retries the sibling cancel through transient errors", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const cancel = vi.spyOn(venue, "cancelOrder");
		const fake = scriptedSleep((call) => {
			if (call === 1) {
				venue.setPrice(65000);
				venue.failNext("cancelOrder", new NetworkError("ECONNRESET"));
			}
		});
		const oco = new OcoCoordinator(venue, DEFAULT_OCO_CONFIG, { sleep: fake.sleep, now: () => 0 });

		const result = await oco.execute(PARAMS);

		expect(result.outcome).toBe("filled");
		if (result.outcome !== "filled") return;
		expect(result.resolvedLeg).toBe("takeProfit");
		expect(result.cancel?.kind).toBe("canceled");
		expect(result.pair.stopLoss.status).toBe("CANCELED");
		expect(cancel).toHaveBeenCalledTimes(2);
		expect(fake.calls).toEqual([5000, 5000]);
		expect(await venue.getOpenOrders("BTCUSDT")).toHaveLength(0);
	});

	it("reports a sibling cancel rejected for good as failed", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const fake = scriptedSleep(() => {
			venue.setPrice(65000);
			venue.failNext("cancelOrder", new AuthError("Invalid API-key, IP, or permissions for action.", -2015));
		});
		const oco = new OcoCoordinator(venue, DEFAULT_OCO_CONFIG, { sleep: fake.sleep, now: () => 0 });

		const result = await oco.execute(PARAMS);

		expect(result.outcome).toBe("filled");
		if (result.outcome !== "filled") return;
		expect(result.cancel?.kind).toBe("failed");
		expect(result.pair.stopLoss.status).toBe("NEW");
		expect(fake.calls).toEqual([5000]);
	});

	it("closes the pair when a leg ends without a fill", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const oco = new OcoCoordinator(venue, DEFAULT_OCO_CONFIG, { sleep: scriptedSleep().sleep, now: () => 0 });
		const placed = await oco.execute({ ...PARAMS, monitor: false });
		venue.endOrder(placed.pair.takeProfit.orderId, "EXPIRED");

		const result = await oco.monitor(placed.pair);

		expect(result.outcome).toBe("leg-terminated");
		if (result.outcome !== "leg-terminated") return;
		expect(result.leg).toBe("takeProfit");
		expect(result.legStatus).toBe("EXPIRED");
		expect(result.cancel?.kind).toBe("canceled");
		expect(result.pair.stopLoss.status).toBe("CANCELED");
		expect(ocoExitCode(result)).toBe(1);
	});

	it("reports both legs when the sibling fills before its cancel lands", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const cancel = venue.cancelOrder.bind(venue);
		vi.spyOn(venue, "cancelOrder").mockImplementation(async (symbol, orderId) => {
			venue.fillOrder(orderId);
			return cancel(symbol, orderId);
		});
		const fake = scriptedSleep(() => venue.setPrice(65000));
		const oco = new OcoCoordinator(venue, DEFAULT_OCO_CONFIG, { sleep: fake.sleep, now: () => 0 });

		const result = await oco.execute(PARAMS);

		expect(result.outcome).toBe("filled");
		if (result.outcome !== "filled") return;
		expect(result.resolvedLeg).toBe("both");
		expect(result.cancel).toEqual({ kind: "already-resolved", orderId: "1001" });
		expect(result.pair.stopLoss.status).toBe("FILLED");
	});

	it("does not cancel anything when both legs are already filled", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const cancel = vi.spyOn(venue, "cancelOrder");
		const oco = new OcoCoordinator(venue, DEFAULT_OCO_CONFIG, { sleep: scriptedSleep().sleep, now: () => 0 });
		const placed = await oco.execute({ ...PARAMS, monitor: false });
		venue.fillOrder("1000");
		venue.fillOrder("1001");

		const result = await oco.monitor(placed.pair);

		expect(result.outcome === "filled" && result.resolvedLeg).toBe("both");
		expect(cancel).not.toHaveBeenCalled();
	});

	it("leaves both legs live when interrupted", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const controller = new AbortController();
		const fake = scriptedSleep(() => controller.abort());
		const oco = new OcoCoordinator(venue, DEFAULT_OCO_CONFIG, {
			sleep: fake.sleep,
			now: () => 0,
			signal: controller.signal,
		});

		const result = await oco.execute(PARAMS);

		expect(result.outcome).toBe("aborted");
		expect(ocoExitCode(result)).toBe(0);
		expect((await venue.getOpenOrders("BTCUSDT")).map((o) => o.orderId)).toEqual(["1000", "1001"]);
	});

	it("times out after the monitoring window", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		let clock = 0;
		const fake = scriptedSleep(() => {
			clock += 5000;
		});
		const oco = new OcoCoordinator(
			venue,
			{ ...DEFAULT_OCO_CONFIG, maxMonitorMs: 10000 },
			{ sleep: fake.sleep, now: () => clock },
		);

		const result = await oco.execute(PARAMS);

		expect(result.outcome).toBe("timeout");
		expect(fake.calls).toEqual([5000, 5000]);
		expect(await venue.getOpenOrders("BTCUSDT")).toHaveLength(2);
	});
});
