import { describe, expect, it, vi } from "vitest";
import { gridExitCode } from "../../cli/outcomes.js";
import { InputValidationError, InsufficientBalanceError, NetworkError } from "../../errors.js";
import { SimulatedExchange } from "../../exchange/simulated.js";
import type { Sleep } from "../../utils/poll.js";
import { DEFAULT_GRID_CONFIG } from "./config.js";
import { GridExecutor, type GridParams } from "./index.js";

const PARAMS: GridParams = {
	symbol: "BTCUSDT",
	lowerPrice: "58000",
	upperPrice: "62000",
	levelCount: 10,
	quantityPerLevel: "0.001",
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

describe("GridExecutor", () => {
	it("buys below the market and sells above it", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const grid = new GridExecutor(venue, DEFAULT_GRID_CONFIG);

		const result = await grid.execute({ ...PARAMS, monitor: false });

		expect(result.outcome).toBe("placed");
		expect(result.ordersPlaced).toBe(10);
		expect(result.levels.map((l) => l.order?.side ?? "-")).toEqual([
			"BUY",
			"BUY",
			"BUY",
			"BUY",
			"BUY",
			"-",
			"SELL",
			"SELL",
			"SELL",
			"SELL",
			"SELL",
		]);
		expect(result.levels[4]?.order?.price?.toFixed()).toBe("59600");
		expect(result.levels[6]?.order?.price?.toFixed()).toBe("60400");
		expect(venue.listOrders().every((o) => o.type === "LIMIT" && o.quantity.toFixed() === "0.001")).toBe(true);
	});

	it("re-arms a sell one level up after a buy fills", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const fake = scriptedSleep(() => venue.setPrice(59500));
		const grid = new GridExecutor(venue, DEFAULT_GRID_CONFIG, { sleep: fake.sleep });

		const result = await grid.execute({ ...PARAMS, maxTicks: 2 });

		expect(result.outcome).toBe("exhausted");
		expect(fake.calls).toEqual([10000]);
		expect(result.fills).toHaveLength(1);
		expect(result.fills[0]).toMatchObject({ levelIndex: 4, orderId: "1004", side: "BUY" });
		expect(result.fills[0]?.price.toFixed()).toBe("59600");
		expect(result.rearmed).toEqual([{ fromLevel: 4, toLevel: 5, side: "SELL", orderId: "1010" }]);
		expect(result.levels[4]?.order).toBeUndefined();
		expect(result.levels[5]?.order?.side).toBe("SELL");
		expect(result.levels[5]?.order?.price?.toFixed()).toBe("60000");
	});

	it("skips the re-arm when the target level is occupied", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const fake = scriptedSleep(() => venue.fillOrder("1006"));
		const grid = new GridExecutor(venue, DEFAULT_GRID_CONFIG, { sleep: fake.sleep });

		const result = await grid.execute({ ...PARAMS, maxTicks: 2 });

		expect(result.fills.map((f) => [f.levelIndex, f.side, f.price.toFixed()])).toEqual([[7, "SELL", "60800"]]);
		expect(result.skippedRearms).toEqual([{ fromLevel: 7, toLevel: 6, reason: "occupied" }]);
		expect(result.rearmed).toEqual([]);
		expect(result.levels[6]?.order?.orderId).toBe("1005");
	});

	it("skips the re-arm past the edge of the grid", async () => {
		const venue = new SimulatedExchange({ midPrice: 63000 });
		const fake = scriptedSleep(() => venue.fillOrder("1010"));
		const grid = new GridExecutor(venue, DEFAULT_GRID_CONFIG, { sleep: fake.sleep });

		const result = await grid.execute({ ...PARAMS, maxTicks: 2 });

		expect(result.ordersPlaced).toBe(11);
		expect(result.skippedRearms).toEqual([{ fromLevel: 10, toLevel: 11, reason: "out-of-range" }]);
	});

	it("retries a re-arm that hit a transient error on the next sweep", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const fake = scriptedSleep((call) => {
			if (call === 1) {
				venue.setPrice(59500);
				venue.failNext("placeOrder", new NetworkError("timeout"));
			}
		});
		const grid = new GridExecutor(venue, DEFAULT_GRID_CONFIG, { sleep: fake.sleep });

		const result = await grid.execute({ ...PARAMS, maxTicks: 3 });

		expect(result.outcome).toBe("exhausted");
		expect(fake.calls).toEqual([10000, 10000]);
		expect(result.fills.map((f) => f.levelIndex)).toEqual([4]);
		expect(result.rearmed).toEqual([{ fromLevel: 4, toLevel: 5, side: "SELL", orderId: "1010" }]);
		expect(result.skippedRearms).toEqual([]);
		expect(result.levels[5]?.order?.side).toBe("SELL");
		expect(result.levels[5]?.order?.price?.toFixed()).toBe("60000");
	});

	it("reports a re-arm still owed when monitoring ends as failed", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const fake = scriptedSleep(() => {
			venue.setPrice(59500);
			venue.failNext("placeOrder", new NetworkError("timeout"));
		});
		const grid = new GridExecutor(venue, DEFAULT_GRID_CONFIG, { sleep: fake.sleep });

		const result = await grid.execute({ ...PARAMS, maxTicks: 2 });

		expect(result.outcome).toBe("exhausted");
		expect(result.lastError?.message).toBe("timeout");
		expect(result.rearmed).toEqual([]);
		expect(result.skippedRearms).toEqual([{ fromLevel: 4, toLevel: 5, reason: "failed" }]);
		expect(result.levels[5]?.order).toBeUndefined();
	});

	it("gives up after three failed sweeps in a row and leaves the orders live", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		for (let i = 0; i < 3; i++) venue.failNext("getOrderStatus", new NetworkError("connection reset"));
		const fake = scriptedSleep();
		const grid = new GridExecutor(venue, DEFAULT_GRID_CONFIG, { sleep: fake.sleep });

		const result = await grid.execute(PARAMS);

		expect(result.outcome).toBe("aborted-errors");
		expect(result.lastError?.message).toBe("connection reset");
		expect(fake.calls).toEqual([10000, 10000]);
		expect(gridExitCode(result)).toBe(1);
		expect(await venue.getOpenOrders("BTCUSDT")).toHaveLength(10);
	});

	it("resets the failure count after a clean sweep", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const fail = (): void => venue.failNext("getOrderStatus", new NetworkError("connection reset"));
		fail();
		fail();
		const fake = scriptedSleep((call) => {
			if (call === 3) {
				fail();
				fail();
			}
		});
		const grid = new GridExecutor(venue, DEFAULT_GRID_CONFIG, { sleep: fake.sleep });

		const result = await grid.execute({ ...PARAMS, maxTicks: 5 });

		expect(result.outcome).toBe("exhausted");
		expect(fake.calls).toHaveLength(4);
		expect(gridExitCode(result)).toBe(0);
	});

	it("cancels every open order on request", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const cancelAll = vi.spyOn(venue, "cancelAllOpenOrders");
		let grid: GridExecutor | undefined;
		const fake = scriptedSleep(() => grid?.cancelAll());
		grid = new GridExecutor(venue, DEFAULT_GRID_CONFIG, { sleep: fake.sleep });

		const result = await grid.execute(PARAMS);

		expect(result.outcome).toBe("cancelled");
		expect(cancelAll).toHaveBeenCalledWith("BTCUSDT");
		expect(result.levels.every((l) => l.order === undefined)).toBe(true);
		expect(await venue.getOpenOrders("BTCUSDT")).toHaveLength(0);
	});

	it("stops when every level has emptied", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const fake = scriptedSleep(() => {
			venue.endOrder("1000", "CANCELED");
			venue.endOrder("1001", "EXPIRED");
		});
		const grid = new GridExecutor(venue, DEFAULT_GRID_CONFIG, { sleep: fake.sleep });

		const result = await grid.execute({ ...PARAMS, levelCount: 2 });

		expect(result.ordersPlaced).toBe(2);
		expect(result.outcome).toBe("drained");
		expect(result.fills).toEqual([]);
	});

	it("stops monitoring on interrupt and leaves the orders live", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const controller = new AbortController();
		const fake = scriptedSleep(() => controller.abort());
		const grid = new GridExecutor(venue, DEFAULT_GRID_CONFIG, { sleep: fake.sleep, signal: controller.signal });

		const result = await grid.execute(PARAMS);

		expect(result.outcome).toBe("stopped");
		expect(await venue.getOpenOrders("BTCUSDT")).toHaveLength(10);
	});

	it("cancels every open order when interrupted after a cancel request", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const controller = new AbortController();
		let grid: GridExecutor | undefined;
		const fake = scriptedSleep(() => {
			grid?.cancelAll();
			controller.abort();
		});
		grid = new GridExecutor(venue, DEFAULT_GRID_CONFIG, { sleep: fake.sleep, signal: controller.signal });

		const result = await grid.execute(PARAMS);

		expect(result.outcome).toBe("cancelled");
		expect(fake.calls).toEqual([10000]);
		expect(await venue.getOpenOrders("BTCUSDT")).toHaveLength(0);
	});

	it("carries on past a level that cannot be placed", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		venue.failNext("placeOrder", new InsufficientBalanceError("Margin is insufficient.", -2019));
		const grid = new GridExecutor(venue, DEFAULT_GRID_CONFIG);

		const result = await grid.execute({ ...PARAMS, monitor: false });

		expect(result.ordersPlaced).toBe(9);
		expect(result.levels[0]?.order).toBeUndefined();
		expect(gridExitCode(result)).toBe(0);
	});

	it("rejects a quantity off the step grid", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const grid = new GridExecutor(venue, DEFAULT_GRID_CONFIG);

		await expect(grid.execute({ ...PARAMS, quantityPerLevel: "0.0015" })).rejects.toBeInstanceOf(InputValidationError);
		await expect(grid.execute({ ...PARAMS, levelCount: 1 })).rejects.toBeInstanceOf(InputValidationError);
		expect(venue.listOrders()).toHaveLength(0);
	});
});
