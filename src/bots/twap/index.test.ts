import Decimal from "decimal.js";
import { describe, expect, it, vi } from "vitest";
import { twapExitCode } from "../../cli/outcomes.js";
import { InputValidationError, InsufficientBalanceError, RateLimitError } from "../../errors.js";
import { SimulatedExchange } from "../../exchange/simulated.js";
import type { Sleep } from "../../utils/poll.js";
import { DEFAULT_TWAP_CONFIG } from "./config.js";
import { TwapExecutor, type TwapParams } from "./index.js";

const PARAMS: TwapParams = {
	symbol: "BTCUSDT",
	side: "BUY",
	quantity: "0.01",
	durationSeconds: 600,
	chunkCount: 5,
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

describe("TwapExecutor", () => {
	it("sends equal market chunks spaced by the interval", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const fake = scriptedSleep();
		const twap = new TwapExecutor(venue, DEFAULT_TWAP_CONFIG, { sleep: fake.sleep });

		const result = await twap.execute(PARAMS);

		expect(venue.listOrders().map((o) => [o.type, o.side, o.quantity.toFixed()])).toEqual(
			Array.from({ length: 5 }, () => ["MARKET", "BUY", "0.002"]),
		);
		expect(fake.calls).toEqual([120000, 120000, 120000, 120000]);
		expect(result.executedQuantity.toFixed()).toBe("0.01");
		expect(result.requestedQuantity.toFixed()).toBe("0.01");
		expect(result.chunksCompleted).toBe(5);
		expect(result.failures).toEqual([]);
		expect(result.aborted).toBe(false);
		expect(twapExitCode(result)).toBe(0);
	});

	it("reports the volume-weighted average price", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const fake = scriptedSleep((call) => venue.setPrice(60000 + call * 100));
		const twap = new TwapExecutor(venue, DEFAULT_TWAP_CONFIG, { sleep: fake.sleep });

		const result = await twap.execute(PARAMS);

		expect(result.fills.map((f) => f.price.toFixed())).toEqual(["60000", "60100", "60200", "60300", "60400"]);
		expect(result.averagePrice?.toFixed()).toBe("60200");
	});

	it("moves on after a failed chunk without waiting", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		venue.failNext("placeOrder", new InsufficientBalanceError("Margin is insufficient.", -2019));
		const fake = scriptedSleep();
		const twap = new TwapExecutor(venue, DEFAULT_TWAP_CONFIG, { sleep: fake.sleep });

		const result = await twap.execute(PARAMS);

		expect(result.failures).toHaveLength(1);
		expect(result.failures[0]?.index).toBe(0);
		expect(result.failures[0]?.error).toBeInstanceOf(InsufficientBalanceError);
		expect(result.chunksCompleted).toBe(4);
		expect(result.executedQuantity.toFixed()).toBe("0.008");
		expect(fake.calls).toEqual([120000, 120000, 120000]);
	});

	it("retries a chunk after a transient failure", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		venue.failNext("placeOrder", new RateLimitError("Too many requests.", -1003));
		const fake = scriptedSleep();
		const twap = new TwapExecutor(venue, DEFAULT_TWAP_CONFIG, { sleep: fake.sleep });

		const result = await twap.execute(PARAMS);

		expect(fake.calls).toEqual([5000, 120000, 120000, 120000, 120000]);
		expect(result.chunksCompleted).toBe(5);
		expect(result.failures).toEqual([]);
		expect(venue.listOrders()).toHaveLength(5);
	});

	it("re-reads an unsettled order instead of resubmitting it", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const place = venue.placeOrder.bind(venue);
		const submit = vi.spyOn(venue, "placeOrder").mockImplementation(async (request) => {
			const order = await place(request);
			return { ...order, status: "NEW", executedQty: new Decimal(0) };
		});
		const twap = new TwapExecutor(venue, DEFAULT_TWAP_CONFIG, { sleep: scriptedSleep().sleep });

		const result = await twap.execute({ ...PARAMS, quantity: "0.002", chunkCount: 1 });

		expect(submit).toHaveBeenCalledTimes(1);
		expect(result.chunksCompleted).toBe(1);
		expect(result.executedQuantity.toFixed()).toBe("0.002");
	});

	it("stops between chunks when interrupted and keeps what executed", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const controller = new AbortController();
		const fake = scriptedSleep(() => controller.abort());
		const twap = new TwapExecutor(venue, DEFAULT_TWAP_CONFIG, { sleep: fake.sleep, signal: controller.signal });

		const result = await twap.execute(PARAMS);

		expect(result.aborted).toBe(true);
		expect(result.chunksCompleted).toBe(1);
		expect(result.executedQuantity.toFixed()).toBe("0.002");
		expect(venue.listOrders()).toHaveLength(1);
	});

	it("exits non-zero when no chunk executed", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		venue.failNext("placeOrder", new InsufficientBalanceError("Margin is insufficient.", -2019));
		const twap = new TwapExecutor(venue, DEFAULT_TWAP_CONFIG, { sleep: scriptedSleep().sleep });

		const result = await twap.execute({ ...PARAMS, quantity: "0.002", chunkCount: 1 });

		expect(result.chunksCompleted).toBe(0);
		expect(result.averagePrice).toBeNull();
		expect(twapExitCode(result)).toBe(1);
	});

	it("rejects a total off the step grid before placing anything", async () => {
		const venue = new SimulatedExchange({ midPrice: 60000 });
		const twap = new TwapExecutor(venue, DEFAULT_TWAP_CONFIG, { sleep: scriptedSleep().sleep });

		await expect(twap.execute({ ...PARAMS, quantity: "0.0105" })).rejects.toBeInstanceOf(InputValidationError);
		await expect(twap.execute({ ...PARAMS, chunkCount: 0 })).rejects.toBeInstanceOf(InputValidationError);
		expect(venue.listOrders()).toHaveLength(0);
	});
});
