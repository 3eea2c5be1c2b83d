// GridExecutor - limit ladder that re-arms the neighbouring level after each fill

import type Decimal from "decimal.js";
import { describeError, InputValidationError, toError } from "../../errors.js";
import type { ExchangeGateway } from "../../exchange/types.js";
import { buildLimitOrder, submitOrder } from "../../sdk/orders.js";
import { computeGridLevels } from "../../strategy/grid.js";
import { isAligned } from "../../strategy/precision.js";
import type { OrderHandle, Side } from "../../types.js";
import { isTerminal, oppositeSide } from "../../types.js";
import { createLogger, log as rootLog } from "../../utils/logger.js";
import { type LoopDeps, runPollLoop } from "../../utils/poll.js";
import { validatePrice, validateQuantity, validateSymbol } from "../../validation.js";
import type { GridConfig } from "./config.js";

export type { GridConfig } from "./config.js";

const log = createLogger("grid");

export interface GridParams {
	readonly symbol: string;
	readonly lowerPrice: Decimal.Value;
	readonly upperPrice: Decimal.Value;
	readonly levelCount: number;
	readonly quantityPerLevel: Decimal.Value;
	readonly currentPrice?: Decimal.Value;
	readonly monitor?: boolean;
	readonly maxTicks?: number;
}

export interface GridLevel {
	readonly index: number;
	readonly price: Decimal;
	readonly order?: OrderHandle;
}

export interface GridFill {
	readonly levelIndex: number;
	readonly orderId: string;
	readonly side: Side;
	readonly quantity: Decimal;
	readonly price: Decimal;
	readonly timestamp: number;
}

export interface GridRearm {
	readonly fromLevel: number;
	readonly toLevel: number;
	readonly side: Side;
	readonly orderId: string;
}

export interface SkippedRearm {
	readonly fromLevel: number;
	readonly toLevel: number;
	readonly reason: "out-of-range" | "occupied" | "failed";
}

export type GridOutcome =
	| "placed"
	| "stopped"
	| "cancelled"
	| "exhausted"
	| "drained"
	| "aborted-errors";

export interface GridResult {
	readonly outcome: GridOutcome;
	readonly levels: readonly GridLevel[];
	readonly ordersPlaced: number;
	readonly fills: readonly GridFill[];
	readonly rearmed: readonly GridRearm[];
	readonly skippedRearms: readonly SkippedRearm[];
	readonly lastError?: Error;
}

interface PendingRearm {
	readonly fromLevel: number;
	readonly side: Side;
}

interface LevelSlot {
	readonly index: number;
	readonly price: Decimal;
	order: OrderHandle | null;
	// Set while a re-arm at this level is owed but not yet on the book
	rearmDue: PendingRearm | null;
}

type LoopEnd = "cancelled" | "drained" | "aborted-errors";

export class GridExecutor {
	private slots: LevelSlot[] = [];
	private symbol = "";
	private quantity: Decimal | null = null;
	private cancelRequested = false;
	private fills: GridFill[] = [];
	private rearmed: GridRearm[] = [];
	private skippedRearms: SkippedRearm[] = [];

	constructor(
		private readonly gateway: ExchangeGateway,
		private readonly config: GridConfig,
		private readonly deps: LoopDeps = {},
	) {}

	// Stops monitoring after the current sweep, or on interrupt,
	// and cancels every open order on the symbol
	cancelAll(): void {
		this.cancelRequested = true;
	}

	async execute(params: GridParams): Promise<GridResult> {
		const symbol = validateSymbol(params.symbol, this.config.quoteAsset);
		const lower = validatePrice(params.lowerPrice, "lowerPrice");
		const upper = validatePrice(params.upperPrice, "upperPrice");
		const quantity = validateQuantity(params.quantityPerLevel);

		const rules = await this.gateway.getSymbolRules(symbol);
		if (!isAligned(quantity, rules.stepSize)) {
			throw new InputValidationError(
				"quantity",
				quantity.toFixed(),
				`Quantity per level must be a multiple of the step size ${rules.stepSize.toFixed()}`,
			);
		}
		const prices = computeGridLevels(lower, upper, params.levelCount, rules.tickSize);

		const current =
			params.currentPrice === undefined
				? await this.gateway.getCurrentPrice(symbol)
				: validatePrice(params.currentPrice, "currentPrice");
		if (current.lt(lower) || current.gt(upper)) {
			log.warn(`Current price ${current.toFixed()} is outside the grid ${lower.toFixed()}-${upper.toFixed()}`);
		}

		this.symbol = symbol;
		this.quantity = quantity;
		this.slots = prices.map((price, index) => ({ index, price, order: null, rearmDue: null }));
		this.fills = [];
		this.rearmed = [];
		this.skippedRearms = [];

		log.info(
			`Grid ${symbol}: ${prices.length} levels ${lower.toFixed()}-${upper.toFixed()}, ` +
				`${quantity.toFixed()} per level, market ${current.toFixed()}`,
		);
		const ordersPlaced = await this.placeInitialOrders(current);

		if (params.monitor === false || ordersPlaced === 0) {
			if (ordersPlaced === 0) log.error("No grid orders were placed");
			return this.result("placed", ordersPlaced);
		}
		return this.monitor(ordersPlaced, params.maxTicks);
	}

	private async placeInitialOrders(current: Decimal): Promise<number> {
		let placed = 0;
		for (const slot of this.slots) {
			if (slot.price.eq(current)) {
				log.info(`Level ${slot.index} @ ${slot.price.toFixed()} is at market, left empty`);
				continue;
			}
			const side: Side = slot.price.lt(current) ? "BUY" : "SELL";
			try {
				slot.order = await this.placeAt(slot, side);
				placed++;
			} catch (err) {
				log.error(`Level ${slot.index} ${side} @ ${slot.price.toFixed()} failed: ${describeError(err)}`);
			}
		}

		const below = this.slots.filter((s) => s.price.lt(current)).at(-1);
		const above = this.slots.find((s) => s.price.gt(current));
		const buyAnchor = below ? `BUY ${below.price.toFixed()}` : "no buy";
		const sellAnchor = above ? `SELL ${above.price.toFixed()}` : "no sell";
		log.info(`Placed ${placed} orders, anchored by ${buyAnchor} / ${sellAnchor}`);
		return placed;
	}

	private async monitor(ordersPlaced: number, maxTicks?: number): Promise<GridResult> {
		let consecutiveFailures = 0;
		let lastError: Error | undefined;

		log.info(`Monitoring grid every ${this.config.pollIntervalMs}ms`);

		const loop = await runPollLoop<LoopEnd>({
			intervalMs: this.config.pollIntervalMs,
			signal: this.deps.signal,
			sleep: this.deps.sleep,
			now: this.deps.now,
			maxTicks,
			tick: async (n) => {
				if (this.cancelRequested) return { done: "cancelled" };
				try {
					await this.sweep();
					consecutiveFailures = 0;
				} catch (err) {
					consecutiveFailures++;
					lastError = toError(err);
					log.error(
						`Sweep ${n} failed (${consecutiveFailures}/${this.config.maxConsecutiveFailures}): ` +
							describeError(err),
					);
					if (consecutiveFailures >= this.config.maxConsecutiveFailures) {
						return { done: "aborted-errors" };
					}
				}
				if (this.cancelRequested) return { done: "cancelled" };
				if (this.slots.every((s) => s.order === null && s.rearmDue === null)) {
					return { done: "drained" };
				}
				return "continue";
			},
		});

		this.abandonDueRearms();

		switch (loop.kind) {
			case "done":
				if (loop.value === "cancelled") {
					await this.cancelOpenOrders();
				} else if (loop.value === "aborted-errors") {
					log.error(`Giving up after ${consecutiveFailures} failed sweeps, grid orders stay live`);
				} else {
					log.warn("No pending grid orders left");
				}
				return this.result(loop.value, ordersPlaced, lastError);
			case "aborted":
				if (this.cancelRequested) {
					await this.cancelOpenOrders();
					return this.result("cancelled", ordersPlaced, lastError);
				}
				log.warn(`Grid monitoring stopped, ${this.pendingCount()} orders stay live`);
				return this.result("stopped", ordersPlaced, lastError);
			case "deadline":
				log.warn(`Grid monitoring stopped, ${this.pendingCount()} orders stay live`);
				return this.result("stopped", ordersPlaced, lastError);
			case "exhausted":
				return this.result("exhausted", ordersPlaced, lastError);
		}
	}

	// One pass over the owed re-arms, then the pending orders in ascending price order.
	// Throws on the first gateway error; the next sweep picks up where it left off.
	private async sweep(): Promise<void> {
		for (const slot of this.slots) {
			await this.placeDue(slot);
		}

		const pending = this.slots.flatMap((slot) =>
			slot.order ? [{ slot, orderId: slot.order.orderId }] : [],
		);

		for (const { slot, orderId } of pending) {
			if (slot.order?.orderId !== orderId) continue;
			const order = await this.gateway.getOrderStatus(this.symbol, orderId);

			if (order.status === "FILLED") {
				slot.order = null;
				this.fills.push({
					levelIndex: slot.index,
					orderId,
					side: order.side,
					quantity: order.executedQty,
					price: order.avgPrice,
					timestamp: (this.deps.now ?? Date.now)(),
				});
				rootLog.fill("grid", order.side, order.executedQty.toFixed(), order.avgPrice.toFixed(), orderId);
				await this.rearm(slot, order.side);
			} else if (isTerminal(order.status)) {
				slot.order = null;
				log.warn(`Level ${slot.index} order #${orderId} ended ${order.status}, level left empty`);
			} else {
				slot.order = order;
			}
		}
	}

	// BUY fill sells one level up, SELL fill buys one level down
	private async rearm(filled: LevelSlot, filledSide: Side): Promise<void> {
		const toLevel = filledSide === "BUY" ? filled.index + 1 : filled.index - 1;
		const side = oppositeSide(filledSide);
		const target = this.slots[toLevel];

		if (!target) {
			this.skippedRearms.push({ fromLevel: filled.index, toLevel, reason: "out-of-range" });
			log.info(`Level ${filled.index} filled at the edge of the grid, nothing to re-arm`);
			return;
		}
		if (target.order || target.rearmDue) {
			this.skippedRearms.push({ fromLevel: filled.index, toLevel, reason: "occupied" });
			log.info(`Level ${toLevel} is already taken, skipping re-arm`);
			return;
		}

		target.rearmDue = { fromLevel: filled.index, side };
		await this.placeDue(target);
	}

	// A failed placement leaves rearmDue set so the next sweep tries again
	private async placeDue(slot: LevelSlot): Promise<void> {
		const due = slot.rearmDue;
		if (!due) return;
		const order = await this.placeAt(slot, due.side);
		slot.order = order;
		slot.rearmDue = null;
		this.rearmed.push({
			fromLevel: due.fromLevel,
			toLevel: slot.index,
			side: due.side,
			orderId: order.orderId,
		});
		log.info(`Re-armed ${due.side} at level ${slot.index} @ ${slot.price.toFixed()}`);
	}

	private abandonDueRearms(): void {
		for (const slot of this.slots) {
			const due = slot.rearmDue;
			if (!due) continue;
			this.skippedRearms.push({ fromLevel: due.fromLevel, toLevel: slot.index, reason: "failed" });
			log.warn(`Re-arm ${due.side} at level ${slot.index} was never placed`);
			slot.rearmDue = null;
		}
	}

	private async placeAt(slot: LevelSlot, side: Side): Promise<OrderHandle> {
		if (!this.quantity) {
			throw new Error("Grid quantity is not set");
		}
		return submitOrder(this.gateway, buildLimitOrder(this.symbol, side, this.quantity, slot.price, "GTC"));
	}

	private async cancelOpenOrders(): Promise<void> {
		log.info(`Cancelling all open ${this.symbol} orders`);
		await this.gateway.cancelAllOpenOrders(this.symbol);
		for (const slot of this.slots) {
			slot.order = null;
		}
	}

	private pendingCount(): number {
		return this.slots.filter((s) => s.order !== null).length;
	}

	private result(outcome: GridOutcome, ordersPlaced: number, lastError?: Error): GridResult {
		return {
			outcome,
			levels: this.slots.map((s) =>
				s.order
					? { index: s.index, price: s.price, order: s.order }
					: { index: s.index, price: s.price },
			),
			ordersPlaced,
			fills: [...this.fills],
			rearmed: [...this.rearmed],
			skippedRearms: [...this.skippedRearms],
			lastError,
		};
	}
}
