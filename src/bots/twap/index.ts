// TwapExecutor - slices a market order into timed chunks and tracks the VWAP

import Decimal from "decimal.js";
import { describeError, isRetryable, toError } from "../../errors.js";
import type { ExchangeGateway } from "../../exchange/types.js";
import { buildMarketOrder, submitOrder } from "../../sdk/orders.js";
import { vwap } from "../../strategy/precision.js";
import { planTwap, type TwapPlan } from "../../strategy/twap.js";
import type { OrderHandle } from "../../types.js";
import { createLogger, log as rootLog } from "../../utils/logger.js";
import { type LoopDeps, sleep } from "../../utils/poll.js";
import { validateQuantity, validateSide, validateSymbol } from "../../validation.js";
import type { TwapConfig } from "./config.js";

export type { TwapConfig } from "./config.js";

const log = createLogger("twap");

export interface TwapParams {
	readonly symbol: string;
	readonly side: string;
	readonly quantity: Decimal.Value;
	readonly durationSeconds: number;
	readonly chunkCount: number;
}

export interface TwapFill {
	readonly index: number;
	readonly orderId: string;
	readonly quantity: Decimal;
	readonly price: Decimal;
	readonly timestamp: number;
}

export interface TwapFailure {
	readonly index: number;
	readonly quantity: Decimal;
	readonly error: Error;
}

export interface TwapResult {
	readonly plan: TwapPlan;
	readonly requestedQuantity: Decimal;
	readonly executedQuantity: Decimal;
	readonly averagePrice: Decimal | null;
	readonly fills: readonly TwapFill[];
	readonly failures: readonly TwapFailure[];
	readonly chunksCompleted: number;
	readonly aborted: boolean;
}

type ChunkOutcome =
	| { readonly kind: "filled"; readonly fill: TwapFill }
	| { readonly kind: "failed"; readonly failure: TwapFailure }
	| { readonly kind: "aborted" };

export class TwapExecutor {
	constructor(
		private readonly gateway: ExchangeGateway,
		private readonly config: TwapConfig,
		private readonly deps: LoopDeps = {},
	) {}

	async execute(params: TwapParams): Promise<TwapResult> {
		const symbol = validateSymbol(params.symbol, this.config.quoteAsset);
		const side = validateSide(params.side);
		const totalQuantity = validateQuantity(params.quantity);

		const rules = await this.gateway.getSymbolRules(symbol);
		const plan = planTwap({
			symbol,
			side,
			totalQuantity,
			durationSeconds: params.durationSeconds,
			chunkCount: params.chunkCount,
			stepSize: rules.stepSize,
			minQty: rules.minQty,
		});

		log.info(
			`TWAP ${side} ${totalQuantity.toFixed()} ${symbol}: ` +
				`${plan.chunkCount} chunks every ${plan.intervalMs / 1000}s`,
		);
		if (plan.chunkCount > 1 && plan.intervalMs < this.config.minIntervalWarnMs) {
			log.warn(`Interval of ${plan.intervalMs}ms is very short, chunks will hit the book almost at once`);
		}

		const sleepFn = this.deps.sleep ?? sleep;
		const fills: TwapFill[] = [];
		const failures: TwapFailure[] = [];
		let aborted = false;

		for (let index = 0; index < plan.chunks.length; index++) {
			const quantity = plan.chunks[index];
			if (!quantity) continue;
			if (this.deps.signal?.aborted) {
				aborted = true;
				break;
			}

			log.info(`Chunk ${index + 1}/${plan.chunkCount}: ${side} ${quantity.toFixed()}`);
			const outcome = await this.executeChunk(plan, index, quantity);

			if (outcome.kind === "aborted") {
				aborted = true;
				break;
			}
			if (outcome.kind === "failed") {
				failures.push(outcome.failure);
				log.error(`Chunk ${index + 1} failed: ${describeError(outcome.failure.error)}`);
				continue;
			}

			fills.push(outcome.fill);
			const running = vwap(fills);
			log.info(
				`Chunk ${index + 1} filled ${outcome.fill.quantity.toFixed()} @ ${outcome.fill.price.toFixed()}, ` +
					`running VWAP ${running?.toFixed(2) ?? "-"}`,
			);

			if (index < plan.chunks.length - 1) {
				await sleepFn(plan.intervalMs, this.deps.signal);
			}
		}

		const executedQuantity = fills.reduce((sum, f) => sum.add(f.quantity), new Decimal(0));
		const averagePrice = vwap(fills);

		if (aborted) {
			log.warn(`TWAP interrupted after ${fills.length} chunks, executed fills are kept`);
		}
		log.info(
			`TWAP done: ${executedQuantity.toFixed()}/${totalQuantity.toFixed()} executed ` +
				`in ${fills.length} chunks, ${failures.length} failed, ` +
				`VWAP ${averagePrice?.toFixed(2) ?? "-"}`,
		);

		return {
			plan,
			requestedQuantity: totalQuantity,
			executedQuantity,
			averagePrice,
			fills,
			failures,
			chunksCompleted: fills.length,
			aborted,
		};
	}

	// Transient failures resubmit the same chunk; anything else fails it
	private async executeChunk(plan: TwapPlan, index: number, quantity: Decimal): Promise<ChunkOutcome> {
		const sleepFn = this.deps.sleep ?? sleep;
		const now = this.deps.now ?? Date.now;

		for (;;) {
			if (this.deps.signal?.aborted) return { kind: "aborted" };

			let submitted: OrderHandle;
			try {
				submitted = await submitOrder(this.gateway, buildMarketOrder(plan.symbol, plan.side, quantity));
			} catch (err) {
				if (!isRetryable(err)) {
					return { kind: "failed", failure: { index, quantity, error: toError(err) } };
				}
				log.warn(`Chunk ${index + 1} hit ${describeError(err)}, retrying in ${this.config.retryDelayMs}ms`);
				await sleepFn(this.config.retryDelayMs, this.deps.signal);
				continue;
			}

			const order = await this.settled(submitted);
			if (order.executedQty.isZero()) {
				return {
					kind: "failed",
					failure: {
						index,
						quantity,
						error: new Error(`Market order #${order.orderId} ended ${order.status} with nothing executed`),
					},
				};
			}
			rootLog.fill("twap", order.side, order.executedQty.toFixed(), order.avgPrice.toFixed(), order.orderId);
			return {
				kind: "filled",
				fill: {
					index,
					orderId: order.orderId,
					quantity: order.executedQty,
					price: order.avgPrice,
					timestamp: now(),
				},
			};
		}
	}

	// Market orders normally come back filled; re-read once if not.
	// The order is never resubmitted from here.
	private async settled(order: OrderHandle): Promise<OrderHandle> {
		if (order.status === "FILLED") return order;
		try {
			return await this.gateway.getOrderStatus(order.symbol, order.orderId);
		} catch (err) {
			log.warn(`Could not re-check #${order.orderId}: ${describeError(err)}`);
			return order;
		}
	}
}
