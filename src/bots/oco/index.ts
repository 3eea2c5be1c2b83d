// OcoCoordinator - take-profit and stop-loss legs, first fill cancels the other

import type Decimal from "decimal.js";
import { describeError, isRetryable } from "../../errors.js";
import type { ExchangeGateway } from "../../exchange/types.js";
import {
	buildStopMarketOrder,
	buildTakeProfitMarketOrder,
	formatHandle,
	submitOrder,
} from "../../sdk/orders.js";
import type { CancelResult, OrderHandle, OrderStatus } from "../../types.js";
import { isTerminal } from "../../types.js";
import { createLogger, log as rootLog } from "../../utils/logger.js";
import { type LoopDeps, runPollLoop, sleep } from "../../utils/poll.js";
import {
	validateOcoPrices,
	validatePrice,
	validateQuantity,
	validateSide,
	validateStopPrice,
	validateSymbol,
	validateTakeProfitPrice,
} from "../../validation.js";
import type { OcoConfig } from "./config.js";

export type { OcoConfig } from "./config.js";

const log = createLogger("oco");

export type OcoLeg = "takeProfit" | "stopLoss";

export interface OcoPair {
	readonly takeProfit: OrderHandle;
	readonly stopLoss: OrderHandle;
	readonly state: "ACTIVE" | "RESOLVED";
}

export interface OcoParams {
	readonly symbol: string;
	readonly side: string;
	readonly quantity: Decimal.Value;
	readonly takeProfitPrice: Decimal.Value;
	readonly stopLossPrice: Decimal.Value;
	readonly monitor?: boolean;
}

export type OcoResult =
	| { readonly outcome: "placed"; readonly pair: OcoPair }
	| {
			readonly outcome: "filled";
			readonly pair: OcoPair;
			readonly resolvedLeg: OcoLeg | "both";
			readonly fillPrice: Decimal;
			readonly cancel?: CancelResult;
	  }
	| {
			readonly outcome: "leg-terminated";
			readonly pair: OcoPair;
			readonly leg: OcoLeg;
			readonly legStatus: OrderStatus;
			readonly cancel?: CancelResult;
	  }
	| { readonly outcome: "aborted"; readonly pair: OcoPair }
	| { readonly outcome: "timeout"; readonly pair: OcoPair };

const LEG_LABEL: Record<OcoLeg, string> = {
	takeProfit: "take-profit",
	stopLoss: "stop-loss",
};

function otherLeg(leg: OcoLeg): OcoLeg {
	return leg === "takeProfit" ? "stopLoss" : "takeProfit";
}

function liveLegs(pair: OcoPair): string {
	return `TP #${pair.takeProfit.orderId}, SL #${pair.stopLoss.orderId}`;
}

function withLegs(
	leg: OcoLeg,
	own: OrderHandle,
	sibling: OrderHandle,
	state: OcoPair["state"],
): OcoPair {
	return leg === "takeProfit"
		? { takeProfit: own, stopLoss: sibling, state }
		: { takeProfit: sibling, stopLoss: own, state };
}

export class OcoCoordinator {
	constructor(
		private readonly gateway: ExchangeGateway,
		private readonly config: OcoConfig,
		private readonly deps: LoopDeps = {},
	) {}

	async execute(params: OcoParams): Promise<OcoResult> {
		const symbol = validateSymbol(params.symbol, this.config.quoteAsset);
		const side = validateSide(params.side);
		const quantity = validateQuantity(params.quantity);
		const takeProfitPrice = validatePrice(params.takeProfitPrice, "takeProfitPrice");
		const stopLossPrice = validatePrice(params.stopLossPrice, "stopLossPrice");
		validateOcoPrices(side, takeProfitPrice, stopLossPrice);

		const market = await this.gateway.getCurrentPrice(symbol);
		validateStopPrice(stopLossPrice, market, side);
		validateTakeProfitPrice(takeProfitPrice, market, side);
		log.info(
			`${symbol} at ${market.toFixed()}: ${side} ${quantity.toFixed()} ` +
				`TP ${takeProfitPrice.toFixed()} / SL ${stopLossPrice.toFixed()}`,
		);

		const takeProfit = await submitOrder(
			this.gateway,
			buildTakeProfitMarketOrder(symbol, side, quantity, takeProfitPrice),
		);

		let stopLoss: OrderHandle;
		try {
			stopLoss = await submitOrder(this.gateway, buildStopMarketOrder(symbol, side, quantity, stopLossPrice));
		} catch (err) {
			log.error(
				`Stop-loss placement failed (${describeError(err)}), ` +
					`cancelling take-profit #${takeProfit.orderId}`,
			);
			const rollback = await this.gateway.cancelOrder(symbol, takeProfit.orderId);
			if (rollback.kind === "failed") {
				log.error(`Take-profit #${takeProfit.orderId} could not be cancelled and is still live:`, rollback.error);
			}
			throw err;
		}

		const pair: OcoPair = { takeProfit, stopLoss, state: "ACTIVE" };
		log.info(`OCO placed: TP #${takeProfit.orderId}, SL #${stopLoss.orderId}`);

		if (params.monitor === false) {
			return { outcome: "placed", pair };
		}
		return this.monitor(pair);
	}

	async monitor(pair: OcoPair): Promise<OcoResult> {
		const now = this.deps.now ?? Date.now;
		const symbol = pair.takeProfit.symbol;
		let current = pair;

		log.info(
			`Monitoring OCO every ${this.config.pollIntervalMs}ms ` +
				`for up to ${Math.round(this.config.maxMonitorMs / 1000)}s`,
		);

		const result = await runPollLoop<OcoResult>({
			intervalMs: this.config.pollIntervalMs,
			signal: this.deps.signal,
			sleep: this.deps.sleep,
			now,
			deadline: now() + this.config.maxMonitorMs,
			tick: async (n) => {
				let takeProfit: OrderHandle;
				let stopLoss: OrderHandle;
				try {
					takeProfit = await this.gateway.getOrderStatus(symbol, current.takeProfit.orderId);
					stopLoss = await this.gateway.getOrderStatus(symbol, current.stopLoss.orderId);
				} catch (err) {
					if (!isRetryable(err)) throw err;
					log.warn(`Poll ${n} failed, retrying: ${describeError(err)}`);
					return "continue";
				}

				current = { takeProfit, stopLoss, state: "ACTIVE" };
				log.debug(`Poll ${n}: TP ${takeProfit.status} / SL ${stopLoss.status}`);

				const resolution = await this.resolve(current);
				return resolution ? { done: resolution } : "continue";
			},
		});

		switch (result.kind) {
			case "done":
				return result.value;
			case "aborted":
				log.warn(
					`Monitoring stopped. Orders remain live: ${liveLegs(current)}`,
				);
				return { outcome: "aborted", pair: current };
			case "deadline":
			case "exhausted":
				log.warn(
					`Monitoring timed out. Orders remain live: ${liveLegs(current)}`,
				);
				return { outcome: "timeout", pair: current };
		}
	}

	private async resolve(pair: OcoPair): Promise<OcoResult | null> {
		const { takeProfit, stopLoss } = pair;

		if (takeProfit.status === "FILLED" && stopLoss.status === "FILLED") {
			log.warn("Both OCO legs filled - position may be flat or reversed, check the account");
			return {
				outcome: "filled",
				pair: { ...pair, state: "RESOLVED" },
				resolvedLeg: "both",
				fillPrice: takeProfit.avgPrice,
			};
		}
		if (takeProfit.status === "FILLED") return this.onFill(pair, "takeProfit");
		if (stopLoss.status === "FILLED") return this.onFill(pair, "stopLoss");

		for (const leg of ["takeProfit", "stopLoss"] as const) {
			if (isTerminal(pair[leg].status)) {
				return this.onLegEnded(pair, leg);
			}
		}
		return null;
	}

	private async onFill(pair: OcoPair, leg: OcoLeg): Promise<OcoResult> {
		const filled = pair[leg];
		const siblingLeg = otherLeg(leg);
		let sibling = pair[siblingLeg];

		rootLog.fill("oco", filled.side, filled.executedQty.toFixed(), filled.avgPrice.toFixed(), filled.orderId);
		log.info(`${LEG_LABEL[leg]} filled, cancelling ${LEG_LABEL[siblingLeg]} #${sibling.orderId}`);

		let cancel: CancelResult | undefined;
		if (!isTerminal(sibling.status)) {
			cancel = await this.cancelSibling(sibling);
			sibling = await this.afterCancel(sibling, cancel);
		}

		const both = sibling.status === "FILLED";
		if (both) {
			log.warn(`${LEG_LABEL[siblingLeg]} #${sibling.orderId} also filled before it could be cancelled`);
		}
		return {
			outcome: "filled",
			pair: withLegs(leg, filled, sibling, "RESOLVED"),
			resolvedLeg: both ? "both" : leg,
			fillPrice: filled.avgPrice,
			cancel,
		};
	}

	private async onLegEnded(pair: OcoPair, leg: OcoLeg): Promise<OcoResult> {
		const ended = pair[leg];
		const siblingLeg = otherLeg(leg);
		let sibling = pair[siblingLeg];

		log.error(`${LEG_LABEL[leg]} #${ended.orderId} ended as ${ended.status} without a fill`);

		let cancel: CancelResult | undefined;
		if (!isTerminal(sibling.status)) {
			log.info(`Cancelling ${LEG_LABEL[siblingLeg]} #${sibling.orderId}`);
			cancel = await this.cancelSibling(sibling);
			sibling = await this.afterCancel(sibling, cancel);
		}
		return {
			outcome: "leg-terminated",
			pair: withLegs(leg, ended, sibling, "RESOLVED"),
			leg,
			legStatus: ended.status,
			cancel,
		};
	}

	// Transient failures are retried every poll interval until the cancel lands
	// or monitoring is interrupted
	private async cancelSibling(sibling: OrderHandle): Promise<CancelResult> {
		const sleepFn = this.deps.sleep ?? sleep;
		for (let attempt = 1; ; attempt++) {
			const cancel = await this.gateway.cancelOrder(sibling.symbol, sibling.orderId);
			if (cancel.kind !== "failed" || !isRetryable(cancel.error) || this.deps.signal?.aborted) {
				return cancel;
			}
			log.warn(
				`Cancel of #${sibling.orderId} failed (attempt ${attempt}), ` +
					`retrying: ${describeError(cancel.error)}`,
			);
			await sleepFn(this.config.pollIntervalMs, this.deps.signal);
		}
	}

	private async afterCancel(sibling: OrderHandle, cancel: CancelResult): Promise<OrderHandle> {
		switch (cancel.kind) {
			case "canceled":
				log.info(`Cancelled ${formatHandle(cancel.order)}`);
				return cancel.order;
			case "already-resolved":
				log.info(`Order #${sibling.orderId} already resolved, checking final state`);
				return this.requery(sibling);
			case "failed":
				log.error(`Cancel of #${sibling.orderId} failed, order may still be live:`, cancel.error);
				return sibling;
		}
	}

	private async requery(order: OrderHandle): Promise<OrderHandle> {
		try {
			return await this.gateway.getOrderStatus(order.symbol, order.orderId);
		} catch (err) {
			log.warn(`Could not re-check #${order.orderId}: ${describeError(err)}`);
			return order;
		}
	}
}
