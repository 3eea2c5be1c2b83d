// TWAP planning - equal step-aligned chunks, remainder on the last one

import type Decimal from "decimal.js";
import { InputValidationError } from "../errors.js";
import type { Side } from "../types.js";
import { validateTwapParams } from "../validation.js";
import { alignToIncrement, isAligned } from "./precision.js";

export interface TwapPlanInput {
	readonly symbol: string;
	readonly side: Side;
	readonly totalQuantity: Decimal;
	readonly durationSeconds: number;
	readonly chunkCount: number;
	readonly stepSize: Decimal;
	readonly minQty?: Decimal;
}

export interface TwapPlan {
	readonly symbol: string;
	readonly side: Side;
	readonly totalQuantity: Decimal;
	readonly chunkCount: number;
	readonly intervalMs: number;
	readonly chunks: readonly Decimal[];
}

export function planTwap(input: TwapPlanInput): TwapPlan {
	const { totalQuantity, chunkCount, stepSize } = input;
	validateTwapParams(input.durationSeconds, chunkCount);

	if (!isAligned(totalQuantity, stepSize)) {
		throw new InputValidationError(
			"quantity",
			totalQuantity.toFixed(),
			`Quantity ${totalQuantity.toFixed()} must be a multiple of the step size ${stepSize.toFixed()}`,
		);
	}

	const chunkSize = alignToIncrement(totalQuantity.div(chunkCount), stepSize, "floor");
	if (chunkSize.lte(0) || (input.minQty && chunkSize.lt(input.minQty))) {
		throw new InputValidationError(
			"chunkCount",
			chunkCount,
			`${chunkCount} chunks of ${totalQuantity.toFixed()} fall below the minimum order size`,
		);
	}

	const chunks: Decimal[] = Array.from({ length: chunkCount - 1 }, () => chunkSize);
	chunks.push(totalQuantity.sub(chunkSize.mul(chunkCount - 1)));

	return {
		symbol: input.symbol,
		side: input.side,
		totalQuantity,
		chunkCount,
		intervalMs: Math.round((input.durationSeconds * 1000) / chunkCount),
		chunks,
	};
}
