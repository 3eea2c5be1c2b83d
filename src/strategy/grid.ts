// Grid level math

import type Decimal from "decimal.js";
import { InputValidationError } from "../errors.js";
import { validateGridBounds } from "../validation.js";
import { alignToIncrement } from "./precision.js";

// levelCount + 1 evenly spaced prices from lower to upper inclusive
export function computeGridLevels(
	lower: Decimal,
	upper: Decimal,
	levelCount: number,
	tickSize?: Decimal,
): Decimal[] {
	validateGridBounds(lower, upper, levelCount);

	const step = upper.sub(lower).div(levelCount);
	const levels: Decimal[] = [];
	for (let i = 0; i <= levelCount; i++) {
		const raw = i === levelCount ? upper : lower.add(step.mul(i));
		levels.push(tickSize ? alignToIncrement(raw, tickSize, "nearest") : raw);
	}

	for (let i = 1; i < levels.length; i++) {
		const prev = levels[i - 1];
		const current = levels[i];
		if (prev && current && !current.gt(prev)) {
			throw new InputValidationError(
				"levelCount",
				levelCount,
				`${levelCount} levels between ${lower.toFixed()} and ${upper.toFixed()} ` +
					`collapse at tick size ${tickSize?.toFixed()}`,
			);
		}
	}
	return levels;
}
