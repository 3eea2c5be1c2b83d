// Step and tick alignment

import Decimal from "decimal.js";

export type Rounding = "floor" | "ceil" | "nearest";

export function alignToIncrement(value: Decimal, increment: Decimal, round: Rounding = "floor"): Decimal {
	if (increment.lte(0)) return value;
	const units = value.div(increment);
	const aligned = round === "floor" ? units.floor() : round === "ceil" ? units.ceil() : units.round();
	return aligned.mul(increment);
}

export function isAligned(value: Decimal, increment: Decimal): boolean {
	return increment.lte(0) || value.mod(increment).isZero();
}

// Volume-weighted average price, null when nothing traded
export function vwap(fills: ReadonlyArray<{ quantity: Decimal; price: Decimal }>): Decimal | null {
	const quantity = Decimal.sum(0, ...fills.map((f) => f.quantity));
	if (quantity.isZero()) return null;
	const notional = Decimal.sum(0, ...fills.map((f) => f.quantity.mul(f.price)));
	return notional.div(quantity);
}
