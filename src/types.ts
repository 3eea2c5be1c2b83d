// Shared order and market types

import type Decimal from "decimal.js";

export type Side = "BUY" | "SELL";

export type OrderType =
	| "MARKET"
	| "LIMIT"
	| "STOP"
	| "STOP_MARKET"
	| "TAKE_PROFIT"
	| "TAKE_PROFIT_MARKET";

export type TimeInForce = "GTC" | "IOC" | "FOK";

export type OrderStatus =
	| "NEW"
	| "PARTIALLY_FILLED"
	| "FILLED"
	| "CANCELED"
	| "REJECTED"
	| "EXPIRED";

export const SIDES: readonly Side[] = ["BUY", "SELL"];
export const TIME_IN_FORCE: readonly TimeInForce[] = ["GTC", "IOC", "FOK"];

// Types that rest on the book with a limit price
export const PRICED_TYPES: readonly OrderType[] = ["LIMIT", "STOP", "TAKE_PROFIT"];

// Types that wait for a trigger price
export const TRIGGERED_TYPES: readonly OrderType[] = [
	"STOP",
	"STOP_MARKET",
	"TAKE_PROFIT",
	"TAKE_PROFIT_MARKET",
];

export interface OrderRequest {
	readonly symbol: string;
	readonly side: Side;
	readonly type: OrderType;
	readonly quantity: Decimal;
	readonly price?: Decimal;
	readonly stopPrice?: Decimal;
	readonly timeInForce?: TimeInForce;
	readonly reduceOnly?: boolean;
}

// Snapshot of an order as last reported by the venue
export interface OrderHandle {
	readonly orderId: string;
	readonly symbol: string;
	readonly side: Side;
	readonly type: OrderType;
	readonly status: OrderStatus;
	readonly quantity: Decimal;
	readonly executedQty: Decimal;
	readonly avgPrice: Decimal;
	readonly price?: Decimal;
	readonly stopPrice?: Decimal;
	readonly updateTime: number;
}

export type CancelResult =
	| { readonly kind: "canceled"; readonly order: OrderHandle }
	| { readonly kind: "already-resolved"; readonly orderId: string }
	| { readonly kind: "failed"; readonly orderId: string; readonly error: Error };

export interface SymbolRules {
	readonly symbol: string;
	readonly stepSize: Decimal;
	readonly tickSize: Decimal;
	readonly minQty: Decimal;
}

export interface Balance {
	readonly asset: string;
	readonly balance: Decimal;
	readonly availableBalance: Decimal;
}

export function isTerminal(status: OrderStatus): boolean {
	return (
		status === "FILLED" ||
		status === "CANCELED" ||
		status === "REJECTED" ||
		status === "EXPIRED"
	);
}

export function oppositeSide(side: Side): Side {
	return side === "BUY" ? "SELL" : "BUY";
}
