import type Decimal from "decimal.js";
import type {
	Balance,
	CancelResult,
	OrderHandle,
	OrderRequest,
	SymbolRules,
} from "../types.js";

// Everything the coordinators need from a venue. Implementations map venue
// failures onto the TradingError hierarchy before they escape.
export interface ExchangeGateway {
	readonly name: string;
	placeOrder(request: OrderRequest): Promise<OrderHandle>;
	getOrderStatus(symbol: string, orderId: string): Promise<OrderHandle>;
	// Not-found is reported as "already-resolved", other venue failures as "failed"
	cancelOrder(symbol: string, orderId: string): Promise<CancelResult>;
	cancelAllOpenOrders(symbol: string): Promise<void>;
	getOpenOrders(symbol: string): Promise<OrderHandle[]>;
	getCurrentPrice(symbol: string): Promise<Decimal>;
	getBalance(asset: string): Promise<Balance | null>;
	getSymbolRules(symbol: string): Promise<SymbolRules>;
}
