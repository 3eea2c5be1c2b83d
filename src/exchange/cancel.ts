import { GatewayError, NotFoundError } from "../errors.js";
import type { CancelResult, OrderHandle } from "../types.js";

// Folds venue failures into a CancelResult. Anything that is not a
// GatewayError is a bug and propagates.
export async function settleCancel(
	orderId: string,
	cancel: () => Promise<OrderHandle>,
): Promise<CancelResult> {
	try {
		return { kind: "canceled", order: await cancel() };
	} catch (err) {
		if (err instanceof NotFoundError) {
			return { kind: "already-resolved", orderId };
		}
		if (err instanceof GatewayError) {
			return { kind: "failed", orderId, error: err };
		}
		throw err;
	}
}
