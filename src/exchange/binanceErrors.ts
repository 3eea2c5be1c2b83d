// Maps whatever the binance client throws onto the TradingError hierarchy.
// API rejections arrive as { code, message, body, ... }; transport failures
// as an axios error carrying a string code, or as a bare string. A gateway
// page in front of the API (502/503/504 HTML) arrives with no code at all.

import { z } from "zod";
import {
	AuthError,
	GatewayError,
	InsufficientBalanceError,
	InvalidSymbolError,
	MinNotionalError,
	NetworkError,
	NotFoundError,
	RateLimitError,
	TimeoutError,
} from "../errors.js";

const venueErrorSchema = z.object({
	code: z.number(),
	message: z.string().optional(),
	msg: z.string().optional(),
});

const systemErrorSchema = z.object({
	code: z.string(),
	message: z.string().optional(),
});

const responseErrorSchema = z.object({
	status: z.number().optional(),
	message: z.string().optional(),
	headers: z.record(z.string(), z.unknown()),
	body: z.unknown(),
});

const TIMEOUT_CODES = ["ECONNABORTED", "ETIMEDOUT", "ESOCKETTIMEDOUT"];
const NETWORK_CODES = ["ECONNRESET", "ENOTFOUND", "ECONNREFUSED", "EAI_AGAIN", "EPIPE", "ERR_NETWORK"];

export function fromVenueCode(code: number, message: string, cause?: unknown): GatewayError {
	switch (code) {
		case -2014: // API-key format invalid
		case -2015: // Invalid API-key, IP, or permissions
		case -1022: // Signature not valid
		case -2008: // Invalid Api-Key ID
			return new AuthError(message, code, cause);
		case -1121:
			return new InvalidSymbolError(message, code, cause);
		case -2018:
		case -2019:
			return new InsufficientBalanceError(message, code, cause);
		case -4164:
			return new MinNotionalError(message, code, cause);
		case -1013:
			return message.includes("MIN_NOTIONAL")
				? new MinNotionalError(message, code, cause)
				: new GatewayError(message, code, { cause });
		case -2011: // Unknown order sent (cancel)
		case -2013: // Order does not exist (query)
			return new NotFoundError(message, code, cause);
		case -1003:
		case -1015:
			return new RateLimitError(message, code, cause);
		case -1001:
		case -1006:
			return new NetworkError(message, code, cause);
		case -1007:
			return new TimeoutError(message, code, cause);
		default:
			return new GatewayError(message, code, { cause });
	}
}

export function toGatewayError(err: unknown, op: string): GatewayError {
	if (err instanceof GatewayError) {
		return err;
	}
	if (typeof err === "string") {
		return new NetworkError(`${op}: ${err}`, undefined, err);
	}

	const venue = venueErrorSchema.safeParse(err);
	if (venue.success) {
		const { code } = venue.data;
		const message = venue.data.message ?? venue.data.msg ?? `venue error ${code}`;
		return fromVenueCode(code, `${op}: ${message}`, err);
	}

	const system = systemErrorSchema.safeParse(err);
	if (system.success) {
		const message = `${op}: ${system.data.message ?? system.data.code}`;
		if (TIMEOUT_CODES.includes(system.data.code)) {
			return new TimeoutError(message, undefined, err);
		}
		if (NETWORK_CODES.includes(system.data.code)) {
			return new NetworkError(message, undefined, err);
		}
	}

	const response = responseErrorSchema.safeParse(err);
	if (response.success) {
		const { status } = response.data;
		const detail = status === undefined ? "non-API response" : `non-API response (HTTP ${status})`;
		const message = `${op}: ${response.data.message ?? detail}`;
		if (status === 418 || status === 429) {
			return new RateLimitError(message, undefined, err);
		}
		if (status !== undefined && status < 500) {
			return new GatewayError(message, undefined, { cause: err });
		}
		return new NetworkError(message, undefined, err);
	}

	const message = err instanceof Error ? err.message : JSON.stringify(err);
	return new GatewayError(`${op}: ${message}`, undefined, { cause: err });
}
