// Error hierarchy shared by validation, the gateway and the coordinators

export type ErrorCategory = "validation" | "venue" | "transient";

export class TradingError extends Error {
	readonly code: string;
	readonly category: ErrorCategory;
	readonly retryable: boolean;
	readonly context?: Record<string, unknown>;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		options: { retryable?: boolean; context?: Record<string, unknown>; cause?: unknown } = {},
	) {
		super(message, options.cause === undefined ? undefined : { cause: options.cause });
		this.name = new.target.name;
		this.code = code;
		this.category = category;
		this.retryable = options.retryable ?? false;
		this.context = options.context;
	}
}

// Raised before any network call
export class InputValidationError extends TradingError {
	readonly field: string;
	readonly value: unknown;

	constructor(field: string, value: unknown, message: string) {
		super(message, "INVALID_INPUT", "validation", { context: { field, value } });
		this.field = field;
		this.value = value;
	}
}

export class GatewayError extends TradingError {
	readonly venueCode?: number;

	constructor(
		message: string,
		venueCode?: number,
		options: { code?: string; retryable?: boolean; cause?: unknown } = {},
	) {
		super(message, options.code ?? "GATEWAY_ERROR", options.retryable ? "transient" : "venue", {
			retryable: options.retryable ?? false,
			context: venueCode === undefined ? undefined : { venueCode },
			cause: options.cause,
		});
		this.venueCode = venueCode;
	}
}

export class AuthError extends GatewayError {
	constructor(message: string, venueCode?: number, cause?: unknown) {
		super(message, venueCode, { code: "AUTH", cause });
	}
}

export class InvalidSymbolError extends GatewayError {
	constructor(message: string, venueCode?: number, cause?: unknown) {
		super(message, venueCode, { code: "INVALID_SYMBOL", cause });
	}
}

export class InsufficientBalanceError extends GatewayError {
	constructor(message: string, venueCode?: number, cause?: unknown) {
		super(message, venueCode, { code: "INSUFFICIENT_BALANCE", cause });
	}
}

export class MinNotionalError extends GatewayError {
	constructor(message: string, venueCode?: number, cause?: unknown) {
		super(message, venueCode, { code: "MIN_NOTIONAL", cause });
	}
}

// Order unknown to the venue, usually because it already resolved
export class NotFoundError extends GatewayError {
	constructor(message: string, venueCode?: number, cause?: unknown) {
		super(message, venueCode, { code: "NOT_FOUND", cause });
	}
}

export class TransientError extends GatewayError {
	constructor(message: string, venueCode: number | undefined, code: string, cause?: unknown) {
		super(message, venueCode, { code, retryable: true, cause });
	}
}

export class RateLimitError extends TransientError {
	constructor(message: string, venueCode?: number, cause?: unknown) {
		super(message, venueCode, "RATE_LIMIT", cause);
	}
}

export class NetworkError extends TransientError {
	constructor(message: string, venueCode?: number, cause?: unknown) {
		super(message, venueCode, "NETWORK", cause);
	}
}

export class TimeoutError extends TransientError {
	constructor(message: string, venueCode?: number, cause?: unknown) {
		super(message, venueCode, "TIMEOUT", cause);
	}
}

export function isRetryable(err: unknown): boolean {
	return err instanceof TransientError;
}

export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}

// One-line description for logs and CLI output
export function describeError(err: unknown): string {
	if (err instanceof GatewayError && err.venueCode !== undefined) {
		return `${err.name} [${err.venueCode}]: ${err.message}`;
	}
	if (err instanceof TradingError) {
		return `${err.name}: ${err.message}`;
	}
	return toError(err).message;
}
