// Cooperative sleep and the polling loop used by the OCO and grid monitors

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

// Resolves after ms, or as soon as the signal aborts. Never rejects.
export const sleep: Sleep = (ms, signal) =>
	new Promise<void>((resolve) => {
		if (signal?.aborted) {
			resolve();
			return;
		}
		const onAbort = (): void => {
			clearTimeout(timer);
			resolve();
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});

export type TickResult<T> = "continue" | { readonly done: T };

export type PollOutcome<T> =
	| { readonly kind: "done"; readonly value: T; readonly ticks: number }
	| { readonly kind: "aborted"; readonly ticks: number }
	| { readonly kind: "exhausted"; readonly ticks: number }
	| { readonly kind: "deadline"; readonly ticks: number };

export interface PollOptions<T> {
	readonly intervalMs: number;
	readonly tick: (n: number) => Promise<TickResult<T>>;
	readonly signal?: AbortSignal;
	readonly maxTicks?: number;
	readonly deadline?: number; // Epoch ms
	readonly sleep?: Sleep;
	readonly now?: () => number;
}

// Runs tick(1), tick(2), ... with intervalMs between them.
// Errors thrown by tick propagate; callers decide what is retryable.
export async function runPollLoop<T>(options: PollOptions<T>): Promise<PollOutcome<T>> {
	const sleepFn = options.sleep ?? sleep;
	const now = options.now ?? Date.now;
	let ticks = 0;

	for (;;) {
		if (options.signal?.aborted) {
			return { kind: "aborted", ticks };
		}
		if (options.deadline !== undefined && now() >= options.deadline) {
			return { kind: "deadline", ticks };
		}

		ticks++;
		const result = await options.tick(ticks);
		if (result !== "continue") {
			return { kind: "done", value: result.done, ticks };
		}
		if (options.maxTicks !== undefined && ticks >= options.maxTicks) {
			return { kind: "exhausted", ticks };
		}

		await sleepFn(options.intervalMs, options.signal);
	}
}

// Injected into the coordinators so tests control time and cancellation
export interface LoopDeps {
	readonly sleep?: Sleep;
	readonly now?: () => number;
	readonly signal?: AbortSignal;
}
