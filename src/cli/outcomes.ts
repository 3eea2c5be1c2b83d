// Exit codes for the long-running commands

import type { GridResult } from "../bots/grid/index.js";
import type { OcoResult } from "../bots/oco/index.js";
import type { TwapResult } from "../bots/twap/index.js";

export function ocoExitCode(result: OcoResult): number {
	switch (result.outcome) {
		case "filled":
			return result.cancel?.kind === "failed" ? 1 : 0;
		case "leg-terminated":
			return 1;
		case "placed":
		case "aborted":
		case "timeout":
			return 0;
	}
}

export function twapExitCode(result: TwapResult): number {
	return result.chunksCompleted > 0 ? 0 : 1;
}

export function gridExitCode(result: GridResult): number {
	return result.ordersPlaced === 0 || result.outcome === "aborted-errors" ? 1 : 0;
}
