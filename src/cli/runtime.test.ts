import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { log } from "../utils/logger.js";
import { readInteger } from "./args.js";
import { runMain } from "./runtime.js";

describe("runMain", () => {
	let dir: string;
	let file: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "desk-cli-"));
		file = join(dir, "desk.log");
		log.setOutput(() => {});
	});

	afterEach(() => {
		log.setFileOutput(null);
		log.setLevel("info");
		rmSync(dir, { recursive: true, force: true });
	});

	it("records an argument error in the audit file", async () => {
		const code = await runMain(
			async () => {
				readInteger("2.5", "chunkCount");
				return 0;
			},
			{ LOG_FILE: file, LOG_LEVEL: "error" },
		);

		expect(code).toBe(1);
		const written = readFileSync(file, "utf-8").trimEnd().split("\n");
		expect(written).toHaveLength(1);
		expect(written[0]).toMatch(/ \[ERROR\] desk: Invalid input: chunkCount must be a whole number, got "2\.5"$/);
	});

	it("records unexpected errors as fatal", async () => {
		const code = await runMain(
			async () => {
				throw new Error("boom");
			},
			{ LOG_FILE: file },
		);

		expect(code).toBe(1);
		const written = readFileSync(file, "utf-8").split("\n");
		expect(written[0]).toMatch(/ \[ERROR\] desk: Fatal error: Error: boom$/);
	});

	it("passes the exit code of main through", async () => {
		expect(await runMain(async () => 2, { LOG_FILE: file })).toBe(2);
	});
});
