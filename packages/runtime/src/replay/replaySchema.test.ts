import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DataError } from "@intraday/core";
import { loadReplayEvents, parseReplayEvents } from "./replaySchema";

const SAMPLE_PATH = fileURLToPath(
	new URL("../../../../data/replay/sample-session.json", import.meta.url)
);

let tmpDir: string;

beforeEach(() => {
	tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "intraday-replay-"));
});

afterEach(() => {
	fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("parseReplayEvents", () => {
	it("applies defaults and converts ISO timestamps", () => {
		const events = parseReplayEvents([
			{
				type: "bar",
				timestamp: "2024-01-02T14:00:00Z",
				closePrice: 100,
				portfolioValue: 10_000,
			},
			{ type: "tick", timestamp: 1_704_204_060_000 },
		]);
		expect(events).toEqual([
			{
				type: "bar",
				timestamp: Date.UTC(2024, 0, 2, 14, 0),
				closePrice: 100,
				ema: null,
				rsi: null,
				portfolioValue: 10_000,
				isInvested: false,
			},
			{
				type: "tick",
				timestamp: 1_704_204_060_000,
				obv: null,
				isWarmingUp: false,
			},
		]);
	});

	it("accepts an events wrapper object", () => {
		const events = parseReplayEvents({
			events: [{ type: "tick", timestamp: 0, obv: 5 }],
		});
		expect(events).toHaveLength(1);
	});

	it("reports the offending path", () => {
		expect(() =>
			parseReplayEvents([
				{ type: "bar", timestamp: 0, closePrice: -1, portfolioValue: 1 },
			])
		).toThrowError(/0\.closePrice/);
	});

	it("rejects unparseable timestamps", () => {
		expect(() =>
			parseReplayEvents([{ type: "tick", timestamp: "yesterday" }])
		).toThrowError(DataError);
	});
});

describe("loadReplayEvents", () => {
	it("reads events from a JSON file", () => {
		const filePath = path.join(tmpDir, "events.json");
		fs.writeFileSync(
			filePath,
			JSON.stringify([{ type: "tick", timestamp: 10, obv: 1 }])
		);
		expect(loadReplayEvents(filePath)).toEqual([
			{ type: "tick", timestamp: 10, obv: 1, isWarmingUp: false },
		]);
	});

	it("wraps read failures in a DataError", () => {
		expect(() => loadReplayEvents(path.join(tmpDir, "absent.json"))).toThrowError(
			DataError
		);
	});

	it("loads the bundled sample session", () => {
		const events = loadReplayEvents(SAMPLE_PATH);
		expect(events).toHaveLength(7);
		expect(events.filter((event) => event.type === "tick")).toHaveLength(1);
	});
});
