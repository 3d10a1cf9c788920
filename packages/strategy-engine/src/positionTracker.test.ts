import { describe, expect, it } from "vitest";
import {
	MINUTE_MS,
	MemoryEventSink,
	PositionStateError,
	createStrategyContext,
	parseStrategyConfiguration,
	type StrategyContext,
} from "@intraday/core";
import { PositionTracker, type EntryFill } from "./positionTracker";

const T0 = Date.UTC(2024, 0, 2, 14, 30);

const entryFill = (overrides: Partial<EntryFill> = {}): EntryFill => ({
	price: 100,
	timestamp: T0,
	size: 0.99,
	portfolioValue: 10_000,
	ema: 99.5,
	rsi: 25,
	...overrides,
});

const createTracker = () => {
	const sink = new MemoryEventSink();
	return {
		tracker: new PositionTracker(parseStrategyConfiguration({}), sink),
		sink,
	};
};

const openAt100 = (tracker: PositionTracker): StrategyContext => {
	const context = createStrategyContext();
	tracker.openPosition(context, entryFill());
	return context;
};

describe("PositionTracker.openPosition", () => {
	it("moves FLAT to OPEN and records the entry", () => {
		const { tracker, sink } = createTracker();
		const context = createStrategyContext();
		const record = tracker.openPosition(context, entryFill());

		expect(context.position).toEqual({
			status: "OPEN",
			entryPrice: 100,
			entryTime: T0,
			entrySize: 0.99,
			entryPortfolioValue: 10_000,
			tradeCount: 1,
		});
		expect(record).toEqual({
			action: "ENTRY",
			symbol: "BTCUSD",
			quantity: 0.99,
			price: 100,
			timestamp: T0,
			tradeCount: 1,
			portfolioValue: 10_000,
			ema: 99.5,
			rsi: 25,
		});
		expect(Object.isFrozen(record)).toBe(true);
		expect(context.tradeLog).toEqual([record]);
		expect(sink.ofKind("trade")).toEqual([{ ...record, kind: "trade" }]);
	});

	it("rejects opening while already open", () => {
		const { tracker } = createTracker();
		const context = openAt100(tracker);
		expect(() => tracker.openPosition(context, entryFill())).toThrowError(
			PositionStateError
		);
		expect(context.tradeLog).toHaveLength(1);
	});
});

describe("PositionTracker.closePosition", () => {
	it("rejects closing while flat", () => {
		const { tracker } = createTracker();
		expect(() =>
			tracker.closePosition(createStrategyContext(), {
				price: 100,
				timestamp: T0,
				portfolioValue: 10_000,
				reason: "TIME_EXIT",
			})
		).toThrowError(PositionStateError);
	});

	it("closes a losing trade and books it against the day", () => {
		const { tracker, sink } = createTracker();
		const context = openAt100(tracker);
		const outcome = tracker.closePosition(context, {
			price: 99.4,
			timestamp: T0 + 10 * MINUTE_MS,
			portfolioValue: 9_940,
			reason: "STOP_LOSS",
		});

		expect(outcome.isWin).toBe(false);
		expect(outcome.tradePnL).toBeCloseTo(-0.006, 10);
		expect(outcome.realizedPnl).toBeCloseTo(-59.4, 8);
		expect(outcome.durationMinutes).toBe(10);
		expect(context.risk.consecutiveLosses).toBe(1);
		expect(context.risk.dailyPnL).toBeCloseTo(-59.4, 8);
		expect(context.position).toEqual({
			status: "FLAT",
			entryPrice: null,
			entryTime: null,
			entrySize: null,
			entryPortfolioValue: null,
			tradeCount: 1,
		});

		const exit = outcome.record;
		expect(exit.action).toBe("EXIT");
		expect(exit.exitReason).toBe("STOP_LOSS");
		expect(exit.quantity).toBe(0.99);
		expect(exit.entryPrice).toBe(100);
		expect(exit.price).toBe(99.4);
		expect(exit.pnlPercent).toBeCloseTo(-0.6, 8);
		expect(Object.isFrozen(exit)).toBe(true);
		expect(context.tradeLog.map((record) => record.action)).toEqual([
			"ENTRY",
			"EXIT",
		]);
		expect(sink.ofKind("trade")).toHaveLength(2);
	});

	it("counts a break-even trade as a loss", () => {
		const { tracker } = createTracker();
		const context = openAt100(tracker);
		const outcome = tracker.closePosition(context, {
			price: 100,
			timestamp: T0 + MINUTE_MS,
			portfolioValue: 10_000,
			reason: "TIME_EXIT",
		});
		expect(outcome.isWin).toBe(false);
		expect(context.risk.consecutiveLosses).toBe(1);
	});

	it("leaves the loss streak untouched on a win", () => {
		const { tracker } = createTracker();
		const context = openAt100(tracker);
		tracker.closePosition(context, {
			price: 99,
			timestamp: T0 + MINUTE_MS,
			portfolioValue: 9_900,
			reason: "STOP_LOSS",
		});
		tracker.openPosition(context, entryFill({ timestamp: T0 + 2 * MINUTE_MS }));
		const outcome = tracker.closePosition(context, {
			price: 102,
			timestamp: T0 + 3 * MINUTE_MS,
			portfolioValue: 10_100,
			reason: "TAKE_PROFIT",
		});
		expect(outcome.isWin).toBe(true);
		expect(context.risk.consecutiveLosses).toBe(1);
		expect(context.position.tradeCount).toBe(2);
	});
});
