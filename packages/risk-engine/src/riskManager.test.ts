import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
	ConfigurationError,
	DataError,
	MemoryEventSink,
	createRiskState,
	parseStrategyConfiguration,
	type RiskState,
} from "@intraday/core";
import { MAX_POSITION_FRACTION, RiskManager } from "./riskManager";

const createManager = (
	raw: Record<string, unknown> = {},
	sink = new MemoryEventSink()
): { manager: RiskManager; sink: MemoryEventSink } => ({
	manager: new RiskManager(parseStrategyConfiguration(raw), sink),
	sink,
});

const seededState = (peak: number, dailyPnL = 0): RiskState => ({
	...createRiskState(),
	peakPortfolioValue: peak,
	dailyPnL,
});

beforeEach(() => {
	vi.spyOn(console, "log").mockImplementation(() => undefined);
});

afterEach(() => {
	vi.restoreAllMocks();
});

describe("RiskManager.calculatePositionSize", () => {
	it("returns the configured fraction for fixed sizing", () => {
		const { manager } = createManager({ trading: { position_size: 0.5 } });
		expect(manager.calculatePositionSize()).toBe(0.5);
		expect(manager.calculatePositionSize("fixed")).toBe(0.5);
	});

	it("caps percent-risk sizing at the maximum fraction", () => {
		const { manager } = createManager({
			risk: {
				position_sizing: { percent_risk: { risk_per_trade: 0.02 } },
				stop_loss: { default_percent: 0.005 },
			},
		});
		expect(manager.calculatePositionSize("percent_risk")).toBe(
			MAX_POSITION_FRACTION
		);
	});

	it("divides risk per trade by the stop distance below the cap", () => {
		const { manager } = createManager({
			risk: {
				position_sizing: {
					method: "percent_risk",
					percent_risk: { risk_per_trade: 0.002 },
				},
				stop_loss: { default_percent: 0.005 },
			},
		});
		expect(manager.calculatePositionSize()).toBeCloseTo(0.4, 10);
	});

	it("rejects percent-risk sizing without a stop distance", () => {
		const { manager } = createManager({
			risk: { stop_loss: { default_percent: 0 } },
		});
		expect(() => manager.calculatePositionSize("percent_risk")).toThrowError(
			ConfigurationError
		);
	});

	it("rejects percent-risk sizing with no risk budget", () => {
		const { manager } = createManager({
			risk: { position_sizing: { percent_risk: { risk_per_trade: 0 } } },
		});
		expect(() => manager.calculatePositionSize("percent_risk")).toThrowError(
			/risk_per_trade/
		);
	});

	it("sizes unknown methods like fixed and warns once", () => {
		const warnings: string[] = [];
		vi.spyOn(console, "log").mockImplementation((line: unknown) => {
			if (typeof line === "string" && line.includes("unknown_sizing_method")) {
				warnings.push(line);
			}
		});
		const { manager } = createManager();
		expect(manager.calculatePositionSize("kelly")).toBe(0.99);
		expect(manager.calculatePositionSize("kelly")).toBe(0.99);
		expect(warnings).toHaveLength(1);
	});
});

describe("RiskManager.checkRiskLimits", () => {
	it("seeds the peak from the first reading", () => {
		const { manager } = createManager();
		const state = createRiskState();
		expect(manager.checkRiskLimits(1000, state)).toBe(true);
		expect(state.peakPortfolioValue).toBe(1000);
		expect(state.currentDrawdown).toBe(0);
	});

	it("keeps peak and max drawdown monotone across a value path", () => {
		const { manager, sink } = createManager();
		const state = createRiskState();
		const path = [1000, 1100, 1050, 900, 1200, 1000];
		const results: boolean[] = [];
		let lastPeak = 0;
		let lastMax = 0;
		for (const value of path) {
			results.push(manager.checkRiskLimits(value, state));
			expect(state.peakPortfolioValue ?? 0).toBeGreaterThanOrEqual(lastPeak);
			expect(state.maxDrawdownSeen).toBeGreaterThanOrEqual(lastMax);
			lastPeak = state.peakPortfolioValue ?? 0;
			lastMax = state.maxDrawdownSeen;
		}
		expect(results).toEqual([true, true, true, false, true, false]);
		expect(state.peakPortfolioValue).toBe(1200);
		expect(state.maxDrawdownSeen).toBeCloseTo(200 / 1100, 10);
		expect(state.currentDrawdown).toBeCloseTo(200 / 1200, 10);
		expect(sink.ofKind("risk").map((event) => event.eventType)).toEqual([
			"MAX_DRAWDOWN_EXCEEDED",
			"MAX_DRAWDOWN_EXCEEDED",
		]);
	});

	it("allows a drawdown exactly at the limit", () => {
		const { manager, sink } = createManager();
		expect(manager.checkRiskLimits(850, seededState(1000))).toBe(true);
		expect(sink.events).toHaveLength(0);
	});

	it("reports the drawdown and limit when breached", () => {
		const { manager, sink } = createManager();
		expect(manager.checkRiskLimits(800, seededState(1000))).toBe(false);
		expect(sink.ofKind("risk")).toEqual([
			{
				kind: "risk",
				eventType: "MAX_DRAWDOWN_EXCEEDED",
				symbol: "BTCUSD",
				details: { currentDrawdown: 0.2, limit: 0.15 },
			},
		]);
	});

	it("blocks once the daily loss exceeds its limit", () => {
		const { manager, sink } = createManager();
		const result = manager.evaluateRiskLimits(1000, seededState(1000, -60));
		expect(result).toEqual({
			allowed: false,
			drawdown: 0,
			dailyLossPercent: 0.06,
			breach: "DAILY_LOSS_LIMIT_EXCEEDED",
		});
		expect(sink.ofKind("risk")[0]?.details).toEqual({
			dailyLossPercent: 0.06,
			limit: 0.05,
		});
	});

	it("measures the daily limit on the magnitude of the day's P&L", () => {
		const { manager } = createManager();
		expect(manager.checkRiskLimits(1000, seededState(1000, 60))).toBe(false);
		expect(manager.checkRiskLimits(1000, seededState(1000, -40))).toBe(true);
	});

	it("is idempotent for repeated readings", () => {
		const { manager } = createManager();
		const state = seededState(1000);
		const first = manager.evaluateRiskLimits(950, state);
		const snapshot = { ...state };
		const second = manager.evaluateRiskLimits(950, state);
		expect(second).toEqual(first);
		expect(state).toEqual(snapshot);
		expect(state.currentDrawdown).toBeCloseTo(0.05, 10);
	});

	it("never touches daily P&L or the loss streak", () => {
		const { manager } = createManager();
		const state = { ...seededState(1000, -10), consecutiveLosses: 2 };
		manager.checkRiskLimits(990, state);
		expect(state.dailyPnL).toBe(-10);
		expect(state.consecutiveLosses).toBe(2);
	});

	it("rejects non-positive or non-finite portfolio values", () => {
		const { manager } = createManager();
		expect(() => manager.checkRiskLimits(0, createRiskState())).toThrowError(
			DataError
		);
		expect(() =>
			manager.checkRiskLimits(Number.NaN, createRiskState())
		).toThrowError(DataError);
	});
});
