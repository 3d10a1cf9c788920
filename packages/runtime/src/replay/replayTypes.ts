import type {
	StrategyContext,
	TradeDecision,
	TradeRecord,
} from "@intraday/core";
import type { PerformanceSnapshot, RunSummary } from "@intraday/metrics";
import type { BarSkipReason } from "../types";

export interface ReplayDecision {
	timestamp: number;
	price: number;
	decision: TradeDecision;
}

export interface DailyPerformance extends PerformanceSnapshot {
	day: string;
	timestamp: number;
}

export interface ReplayWindow {
	startTimestamp: number | null;
	/** Exclusive. */
	endTimestamp: number | null;
}

export interface ReplayResult {
	symbol: string;
	window: ReplayWindow;
	barsProcessed: number;
	barsEvaluated: number;
	barsSkipped: Record<BarSkipReason, number>;
	eventsOutsideWindow: number;
	decisions: ReplayDecision[];
	tradeLog: TradeRecord[];
	dailySnapshots: DailyPerformance[];
	summary: RunSummary;
	context: StrategyContext;
}
