import {
	noopEventSink,
	type EventSink,
	type StrategyContext,
} from "@intraday/core";
import type {
	CompletedTrade,
	PerformanceSnapshot,
	RunSummary,
} from "./metricsSchema";
import {
	applyCompletedTrade,
	calculateAverage,
	calculateWinRate,
} from "./tradeStats";

export class PerformanceTracker {
	constructor(private readonly sink: EventSink = noopEventSink) {}

	recordEntry(context: StrategyContext): void {
		context.performance.tradesExecuted += 1;
	}

	recordExit(context: StrategyContext, trade: CompletedTrade): void {
		applyCompletedTrade(context.performance, trade);
	}

	snapshot(context: StrategyContext, portfolioValue: number): PerformanceSnapshot {
		return {
			portfolioValue,
			totalTrades: context.performance.tradesExecuted,
			maxDrawdown: context.risk.maxDrawdownSeen,
			consecutiveLosses: context.risk.consecutiveLosses,
			dailyPnL: context.risk.dailyPnL,
			signalsGenerated: context.performance.signalsGenerated,
		};
	}

	/**
	 * Emits the day's snapshot, then starts a new trading day. Only
	 * `risk.dailyPnL` is reset.
	 */
	onEndOfDay(
		context: StrategyContext,
		portfolioValue: number,
		timestamp: number
	): PerformanceSnapshot {
		const snapshot = this.snapshot(context, portfolioValue);
		this.sink.emit({
			kind: "performance",
			scope: "daily",
			timestamp,
			metrics: snapshot,
		});
		context.risk.dailyPnL = 0;
		return snapshot;
	}

	finalize(context: StrategyContext, portfolioValue: number): RunSummary {
		const counters = context.performance;
		const summary: RunSummary = {
			totalSignals: counters.signalsGenerated,
			totalTrades: counters.winningTrades + counters.losingTrades,
			winningTrades: counters.winningTrades,
			losingTrades: counters.losingTrades,
			winRatePercent: calculateWinRate(
				counters.winningTrades,
				counters.losingTrades
			),
			finalPortfolioValue: portfolioValue,
			maxDrawdownPercent: context.risk.maxDrawdownSeen * 100,
			totalPnlPercent: counters.totalPnlPercent,
			averageWinPercent: calculateAverage(
				counters.grossWinPercent,
				counters.winningTrades
			),
			averageLossPercent: calculateAverage(
				counters.grossLossPercent,
				counters.losingTrades
			),
			averageHoldingMinutes: calculateAverage(
				counters.totalHoldingMinutes,
				counters.winningTrades + counters.losingTrades
			),
			longestWinStreak: counters.longestWinStreak,
			longestLossStreak: counters.longestLossStreak,
			realizedPnl: counters.realizedPnl,
		};
		this.sink.emit({ kind: "performance", scope: "final", metrics: summary });
		return summary;
	}
}
