import type { PerformanceCounters } from "@intraday/core";
import type { CompletedTrade } from "./metricsSchema";

export const calculateWinRate = (wins: number, losses: number): number => {
	const total = wins + losses;
	return total > 0 ? (wins / total) * 100 : 0;
};

export const calculateAverage = (total: number, count: number): number =>
	count > 0 ? total / count : 0;

/** Folds one closed trade into the running counters and streaks. */
export const applyCompletedTrade = (
	counters: PerformanceCounters,
	trade: CompletedTrade
): void => {
	const pnlPercent = trade.tradePnL * 100;
	counters.totalPnlPercent += pnlPercent;
	counters.totalHoldingMinutes += trade.durationMinutes;
	counters.realizedPnl += trade.realizedPnl;

	if (trade.isWin) {
		counters.winningTrades += 1;
		counters.grossWinPercent += pnlPercent;
		counters.currentWinStreak += 1;
		counters.currentLossStreak = 0;
		counters.longestWinStreak = Math.max(
			counters.longestWinStreak,
			counters.currentWinStreak
		);
		return;
	}

	counters.losingTrades += 1;
	counters.grossLossPercent += pnlPercent;
	counters.currentLossStreak += 1;
	counters.currentWinStreak = 0;
	counters.longestLossStreak = Math.max(
		counters.longestLossStreak,
		counters.currentLossStreak
	);
};
