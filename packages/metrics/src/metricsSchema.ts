/** Point-in-time view emitted at each day boundary. */
export type PerformanceSnapshot = {
	portfolioValue: number;
	totalTrades: number;
	maxDrawdown: number;
	consecutiveLosses: number;
	dailyPnL: number;
	signalsGenerated: number;
};

export type RunSummary = {
	totalSignals: number;
	totalTrades: number;
	winningTrades: number;
	losingTrades: number;
	winRatePercent: number;
	finalPortfolioValue: number;
	maxDrawdownPercent: number;
	/** Sum of per-trade returns, in percent. */
	totalPnlPercent: number;
	averageWinPercent: number;
	averageLossPercent: number;
	averageHoldingMinutes: number;
	longestWinStreak: number;
	longestLossStreak: number;
	realizedPnl: number;
};

/** The parts of a closed trade the counters need. */
export interface CompletedTrade {
	tradePnL: number;
	realizedPnl: number;
	durationMinutes: number;
	isWin: boolean;
}
