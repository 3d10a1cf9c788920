import type {
	PerformanceCounters,
	Position,
	RiskState,
	StrategyContext,
} from "./types";

export const createFlatPosition = (tradeCount = 0): Position => ({
	status: "FLAT",
	entryPrice: null,
	entryTime: null,
	entrySize: null,
	entryPortfolioValue: null,
	tradeCount,
});

export const createRiskState = (): RiskState => ({
	peakPortfolioValue: null,
	currentDrawdown: 0,
	maxDrawdownSeen: 0,
	dailyPnL: 0,
	consecutiveLosses: 0,
});

export const createPerformanceCounters = (): PerformanceCounters => ({
	signalsGenerated: 0,
	tradesExecuted: 0,
	winningTrades: 0,
	losingTrades: 0,
	totalPnlPercent: 0,
	grossWinPercent: 0,
	grossLossPercent: 0,
	totalHoldingMinutes: 0,
	currentWinStreak: 0,
	currentLossStreak: 0,
	longestWinStreak: 0,
	longestLossStreak: 0,
	realizedPnl: 0,
});

export const createStrategyContext = (): StrategyContext => ({
	position: createFlatPosition(),
	risk: createRiskState(),
	signals: { lastTrackedObv: null },
	performance: createPerformanceCounters(),
	tradeLog: [],
});
