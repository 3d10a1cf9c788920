export interface BollingerBandsValue {
	upper: number;
	middle: number;
	lower: number;
}

export interface MacdValue {
	macd: number;
	signal: number;
	histogram: number;
}

/**
 * Indicator values for one consolidated bar. Produced by the indicator
 * service; the core never mutates it.
 */
export interface IndicatorSnapshot {
	timestamp: number;
	close: number;
	ema: number;
	rsi: number;
	obv?: number;
	bollingerBands?: BollingerBandsValue;
	macd?: MacdValue;
}

/**
 * Inbound consolidated-bar event. A `null` indicator value means the
 * indicator has not finished warming up.
 */
export interface BarEvent {
	timestamp: number;
	closePrice: number;
	ema: number | null;
	rsi: number | null;
	obv?: number | null;
	bollingerBands?: BollingerBandsValue | null;
	macd?: MacdValue | null;
	portfolioValue: number;
	isInvested: boolean;
	isWarmingUp: boolean;
}

/** Finer-grained event used only to refresh the OBV baseline. */
export interface TickEvent {
	timestamp: number;
	obv: number | null;
	isWarmingUp: boolean;
}

export type PositionStatus = "FLAT" | "OPEN";

export type ExitReason = "STOP_LOSS" | "TAKE_PROFIT" | "TIME_EXIT";
export type ExitSignal = ExitReason | "NONE";

export type TradeAction = "ENTRY" | "EXIT";

export interface Position {
	status: PositionStatus;
	entryPrice: number | null;
	entryTime: number | null;
	entrySize: number | null;
	entryPortfolioValue: number | null;
	tradeCount: number;
}

export interface RiskState {
	peakPortfolioValue: number | null;
	currentDrawdown: number;
	maxDrawdownSeen: number;
	dailyPnL: number;
	consecutiveLosses: number;
}

export interface SignalState {
	lastTrackedObv: number | null;
}

export interface PerformanceCounters {
	signalsGenerated: number;
	tradesExecuted: number;
	winningTrades: number;
	losingTrades: number;
	totalPnlPercent: number;
	grossWinPercent: number;
	grossLossPercent: number;
	totalHoldingMinutes: number;
	currentWinStreak: number;
	currentLossStreak: number;
	longestWinStreak: number;
	longestLossStreak: number;
	realizedPnl: number;
}

interface TradeRecordBase {
	symbol: string;
	quantity: number;
	price: number;
	timestamp: number;
	tradeCount: number;
	portfolioValue: number;
}

export interface EntryTradeRecord extends TradeRecordBase {
	action: "ENTRY";
	ema: number;
	rsi: number;
}

export interface ExitTradeRecord extends TradeRecordBase {
	action: "EXIT";
	exitReason: ExitReason;
	entryPrice: number;
	pnlPercent: number;
	durationMinutes: number;
	realizedPnl: number;
}

export type TradeRecord = EntryTradeRecord | ExitTradeRecord;

/**
 * All mutable strategy state. Components receive it by reference so every
 * mutation point is an explicit method call.
 */
export interface StrategyContext {
	position: Position;
	risk: RiskState;
	signals: SignalState;
	performance: PerformanceCounters;
	tradeLog: TradeRecord[];
}

export interface EntryDecision {
	type: "ENTRY";
	symbol: string;
	targetFraction: number;
}

export interface ExitDecision {
	type: "EXIT";
	symbol: string;
	liquidate: true;
	reason: ExitReason;
}

export type TradeDecision = EntryDecision | ExitDecision;
