import {
	DataError,
	PositionStateError,
	createFlatPosition,
	elapsedMinutes,
	noopEventSink,
	type EntryTradeRecord,
	type EventSink,
	type ExitReason,
	type ExitTradeRecord,
	type StrategyConfiguration,
	type StrategyContext,
	type TradeRecord,
} from "@intraday/core";

export interface EntryFill {
	price: number;
	timestamp: number;
	/** Fraction of portfolio value committed. */
	size: number;
	portfolioValue: number;
	ema: number;
	rsi: number;
}

export interface ExitFill {
	price: number;
	timestamp: number;
	portfolioValue: number;
	reason: ExitReason;
}

export interface ClosedTradeOutcome {
	record: ExitTradeRecord;
	/** (exit - entry) / entry */
	tradePnL: number;
	realizedPnl: number;
	durationMinutes: number;
	isWin: boolean;
}

export class PositionTracker {
	constructor(
		private readonly config: StrategyConfiguration,
		private readonly sink: EventSink = noopEventSink
	) {}

	openPosition(context: StrategyContext, fill: EntryFill): EntryTradeRecord {
		const { position } = context;
		if (position.status !== "FLAT") {
			throw new PositionStateError("Cannot open a position while one is open", {
				tradeCount: position.tradeCount,
				entryPrice: position.entryPrice,
			});
		}
		if (!Number.isFinite(fill.price) || fill.price <= 0) {
			throw new DataError("Entry price must be a positive finite number", {
				price: fill.price,
			});
		}

		context.position = {
			status: "OPEN",
			entryPrice: fill.price,
			entryTime: fill.timestamp,
			entrySize: fill.size,
			entryPortfolioValue: fill.portfolioValue,
			tradeCount: position.tradeCount + 1,
		};

		const record: EntryTradeRecord = {
			action: "ENTRY",
			symbol: this.config.trading.symbol,
			quantity: fill.size,
			price: fill.price,
			timestamp: fill.timestamp,
			tradeCount: context.position.tradeCount,
			portfolioValue: fill.portfolioValue,
			ema: fill.ema,
			rsi: fill.rsi,
		};
		this.append(context, record);
		return record;
	}

	closePosition(context: StrategyContext, fill: ExitFill): ClosedTradeOutcome {
		const { position } = context;
		const { entryPrice, entryTime, entrySize, entryPortfolioValue } = position;
		if (
			position.status !== "OPEN" ||
			entryPrice === null ||
			entryTime === null ||
			entrySize === null ||
			entryPortfolioValue === null
		) {
			throw new PositionStateError("Cannot close a position while flat", {
				tradeCount: position.tradeCount,
			});
		}

		const tradePnL = (fill.price - entryPrice) / entryPrice;
		const realizedPnl = tradePnL * entrySize * entryPortfolioValue;
		const durationMinutes = elapsedMinutes(entryTime, fill.timestamp);
		const isWin = tradePnL > 0;

		if (!isWin) {
			context.risk.consecutiveLosses += 1;
		}
		context.risk.dailyPnL += realizedPnl;
		context.position = createFlatPosition(position.tradeCount);

		const record: ExitTradeRecord = {
			action: "EXIT",
			symbol: this.config.trading.symbol,
			quantity: entrySize,
			price: fill.price,
			timestamp: fill.timestamp,
			tradeCount: position.tradeCount,
			portfolioValue: fill.portfolioValue,
			exitReason: fill.reason,
			entryPrice,
			pnlPercent: tradePnL * 100,
			durationMinutes,
			realizedPnl,
		};
		this.append(context, record);

		return { record, tradePnL, realizedPnl, durationMinutes, isWin };
	}

	private append(context: StrategyContext, record: TradeRecord): void {
		Object.freeze(record);
		context.tradeLog.push(record);
		this.sink.emit({ ...record, kind: "trade" });
	}
}
