import {
	PositionStateError,
	elapsedMinutes,
	noopEventSink,
	type EventSink,
	type ExitSignal,
	type IndicatorSnapshot,
	type Position,
	type StrategyConfiguration,
	type StrategyContext,
} from "@intraday/core";

export interface EntryConditionResult {
	priceAboveEma: boolean;
	rsiOversold: boolean;
	obvIncreasing: boolean;
}

/**
 * Turns indicator snapshots into entry and exit signals. Pure apart from the
 * signal counter, the OBV baseline and emitted events.
 */
export class SignalEngine {
	constructor(
		private readonly config: StrategyConfiguration,
		private readonly sink: EventSink = noopEventSink
	) {}

	/** Disabled conditions evaluate to true. */
	evaluateEntryConditions(
		snapshot: IndicatorSnapshot,
		lastTrackedObv: number | null
	): EntryConditionResult {
		const { conditions } = this.config.entry;
		const priceAboveEma = conditions.priceAboveEma
			? snapshot.close > snapshot.ema
			: true;
		const rsiOversold = conditions.rsiOversold
			? snapshot.rsi < this.config.indicators.rsi.oversold
			: true;

		let obvIncreasing = true;
		if (
			conditions.obvIncreasing &&
			this.config.indicators.obv.enabled &&
			snapshot.obv !== undefined &&
			lastTrackedObv !== null
		) {
			obvIncreasing = snapshot.obv > lastTrackedObv;
		}

		return { priceAboveEma, rsiOversold, obvIncreasing };
	}

	generateEntrySignal(
		snapshot: IndicatorSnapshot,
		context: StrategyContext
	): boolean {
		if (context.position.status !== "FLAT") {
			return false;
		}

		const conditions = this.evaluateEntryConditions(
			snapshot,
			context.signals.lastTrackedObv
		);
		if (
			!conditions.priceAboveEma ||
			!conditions.rsiOversold ||
			!conditions.obvIncreasing
		) {
			return false;
		}

		context.performance.signalsGenerated += 1;
		this.sink.emit({
			kind: "signal",
			signalType: "ENTRY",
			symbol: this.config.trading.symbol,
			timestamp: snapshot.timestamp,
			values: {
				price: snapshot.close,
				ema: snapshot.ema,
				rsi: snapshot.rsi,
				...(snapshot.obv !== undefined ? { obv: snapshot.obv } : {}),
				obvIncreasing: conditions.obvIncreasing,
			},
		});
		return true;
	}

	/**
	 * First match wins: stop-loss, then take-profit, then holding time.
	 */
	generateExitSignal(
		snapshot: IndicatorSnapshot,
		position: Position,
		currentTime: number
	): ExitSignal {
		if (position.status !== "OPEN") {
			return "NONE";
		}
		const { entryPrice, entryTime } = position;
		if (entryPrice === null || entryTime === null) {
			throw new PositionStateError("Open position is missing entry fields", {
				tradeCount: position.tradeCount,
			});
		}

		const { stopLossPercent, takeProfitPercent } = this.config.exit;
		if (snapshot.close <= entryPrice * (1 - stopLossPercent)) {
			return "STOP_LOSS";
		}
		if (snapshot.close >= entryPrice * (1 + takeProfitPercent)) {
			return "TAKE_PROFIT";
		}
		if (
			elapsedMinutes(entryTime, currentTime) >=
			this.config.trading.tradeDurationMinutes
		) {
			return "TIME_EXIT";
		}
		return "NONE";
	}

	updateObvBaseline(context: StrategyContext, obv: number): void {
		context.signals.lastTrackedObv = obv;
	}

	/** Sets the baseline only when none has been recorded yet. */
	seedObvBaseline(context: StrategyContext, obv: number): void {
		if (context.signals.lastTrackedObv === null) {
			context.signals.lastTrackedObv = obv;
		}
	}
}
