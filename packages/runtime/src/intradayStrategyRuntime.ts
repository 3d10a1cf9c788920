import {
	DataError,
	createStrategyContext,
	noopEventSink,
	type BarEvent,
	type EntryDecision,
	type EventSink,
	type ExitDecision,
	type ExitReason,
	type ExitSignal,
	type IndicatorSnapshot,
	type StrategyConfiguration,
	type StrategyContext,
	type TickEvent,
	type TradeDecision,
} from "@intraday/core";
import {
	PerformanceTracker,
	type PerformanceSnapshot,
	type RunSummary,
} from "@intraday/metrics";
import { RiskManager } from "@intraday/risk-engine";
import { PositionTracker, SignalEngine } from "@intraday/strategy-engine";
import { buildIndicatorSnapshot } from "./loop/buildIndicatorSnapshot";
import { runtimeLogger } from "./runtimeShared";
import type { BarOutcome, BarSkipReason } from "./types";

export interface StrategyComponents {
	signalEngine: SignalEngine;
	riskManager: RiskManager;
	positionTracker: PositionTracker;
	performanceTracker: PerformanceTracker;
}

export interface IntradayStrategyRuntimeOptions {
	sink?: EventSink;
	context?: StrategyContext;
	components?: Partial<StrategyComponents>;
}

/**
 * Per-event control flow for one symbol. Events must be delivered one at a
 * time in timestamp order; every call runs to completion.
 */
export class IntradayStrategyRuntime {
	readonly context: StrategyContext;
	private readonly sink: EventSink;
	private readonly signalEngine: SignalEngine;
	private readonly riskManager: RiskManager;
	private readonly positionTracker: PositionTracker;
	private readonly performanceTracker: PerformanceTracker;
	private lastBarTimestamp: number | null = null;

	constructor(
		private readonly config: StrategyConfiguration,
		options: IntradayStrategyRuntimeOptions = {}
	) {
		this.sink = options.sink ?? noopEventSink;
		this.context = options.context ?? createStrategyContext();
		const components = options.components ?? {};
		this.signalEngine =
			components.signalEngine ?? new SignalEngine(config, this.sink);
		this.riskManager =
			components.riskManager ?? new RiskManager(config, this.sink);
		this.positionTracker =
			components.positionTracker ?? new PositionTracker(config, this.sink);
		this.performanceTracker =
			components.performanceTracker ?? new PerformanceTracker(this.sink);
	}

	get symbol(): string {
		return this.config.trading.symbol;
	}

	onTick(tick: TickEvent): void {
		if (
			!this.config.indicators.obv.enabled ||
			tick.isWarmingUp ||
			tick.obv === null
		) {
			return;
		}
		this.signalEngine.updateObvBaseline(this.context, tick.obv);
	}

	onBar(bar: BarEvent): BarOutcome {
		if (this.lastBarTimestamp !== null && bar.timestamp < this.lastBarTimestamp) {
			throw new DataError("Bar timestamps must be non-decreasing", {
				previous: this.lastBarTimestamp,
				received: bar.timestamp,
			});
		}
		this.lastBarTimestamp = bar.timestamp;

		if (bar.isWarmingUp) {
			return this.skip(bar, "warming_up");
		}

		const built = buildIndicatorSnapshot(bar, this.config);
		if (!built.ready) {
			runtimeLogger.debug("indicators_not_ready", {
				timestamp: bar.timestamp,
				missing: built.missing,
			});
			return this.skip(bar, "indicators_not_ready");
		}
		const { snapshot } = built;

		this.reconcileInvestedFlag(bar);

		const riskAllowed = this.riskManager.checkRiskLimits(
			bar.portfolioValue,
			this.context.risk
		);
		if (!riskAllowed) {
			return {
				status: "evaluated",
				timestamp: bar.timestamp,
				snapshot,
				riskAllowed,
				entrySignal: false,
				exitSignal: "NONE",
				decision: null,
			};
		}

		if (snapshot.obv !== undefined) {
			this.signalEngine.seedObvBaseline(this.context, snapshot.obv);
		}

		let entrySignal = false;
		let exitSignal: ExitSignal = "NONE";
		let decision: TradeDecision | null = null;

		if (this.context.position.status === "FLAT") {
			entrySignal = this.signalEngine.generateEntrySignal(
				snapshot,
				this.context
			);
			if (entrySignal) {
				decision = this.enter(snapshot, bar);
			}
		} else {
			exitSignal = this.signalEngine.generateExitSignal(
				snapshot,
				this.context.position,
				bar.timestamp
			);
			if (exitSignal !== "NONE") {
				decision = this.exit(snapshot, bar, exitSignal);
			}
		}

		if (this.config.behavior.logIndicators) {
			this.emitIndicators(snapshot);
		}

		return {
			status: "evaluated",
			timestamp: bar.timestamp,
			snapshot,
			riskAllowed,
			entrySignal,
			exitSignal,
			decision,
		};
	}

	onEndOfDay(timestamp: number, portfolioValue: number): PerformanceSnapshot {
		return this.performanceTracker.onEndOfDay(
			this.context,
			portfolioValue,
			timestamp
		);
	}

	onEndOfRun(portfolioValue: number): RunSummary {
		return this.performanceTracker.finalize(this.context, portfolioValue);
	}

	private enter(snapshot: IndicatorSnapshot, bar: BarEvent): EntryDecision {
		const size = this.riskManager.calculatePositionSize();
		this.positionTracker.openPosition(this.context, {
			price: snapshot.close,
			timestamp: bar.timestamp,
			size,
			portfolioValue: bar.portfolioValue,
			ema: snapshot.ema,
			rsi: snapshot.rsi,
		});
		this.performanceTracker.recordEntry(this.context);
		return { type: "ENTRY", symbol: this.symbol, targetFraction: size };
	}

	private exit(
		snapshot: IndicatorSnapshot,
		bar: BarEvent,
		reason: ExitReason
	): ExitDecision {
		const outcome = this.positionTracker.closePosition(this.context, {
			price: snapshot.close,
			timestamp: bar.timestamp,
			portfolioValue: bar.portfolioValue,
			reason,
		});
		this.performanceTracker.recordExit(this.context, outcome);
		return { type: "EXIT", symbol: this.symbol, liquidate: true, reason };
	}

	private skip(bar: BarEvent, reason: BarSkipReason): BarOutcome {
		return { status: "skipped", timestamp: bar.timestamp, reason };
	}

	private reconcileInvestedFlag(bar: BarEvent): void {
		const trackedOpen = this.context.position.status === "OPEN";
		if (bar.isInvested !== trackedOpen) {
			runtimeLogger.warn("position_state_mismatch", {
				timestamp: bar.timestamp,
				isInvested: bar.isInvested,
				trackedStatus: this.context.position.status,
			});
		}
	}

	private emitIndicators(snapshot: IndicatorSnapshot): void {
		const values: Record<string, number> = {
			price: snapshot.close,
			ema: snapshot.ema,
			rsi: snapshot.rsi,
		};
		if (snapshot.obv !== undefined) {
			values.obv = snapshot.obv;
		}
		if (snapshot.bollingerBands) {
			values.bbUpper = snapshot.bollingerBands.upper;
			values.bbMiddle = snapshot.bollingerBands.middle;
			values.bbLower = snapshot.bollingerBands.lower;
		}
		if (snapshot.macd) {
			values.macd = snapshot.macd.macd;
			values.macdSignal = snapshot.macd.signal;
			values.macdHistogram = snapshot.macd.histogram;
		}
		this.sink.emit({
			kind: "signal",
			signalType: "INDICATORS",
			symbol: this.symbol,
			timestamp: snapshot.timestamp,
			values,
		});
	}
}
