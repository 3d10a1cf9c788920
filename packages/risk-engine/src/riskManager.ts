import {
	ConfigurationError,
	DataError,
	createLogger,
	noopEventSink,
	type EventSink,
	type RiskEventType,
	type RiskState,
	type StrategyConfiguration,
} from "@intraday/core";

export type PositionSizingMethod = "fixed" | "percent_risk";

/** Upper bound for any computed position fraction. */
export const MAX_POSITION_FRACTION = 0.99;

export interface RiskCheckResult {
	allowed: boolean;
	drawdown: number;
	dailyLossPercent: number | null;
	breach?: RiskEventType;
}

export class RiskManager {
	private readonly logger = createLogger("risk-engine");
	private readonly warnedMethods = new Set<string>();

	constructor(
		private readonly config: StrategyConfiguration,
		private readonly sink: EventSink = noopEventSink
	) {}

	resolveSizingMethod(method: string): PositionSizingMethod {
		if (method === "fixed" || method === "percent_risk") {
			return method;
		}
		if (!this.warnedMethods.has(method)) {
			this.warnedMethods.add(method);
			this.logger.warn("unknown_sizing_method", { method, fallback: "fixed" });
		}
		return "fixed";
	}

	/**
	 * Fraction of portfolio value to commit to a new position, in (0, 1].
	 * Unrecognised methods size like `fixed`.
	 */
	calculatePositionSize(
		method: string = this.config.risk.positionSizing.method
	): number {
		return this.resolveSizingMethod(method) === "percent_risk"
			? this.calculatePercentRiskSize()
			: this.calculateFixedSize();
	}

	/**
	 * Updates peak, current and max drawdown on `state`, then applies the
	 * drawdown and daily-loss limits. Nothing else on `state` changes.
	 */
	evaluateRiskLimits(portfolioValue: number, state: RiskState): RiskCheckResult {
		if (!Number.isFinite(portfolioValue) || portfolioValue <= 0) {
			throw new DataError("Portfolio value must be a positive finite number", {
				portfolioValue,
			});
		}

		const peak = Math.max(
			state.peakPortfolioValue ?? portfolioValue,
			portfolioValue
		);
		const drawdown = peak > 0 ? (peak - portfolioValue) / peak : 0;
		state.peakPortfolioValue = peak;
		state.currentDrawdown = drawdown;
		state.maxDrawdownSeen = Math.max(state.maxDrawdownSeen, drawdown);

		const { maxDrawdownPercent, dailyLossLimitPercent } =
			this.config.risk.portfolio;

		if (drawdown > maxDrawdownPercent) {
			this.emitBreach("MAX_DRAWDOWN_EXCEEDED", {
				currentDrawdown: drawdown,
				limit: maxDrawdownPercent,
			});
			return {
				allowed: false,
				drawdown,
				dailyLossPercent: null,
				breach: "MAX_DRAWDOWN_EXCEEDED",
			};
		}

		const dailyLossPercent = Math.abs(state.dailyPnL) / portfolioValue;
		if (dailyLossPercent > dailyLossLimitPercent) {
			this.emitBreach("DAILY_LOSS_LIMIT_EXCEEDED", {
				dailyLossPercent,
				limit: dailyLossLimitPercent,
			});
			return {
				allowed: false,
				drawdown,
				dailyLossPercent,
				breach: "DAILY_LOSS_LIMIT_EXCEEDED",
			};
		}

		return { allowed: true, drawdown, dailyLossPercent };
	}

	checkRiskLimits(portfolioValue: number, state: RiskState): boolean {
		return this.evaluateRiskLimits(portfolioValue, state).allowed;
	}

	private calculateFixedSize(): number {
		const size = this.config.trading.positionSize;
		if (!(size > 0 && size <= 1)) {
			throw new ConfigurationError(
				"trading.position_size must be within (0, 1]",
				{ positionSize: size }
			);
		}
		return size;
	}

	private calculatePercentRiskSize(): number {
		const riskPerTrade = this.config.risk.positionSizing.percentRisk.riskPerTrade;
		const stopLossPercent = this.config.risk.stopLoss.defaultPercent;
		if (!(stopLossPercent > 0)) {
			throw new ConfigurationError(
				"percent_risk sizing requires risk.stop_loss.default_percent > 0",
				{ stopLossPercent }
			);
		}
		if (!(riskPerTrade > 0)) {
			throw new ConfigurationError(
				"percent_risk sizing requires risk.position_sizing.percent_risk.risk_per_trade > 0",
				{ riskPerTrade }
			);
		}
		return Math.min(riskPerTrade / stopLossPercent, MAX_POSITION_FRACTION);
	}

	private emitBreach(
		eventType: RiskEventType,
		details: Record<string, number>
	): void {
		this.sink.emit({
			kind: "risk",
			eventType,
			symbol: this.config.trading.symbol,
			details,
		});
	}
}
