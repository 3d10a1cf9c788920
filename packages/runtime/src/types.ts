import type {
	ExitSignal,
	IndicatorSnapshot,
	TradeDecision,
} from "@intraday/core";

export type BarSkipReason = "warming_up" | "indicators_not_ready";

export interface SkippedBarOutcome {
	status: "skipped";
	timestamp: number;
	reason: BarSkipReason;
}

export interface EvaluatedBarOutcome {
	status: "evaluated";
	timestamp: number;
	snapshot: IndicatorSnapshot;
	/** False when a risk limit suppressed all trading logic for this bar. */
	riskAllowed: boolean;
	entrySignal: boolean;
	exitSignal: ExitSignal;
	decision: TradeDecision | null;
}

export type BarOutcome = SkippedBarOutcome | EvaluatedBarOutcome;
