import type {
	BarEvent,
	IndicatorSnapshot,
	StrategyConfiguration,
} from "@intraday/core";

export type IndicatorSnapshotResult =
	| { ready: true; snapshot: IndicatorSnapshot }
	| { ready: false; missing: string[] };

/**
 * Build the per-bar indicator snapshot. EMA and RSI are always required;
 * OBV, Bollinger Bands and MACD only when enabled. A `null` value on a
 * required indicator means it is still warming up.
 */
export function buildIndicatorSnapshot(
	bar: BarEvent,
	config: StrategyConfiguration
): IndicatorSnapshotResult {
	const { indicators } = config;
	const missing: string[] = [];

	if (bar.ema === null) {
		missing.push("ema");
	}
	if (bar.rsi === null) {
		missing.push("rsi");
	}
	if (indicators.obv.enabled && bar.obv === null) {
		missing.push("obv");
	}
	if (indicators.bollingerBands.enabled && bar.bollingerBands === null) {
		missing.push("bollingerBands");
	}
	if (indicators.macd.enabled && bar.macd === null) {
		missing.push("macd");
	}

	if (bar.ema === null || bar.rsi === null || missing.length) {
		return { ready: false, missing };
	}

	const snapshot: IndicatorSnapshot = {
		timestamp: bar.timestamp,
		close: bar.closePrice,
		ema: bar.ema,
		rsi: bar.rsi,
	};
	if (indicators.obv.enabled && typeof bar.obv === "number") {
		snapshot.obv = bar.obv;
	}
	if (indicators.bollingerBands.enabled && bar.bollingerBands) {
		snapshot.bollingerBands = bar.bollingerBands;
	}
	if (indicators.macd.enabled && bar.macd) {
		snapshot.macd = bar.macd;
	}
	return { ready: true, snapshot };
}
