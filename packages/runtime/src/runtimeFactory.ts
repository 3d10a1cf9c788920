import {
	createLogger,
	createLoggingEventSink,
	fanOutEventSink,
	getWarmupPeriod,
	type EventSink,
	type StrategyConfiguration,
} from "@intraday/core";
import {
	IntradayStrategyRuntime,
	type IntradayStrategyRuntimeOptions,
} from "./intradayStrategyRuntime";
import { runtimeLogger } from "./runtimeShared";

export interface CreateRuntimeOptions
	extends Omit<IntradayStrategyRuntimeOptions, "sink"> {
	/** Extra sinks that receive every event next to the logging sink. */
	sinks?: EventSink[];
	/** Disable the logging sink, e.g. for quiet test runs. */
	logEvents?: boolean;
}

export const createStrategyRuntime = (
	config: StrategyConfiguration,
	options: CreateRuntimeOptions = {}
): IntradayStrategyRuntime => {
	const { sinks = [], logEvents = true, ...runtimeOptions } = options;
	const eventSinks = logEvents
		? [createLoggingEventSink(createLogger("strategy"), config.behavior), ...sinks]
		: sinks;

	runtimeLogger.info("runtime_initialized", {
		symbol: config.trading.symbol,
		market: config.trading.market,
		consolidationMinutes: config.trading.consolidationMinutes,
		sizingMethod: config.risk.positionSizing.method,
		warmupBars: getWarmupPeriod(config),
	});

	return new IntradayStrategyRuntime(config, {
		...runtimeOptions,
		sink: fanOutEventSink(...eventSinks),
	});
};
