import {
	ConfigurationError,
	DAY_MS,
	DataError,
	describeError,
	getWarmupPeriod,
	isSameUtcDay,
	parseDateToMs,
	utcDayStart,
	type EnvironmentConfig,
	type EventSink,
	type StrategyConfiguration,
} from "@intraday/core";
import { createStrategyRuntime } from "../runtimeFactory";
import { runtimeLogger } from "../runtimeShared";
import type { BarSkipReason } from "../types";
import type { ReplayEvent } from "./replaySchema";
import type {
	DailyPerformance,
	ReplayDecision,
	ReplayResult,
	ReplayWindow,
} from "./replayTypes";

export interface RunReplayOptions {
	config: StrategyConfiguration;
	sinks?: EventSink[];
	logEvents?: boolean;
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

const parseBound = (value: string, key: string): number => {
	try {
		return parseDateToMs(value);
	} catch (error) {
		throw new ConfigurationError(`environment.${key} is not a valid date`, {
			value,
			error: describeError(error),
		});
	}
};

/**
 * Resolve the configured replay window. A date-only end bound includes the
 * whole UTC day.
 */
export const resolveReplayWindow = (
	environment: EnvironmentConfig
): ReplayWindow => {
	const startTimestamp = environment.startDate
		? parseBound(environment.startDate, "start_date")
		: null;
	let endTimestamp: number | null = null;
	if (environment.endDate) {
		const parsed = parseBound(environment.endDate, "end_date");
		endTimestamp = DATE_ONLY.test(environment.endDate) ? parsed + DAY_MS : parsed + 1;
	}
	if (
		startTimestamp !== null &&
		endTimestamp !== null &&
		startTimestamp >= endTimestamp
	) {
		throw new ConfigurationError(
			"environment.start_date must be before environment.end_date",
			{ startDate: environment.startDate, endDate: environment.endDate }
		);
	}
	return { startTimestamp, endTimestamp };
};

const insideWindow = (timestamp: number, window: ReplayWindow): boolean =>
	(window.startTimestamp === null || timestamp >= window.startTimestamp) &&
	(window.endTimestamp === null || timestamp < window.endTimestamp);

const dayLabel = (timestamp: number): string =>
	new Date(utcDayStart(timestamp)).toISOString().slice(0, 10);

/**
 * Drive the strategy over a recorded event stream. A day-end is raised when
 * the UTC day changes between bars and once more after the last bar.
 */
export const runReplay = (
	events: readonly ReplayEvent[],
	options: RunReplayOptions
): ReplayResult => {
	const { config } = options;
	const replayWindow = resolveReplayWindow(config.environment);
	const warmupBars = getWarmupPeriod(config);
	const runtime = createStrategyRuntime(config, {
		sinks: options.sinks,
		logEvents: options.logEvents,
	});

	const decisions: ReplayDecision[] = [];
	const dailySnapshots: DailyPerformance[] = [];
	const barsSkipped: Record<BarSkipReason, number> = {
		warming_up: 0,
		indicators_not_ready: 0,
	};
	let barsProcessed = 0;
	let barsEvaluated = 0;
	let eventsOutsideWindow = 0;
	let previousTimestamp: number | null = null;
	let lastBar: { timestamp: number; portfolioValue: number } | null = null;

	const closeDay = (bar: { timestamp: number; portfolioValue: number }): void => {
		const snapshot = runtime.onEndOfDay(bar.timestamp, bar.portfolioValue);
		dailySnapshots.push({
			...snapshot,
			day: dayLabel(bar.timestamp),
			timestamp: bar.timestamp,
		});
	};

	for (const [index, event] of events.entries()) {
		if (previousTimestamp !== null && event.timestamp < previousTimestamp) {
			throw new DataError("Replay events must be in timestamp order", {
				index,
				previous: previousTimestamp,
				received: event.timestamp,
			});
		}
		previousTimestamp = event.timestamp;

		if (!insideWindow(event.timestamp, replayWindow)) {
			eventsOutsideWindow += 1;
			continue;
		}

		if (event.type === "tick") {
			runtime.onTick(event);
			continue;
		}

		if (lastBar && !isSameUtcDay(lastBar.timestamp, event.timestamp)) {
			closeDay(lastBar);
		}

		const outcome = runtime.onBar({
			...event,
			isWarmingUp: event.isWarmingUp ?? barsProcessed < warmupBars,
		});
		barsProcessed += 1;
		lastBar = { timestamp: event.timestamp, portfolioValue: event.portfolioValue };

		if (outcome.status === "skipped") {
			barsSkipped[outcome.reason] += 1;
			continue;
		}
		barsEvaluated += 1;
		if (outcome.decision) {
			decisions.push({
				timestamp: outcome.timestamp,
				price: outcome.snapshot.close,
				decision: outcome.decision,
			});
		}
	}

	if (!lastBar) {
		throw new DataError("Replay contains no bars inside the configured window", {
			events: events.length,
			eventsOutsideWindow,
		});
	}

	closeDay(lastBar);
	const summary = runtime.onEndOfRun(lastBar.portfolioValue);

	runtimeLogger.info("replay_completed", {
		symbol: runtime.symbol,
		barsProcessed,
		barsEvaluated,
		decisions: decisions.length,
		days: dailySnapshots.length,
	});

	return {
		symbol: runtime.symbol,
		window: replayWindow,
		barsProcessed,
		barsEvaluated,
		barsSkipped,
		eventsOutsideWindow,
		decisions,
		tradeLog: [...runtime.context.tradeLog],
		dailySnapshots,
		summary,
		context: runtime.context,
	};
};
