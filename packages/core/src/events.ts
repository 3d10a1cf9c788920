import type { TradeRecord } from "./types";
import type { ModuleLogger } from "./utils/logger";

export type SignalType = "ENTRY" | "INDICATORS";

export type RiskEventType =
	| "MAX_DRAWDOWN_EXCEEDED"
	| "DAILY_LOSS_LIMIT_EXCEEDED";

export type PerformanceScope = "daily" | "final";

export type TradeEvent = TradeRecord & { kind: "trade" };

export interface SignalEvent {
	kind: "signal";
	signalType: SignalType;
	symbol: string;
	timestamp: number;
	values: Record<string, number | boolean | string>;
}

export interface RiskEvent {
	kind: "risk";
	eventType: RiskEventType;
	symbol: string;
	details: Record<string, number>;
}

export interface PerformanceEvent {
	kind: "performance";
	scope: PerformanceScope;
	timestamp?: number;
	metrics: Record<string, number>;
}

export type StrategyEvent = TradeEvent | SignalEvent | RiskEvent | PerformanceEvent;

export type StrategyEventKind = StrategyEvent["kind"];

/**
 * Narrow output capability handed to every component. Components describe
 * what happened; the sink decides formatting and destination.
 */
export interface EventSink {
	emit(event: StrategyEvent): void;
}

export const noopEventSink: EventSink = {
	emit: () => undefined,
};

export class MemoryEventSink implements EventSink {
	readonly events: StrategyEvent[] = [];

	emit(event: StrategyEvent): void {
		this.events.push(event);
	}

	ofKind<K extends StrategyEventKind>(
		kind: K
	): Extract<StrategyEvent, { kind: K }>[] {
		return this.events.filter(
			(event): event is Extract<StrategyEvent, { kind: K }> =>
				event.kind === kind
		);
	}

	clear(): void {
		this.events.length = 0;
	}
}

export const fanOutEventSink = (...sinks: EventSink[]): EventSink => ({
	emit: (event) => {
		for (const sink of sinks) {
			sink.emit(event);
		}
	},
});

export interface EventLoggingOptions {
	logTrades: boolean;
	logSignals: boolean;
	logPerformance: boolean;
}

/**
 * Writes events as flat log records. ENTRY signals, trades and performance
 * metrics honour their behaviour toggles; INDICATORS dumps are gated by the
 * caller and risk events are always logged.
 */
export const createLoggingEventSink = (
	logger: ModuleLogger,
	options: EventLoggingOptions
): EventSink => ({
	emit: (event) => {
		switch (event.kind) {
			case "trade": {
				if (!options.logTrades) {
					return;
				}
				const { kind: _kind, ...fields } = event;
				logger.info("trade", fields);
				return;
			}
			case "signal": {
				if (event.signalType === "ENTRY" && !options.logSignals) {
					return;
				}
				logger.info("signal", {
					signalType: event.signalType,
					symbol: event.symbol,
					timestamp: event.timestamp,
					...event.values,
				});
				return;
			}
			case "risk": {
				logger.warn("risk_event", {
					eventType: event.eventType,
					symbol: event.symbol,
					...event.details,
				});
				return;
			}
			case "performance": {
				if (!options.logPerformance) {
					return;
				}
				logger.info("performance", {
					scope: event.scope,
					...(event.timestamp !== undefined
						? { timestamp: event.timestamp }
						: {}),
					...event.metrics,
				});
				return;
			}
		}
	},
});
