export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

export interface LoggerSettings {
	minLevel: LogLevel;
	modules: Set<string> | null;
	pretty: boolean;
	json: boolean;
}

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

export const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

const parseModuleFilter = (raw?: string): Set<string> | null => {
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
};

const settingsFromEnv = (): LoggerSettings => {
	const pretty =
		process.env.LOG_PRETTY === "true" || process.env.NODE_ENV === "development";
	return {
		minLevel: normalizeLevel(process.env.LOG_LEVEL),
		modules: parseModuleFilter(process.env.LOG_MODULE),
		pretty,
		json: process.env.LOG_JSON === "true" || !pretty,
	};
};

let settings: LoggerSettings = settingsFromEnv();

/**
 * Override logger settings at runtime. Unspecified fields keep their current
 * (env-derived) value.
 */
export const configureLogger = (
	overrides: Partial<Omit<LoggerSettings, "modules">> & {
		modules?: string[] | null;
	}
): LoggerSettings => {
	const { modules, ...rest } = overrides;
	settings = {
		...settings,
		...rest,
		modules:
			modules === undefined
				? settings.modules
				: modules && modules.length
					? new Set(modules)
					: null,
	};
	return settings;
};

export const resetLoggerSettings = (): LoggerSettings => {
	settings = settingsFromEnv();
	return settings;
};

const shouldLog = (level: LogLevel, moduleName: string): boolean => {
	if (LEVELS[level] < LEVELS[settings.minLevel]) {
		return false;
	}
	if (settings.modules && !settings.modules.has(moduleName)) {
		return false;
	}
	return true;
};

export function log(payload: BaseLogPayload): void {
	if (!shouldLog(payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ts, ...payload };

	if (settings.pretty) {
		try {
			printPretty(base);
		} catch (error) {
			console.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}

	if (settings.json) {
		try {
			console.log(JSON.stringify(sanitize(base)));
		} catch (err) {
			console.log(
				JSON.stringify({
					ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	}
}

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => ({
	log: (level, event, data) =>
		log({ ...(data ?? {}), level, event, module: moduleName }),
	debug: (event, data) =>
		log({ ...(data ?? {}), level: "debug", event, module: moduleName }),
	info: (event, data) =>
		log({ ...(data ?? {}), level: "info", event, module: moduleName }),
	warn: (event, data) =>
		log({ ...(data ?? {}), level: "warn", event, module: moduleName }),
	error: (event, data) =>
		log({ ...(data ?? {}), level: "error", event, module: moduleName }),
});

const sanitize = (payload: BaseLogPayload): unknown => {
	const seen = new WeakSet<object>();
	return sanitizeValue(payload, seen);
};

const sanitizeValue = (value: unknown, seen: WeakSet<object>): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (typeof value === "number" && !Number.isFinite(value)) {
		return String(value);
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

function printPretty(base: BaseLogPayload): void {
	const { level, event, module, ts, ...rest } = base;
	console.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);

	try {
		switch (event) {
			case "trade": {
				printTrade(rest);
				break;
			}
			case "signal": {
				printSignal(rest);
				break;
			}
			case "risk_event": {
				printRiskEvent(rest);
				break;
			}
			case "performance": {
				printPerformance(rest);
				break;
			}
			default:
				break;
		}
	} catch (error) {
		console.warn(
			`[logger] pretty render error: ${
				error instanceof Error ? error.message : "unknown"
			}`
		);
	}
}

const fmtNumber = (value: unknown, digits = 4): string =>
	typeof value === "number" ? value.toFixed(digits) : "n/a";

const printTrade = (rest: Record<string, unknown>): void => {
	const { action, symbol, quantity, price, tradeCount, portfolioValue } = rest;
	const row: Record<string, unknown> = {
		action,
		symbol,
		quantity,
		price: fmtNumber(price),
		tradeCount,
		portfolioValue: fmtNumber(portfolioValue, 2),
	};
	if (action === "EXIT") {
		row.exitReason = rest.exitReason;
		row.pnlPercent = fmtNumber(rest.pnlPercent);
		row.durationMinutes = rest.durationMinutes;
	}
	console.table([row]);
};

const printSignal = (rest: Record<string, unknown>): void => {
	const { signalType, symbol, timestamp: _timestamp, ...values } = rest;
	const rows = Object.entries(values).map(([name, value]) => ({
		indicator: name,
		value: typeof value === "number" ? fmtNumber(value) : String(value),
	}));
	console.log(`Signal ${String(signalType)} for ${String(symbol)}`);
	if (rows.length) {
		console.table(rows);
	}
};

const printRiskEvent = (rest: Record<string, unknown>): void => {
	console.table([rest]);
};

const printPerformance = (rest: Record<string, unknown>): void => {
	const { scope, ...metrics } = rest;
	console.log(`Performance (${String(scope)})`);
	console.table([metrics]);
};
