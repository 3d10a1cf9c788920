import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

import { ConfigurationError, describeError } from "./errors";
import { createLogger } from "./utils/logger";

const logger = createLogger("config");

const percentSchema = z.number().min(0);

const tradingSchema = z
	.object({
		symbol: z.string().min(1).default("BTCUSD"),
		market: z.string().min(1).default("Bitfinex"),
		resolution: z.string().min(1).default("Minute"),
		consolidation_minutes: z.number().int().positive().default(5),
		position_size: z.number().positive().max(1).default(0.99),
		trade_duration_minutes: z.number().positive().default(30),
	})
	.default({});

const indicatorsSchema = z
	.object({
		ema: z
			.object({
				period: z.number().int().positive().default(20),
			})
			.default({}),
		rsi: z
			.object({
				period: z.number().int().positive().default(14),
				oversold: z.number().min(0).max(100).default(30),
				overbought: z.number().min(0).max(100).default(70),
			})
			.default({}),
		obv: z
			.object({
				enabled: z.boolean().default(true),
			})
			.default({}),
		bollinger_bands: z
			.object({
				enabled: z.boolean().default(false),
				period: z.number().int().positive().default(20),
				std_dev: z.number().positive().default(2),
			})
			.default({}),
		macd: z
			.object({
				enabled: z.boolean().default(false),
				fast_period: z.number().int().positive().default(12),
				slow_period: z.number().int().positive().default(26),
				signal_period: z.number().int().positive().default(9),
			})
			.default({}),
	})
	.default({});

const entrySchema = z
	.object({
		conditions: z
			.object({
				price_above_ema: z.boolean().default(true),
				rsi_oversold: z.boolean().default(true),
				obv_increasing: z.boolean().default(true),
			})
			.default({}),
	})
	.default({});

const exitSchema = z
	.object({
		stop_loss_percent: percentSchema.default(0.005),
		take_profit_percent: percentSchema.default(0.01),
	})
	.default({});

const riskSchema = z
	.object({
		portfolio: z
			.object({
				max_drawdown_percent: percentSchema.default(0.15),
				daily_loss_limit_percent: percentSchema.default(0.05),
			})
			.default({}),
		position_sizing: z
			.object({
				method: z.string().min(1).default("fixed"),
				percent_risk: z
					.object({
						risk_per_trade: percentSchema.default(0.02),
					})
					.default({}),
			})
			.default({}),
		stop_loss: z
			.object({
				default_percent: percentSchema.default(0.005),
			})
			.default({}),
	})
	.default({});

const behaviorSchema = z
	.object({
		debug_mode: z.boolean().default(false),
		log_performance: z.boolean().default(true),
		log_signals: z.boolean().default(true),
		log_trades: z.boolean().default(true),
		log_indicators: z.boolean().default(false),
		warmup_buffer: z.number().int().min(0).default(1),
	})
	.default({});

const environmentSchema = z
	.object({
		start_date: z.string().min(1).optional(),
		end_date: z.string().min(1).optional(),
	})
	.default({});

/** On-disk (snake_case) profile format. Unknown top-level sections are rejected. */
export const strategyConfigFileSchema = z
	.object({
		trading: tradingSchema,
		indicators: indicatorsSchema,
		entry: entrySchema,
		exit: exitSchema,
		risk: riskSchema,
		behavior: behaviorSchema,
		environment: environmentSchema,
	})
	.strict();

export type StrategyConfigFile = z.infer<typeof strategyConfigFileSchema>;

export interface TradingConfig {
	symbol: string;
	market: string;
	resolution: string;
	consolidationMinutes: number;
	positionSize: number;
	tradeDurationMinutes: number;
}

export interface IndicatorsConfig {
	ema: { period: number };
	rsi: { period: number; oversold: number; overbought: number };
	obv: { enabled: boolean };
	bollingerBands: { enabled: boolean; period: number; stdDev: number };
	macd: {
		enabled: boolean;
		fastPeriod: number;
		slowPeriod: number;
		signalPeriod: number;
	};
}

export interface EntryConditionsConfig {
	priceAboveEma: boolean;
	rsiOversold: boolean;
	obvIncreasing: boolean;
}

export interface ExitConfig {
	stopLossPercent: number;
	takeProfitPercent: number;
}

export interface RiskConfig {
	portfolio: {
		maxDrawdownPercent: number;
		dailyLossLimitPercent: number;
	};
	positionSizing: {
		method: string;
		percentRisk: { riskPerTrade: number };
	};
	stopLoss: { defaultPercent: number };
}

export interface BehaviorConfig {
	debugMode: boolean;
	logPerformance: boolean;
	logSignals: boolean;
	logTrades: boolean;
	logIndicators: boolean;
	warmupBuffer: number;
}

export interface EnvironmentConfig {
	startDate?: string;
	endDate?: string;
}

export interface StrategyConfiguration {
	trading: TradingConfig;
	indicators: IndicatorsConfig;
	entry: { conditions: EntryConditionsConfig };
	exit: ExitConfig;
	risk: RiskConfig;
	behavior: BehaviorConfig;
	environment: EnvironmentConfig;
}

export type ConfigSourceType = "file" | "defaults" | "inline";

export interface ConfigMetadata {
	source: ConfigSourceType;
	path?: string;
	profile?: string;
}

export interface LoadedStrategyConfiguration {
	config: StrategyConfiguration;
	metadata: ConfigMetadata;
}

export const toStrategyConfiguration = (
	file: StrategyConfigFile
): StrategyConfiguration => ({
	trading: {
		symbol: file.trading.symbol,
		market: file.trading.market,
		resolution: file.trading.resolution,
		consolidationMinutes: file.trading.consolidation_minutes,
		positionSize: file.trading.position_size,
		tradeDurationMinutes: file.trading.trade_duration_minutes,
	},
	indicators: {
		ema: { period: file.indicators.ema.period },
		rsi: {
			period: file.indicators.rsi.period,
			oversold: file.indicators.rsi.oversold,
			overbought: file.indicators.rsi.overbought,
		},
		obv: { enabled: file.indicators.obv.enabled },
		bollingerBands: {
			enabled: file.indicators.bollinger_bands.enabled,
			period: file.indicators.bollinger_bands.period,
			stdDev: file.indicators.bollinger_bands.std_dev,
		},
		macd: {
			enabled: file.indicators.macd.enabled,
			fastPeriod: file.indicators.macd.fast_period,
			slowPeriod: file.indicators.macd.slow_period,
			signalPeriod: file.indicators.macd.signal_period,
		},
	},
	entry: {
		conditions: {
			priceAboveEma: file.entry.conditions.price_above_ema,
			rsiOversold: file.entry.conditions.rsi_oversold,
			obvIncreasing: file.entry.conditions.obv_increasing,
		},
	},
	exit: {
		stopLossPercent: file.exit.stop_loss_percent,
		takeProfitPercent: file.exit.take_profit_percent,
	},
	risk: {
		portfolio: {
			maxDrawdownPercent: file.risk.portfolio.max_drawdown_percent,
			dailyLossLimitPercent: file.risk.portfolio.daily_loss_limit_percent,
		},
		positionSizing: {
			method: file.risk.position_sizing.method,
			percentRisk: {
				riskPerTrade: file.risk.position_sizing.percent_risk.risk_per_trade,
			},
		},
		stopLoss: { defaultPercent: file.risk.stop_loss.default_percent },
	},
	behavior: {
		debugMode: file.behavior.debug_mode,
		logPerformance: file.behavior.log_performance,
		logSignals: file.behavior.log_signals,
		logTrades: file.behavior.log_trades,
		logIndicators: file.behavior.log_indicators,
		warmupBuffer: file.behavior.warmup_buffer,
	},
	environment: {
		startDate: file.environment.start_date,
		endDate: file.environment.end_date,
	},
});

const deepFreeze = <T>(value: T): T => {
	if (value && typeof value === "object") {
		Object.values(value).forEach((nested) => deepFreeze(nested));
		Object.freeze(value);
	}
	return value;
};

export const DEFAULT_STRATEGY_CONFIGURATION: Readonly<StrategyConfiguration> =
	deepFreeze(toStrategyConfiguration(strategyConfigFileSchema.parse({})));

interface KeyReport {
	unknown: string[];
	defaulted: string[];
}

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const unwrapObjectSchema = (schema: z.ZodTypeAny): z.AnyZodObject | null => {
	if (schema instanceof z.ZodObject) {
		return schema;
	}
	if (schema instanceof z.ZodDefault) {
		return unwrapObjectSchema(schema.removeDefault());
	}
	if (schema instanceof z.ZodOptional) {
		return unwrapObjectSchema(schema.unwrap());
	}
	return null;
};

const collectKeyReport = (
	raw: Record<string, unknown>,
	schema: z.AnyZodObject,
	prefix: string,
	report: KeyReport
): KeyReport => {
	const shape: Record<string, z.ZodTypeAny> = schema.shape;
	for (const key of Object.keys(raw)) {
		if (!(key in shape) && prefix) {
			report.unknown.push(`${prefix}${key}`);
		}
	}
	for (const [key, fieldSchema] of Object.entries(shape)) {
		const value = raw[key];
		const nested = unwrapObjectSchema(fieldSchema);
		if (value === undefined) {
			if (fieldSchema instanceof z.ZodDefault) {
				report.defaulted.push(`${prefix}${key}`);
			}
			continue;
		}
		if (nested && isPlainObject(value)) {
			collectKeyReport(value, nested, `${prefix}${key}.`, report);
		}
	}
	return report;
};

const formatIssues = (error: z.ZodError): string[] =>
	error.issues.map((issue) => {
		const location = issue.path.length ? issue.path.join(".") : "<root>";
		return `${location}: ${issue.message}`;
	});

/**
 * Validate a raw profile object and map it to the typed configuration.
 * Missing keys take their documented default; unknown nested keys are logged
 * and dropped; unknown top-level sections and type errors throw.
 */
export const parseStrategyConfiguration = (
	raw: unknown,
	source = "inline"
): StrategyConfiguration => {
	const input = raw ?? {};
	if (!isPlainObject(input)) {
		throw new ConfigurationError(
			`Strategy configuration from ${source} must be an object`,
			{ source }
		);
	}

	const parsed = strategyConfigFileSchema.safeParse(input);
	if (!parsed.success) {
		const issues = formatIssues(parsed.error);
		throw new ConfigurationError(
			`Invalid strategy configuration from ${source}: ${issues.join("; ")}`,
			{ source, issues }
		);
	}

	const report = collectKeyReport(input, strategyConfigFileSchema, "", {
		unknown: [],
		defaulted: [],
	});
	if (report.unknown.length) {
		logger.warn("config_unknown_keys_ignored", {
			source,
			keys: report.unknown,
		});
	}
	if (report.defaulted.length) {
		logger.debug("config_defaults_applied", {
			source,
			keys: report.defaulted,
		});
	}

	return toStrategyConfiguration(parsed.data);
};

const CONFIG_DIR_SENTINEL = path.join("config", "strategy");

let cachedWorkspaceRoot: string | undefined;

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();
	while (!fs.existsSync(path.join(current, CONFIG_DIR_SENTINEL))) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getWorkspaceRoot = (): string => findWorkspaceRoot();

export const getDefaultConfigDir = (): string =>
	path.join(findWorkspaceRoot(), "config");

export const resolveStrategyConfigPath = (
	configDir: string,
	profile: string
): string => {
	const fileName = profile.endsWith(".json") ? profile : `${profile}.json`;
	return path.isAbsolute(fileName)
		? fileName
		: path.join(configDir, "strategy", fileName);
};

export interface ConfigLoadOptions {
	configDir?: string;
	profile?: string;
}

/**
 * Load a strategy profile. An absent or unreadable file is recovered locally
 * by falling back to the defaults with a warning; a file that parses but
 * fails validation throws.
 */
export const loadStrategyConfiguration = (
	options: ConfigLoadOptions = {}
): LoadedStrategyConfiguration => {
	const profile = options.profile ?? "default";
	const configDir = options.configDir ?? getDefaultConfigDir();
	const configPath = resolveStrategyConfigPath(configDir, profile);

	let raw: unknown;
	try {
		raw = JSON.parse(fs.readFileSync(configPath, "utf-8"));
	} catch (error) {
		logger.warn("config_load_failed_using_defaults", {
			path: configPath,
			profile,
			error: describeError(error),
		});
		return {
			config: DEFAULT_STRATEGY_CONFIGURATION,
			metadata: { source: "defaults", profile },
		};
	}

	const config = parseStrategyConfiguration(raw, configPath);
	logger.info("config_loaded", { path: configPath, profile });
	return {
		config,
		metadata: { source: "file", path: configPath, profile },
	};
};

/** Bars to skip before indicators are trusted: longest period plus buffer. */
export const getWarmupPeriod = (config: StrategyConfiguration): number =>
	Math.max(config.indicators.ema.period, config.indicators.rsi.period) +
	config.behavior.warmupBuffer;
