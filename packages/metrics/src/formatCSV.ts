import type { TradeRecord } from "@intraday/core";
import type { RunSummary } from "./metricsSchema";

export interface FormatCsvOptions {
	includeHeader?: boolean;
}

const TRADE_COLUMNS = [
	"action",
	"symbol",
	"timestamp",
	"tradeCount",
	"quantity",
	"price",
	"portfolioValue",
	"ema",
	"rsi",
	"exitReason",
	"entryPrice",
	"pnlPercent",
	"durationMinutes",
	"realizedPnl",
] as const;

type TradeColumn = (typeof TRADE_COLUMNS)[number];

export const formatTradeLogCsv = (
	tradeLog: readonly TradeRecord[],
	options: FormatCsvOptions = {}
): string =>
	toCsv(
		[...TRADE_COLUMNS],
		tradeLog.map(buildTradeRow),
		options.includeHeader ?? true
	);

export const formatSummaryCsv = (
	summary: RunSummary,
	options: FormatCsvOptions = {}
): string => {
	const row: Record<string, unknown> = { ...summary };
	return toCsv(Object.keys(row), [row], options.includeHeader ?? true);
};

const buildTradeRow = (record: TradeRecord): Record<TradeColumn, unknown> => {
	const base = {
		action: record.action,
		symbol: record.symbol,
		timestamp: new Date(record.timestamp).toISOString(),
		tradeCount: record.tradeCount,
		quantity: record.quantity,
		price: record.price,
		portfolioValue: record.portfolioValue,
	};
	if (record.action === "ENTRY") {
		return {
			...base,
			ema: record.ema,
			rsi: record.rsi,
			exitReason: null,
			entryPrice: null,
			pnlPercent: null,
			durationMinutes: null,
			realizedPnl: null,
		};
	}
	return {
		...base,
		ema: null,
		rsi: null,
		exitReason: record.exitReason,
		entryPrice: record.entryPrice,
		pnlPercent: record.pnlPercent,
		durationMinutes: record.durationMinutes,
		realizedPnl: record.realizedPnl,
	};
};

const toCsv = (
	headers: string[],
	rows: Record<string, unknown>[],
	includeHeader: boolean
): string => {
	if (!rows.length) {
		return includeHeader ? headers.join(",") : "";
	}
	const lines: string[] = [];
	if (includeHeader) {
		lines.push(headers.join(","));
	}
	for (const row of rows) {
		lines.push(headers.map((header) => formatValue(row[header])).join(","));
	}
	return lines.join("\n");
};

const formatValue = (value: unknown): string => {
	if (value === null || value === undefined) {
		return "";
	}
	if (typeof value === "string") {
		if (value.includes(",")) {
			return `"${value}"`;
		}
		return value;
	}
	if (typeof value === "number") {
		return Number.isFinite(value) ? value.toString() : "";
	}
	return String(value);
};
