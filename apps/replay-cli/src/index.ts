#!/usr/bin/env node

import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import {
	configureLogger,
	createLogger,
	describeError,
	getWorkspaceRoot,
	loadEnvFiles,
	loadStrategyConfiguration,
	resetLoggerSettings,
} from "@intraday/core";
import { formatSummaryCsv, formatTradeLogCsv, type RunSummary } from "@intraday/metrics";
import { loadReplayEvents, runReplay } from "@intraday/runtime";
import { parseCliArgs, resolveReplayCliOptions } from "./cliArgs";

const cliLogger = createLogger("replay-cli");

const USAGE = `Usage:
  npm run replay -- --events <file> [options]

Options:
  --events <file>          JSON replay file (required; may be given as the first argument)
  --config-dir <path>      Config directory holding strategy/<profile>.json
  --profile <name>         Strategy profile name (default: default)
  --env-file <path>        Extra .env file loaded after .env and .env.local
  --trades-csv <path>      Write the trade log as CSV
  --summary-csv <path>     Write the run summary as a one-row CSV
  --json                   Print the full JSON result payload
  --help                   Show this message
`;

const formatUsd = (value: number): string => `$${value.toFixed(2)}`;
const formatPct = (value: number): string => `${value.toFixed(2)}%`;

const printSummary = (symbol: string, summary: RunSummary): void => {
	console.log(`---- Summary (${symbol}) ----`);
	console.log(`Signals generated: ${summary.totalSignals}`);
	console.log(
		`Trades closed: ${summary.totalTrades} (${summary.winningTrades} won, ${summary.losingTrades} lost)`
	);
	console.log(`Win rate: ${formatPct(summary.winRatePercent)}`);
	console.log(`Average win: ${formatPct(summary.averageWinPercent)}`);
	console.log(`Average loss: ${formatPct(summary.averageLossPercent)}`);
	console.log(`Average holding: ${summary.averageHoldingMinutes.toFixed(1)} min`);
	console.log(`Total return: ${formatPct(summary.totalPnlPercent)}`);
	console.log(`Max drawdown: ${formatPct(summary.maxDrawdownPercent)}`);
	console.log(`Realized PnL: ${formatUsd(summary.realizedPnl)}`);
	console.log(`Final portfolio value: ${formatUsd(summary.finalPortfolioValue)}`);
};

const writeCsv = (target: string, contents: string): string => {
	const csvPath = path.resolve(target);
	fs.mkdirSync(path.dirname(csvPath), { recursive: true });
	fs.writeFileSync(csvPath, `${contents}\n`);
	return path.relative(process.cwd(), csvPath) || csvPath;
};

const main = (): void => {
	const options = resolveReplayCliOptions(parseCliArgs(process.argv.slice(2)));
	if (options.help || !options.eventsPath) {
		console.log(USAGE);
		return;
	}

	const root = getWorkspaceRoot();
	const envFiles = loadEnvFiles(root, options.envFile);
	resetLoggerSettings();

	const { config, metadata } = loadStrategyConfiguration({
		configDir: options.configDir,
		profile: options.profile,
	});
	if (config.behavior.debugMode) {
		configureLogger({ minLevel: "debug" });
	}
	cliLogger.info("replay_started", {
		events: options.eventsPath,
		configSource: metadata.source,
		profile: metadata.profile,
		envFiles,
	});

	const events = loadReplayEvents(path.resolve(options.eventsPath));
	const result = runReplay(events, { config });

	if (options.tradesCsv) {
		const csvPath = writeCsv(options.tradesCsv, formatTradeLogCsv(result.tradeLog));
		cliLogger.info("trades_csv_written", {
			path: csvPath,
			rows: result.tradeLog.length,
		});
	}
	if (options.summaryCsv) {
		const csvPath = writeCsv(options.summaryCsv, formatSummaryCsv(result.summary));
		cliLogger.info("summary_csv_written", { path: csvPath });
	}

	if (options.json) {
		const { context: _context, ...payload } = result;
		console.log(JSON.stringify(payload, null, 2));
		return;
	}
	printSummary(result.symbol, result.summary);
};

try {
	main();
} catch (error) {
	console.error("Replay failed:", describeError(error));
	if (process.env.DEBUG) {
		console.error(error);
	}
	process.exitCode = 1;
}
