export type ArgValue = string | boolean;

export const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			const key = token.slice(2, eqIdx);
			const value = token.slice(eqIdx + 1);
			args[key] = value;
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	if (positionals[0] && args.events === undefined) {
		args.events = positionals[0];
	}
	return args;
};

export interface ReplayCliOptions {
	help: boolean;
	eventsPath?: string;
	configDir?: string;
	profile?: string;
	envFile?: string;
	tradesCsv?: string;
	summaryCsv?: string;
	json: boolean;
}

const stringArg = (
	args: Record<string, ArgValue>,
	...keys: string[]
): string | undefined => {
	for (const key of keys) {
		const value = args[key];
		if (value === true) {
			throw new Error(`Missing value for --${key}`);
		}
		if (typeof value === "string") {
			return value;
		}
	}
	return undefined;
};

const flagArg = (args: Record<string, ArgValue>, key: string): boolean =>
	args[key] === true || args[key] === "true";

export const resolveReplayCliOptions = (
	args: Record<string, ArgValue>
): ReplayCliOptions => {
	const help = flagArg(args, "help");
	const eventsPath = stringArg(args, "events");
	if (!help && !eventsPath) {
		throw new Error("Missing required --events <file>");
	}
	return {
		help,
		eventsPath,
		configDir: stringArg(args, "config-dir", "configDir"),
		profile: stringArg(args, "profile"),
		envFile: stringArg(args, "env-file", "envPath"),
		tradesCsv: stringArg(args, "trades-csv"),
		summaryCsv: stringArg(args, "summary-csv"),
		json: flagArg(args, "json"),
	};
};
