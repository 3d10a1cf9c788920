import fs from "node:fs";
import { z } from "zod";
import { DataError, describeError } from "@intraday/core";

const timestampSchema = z
	.union([z.number().int().nonnegative(), z.string().min(1)])
	.transform((value, ctx) => {
		if (typeof value === "number") {
			return value;
		}
		const parsed = Date.parse(value);
		if (Number.isNaN(parsed)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `Invalid timestamp "${value}"`,
			});
			return z.NEVER;
		}
		return parsed;
	});

const bollingerBandsSchema = z.object({
	upper: z.number(),
	middle: z.number(),
	lower: z.number(),
});

const macdSchema = z.object({
	macd: z.number(),
	signal: z.number(),
	histogram: z.number(),
});

const barEventSchema = z.object({
	type: z.literal("bar"),
	timestamp: timestampSchema,
	closePrice: z.number().positive(),
	ema: z.number().nullable().default(null),
	rsi: z.number().nullable().default(null),
	obv: z.number().nullable().optional(),
	bollingerBands: bollingerBandsSchema.nullable().optional(),
	macd: macdSchema.nullable().optional(),
	portfolioValue: z.number(),
	isInvested: z.boolean().default(false),
	// derived from the configured warm-up period when absent
	isWarmingUp: z.boolean().optional(),
});

const tickEventSchema = z.object({
	type: z.literal("tick"),
	timestamp: timestampSchema,
	obv: z.number().nullable().default(null),
	isWarmingUp: z.boolean().default(false),
});

export const replayEventSchema = z.discriminatedUnion("type", [
	barEventSchema,
	tickEventSchema,
]);

export const replayEventsSchema = z.array(replayEventSchema);

export type ReplayEvent = z.infer<typeof replayEventSchema>;

/** Accepts a bare event array or an `{ "events": [...] }` document. */
export const parseReplayEvents = (raw: unknown, source = "inline"): ReplayEvent[] => {
	const payload =
		raw !== null && typeof raw === "object" && !Array.isArray(raw) && "events" in raw
			? raw.events
			: raw;
	const parsed = replayEventsSchema.safeParse(payload);
	if (!parsed.success) {
		const issues = parsed.error.issues.map(
			(issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`
		);
		throw new DataError(
			`Invalid replay events from ${source}: ${issues.slice(0, 5).join("; ")}`,
			{ source, issues }
		);
	}
	return parsed.data;
};

export const loadReplayEvents = (filePath: string): ReplayEvent[] => {
	let raw: unknown;
	try {
		raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
	} catch (error) {
		throw new DataError(`Unable to read replay events from ${filePath}`, {
			path: filePath,
			error: describeError(error),
		});
	}
	return parseReplayEvents(raw, filePath);
};
