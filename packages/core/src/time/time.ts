/**
 * Pure time utilities for deterministic timestamp handling
 * All functions operate on UTC epoch milliseconds only (no timezone conversion)
 */
import { DAY_MS, MINUTE_MS } from "./constants";

/**
 * Bucket a timestamp to the start of its period
 * @example bucketTimestamp(1735690261234, 60000) => 1735690260000
 */
export const bucketTimestamp = (ts: number, periodMs: number): number => {
	if (!Number.isFinite(ts) || ts < 0) {
		throw new Error(`Invalid timestamp: ${ts}`);
	}
	if (!Number.isFinite(periodMs) || periodMs <= 0) {
		throw new Error(`Invalid period ms: ${periodMs}`);
	}
	return Math.floor(ts / periodMs) * periodMs;
};

export const utcDayStart = (ts: number): number => bucketTimestamp(ts, DAY_MS);

export const isSameUtcDay = (a: number, b: number): boolean =>
	utcDayStart(a) === utcDayStart(b);

export const minutesToMs = (minutes: number): number => minutes * MINUTE_MS;

/** Elapsed whole-and-fractional minutes between two timestamps. */
export const elapsedMinutes = (from: number, to: number): number =>
	(to - from) / MINUTE_MS;

/**
 * Parse a "YYYY-MM-DD" or full ISO string into epoch milliseconds
 * @throws Error when the value is not a valid date
 */
export const parseDateToMs = (value: string): number => {
	const parsed = Date.parse(value);
	if (Number.isNaN(parsed)) {
		throw new Error(`Invalid date: "${value}"`);
	}
	return parsed;
};
