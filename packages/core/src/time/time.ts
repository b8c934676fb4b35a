/**
 * Pure time utilities for deterministic timestamp handling
 * All functions operate on UTC epoch milliseconds only (no timezone conversion)
 */
import { DAY_MS, HOUR_MS, MINUTE_MS } from "./constants";

export interface ParsedTimeframe {
	unit: "m" | "h" | "d";
	n: number;
	ms: number;
}

const TIMEFRAME_PATTERN = /^(\d+)([mhd])$/;

// Matches a trailing "Z" or "+hh:mm" / "-hhmm" offset on an ISO string
const OFFSET_PATTERN = /(Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Parse timeframe string into structured format
 * @param timeframe - Format: "1m", "5m", "15m", "1h", "4h", "1d"
 * @throws Error if timeframe format is invalid
 */
export const parseTimeframe = (timeframe: string): ParsedTimeframe => {
	if (!timeframe || typeof timeframe !== "string") {
		throw new Error(
			`Invalid timeframe: expected string, got ${typeof timeframe}`
		);
	}

	const trimmed = timeframe.trim().toLowerCase();
	const match = trimmed.match(TIMEFRAME_PATTERN);

	if (!match) {
		throw new Error(
			`Invalid timeframe format: "${timeframe}". Expected format like "1m", "5m", "1h", "1d"`
		);
	}

	const n = parseInt(match[1], 10);
	if (n <= 0) {
		throw new Error(
			`Invalid timeframe: period must be positive, got ${n} in "${timeframe}"`
		);
	}

	switch (match[2]) {
		case "m":
			return { unit: "m", n, ms: n * MINUTE_MS };
		case "h":
			return { unit: "h", n, ms: n * HOUR_MS };
		case "d":
			return { unit: "d", n, ms: n * DAY_MS };
		default:
			throw new Error(`Invalid timeframe unit: "${match[2]}" in "${timeframe}"`);
	}
};

/**
 * Parse timeframe string to milliseconds
 * @example timeframeToMs("1h") => 3600000
 */
export const timeframeToMs = (timeframe: string): number =>
	parseTimeframe(timeframe).ms;

/**
 * Bucket a timestamp to the start of its timeframe period
 * @example bucketTimestamp(1735690261234, 60000) => 1735690260000
 */
export const bucketTimestamp = (ts: number, tfMs: number): number => {
	if (!Number.isFinite(ts) || ts < 0) {
		throw new Error(`Invalid timestamp: ${ts}`);
	}
	if (!Number.isFinite(tfMs) || tfMs <= 0) {
		throw new Error(`Invalid timeframe ms: ${tfMs}`);
	}
	return Math.floor(ts / tfMs) * tfMs;
};

export const isBucketAligned = (ts: number, tfMs: number): boolean => {
	return ts === bucketTimestamp(ts, tfMs);
};

/**
 * Parse an ISO-8601 timestamp into epoch milliseconds.
 * Strings without an explicit offset are read as UTC rather than local time.
 * @returns null when the value cannot be parsed
 */
export const parseTimestamp = (value: string): number | null => {
	const trimmed = value.trim();
	if (!trimmed.length) {
		return null;
	}
	const hasTime = trimmed.includes("T") || trimmed.includes(" ");
	const normalized =
		hasTime && !OFFSET_PATTERN.test(trimmed)
			? `${trimmed.replace(" ", "T")}Z`
			: trimmed;
	const ts = Date.parse(normalized);
	return Number.isNaN(ts) ? null : ts;
};

export const formatTimestamp = (ts: number): string =>
	new Date(ts).toISOString();
