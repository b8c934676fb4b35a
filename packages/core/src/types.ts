export * from "./time";

export const PRICE_FIELDS = ["bid", "mid", "ask"] as const;

export type PriceField = (typeof PRICE_FIELDS)[number];

/**
 * One entity's bid/mid/ask observation at a sampling instant.
 * A field is `null` when the source row had no usable value for it.
 */
export interface Snapshot {
	entityId: string;
	/** UTC epoch milliseconds */
	timestamp: number;
	bid: number | null;
	mid: number | null;
	ask: number | null;
}

export interface StdevResult {
	entityId: string;
	timestamp: number;
	bidStdev: number | null;
	midStdev: number | null;
	askStdev: number | null;
}

export type MissingFieldPolicy = "carry" | "null";

export interface ValueBounds {
	min: number;
	max: number;
}

export interface TimeRange {
	start: number;
	end: number;
}
