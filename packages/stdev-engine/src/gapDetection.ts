/**
 * How a new sample relates to the previous one seen for the same entity.
 *
 * - first: no previous sample
 * - continuous: elapsed time is within tolerance of the cadence
 * - gap: elapsed time deviates from the cadence by more than the tolerance
 * - stale: the sample is not newer than the previous one (already applied)
 */
export type IntervalKind = "first" | "continuous" | "gap" | "stale";

export interface GapPolicy {
	cadenceMs: number;
	toleranceMs: number;
}

export const classifyInterval = (
	lastTimestamp: number | null,
	timestamp: number,
	policy: GapPolicy
): IntervalKind => {
	if (lastTimestamp === null) {
		return "first";
	}
	const elapsed = timestamp - lastTimestamp;
	if (elapsed <= 0) {
		return "stale";
	}
	return Math.abs(elapsed - policy.cadenceMs) > policy.toleranceMs
		? "gap"
		: "continuous";
};
