/**
 * Population standard deviation computed directly from the values.
 * Two-pass, so it serves as the reference for the incremental window.
 */
export function populationStdev(values: number[]): number | null {
	if (!values.length) {
		return null;
	}
	const mean = values.reduce((acc, value) => acc + value, 0) / values.length;
	const squaredDeviation = values.reduce(
		(acc, value) => acc + (value - mean) * (value - mean),
		0
	);
	return Math.sqrt(squaredDeviation / values.length);
}

/**
 * Rolling population standard deviation over the trailing `period` values at
 * every index. Leading positions with fewer than `minPeriods` values are null.
 */
export function rollingPopulationStdev(
	values: number[],
	period: number,
	minPeriods = 1
): (number | null)[] {
	if (period <= 0) {
		return values.map(() => null);
	}
	return values.map((_, idx) => {
		const window = values.slice(Math.max(0, idx + 1 - period), idx + 1);
		return window.length >= minPeriods ? populationStdev(window) : null;
	});
}
