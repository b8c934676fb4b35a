export interface RollingWindowSnapshot {
	values: number[];
	sum: number;
	sumOfSquares: number;
	/** Largest sum of squares held since the sums were last recomputed */
	peakSumOfSquares: number;
	evictionsSinceRecalibration: number;
}

// Recompute once the sum of squares falls this far below its peak: the
// evicted magnitudes have cancelled away most of the significant digits.
const CANCELLATION_RATIO = 1e-3;

/**
 * Fixed-capacity sliding window over one numeric series.
 *
 * Keeps a running sum and sum of squares so that pushing a value and reading
 * the population standard deviation are both O(1) regardless of capacity.
 * Values live in a ring buffer; the oldest value is evicted once the window
 * is full. The length of the trailing run of equal values is tracked so a
 * uniform window reports exactly zero instead of cancellation residue.
 *
 * Both sums are recomputed from the buffer every `capacity` evictions, and
 * immediately after an eviction that leaves the sum of squares far below its
 * peak (a large value leaving a window of small ones).
 */
export class RollingWindow {
	private readonly buffer: number[];
	private head = 0;
	private size = 0;
	private runningSum = 0;
	private runningSumOfSquares = 0;
	private trailingRun = 0;
	private peakSumOfSquares = 0;
	private evictionsSinceRecalibration = 0;

	constructor(readonly capacity: number) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new Error(
				`RollingWindow capacity must be a positive integer, got ${capacity}`
			);
		}
		this.buffer = new Array<number>(capacity).fill(0);
	}

	/**
	 * Rebuild a window from persisted contents. Sums are taken as stored so a
	 * restored window continues exactly where the saved one stopped.
	 */
	static restore(capacity: number, snapshot: RollingWindowSnapshot): RollingWindow {
		if (snapshot.values.length > capacity) {
			throw new Error(
				`Cannot restore ${snapshot.values.length} values into a window of ${capacity}`
			);
		}
		const window = new RollingWindow(capacity);
		snapshot.values.forEach((value, idx) => {
			window.buffer[idx] = value;
		});
		window.size = snapshot.values.length;
		window.head = window.size % capacity;
		window.runningSum = snapshot.sum;
		window.runningSumOfSquares = snapshot.sumOfSquares;
		window.peakSumOfSquares = snapshot.peakSumOfSquares;
		window.evictionsSinceRecalibration = snapshot.evictionsSinceRecalibration;
		const values = snapshot.values;
		let run = 0;
		for (let i = values.length - 1; i >= 0; i -= 1) {
			if (values[i] !== values[values.length - 1]) {
				break;
			}
			run += 1;
		}
		window.trailingRun = run;
		return window;
	}

	get count(): number {
		return this.size;
	}

	get sum(): number {
		return this.runningSum;
	}

	get sumOfSquares(): number {
		return this.runningSumOfSquares;
	}

	get isFull(): boolean {
		return this.size === this.capacity;
	}

	/**
	 * Append a value, evicting the oldest one when full.
	 * @returns the evicted value, or null when nothing was evicted
	 */
	push(value: number): number | null {
		const previous =
			this.size > 0
				? this.buffer[(this.head - 1 + this.capacity) % this.capacity]
				: null;
		this.trailingRun = previous === value ? this.trailingRun + 1 : 1;
		let evicted: number | null = null;
		if (this.size === this.capacity) {
			evicted = this.buffer[this.head];
			this.runningSum -= evicted;
			this.runningSumOfSquares -= evicted * evicted;
		} else {
			this.size += 1;
		}
		this.buffer[this.head] = value;
		this.head = (this.head + 1) % this.capacity;
		this.runningSum += value;
		this.runningSumOfSquares += value * value;
		this.trailingRun = Math.min(this.trailingRun, this.size);

		if (evicted !== null) {
			this.evictionsSinceRecalibration += 1;
			if (
				this.evictionsSinceRecalibration >= this.capacity ||
				this.runningSumOfSquares < this.peakSumOfSquares * CANCELLATION_RATIO
			) {
				this.recalibrate();
			}
		}
		this.peakSumOfSquares = Math.max(
			this.peakSumOfSquares,
			this.runningSumOfSquares
		);
		return evicted;
	}

	private recalibrate(): void {
		let sum = 0;
		let sumOfSquares = 0;
		for (let i = 0; i < this.size; i += 1) {
			const value = this.buffer[i];
			sum += value;
			sumOfSquares += value * value;
		}
		this.runningSum = sum;
		this.runningSumOfSquares = sumOfSquares;
		this.peakSumOfSquares = sumOfSquares;
		this.evictionsSinceRecalibration = 0;
	}

	mean(): number | null {
		return this.size === 0 ? null : this.runningSum / this.size;
	}

	/**
	 * Population standard deviation of the held values, or null when empty.
	 * Residual negative variance from rounding is clamped to zero.
	 */
	stdev(): number | null {
		const n = this.size;
		if (n === 0) {
			return null;
		}
		if (this.trailingRun === n) {
			return 0;
		}
		const mean = this.runningSum / n;
		const variance = this.runningSumOfSquares / n - mean * mean;
		return Math.sqrt(Math.max(0, variance));
	}

	reset(): void {
		this.head = 0;
		this.size = 0;
		this.runningSum = 0;
		this.runningSumOfSquares = 0;
		this.trailingRun = 0;
		this.peakSumOfSquares = 0;
		this.evictionsSinceRecalibration = 0;
	}

	/** Held values, oldest first */
	values(): number[] {
		const start = (this.head - this.size + this.capacity) % this.capacity;
		const out: number[] = [];
		for (let i = 0; i < this.size; i += 1) {
			out.push(this.buffer[(start + i) % this.capacity]);
		}
		return out;
	}

	toSnapshot(): RollingWindowSnapshot {
		return {
			values: this.values(),
			sum: this.runningSum,
			sumOfSquares: this.runningSumOfSquares,
			peakSumOfSquares: this.peakSumOfSquares,
			evictionsSinceRecalibration: this.evictionsSinceRecalibration,
		};
	}
}
