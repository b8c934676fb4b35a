import { PRICE_FIELDS } from "@rollvol/core";
import type { PriceField, Snapshot, ValueBounds } from "@rollvol/core";
import { RollingWindow } from "@rollvol/indicators";
import type { RollingWindowSnapshot } from "@rollvol/indicators";
import { classifyInterval } from "./gapDetection";
import type { GapPolicy, IntervalKind } from "./gapDetection";

export interface EntityStateSnapshot {
	lastTimestamp: number | null;
	windows: Record<PriceField, RollingWindowSnapshot>;
}

export interface ApplyOptions extends GapPolicy {
	valueBounds: ValueBounds;
}

export interface EntityUpdate {
	interval: IntervalKind;
	/** True when the windows were cleared before this sample was pushed */
	reset: boolean;
	/** Fields whose value was missing or unusable and left their window untouched */
	absentFields: PriceField[];
}

/**
 * A field value the windows accept: finite and inside the configured bounds.
 */
export const isUsableValue = (
	value: number | null,
	bounds: ValueBounds
): value is number =>
	value !== null &&
	Number.isFinite(value) &&
	value >= bounds.min &&
	value <= bounds.max;

/**
 * Per-entity bundle of bid/mid/ask windows plus the last timestamp applied.
 */
export class EntityState {
	lastTimestamp: number | null = null;
	readonly windows: Record<PriceField, RollingWindow>;

	constructor(
		readonly entityId: string,
		readonly windowSize: number
	) {
		this.windows = {
			bid: new RollingWindow(windowSize),
			mid: new RollingWindow(windowSize),
			ask: new RollingWindow(windowSize),
		};
	}

	static restore(
		entityId: string,
		windowSize: number,
		snapshot: EntityStateSnapshot
	): EntityState {
		const state = new EntityState(entityId, windowSize);
		for (const field of PRICE_FIELDS) {
			state.windows[field] = RollingWindow.restore(
				windowSize,
				snapshot.windows[field]
			);
		}
		state.lastTimestamp = snapshot.lastTimestamp;
		return state;
	}

	/**
	 * Apply one snapshot: reset on a gap, push every usable field value and
	 * advance the last timestamp. Stale snapshots leave the state untouched.
	 */
	apply(snapshot: Snapshot, options: ApplyOptions): EntityUpdate {
		const interval = classifyInterval(
			this.lastTimestamp,
			snapshot.timestamp,
			options
		);
		if (interval === "stale") {
			return { interval, reset: false, absentFields: [] };
		}

		const reset = interval === "gap";
		if (reset) {
			this.resetWindows();
		}

		const absentFields: PriceField[] = [];
		for (const field of PRICE_FIELDS) {
			const value = snapshot[field];
			if (isUsableValue(value, options.valueBounds)) {
				this.windows[field].push(value);
			} else {
				absentFields.push(field);
			}
		}

		this.lastTimestamp = snapshot.timestamp;
		return { interval, reset, absentFields };
	}

	/**
	 * Standard deviation of one field's window, or null until the window
	 * holds at least `minPeriods` samples.
	 */
	stdev(field: PriceField, minPeriods = 1): number | null {
		const window = this.windows[field];
		return window.count >= minPeriods ? window.stdev() : null;
	}

	resetWindows(): void {
		for (const field of PRICE_FIELDS) {
			this.windows[field].reset();
		}
	}

	toSnapshot(): EntityStateSnapshot {
		return {
			lastTimestamp: this.lastTimestamp,
			windows: {
				bid: this.windows.bid.toSnapshot(),
				mid: this.windows.mid.toSnapshot(),
				ask: this.windows.ask.toSnapshot(),
			},
		};
	}
}
