import { PRICE_FIELDS, createLogger } from "@rollvol/core";
import type {
	EngineConfig,
	MissingFieldPolicy,
	ModuleLogger,
	PriceField,
	Snapshot,
	StdevResult,
	ValueBounds,
} from "@rollvol/core";
import type { EntityState, EntityUpdate } from "./entityState";
import { StateMap } from "./stateMap";

export interface StdevEngineOptions {
	windowSize: number;
	cadenceMs: number;
	gapToleranceMs: number;
	minPeriods: number;
	missingFieldPolicy: MissingFieldPolicy;
	valueBounds: ValueBounds;
	logger?: ModuleLogger;
}

export interface ProcessRange {
	/** First timestamp (inclusive) that produces results */
	start: number;
	/** Last timestamp (inclusive) that is applied */
	end: number;
	/**
	 * Snapshots in [warmupStart, start) update state without producing
	 * results. Defaults to `start`.
	 */
	warmupStart?: number;
}

export interface EngineStats {
	seen: number;
	applied: number;
	warmupOnly: number;
	skippedOutOfRange: number;
	skippedStale: number;
	windowResets: number;
	absentValues: number;
	emitted: number;
	newEntities: number;
}

const emptyStats = (): EngineStats => ({
	seen: 0,
	applied: 0,
	warmupOnly: 0,
	skippedOutOfRange: 0,
	skippedStale: 0,
	windowResets: 0,
	absentValues: 0,
	emitted: 0,
	newEntities: 0,
});

const STDEV_KEYS: Record<PriceField, "bidStdev" | "midStdev" | "askStdev"> = {
	bid: "bidStdev",
	mid: "midStdev",
	ask: "askStdev",
};

/**
 * Incremental rolling standard deviation engine.
 *
 * Owns no state of its own: the StateMap handed in at construction is mutated
 * in place as snapshots are applied and can be read back with getState() for
 * persistence. Snapshots must arrive in increasing timestamp order per entity;
 * the engine never sorts.
 */
export class StdevEngine {
	private readonly logger: ModuleLogger;
	private stats: EngineStats = emptyStats();

	constructor(
		private readonly state: StateMap,
		private readonly options: StdevEngineOptions
	) {
		if (state.windowSize !== options.windowSize) {
			throw new Error(
				`State window size ${state.windowSize} does not match engine window size ${options.windowSize}`
			);
		}
		this.logger = options.logger ?? createLogger("stdev-engine");
	}

	static fromConfig(
		config: EngineConfig,
		state: StateMap = new StateMap(config.windowSize),
		logger?: ModuleLogger
	): StdevEngine {
		return new StdevEngine(state, {
			windowSize: config.windowSize,
			cadenceMs: config.cadenceMs,
			gapToleranceMs: config.gapToleranceMs,
			minPeriods: config.minPeriods,
			missingFieldPolicy: config.missingFieldPolicy,
			valueBounds: config.valueBounds,
			logger,
		});
	}

	getState(): StateMap {
		return this.state;
	}

	/** Counters for the most recent process() call */
	getStats(): EngineStats {
		return { ...this.stats };
	}

	/**
	 * Apply snapshots lazily, yielding one result per in-range snapshot that
	 * has at least one defined field statistic, in input order.
	 */
	*process(
		snapshots: Iterable<Snapshot>,
		range: ProcessRange
	): Generator<StdevResult, void, undefined> {
		const warmupStart = range.warmupStart ?? range.start;
		if (range.start > range.end) {
			throw new Error(
				`Invalid range: start ${range.start} is after end ${range.end}`
			);
		}
		if (warmupStart > range.start) {
			throw new Error(
				`Invalid range: warmupStart ${warmupStart} is after start ${range.start}`
			);
		}
		this.stats = emptyStats();

		for (const snapshot of snapshots) {
			this.stats.seen += 1;
			if (snapshot.timestamp < warmupStart || snapshot.timestamp > range.end) {
				this.stats.skippedOutOfRange += 1;
				continue;
			}

			const { state, created } = this.state.getOrCreate(snapshot.entityId);
			if (created) {
				this.stats.newEntities += 1;
			}
			const update = state.apply(snapshot, {
				cadenceMs: this.options.cadenceMs,
				toleranceMs: this.options.gapToleranceMs,
				valueBounds: this.options.valueBounds,
			});

			if (update.interval === "stale") {
				this.stats.skippedStale += 1;
				this.logger.debug("stale_snapshot_skipped", {
					entityId: snapshot.entityId,
					timestamp: snapshot.timestamp,
					lastTimestamp: state.lastTimestamp,
				});
				continue;
			}

			this.stats.applied += 1;
			this.stats.absentValues += update.absentFields.length;
			if (update.reset) {
				this.stats.windowResets += 1;
				this.logger.debug("window_reset", {
					entityId: snapshot.entityId,
					timestamp: snapshot.timestamp,
				});
			}

			if (snapshot.timestamp < range.start) {
				this.stats.warmupOnly += 1;
				continue;
			}

			const result = this.buildResult(snapshot, state, update);
			if (result) {
				this.stats.emitted += 1;
				yield result;
			}
		}
	}

	private buildResult(
		snapshot: Snapshot,
		state: EntityState,
		update: EntityUpdate
	): StdevResult | null {
		const result: StdevResult = {
			entityId: snapshot.entityId,
			timestamp: snapshot.timestamp,
			bidStdev: null,
			midStdev: null,
			askStdev: null,
		};
		let defined = 0;
		for (const field of PRICE_FIELDS) {
			const absent = update.absentFields.includes(field);
			const value =
				absent && this.options.missingFieldPolicy === "null"
					? null
					: state.stdev(field, this.options.minPeriods);
			result[STDEV_KEYS[field]] = value;
			if (value !== null) {
				defined += 1;
			}
		}
		return defined > 0 ? result : null;
	}
}
