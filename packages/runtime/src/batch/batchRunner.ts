import { createLogger, formatTimestamp } from "@rollvol/core";
import type { Snapshot, StdevResult } from "@rollvol/core";
import { loadSnapshotsCsv } from "@rollvol/data";
import { createStateStore } from "@rollvol/persistence";
import { StdevEngine } from "@rollvol/stdev-engine";
import type { StdevBatchConfig, StdevBatchResult } from "./batchTypes";

const DEFAULT_FLUSH_SIZE = 1_000;

const resolveSnapshots = (batch: StdevBatchConfig, warmupStart: number): Snapshot[] => {
	if (batch.snapshots) {
		return batch.snapshots;
	}
	if (!batch.inputPath) {
		throw new Error("Batch needs either snapshots or an inputPath");
	}
	return loadSnapshotsCsv(batch.inputPath, {
		start: warmupStart,
		end: batch.end,
		cadenceMs: batch.config.cadenceMs,
		logger: batch.logger,
	});
};

/**
 * Run one batch: load persisted state, apply snapshots for the range, stream
 * results to every sink, close the sinks, then save state. State is written
 * only after every sink has closed successfully, so a failed batch leaves the
 * previous state file as it was.
 */
export async function runStdevBatch(
	batch: StdevBatchConfig
): Promise<StdevBatchResult> {
	const { config, start, end } = batch;
	const logger = batch.logger ?? createLogger("runtime");
	if (start > end) {
		throw new Error(
			`Batch start ${formatTimestamp(start)} is after end ${formatTimestamp(end)}`
		);
	}
	const warmupStart = start - config.lookbackMs;
	const sinks = batch.sinks ?? [];
	const flushSize = Math.max(batch.flushSize ?? DEFAULT_FLUSH_SIZE, 1);

	const store = createStateStore(config.statePath, {
		windowSize: config.windowSize,
		cadenceMs: config.cadenceMs,
		logger: batch.logger,
	});
	const state = store.load();
	const snapshots = resolveSnapshots(batch, warmupStart);

	const engine = StdevEngine.fromConfig(config, state, batch.logger);
	let pending: StdevResult[] = [];
	let resultCount = 0;

	const flush = async (): Promise<void> => {
		if (!pending.length) {
			return;
		}
		const chunk = pending;
		pending = [];
		for (const sink of sinks) {
			await sink.write(chunk);
		}
	};

	for (const result of engine.process(snapshots, { start, end, warmupStart })) {
		pending.push(result);
		resultCount += 1;
		if (pending.length >= flushSize) {
			await flush();
		}
	}
	await flush();
	for (const sink of sinks) {
		await sink.close();
	}

	store.save(state);

	const stats = engine.getStats();
	const highWaterMark = state.highWaterMark;
	logger.info("batch_complete", {
		start: formatTimestamp(start),
		end: formatTimestamp(end),
		resultCount,
		stats,
		entityCount: state.size,
		highWaterMark: highWaterMark === null ? null : formatTimestamp(highWaterMark),
		sinks: sinks.map((sink) => sink.name),
	});

	return {
		resultCount,
		stats,
		highWaterMark,
		statePath: store.path,
	};
}
