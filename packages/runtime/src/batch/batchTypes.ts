import type { EngineConfig, ModuleLogger, Snapshot } from "@rollvol/core";
import type { ResultSink } from "@rollvol/metrics";
import type { EngineStats } from "@rollvol/stdev-engine";

export interface StdevBatchConfig {
	config: EngineConfig;
	/** First timestamp (inclusive) to produce results for */
	start: number;
	/** Last timestamp (inclusive) to apply */
	end: number;
	/** CSV path read through the snapshot loader */
	inputPath?: string;
	/** Pre-loaded snapshots, used instead of inputPath */
	snapshots?: Snapshot[];
	sinks?: ResultSink[];
	/** Results handed to sinks per write() call */
	flushSize?: number;
	logger?: ModuleLogger;
}

export interface StdevBatchResult {
	resultCount: number;
	stats: EngineStats;
	highWaterMark: number | null;
	statePath: string;
}
