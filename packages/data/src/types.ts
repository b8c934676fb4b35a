import type { ModuleLogger, Snapshot } from "@rollvol/core";

export interface SnapshotLoadOptions {
	/** Keep snapshots at or after `start - lookbackMs` */
	start?: number;
	/** Keep snapshots at or before `end` */
	end?: number;
	lookbackMs?: number;
	/** When set, snapshots off the cadence boundary are counted and reported */
	cadenceMs?: number;
	logger?: ModuleLogger;
}

export interface SnapshotSummary {
	count: number;
	entityCount: number;
	firstTimestamp: number | null;
	lastTimestamp: number | null;
	contentHash: string | null;
}

export interface ParsedSnapshots {
	snapshots: Snapshot[];
	/** Rows dropped by the range filter */
	outOfRange: number;
	misaligned: number;
}
