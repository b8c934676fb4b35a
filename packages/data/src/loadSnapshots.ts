import fs from "node:fs";
import { parse as parseCSV } from "csv-parse/sync";
import {
	createLogger,
	formatTimestamp,
	hashJson,
	isBucketAligned,
	parseTimestamp,
} from "@rollvol/core";
import type { Snapshot } from "@rollvol/core";
import { SnapshotValidationError } from "./errors";
import type { ParsedSnapshots, SnapshotLoadOptions, SnapshotSummary } from "./types";

const ENTITY_COLUMNS = ["security_id", "entity_id"];
const TIMESTAMP_COLUMNS = ["snap_time", "timestamp"];
const FIELD_COLUMNS = ["bid", "mid", "ask"] as const;
const NULL_TOKENS = new Set(["", "nan", "null", "none", "na", "n/a"]);

const findColumn = (header: string[], candidates: string[]): number =>
	header.findIndex((column) => candidates.includes(column));

const parseFieldValue = (raw: string | undefined): number | null => {
	if (raw === undefined) {
		return null;
	}
	const trimmed = raw.trim();
	if (NULL_TOKENS.has(trimmed.toLowerCase())) {
		return null;
	}
	const value = Number(trimmed);
	return Number.isFinite(value) ? value : null;
};

const isStringRow = (row: unknown): row is string[] =>
	Array.isArray(row) && row.every((cell) => typeof cell === "string");

const compareSnapshots = (a: Snapshot, b: Snapshot): number => {
	if (a.entityId !== b.entityId) {
		return a.entityId < b.entityId ? -1 : 1;
	}
	return a.timestamp - b.timestamp;
};

/**
 * Parse snapshot CSV content (header row required) into snapshots sorted by
 * entity then timestamp. Structural problems throw SnapshotValidationError.
 */
export const parseSnapshotsCsv = (
	content: string,
	options: SnapshotLoadOptions = {}
): ParsedSnapshots => {
	const rows: unknown = parseCSV(content, {
		bom: true,
		skip_empty_lines: true,
		trim: true,
		relax_column_count: true,
	});
	if (!Array.isArray(rows) || !rows.length) {
		throw new SnapshotValidationError("Snapshot source has no header row");
	}

	const [headerRow, ...dataRows] = rows;
	if (!isStringRow(headerRow)) {
		throw new SnapshotValidationError("Snapshot header row is malformed");
	}
	const header = headerRow.map((column) => column.toLowerCase());
	const entityIdx = findColumn(header, ENTITY_COLUMNS);
	const timestampIdx = findColumn(header, TIMESTAMP_COLUMNS);
	const fieldIdx = FIELD_COLUMNS.map((field) => header.indexOf(field));
	const missing = [
		entityIdx === -1 ? ENTITY_COLUMNS.join("|") : null,
		timestampIdx === -1 ? TIMESTAMP_COLUMNS.join("|") : null,
		...FIELD_COLUMNS.filter((_, idx) => fieldIdx[idx] === -1),
	].filter((column): column is string => column !== null);
	if (missing.length) {
		throw new SnapshotValidationError(
			`Missing required columns: ${missing.join(", ")}`
		);
	}

	const lowerBound =
		options.start === undefined
			? Number.NEGATIVE_INFINITY
			: options.start - (options.lookbackMs ?? 0);
	const upperBound = options.end ?? Number.POSITIVE_INFINITY;

	const snapshots: Snapshot[] = [];
	let outOfRange = 0;
	let misaligned = 0;

	dataRows.forEach((row, idx) => {
		const rowNumber = idx + 1;
		if (!isStringRow(row)) {
			throw new SnapshotValidationError("Row is malformed", rowNumber);
		}
		const entityId = row[entityIdx]?.trim() ?? "";
		if (!entityId.length) {
			throw new SnapshotValidationError("Empty entity id", rowNumber);
		}
		const rawTimestamp = row[timestampIdx] ?? "";
		const timestamp = parseTimestamp(rawTimestamp);
		if (timestamp === null) {
			throw new SnapshotValidationError(
				`Unparseable timestamp "${rawTimestamp}"`,
				rowNumber
			);
		}
		if (timestamp < lowerBound || timestamp > upperBound) {
			outOfRange += 1;
			return;
		}
		if (
			options.cadenceMs !== undefined &&
			timestamp >= 0 &&
			!isBucketAligned(timestamp, options.cadenceMs)
		) {
			misaligned += 1;
		}
		snapshots.push({
			entityId,
			timestamp,
			bid: parseFieldValue(row[fieldIdx[0]]),
			mid: parseFieldValue(row[fieldIdx[1]]),
			ask: parseFieldValue(row[fieldIdx[2]]),
		});
	});

	snapshots.sort(compareSnapshots);
	for (let i = 1; i < snapshots.length; i += 1) {
		const previous = snapshots[i - 1];
		const current = snapshots[i];
		if (
			previous.entityId === current.entityId &&
			previous.timestamp === current.timestamp
		) {
			throw new SnapshotValidationError(
				`Duplicate snapshot for ${current.entityId} at ${formatTimestamp(current.timestamp)}`
			);
		}
	}

	return { snapshots, outOfRange, misaligned };
};

export const summarizeSnapshots = (snapshots: Snapshot[]): SnapshotSummary => {
	let firstTimestamp: number | null = null;
	let lastTimestamp: number | null = null;
	const entities = new Set<string>();
	for (const snapshot of snapshots) {
		entities.add(snapshot.entityId);
		if (firstTimestamp === null || snapshot.timestamp < firstTimestamp) {
			firstTimestamp = snapshot.timestamp;
		}
		if (lastTimestamp === null || snapshot.timestamp > lastTimestamp) {
			lastTimestamp = snapshot.timestamp;
		}
	}
	return {
		count: snapshots.length,
		entityCount: entities.size,
		firstTimestamp,
		lastTimestamp,
		contentHash: snapshots.length ? hashJson(snapshots) : null,
	};
};

/**
 * Read and validate a snapshot CSV file.
 */
export const loadSnapshotsCsv = (
	filePath: string,
	options: SnapshotLoadOptions = {}
): Snapshot[] => {
	const logger = options.logger ?? createLogger("data");
	if (!fs.existsSync(filePath)) {
		throw new SnapshotValidationError(`Snapshot file not found: ${filePath}`);
	}
	const content = fs.readFileSync(filePath, "utf-8");
	const { snapshots, outOfRange, misaligned } = parseSnapshotsCsv(content, options);

	if (misaligned > 0) {
		logger.warn("snapshot_misaligned", {
			path: filePath,
			count: misaligned,
			cadenceMs: options.cadenceMs,
		});
	}

	const summary = summarizeSnapshots(snapshots);
	logger.info("snapshots_loaded", {
		path: filePath,
		count: summary.count,
		entityCount: summary.entityCount,
		outOfRange,
		firstTimestamp:
			summary.firstTimestamp === null ? null : formatTimestamp(summary.firstTimestamp),
		lastTimestamp:
			summary.lastTimestamp === null ? null : formatTimestamp(summary.lastTimestamp),
		contentHash: summary.contentHash,
	});
	return snapshots;
};
