import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it, vi } from "vitest";
import { HOUR_MS } from "@rollvol/core";
import type { ModuleLogger } from "@rollvol/core";
import { SnapshotValidationError } from "./errors";
import {
	loadSnapshotsCsv,
	parseSnapshotsCsv,
	summarizeSnapshots,
} from "./loadSnapshots";

const t0 = Date.UTC(2021, 10, 20, 0);

const createLoggerStub = (): ModuleLogger => ({
	log: vi.fn(),
	debug: vi.fn(),
	info: vi.fn(),
	warn: vi.fn(),
	error: vi.fn(),
});

const csv = (...lines: string[]): string => lines.join("\n");

describe("parseSnapshotsCsv", () => {
	it("parses rows, treating blanks and junk as absent values", () => {
		const { snapshots } = parseSnapshotsCsv(
			csv(
				"security_id,snap_time,bid,mid,ask,venue",
				"SEC1,2021-11-20 00:00:00,100.5,,101,X",
				"SEC1,2021-11-20 01:00:00,NaN,100.75,abc,X"
			)
		);
		expect(snapshots).toEqual([
			{ entityId: "SEC1", timestamp: t0, bid: 100.5, mid: null, ask: 101 },
			{ entityId: "SEC1", timestamp: t0 + HOUR_MS, bid: null, mid: 100.75, ask: null },
		]);
	});

	it("accepts entity_id/timestamp headers in any case", () => {
		const { snapshots } = parseSnapshotsCsv(
			csv("Entity_ID,Timestamp,BID,MID,ASK", "A,2021-11-20T00:00:00Z,1,2,3")
		);
		expect(snapshots[0]).toEqual({
			entityId: "A",
			timestamp: t0,
			bid: 1,
			mid: 2,
			ask: 3,
		});
	});

	it("sorts by entity and then timestamp", () => {
		const { snapshots } = parseSnapshotsCsv(
			csv(
				"security_id,snap_time,bid,mid,ask",
				"B,2021-11-20T01:00:00Z,1,1,1",
				"A,2021-11-20T01:00:00Z,1,1,1",
				"B,2021-11-20T00:00:00Z,1,1,1"
			)
		);
		expect(snapshots.map((s) => `${s.entityId}:${s.timestamp - t0}`)).toEqual([
			`A:${HOUR_MS}`,
			"B:0",
			`B:${HOUR_MS}`,
		]);
	});

	it("filters to [start - lookback, end]", () => {
		const { snapshots, outOfRange } = parseSnapshotsCsv(
			csv(
				"security_id,snap_time,bid,mid,ask",
				"A,2021-11-20T00:00:00Z,1,1,1",
				"A,2021-11-20T01:00:00Z,1,1,1",
				"A,2021-11-20T02:00:00Z,1,1,1",
				"A,2021-11-20T03:00:00Z,1,1,1"
			),
			{ start: t0 + 2 * HOUR_MS, end: t0 + 2 * HOUR_MS, lookbackMs: HOUR_MS }
		);
		expect(snapshots.map((s) => s.timestamp)).toEqual([
			t0 + HOUR_MS,
			t0 + 2 * HOUR_MS,
		]);
		expect(outOfRange).toBe(2);
	});

	it("counts snapshots off the cadence boundary", () => {
		const { misaligned } = parseSnapshotsCsv(
			csv(
				"security_id,snap_time,bid,mid,ask",
				"A,2021-11-20T00:00:00Z,1,1,1",
				"A,2021-11-20T01:00:05Z,1,1,1"
			),
			{ cadenceMs: HOUR_MS }
		);
		expect(misaligned).toBe(1);
	});

	it("rejects missing columns", () => {
		expect(() =>
			parseSnapshotsCsv(csv("security_id,bid,mid", "A,1,2"))
		).toThrowError("Missing required columns: snap_time|timestamp, ask");
	});

	it("rejects unparseable timestamps with the row number", () => {
		expect(() =>
			parseSnapshotsCsv(
				csv(
					"security_id,snap_time,bid,mid,ask",
					"A,2021-11-20T00:00:00Z,1,1,1",
					"A,yesterday,1,1,1"
				)
			)
		).toThrowError('Row 2: Unparseable timestamp "yesterday"');
	});

	it("rejects empty entity ids and duplicates", () => {
		expect(() =>
			parseSnapshotsCsv(
				csv("security_id,snap_time,bid,mid,ask", ",2021-11-20T00:00:00Z,1,1,1")
			)
		).toThrowError(SnapshotValidationError);
		expect(() =>
			parseSnapshotsCsv(
				csv(
					"security_id,snap_time,bid,mid,ask",
					"A,2021-11-20T00:00:00Z,1,1,1",
					"A,2021-11-20 00:00:00,2,2,2"
				)
			)
		).toThrowError("Duplicate snapshot for A at 2021-11-20T00:00:00.000Z");
	});

	it("rejects empty content", () => {
		expect(() => parseSnapshotsCsv("")).toThrowError(/no header row/);
	});
});

describe("summarizeSnapshots", () => {
	it("reports counts and bounds", () => {
		const summary = summarizeSnapshots([
			{ entityId: "A", timestamp: t0 + HOUR_MS, bid: 1, mid: 1, ask: 1 },
			{ entityId: "B", timestamp: t0, bid: 1, mid: 1, ask: 1 },
		]);
		expect(summary).toMatchObject({
			count: 2,
			entityCount: 2,
			firstTimestamp: t0,
			lastTimestamp: t0 + HOUR_MS,
		});
		expect(summary.contentHash).toHaveLength(12);
	});

	it("handles an empty list", () => {
		expect(summarizeSnapshots([])).toEqual({
			count: 0,
			entityCount: 0,
			firstTimestamp: null,
			lastTimestamp: null,
			contentHash: null,
		});
	});
});

describe("loadSnapshotsCsv", () => {
	it("reads a file and logs a summary", () => {
		const dir = fs.mkdtempSync(path.join(os.tmpdir(), "rollvol-data-"));
		try {
			const filePath = path.join(dir, "prices.csv");
			fs.writeFileSync(
				filePath,
				csv(
					"security_id,snap_time,bid,mid,ask",
					"A,2021-11-20T00:30:00Z,1,1,1",
					"A,2021-11-20T01:30:00Z,2,2,2"
				)
			);
			const logger = createLoggerStub();
			const snapshots = loadSnapshotsCsv(filePath, {
				cadenceMs: HOUR_MS,
				logger,
			});
			expect(snapshots).toHaveLength(2);
			expect(logger.warn).toHaveBeenCalledWith(
				"snapshot_misaligned",
				expect.objectContaining({ count: 2 })
			);
			expect(logger.info).toHaveBeenCalledWith(
				"snapshots_loaded",
				expect.objectContaining({
					count: 2,
					entityCount: 1,
					firstTimestamp: "2021-11-20T00:30:00.000Z",
				})
			);
		} finally {
			fs.rmSync(dir, { recursive: true, force: true });
		}
	});

	it("fails when the file does not exist", () => {
		expect(() =>
			loadSnapshotsCsv(path.join(os.tmpdir(), "rollvol-missing", "none.csv"))
		).toThrowError(/Snapshot file not found/);
	});
});
