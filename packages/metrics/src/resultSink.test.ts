import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import type { StdevResult } from "@rollvol/core";
import { createCsvFileSink, createMemorySink } from "./resultSink";

const result: StdevResult = {
	entityId: "SEC1",
	timestamp: Date.UTC(2021, 10, 20, 0),
	bidStdev: 0.5,
	midStdev: 0.25,
	askStdev: null,
};

describe("result sinks", () => {
	it("memory sink keeps results in write order", () => {
		const sink = createMemorySink();
		sink.write([result]);
		sink.write([{ ...result, entityId: "SEC2" }]);
		expect(sink.results.map((r) => r.entityId)).toEqual(["SEC1", "SEC2"]);
	});

	it("csv sink writes nothing until closed, then the full file", () => {
		const dir = fs.mkdtempSync(path.join(os.tmpdir(), "rollvol-sink-"));
		try {
			const filePath = path.join(dir, "out", "results.csv");
			const sink = createCsvFileSink(filePath);
			sink.write([result]);
			expect(fs.existsSync(filePath)).toBe(false);
			sink.close();
			expect(fs.readFileSync(filePath, "utf-8")).toBe(
				"security_id,timestamp,bid_stdev,mid_stdev,ask_stdev\n" +
					"SEC1,2021-11-20T00:00:00.000Z,0.5,0.25,\n"
			);
		} finally {
			fs.rmSync(dir, { recursive: true, force: true });
		}
	});
});
