import fs from "node:fs";
import path from "node:path";
import type { StdevResult } from "@rollvol/core";
import { formatStdevCsv } from "./formatCSV";
import type { FormatCsvOptions } from "./formatCSV";

/**
 * Downstream consumer of engine output. Results arrive in engine order;
 * close() is called once after the last write and must surface any failure.
 */
export interface ResultSink {
	readonly name: string;
	write(results: StdevResult[]): void | Promise<void>;
	close(): void | Promise<void>;
}

export interface MemorySink extends ResultSink {
	readonly results: StdevResult[];
}

export const createMemorySink = (): MemorySink => {
	const results: StdevResult[] = [];
	return {
		name: "memory",
		results,
		write: (batch) => {
			results.push(...batch);
		},
		close: () => undefined,
	};
};

/**
 * Buffers results and writes the CSV file (creating parent directories) on
 * close. An existing file at the path is replaced.
 */
export const createCsvFileSink = (
	filePath: string,
	options: FormatCsvOptions = {}
): ResultSink => {
	const buffered: StdevResult[] = [];
	return {
		name: `csv:${filePath}`,
		write: (batch) => {
			buffered.push(...batch);
		},
		close: () => {
			fs.mkdirSync(path.dirname(filePath), { recursive: true });
			const body = formatStdevCsv(buffered, options);
			fs.writeFileSync(filePath, body.length ? `${body}\n` : body);
		},
	};
};
