import { formatTimestamp } from "@rollvol/core";
import type { StdevResult } from "@rollvol/core";

export interface FormatCsvOptions {
	includeHeader?: boolean;
	/** Decimal places for statistics; full precision when omitted */
	precision?: number;
}

export const STDEV_CSV_HEADERS = [
	"security_id",
	"timestamp",
	"bid_stdev",
	"mid_stdev",
	"ask_stdev",
] as const;

type StdevCsvRow = Record<(typeof STDEV_CSV_HEADERS)[number], unknown>;

export const formatStdevCsv = (
	results: StdevResult[],
	options: FormatCsvOptions = {}
): string => {
	return toCsv(
		results.map((result) => buildResultRow(result, options.precision)),
		options.includeHeader ?? true
	);
};

const roundStat = (value: number | null, precision?: number): number | null => {
	if (value === null || precision === undefined) {
		return value;
	}
	return Number(value.toFixed(precision));
};

const buildResultRow = (
	result: StdevResult,
	precision?: number
): StdevCsvRow => ({
	security_id: result.entityId,
	timestamp: formatTimestamp(result.timestamp),
	bid_stdev: roundStat(result.bidStdev, precision),
	mid_stdev: roundStat(result.midStdev, precision),
	ask_stdev: roundStat(result.askStdev, precision),
});

const toCsv = (rows: StdevCsvRow[], includeHeader: boolean): string => {
	const lines: string[] = [];
	if (includeHeader) {
		lines.push(STDEV_CSV_HEADERS.join(","));
	}
	for (const row of rows) {
		lines.push(
			STDEV_CSV_HEADERS.map((header) => formatValue(row[header])).join(",")
		);
	}
	return lines.join("\n");
};

const formatValue = (value: unknown): string => {
	if (value === null || value === undefined) {
		return "";
	}
	if (typeof value === "string") {
		if (/[",\n]/.test(value)) {
			return `"${value.replace(/"/g, '""')}"`;
		}
		return value;
	}
	if (typeof value === "number") {
		return Number.isFinite(value) ? value.toString() : "";
	}
	return String(value);
};
