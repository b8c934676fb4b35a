export * from "./types";
export { SnapshotValidationError } from "./errors";
export {
	loadSnapshotsCsv,
	parseSnapshotsCsv,
	summarizeSnapshots,
} from "./loadSnapshots";
