/**
 * A snapshot source that violates the input contract. The batch is aborted;
 * offending rows are never skipped silently.
 */
export class SnapshotValidationError extends Error {
	constructor(
		message: string,
		readonly row?: number
	) {
		super(row === undefined ? message : `Row ${row}: ${message}`);
		this.name = "SnapshotValidationError";
	}
}
