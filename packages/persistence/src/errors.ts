export type StateStoreErrorReason =
	| "unreadable"
	| "invalid_json"
	| "invalid_schema"
	| "checksum_mismatch"
	| "config_mismatch"
	| "inconsistent_window"
	| "write_failed";

/**
 * Raised for any state file that cannot be trusted or written. A batch that
 * sees one must stop rather than fall back to an empty state.
 */
export class StateStoreError extends Error {
	constructor(
		readonly reason: StateStoreErrorReason,
		readonly filePath: string,
		message: string,
		options?: { cause?: unknown }
	) {
		super(`State file ${filePath}: ${message}`, options);
		this.name = "StateStoreError";
	}
}
