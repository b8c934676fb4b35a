export { StateStoreError } from "./errors";
export type { StateStoreErrorReason } from "./errors";
export {
	createStateStore,
	deserializeState,
	loadState,
	saveState,
	serializeState,
} from "./stateStore";
export type { StateStore, StateStoreOptions } from "./stateStore";
export { STATE_FORMAT_VERSION, persistedStateSchema } from "./stateSchema";
export type { PersistedEntity, PersistedState } from "./stateSchema";
