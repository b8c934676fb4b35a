import { EntityState } from "./entityState";

/**
 * Keyed collection of entity states shared across a batch. Created empty on a
 * cold start or rebuilt by the state store, mutated by the engine, then saved.
 */
export class StateMap {
	private readonly entities = new Map<string, EntityState>();

	constructor(readonly windowSize: number) {}

	get size(): number {
		return this.entities.size;
	}

	has(entityId: string): boolean {
		return this.entities.has(entityId);
	}

	get(entityId: string): EntityState | undefined {
		return this.entities.get(entityId);
	}

	/**
	 * Fetch the state for an entity, creating an empty one on first sight.
	 */
	getOrCreate(entityId: string): { state: EntityState; created: boolean } {
		const existing = this.entities.get(entityId);
		if (existing) {
			return { state: existing, created: false };
		}
		const state = new EntityState(entityId, this.windowSize);
		this.entities.set(entityId, state);
		return { state, created: true };
	}

	set(state: EntityState): void {
		if (state.windowSize !== this.windowSize) {
			throw new Error(
				`Entity ${state.entityId} has window size ${state.windowSize}, expected ${this.windowSize}`
			);
		}
		this.entities.set(state.entityId, state);
	}

	entries(): IterableIterator<[string, EntityState]> {
		return this.entities.entries();
	}

	/** Latest timestamp applied to any entity, or null when nothing has been */
	get highWaterMark(): number | null {
		let mark: number | null = null;
		for (const state of this.entities.values()) {
			if (
				state.lastTimestamp !== null &&
				(mark === null || state.lastTimestamp > mark)
			) {
				mark = state.lastTimestamp;
			}
		}
		return mark;
	}
}
