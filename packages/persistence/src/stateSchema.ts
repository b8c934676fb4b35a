import { z } from "zod";

export const STATE_FORMAT_VERSION = 1;

const windowSchema = z.object({
	values: z.array(z.number().finite()),
	sum: z.number().finite(),
	sumOfSquares: z.number().finite(),
	peakSumOfSquares: z.number().finite().nonnegative(),
	evictionsSinceRecalibration: z.number().int().nonnegative(),
});

const entitySchema = z.object({
	lastTimestamp: z.number().int().nullable(),
	windows: z.object({
		bid: windowSchema,
		mid: windowSchema,
		ask: windowSchema,
	}),
});

export const persistedStateSchema = z.object({
	version: z.literal(STATE_FORMAT_VERSION),
	savedAt: z.string().datetime(),
	config: z.object({
		windowSize: z.number().int().positive(),
		cadenceMs: z.number().int().positive(),
	}),
	highWaterMark: z.number().int().nullable(),
	entityCount: z.number().int().nonnegative(),
	/** SHA-1 of the key-sorted serialization of `entities` */
	checksum: z.string().regex(/^[0-9a-f]{40}$/),
	entities: z.record(z.string().min(1), entitySchema),
});

export type PersistedState = z.infer<typeof persistedStateSchema>;
export type PersistedEntity = z.infer<typeof entitySchema>;
