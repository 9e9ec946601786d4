/*
 * Starter data for an empty pet collection.
 *
 * Counting and inserting are separate store calls. Two processes seeding the
 * same empty store at the same moment can both see zero pets and both insert
 * the starter set; that duplicate is accepted rather than prevented.
 */

import starterPets from "../fixtures/pets.json";
import { parsePetInputs } from "../schemas/pet";
import {
	type AnalyticsAdapter,
	ErrorCodes,
	type PetInput,
	type Result,
	type SeedResult,
	type StoreHandle,
} from "../types/common";
import { toError } from "../utils/error";
import { now } from "../utils/time";
import { PET_COLLECTION } from "./constants";
import { requireStore, safeTrackAnalytics } from "./core-helpers";

/** The bundled starter pets. */
export const DEFAULT_SEED_PETS: readonly PetInput[] =
	parsePetInputs(starterPets);

export class SeedLoader {
	constructor(
		private readonly store: StoreHandle,
		private readonly analytics: AnalyticsAdapter,
		private readonly pets: readonly PetInput[] = DEFAULT_SEED_PETS,
	) {}

	/**
	 * Insert the starter pets when the pet collection is empty.
	 *
	 * With existing pets this is a no-op reporting the current count. On a
	 * failed insert the pets written so far stay in place and the error's
	 * `meta.inserted` says how many there are.
	 */
	async seedIfEmpty(): Promise<Result<SeedResult>> {
		const resolved = requireStore(this.store, "seedIfEmpty");
		if ("error" in resolved) return { error: resolved.error };
		const store = resolved.store;

		let existing: number;
		try {
			existing = await store.count(PET_COLLECTION);
		} catch (err) {
			return {
				error: toError(err, ErrorCodes.STORE_READ_FAILED, {
					op: "seedIfEmpty",
				}),
			};
		}
		if (existing > 0) {
			return { result: { alreadySeeded: true, count: existing } };
		}

		let inserted = 0;
		for (const pet of this.pets) {
			try {
				await store.insertOne(PET_COLLECTION, {
					...pet,
					is_adopted: pet.is_adopted ?? false,
				});
				inserted++;
			} catch (err) {
				return {
					error: toError(err, ErrorCodes.STORE_WRITE_FAILED, {
						op: "seedIfEmpty",
						inserted,
					}),
				};
			}
		}

		await safeTrackAnalytics(this.analytics, "pets.seeded", {
			count: inserted,
			ts: now(),
		});

		return { result: { alreadySeeded: false, count: inserted } };
	}
}
