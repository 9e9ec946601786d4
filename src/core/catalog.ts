/*
 * Pet catalog: search over adoptable pets.
 *
 * Search criteria are turned into a store-neutral predicate, executed against
 * the pet collection, and every matching document is mapped to the public
 * Pet view.
 */

import { parsePetDocument } from "../schemas/pet";
import {
	ErrorCodes,
	type Pet,
	type PetFilters,
	type Result,
	type StoreHandle,
	type StoredDocument,
} from "../types/common";
import type { Predicate } from "../types/query";
import { failure, toError } from "../utils/error";
import { and, containsIgnoreCase, eq, or } from "../utils/predicate";
import { PET_COLLECTION } from "./constants";
import { requireStore } from "./core-helpers";

/** Fields the free-text query is matched against. */
export const SEARCHABLE_PET_FIELDS = ["name", "description", "location"] as const;

function present(value: string | null | undefined): value is string {
	return typeof value === "string" && value.length > 0;
}

/**
 * Build the predicate for a pet search.
 *
 * Adopted pets are always excluded. `species` and `size` are exact matches;
 * `q` matches any searchable field as a case-insensitive substring. All
 * provided criteria must hold.
 */
export function buildPetPredicate(filters: PetFilters = {}): Predicate {
	const clauses: Predicate[] = [eq("is_adopted", false)];
	if (present(filters.species)) clauses.push(eq("species", filters.species));
	if (present(filters.size)) clauses.push(eq("size", filters.size));
	if (present(filters.q)) {
		const q = filters.q;
		clauses.push(or(...SEARCHABLE_PET_FIELDS.map((f) => containsIgnoreCase(f, q))));
	}
	return and(...clauses);
}

export class PetCatalog {
	constructor(private readonly store: StoreHandle) {}

	/**
	 * List adoptable pets matching the given filters.
	 *
	 * Read-only. Ordering is whatever the store returns. A stored pet missing
	 * a required field fails the whole call with `PET_RECORD_INVALID`.
	 */
	async listPets(filters: PetFilters = {}): Promise<Result<Pet[]>> {
		const resolved = requireStore(this.store, "listPets");
		if ("error" in resolved) return { error: resolved.error };

		let docs: StoredDocument[];
		try {
			docs = await resolved.store.findMany(
				PET_COLLECTION,
				buildPetPredicate(filters),
			);
		} catch (err) {
			return {
				error: toError(err, ErrorCodes.STORE_READ_FAILED, { op: "listPets" }),
			};
		}

		const pets: Pet[] = [];
		for (const doc of docs) {
			const parsed = parsePetDocument(doc);
			if (!parsed.success) {
				return {
					error: failure(
						ErrorCodes.PET_RECORD_INVALID,
						`Pet ${doc.id} is not a valid pet record`,
						{ op: "listPets", petId: doc.id, issues: parsed.issues },
					),
				};
			}
			pets.push(parsed.pet);
		}
		return { result: pets };
	}
}
