/*
 * Adoption request intake.
 *
 * A request is accepted only when its pet id is a well-formed store
 * identifier that resolves to an existing pet. The existence check runs
 * before the insert and the two are not transactional.
 */

import { parseAdoptionRequest } from "../schemas/adoption-request";
import {
	type AnalyticsAdapter,
	type DocumentId,
	ErrorCodes,
	type Result,
	type StoreHandle,
	type StoredDocument,
} from "../types/common";
import { failure, toError } from "../utils/error";
import { now } from "../utils/time";
import { ADOPTION_REQUEST_COLLECTION, PET_COLLECTION } from "./constants";
import { requireStore, safeTrackAnalytics } from "./core-helpers";

export class AdoptionWorkflow {
	constructor(
		private readonly store: StoreHandle,
		private readonly analytics: AnalyticsAdapter,
	) {}

	/**
	 * Validate and persist an adoption request.
	 *
	 * Fails with `INVALID_REQUEST` for a malformed payload,
	 * `STORE_NOT_CONFIGURED` without a store, `INVALID_PET_ID` when `pet_id`
	 * is not a store identifier (the store is not queried), and
	 * `PET_NOT_FOUND` when no pet has that id. A pet that is already adopted
	 * still accepts requests.
	 *
	 * @param payload - Untrusted request body.
	 * @returns The id assigned to the stored request.
	 */
	async submitRequest(
		payload: unknown,
	): Promise<Result<{ requestId: DocumentId }>> {
		const parsed = parseAdoptionRequest(payload);
		if (!parsed.success) {
			return {
				error: failure(ErrorCodes.INVALID_REQUEST, parsed.message, {
					op: "submitRequest",
				}),
			};
		}
		const request = parsed.request;

		const resolved = requireStore(this.store, "submitRequest");
		if ("error" in resolved) return { error: resolved.error };
		const store = resolved.store;

		if (!store.isValidId(request.pet_id)) {
			return {
				error: failure(ErrorCodes.INVALID_PET_ID, "Invalid pet ID", {
					op: "submitRequest",
					petId: request.pet_id,
				}),
			};
		}

		let pet: StoredDocument | null;
		try {
			pet = await store.findById(PET_COLLECTION, request.pet_id);
		} catch (err) {
			return {
				error: toError(err, ErrorCodes.STORE_READ_FAILED, {
					op: "submitRequest",
				}),
			};
		}
		if (!pet) {
			return {
				error: failure(ErrorCodes.PET_NOT_FOUND, "Pet not found", {
					op: "submitRequest",
					petId: request.pet_id,
				}),
			};
		}

		let requestId: DocumentId;
		try {
			requestId = await store.insertOne(ADOPTION_REQUEST_COLLECTION, {
				...request,
			});
		} catch (err) {
			return {
				error: toError(err, ErrorCodes.STORE_WRITE_FAILED, {
					op: "submitRequest",
				}),
			};
		}

		await safeTrackAnalytics(this.analytics, "adoption.requested", {
			requestId,
			petId: pet.id,
			ts: now(),
		});

		return { result: { requestId } };
	}
}
