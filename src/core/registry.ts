/**
 * Entity registry.
 *
 * The models this service stores, declared once so introspection endpoints
 * read a fixed list instead of scanning types at runtime.
 */
import { ADOPTION_REQUEST_COLLECTION, PET_COLLECTION } from "./constants";

export interface EntityDescriptor {
	/** Model name shown to clients. */
	model: string;
	/** Collection the model's documents live in. */
	collection: string;
}

export const ENTITY_REGISTRY = [
	{ model: "Pet", collection: PET_COLLECTION },
	{ model: "AdoptionRequest", collection: ADOPTION_REQUEST_COLLECTION },
] as const satisfies readonly EntityDescriptor[];

export function listModels(): string[] {
	return ENTITY_REGISTRY.map((e) => e.model);
}
