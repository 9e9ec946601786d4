import { z } from "zod";
import type { Pet, PetInput, StoredDocument } from "../types/common";

const optionalText = z
	.string()
	.nullish()
	.transform((v) => v ?? null);

/**
 * Stored pet document. Required fields must be present; optional text fields
 * default to `null` and `is_adopted` defaults to `false`. Store-managed
 * fields such as timestamps are dropped.
 */
export const PetDocumentSchema = z.object({
	name: z.string(),
	species: z.string(),
	age_years: z.number().nonnegative(),
	gender: z.string(),
	size: z.string(),
	description: optionalText,
	photo_url: optionalText,
	location: optionalText,
	is_adopted: z.boolean().default(false),
});

/** Pet fields accepted for insertion (seed fixtures). */
export const PetInputSchema = z.object({
	name: z.string().min(1),
	species: z.string().min(1),
	age_years: z.number().nonnegative(),
	gender: z.string().min(1),
	size: z.string().min(1),
	description: z.string().nullish(),
	photo_url: z.string().url().nullish(),
	location: z.string().nullish(),
	is_adopted: z.boolean().optional(),
});

export type ParsedPet =
	| { success: true; pet: Pet }
	| { success: false; issues: string[] };

/** Map a stored document to the public Pet view. */
export function parsePetDocument(doc: StoredDocument): ParsedPet {
	const parsed = PetDocumentSchema.safeParse(doc.data);
	if (!parsed.success) {
		return {
			success: false,
			issues: parsed.error.issues.map(
				(i) => `${i.path.join(".") || "(root)"}: ${i.message}`,
			),
		};
	}
	return { success: true, pet: { id: doc.id, ...parsed.data } };
}

/** Validate a list of starter pets, throwing on the first bad entry. */
export function parsePetInputs(raw: unknown): PetInput[] {
	return z.array(PetInputSchema).parse(raw);
}
