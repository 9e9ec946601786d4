import { z } from "zod";
import type { AdoptionRequestInput } from "../types/common";

/**
 * Adoption request payload. Only `pet_id` is required. It is kept exactly as
 * sent: whether it is a well-formed store identifier (empty or padded ids are
 * not) is decided by the store, not here. Unknown keys are dropped.
 */
export const AdoptionRequestSchema = z.object({
	pet_id: z.string(),
	full_name: z.string().trim().min(1).optional(),
	email: z.string().trim().email().optional(),
	phone: z.string().trim().min(1).optional(),
	message: z.string().optional(),
});

export type ParsedAdoptionRequest =
	| { success: true; request: AdoptionRequestInput }
	| { success: false; message: string };

export function parseAdoptionRequest(payload: unknown): ParsedAdoptionRequest {
	const parsed = AdoptionRequestSchema.safeParse(payload);
	if (!parsed.success) {
		const first = parsed.error.issues[0];
		const path = first?.path.join(".");
		return {
			success: false,
			message: first
				? `${path ? `${path}: ` : ""}${first.message}`
				: "Invalid adoption request",
		};
	}
	return { success: true, request: parsed.data };
}
