/** Error normalization utilities. */
import type { AdoptlyError } from "../types/common";

/**
 * Normalize an unknown thrown value into an `AdoptlyError` suitable for
 * returning from Adoptly APIs.
 *
 * @param err - The unknown thrown value to normalize.
 * @param fallbackCode - Error code to use when the thrown value does not
 * have a string `code` property.
 * @param meta - Optional metadata to merge into the resulting error's `meta`.
 * @returns A well-formed `AdoptlyError` with preserved details when possible.
 */
export function toError(
	err: unknown,
	fallbackCode: string,
	meta?: Record<string, unknown>,
): AdoptlyError {
	const message = err instanceof Error ? err.message : String(err);
	if (err && typeof err === "object") {
		const code =
			"code" in err && typeof err.code === "string" ? err.code : fallbackCode;
		if ("message" in err && typeof err.message === "string") {
			return { code, message: err.message, cause: err, meta };
		}
		return { code, message, cause: err, meta };
	}
	return { code: fallbackCode, message, cause: err, meta };
}

/** Build an error for a condition detected by the library itself. */
export function failure(
	code: string,
	message: string,
	meta?: Record<string, unknown>,
): AdoptlyError {
	return { code, message, meta };
}

/** Shorten a message to at most `max` characters. */
export function truncateMessage(message: string, max: number): string {
	return message.length <= max ? message : message.slice(0, max);
}
