/** Helpers shared by document store adapters. */
import { isoNow } from "./time";

const COLLECTION_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Copy a document for insertion, stamping `created_at` and `updated_at`.
 * Caller-supplied timestamps are overwritten.
 */
export function withTimestamps(
	doc: Record<string, unknown>,
): Record<string, unknown> {
	const ts = isoNow();
	return { ...doc, created_at: ts, updated_at: ts };
}

export function assertCollectionName(collection: string): string {
	if (!COLLECTION_NAME_PATTERN.test(collection)) {
		throw new Error(`Invalid collection name: "${collection}"`);
	}
	return collection;
}

/** Narrow a driver value to a plain object row or document. */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Rows returned by a driver, keeping only object-shaped entries. */
export function toRows(value: unknown): Array<Record<string, unknown>> {
	return Array.isArray(value) ? value.filter(isRecord) : [];
}

/**
 * Parse a JSON column value into a document. Drivers hand back either the
 * parsed object (jsonb) or the raw text.
 */
export function parseDocumentColumn(raw: unknown): Record<string, unknown> {
	const value: unknown = typeof raw === "string" ? JSON.parse(raw) : raw;
	if (!isRecord(value)) {
		throw new Error("Stored document is not a JSON object");
	}
	return value;
}
