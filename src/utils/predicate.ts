/**
 * Predicate builders and the in-process matcher.
 *
 * Adapters without a query language (the memory store) evaluate predicates
 * with `matchesPredicate`; the others compile them and use the escaping
 * helpers here so user text is always matched literally.
 */
import type {
	AndPredicate,
	ContainsIgnoreCasePredicate,
	EqPredicate,
	OrPredicate,
	Predicate,
	Scalar,
} from "../types/query";

const FIELD_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function eq(field: string, value: Scalar): EqPredicate {
	return { kind: "eq", field, value };
}

export function containsIgnoreCase(
	field: string,
	value: string,
): ContainsIgnoreCasePredicate {
	return { kind: "containsIgnoreCase", field, value };
}

export function and(...clauses: Predicate[]): AndPredicate {
	return { kind: "and", clauses };
}

export function or(...clauses: Predicate[]): OrPredicate {
	return { kind: "or", clauses };
}

/** Predicate matching every document. */
export const MATCH_ALL: AndPredicate = { kind: "and", clauses: [] };

/** Evaluate a predicate against a document's fields. */
export function matchesPredicate(
	data: Record<string, unknown>,
	predicate: Predicate,
): boolean {
	switch (predicate.kind) {
		case "eq":
			return (
				Object.hasOwn(data, predicate.field) &&
				data[predicate.field] === predicate.value
			);
		case "containsIgnoreCase": {
			const value = data[predicate.field];
			return (
				typeof value === "string" &&
				value.toLowerCase().includes(predicate.value.toLowerCase())
			);
		}
		case "and":
			return predicate.clauses.every((c) => matchesPredicate(data, c));
		case "or":
			return predicate.clauses.some((c) => matchesPredicate(data, c));
	}
}

/**
 * Guard for field names interpolated into compiled queries. Only plain
 * identifiers are allowed.
 */
export function assertFieldName(field: string): string {
	if (!FIELD_NAME_PATTERN.test(field)) {
		throw new Error(`Invalid document field name: "${field}"`);
	}
	return field;
}

/** Escape regular expression metacharacters. */
export function escapeRegExp(input: string): string {
	return input.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Escape LIKE wildcards using backslash as the escape character. */
export function escapeLike(input: string): string {
	return input.replace(/[\\%_]/g, "\\$&");
}
