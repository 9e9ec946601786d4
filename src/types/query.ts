/**
 * Filter predicate types.
 *
 * A predicate is a small tree that document store adapters compile into their
 * own query language (an in-process matcher, a Mongo filter, a SQL clause).
 */

/** A value that can be compared for equality inside a document. */
export type Scalar = string | number | boolean | null;

/** Field equals the given value exactly. A missing field never matches. */
export type EqPredicate = {
	kind: "eq";
	field: string;
	value: Scalar;
};

/** Field is a string containing `value`, ignoring case. Matched literally. */
export type ContainsIgnoreCasePredicate = {
	kind: "containsIgnoreCase";
	field: string;
	value: string;
};

/** Every clause matches. An empty clause list matches everything. */
export type AndPredicate = {
	kind: "and";
	clauses: Predicate[];
};

/** At least one clause matches. An empty clause list matches nothing. */
export type OrPredicate = {
	kind: "or";
	clauses: Predicate[];
};

export type Predicate =
	| EqPredicate
	| ContainsIgnoreCasePredicate
	| AndPredicate
	| OrPredicate;
