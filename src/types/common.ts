/*
 * Shared types and interfaces for Adoptly.
 *
 * This file contains the building blocks used throughout the library:
 * - Identifier aliases and the stored document shape
 * - The public Pet view and adoption request payloads
 * - The document store and analytics adapter contracts
 * - Error codes and the `Result` wrapper returned by every operation
 */

import type { Predicate } from "./query";

/** An opaque, store-assigned document identifier (24 hex characters). */
export type DocumentId = string;

/** A raw document as it comes back from a store: its id plus its fields. */
export interface StoredDocument {
	id: DocumentId;
	data: Record<string, unknown>;
}

/** Fields accepted when a pet document is written to the store. */
export interface PetInput {
	name: string;
	species: string;
	age_years: number;
	gender: string;
	size: string;
	description?: string | null;
	photo_url?: string | null;
	location?: string | null;
	is_adopted?: boolean;
}

/** The public view of a pet returned over the API boundary. */
export interface Pet {
	id: DocumentId;
	name: string;
	species: string;
	age_years: number;
	gender: string;
	size: string;
	description: string | null;
	photo_url: string | null;
	location: string | null;
	is_adopted: boolean;
}

/** Optional search criteria for listing pets. Empty strings count as absent. */
export interface PetFilters {
	/** Exact match on the species field (e.g. "Dog"). */
	species?: string | null;
	/** Exact match on the size field (e.g. "Small"). */
	size?: string | null;
	/** Case-insensitive substring matched against name, description or location. */
	q?: string | null;
}

/** A validated adoption request payload. */
export interface AdoptionRequestInput {
	pet_id: string;
	full_name?: string;
	email?: string;
	phone?: string;
	message?: string;
}

/** Outcome of a seeding attempt. */
export interface SeedResult {
	/** True when the pet collection already held documents and nothing was written. */
	alreadySeeded: boolean;
	/** Existing document count, or the number of documents inserted. */
	count: number;
}

/**
 * Store connectivity and configuration summary returned by the diagnostics
 * endpoint. Probe failures are folded into `database` rather than thrown.
 */
export interface StatusReport {
	backend: string;
	database: string;
	store_initialized: boolean;
	database_name: string | null;
	connection_status: "Connected" | "Not Connected";
	collections: string[];
	database_url_set: boolean;
	database_name_set: boolean;
}

/** Presence flags for the environment settings the store is built from. */
export interface StoreEnvironmentFlags {
	databaseUrlSet: boolean;
	databaseNameSet: boolean;
}

/**
 * Standard error format used throughout the library.
 *
 * All errors include a code and message. The HTTP layer maps codes to status
 * codes; callers never need to inspect `cause`.
 */
export interface AdoptlyError {
	/** Short error code (like "PET_NOT_FOUND" or "INVALID_PET_ID"). */
	code: string;
	/** Human-readable description of what went wrong. */
	message: string;
	/** The original error that caused this one (if any). */
	cause?: unknown;
	/** Extra information about the error. */
	meta?: Record<string, unknown>;
}

/** Wrapper that contains either a successful result or an error (but not both). */
export type Result<T> = {
	result?: T;
	error?: AdoptlyError;
};

/** Common error codes used by the core library. */
export const ErrorCodes = {
	UNKNOWN: "UNKNOWN",
	STORE_NOT_CONFIGURED: "STORE_NOT_CONFIGURED",
	STORE_READ_FAILED: "STORE_READ_FAILED",
	STORE_WRITE_FAILED: "STORE_WRITE_FAILED",
	INVALID_REQUEST: "INVALID_REQUEST",
	INVALID_PET_ID: "INVALID_PET_ID",
	PET_NOT_FOUND: "PET_NOT_FOUND",
	PET_RECORD_INVALID: "PET_RECORD_INVALID",
	DIAGNOSTIC_FAILED: "DIAGNOSTIC_FAILED",
	ANALYTICS_TRACK_FAILED: "ANALYTICS_TRACK_FAILED",
} as const;

/** All possible error codes from the core library. */
export type AdoptlyErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Interface for a collection-oriented document store.
 *
 * Implementations assign identifiers on insert and decide what a well-formed
 * identifier looks like. Filters arrive as a `Predicate` tree which each
 * adapter compiles to its own query language.
 */
export interface DocumentStoreAdapter {
	/** Promise that resolves when the store is ready to use. */
	readonly ready?: Promise<void>;
	/** Database name reported by diagnostics. */
	readonly name: string;
	/** Whether `raw` has the structural form of an identifier this store issues. */
	isValidId(raw: string): boolean;
	/** Insert one document and return its newly assigned id. */
	insertOne(
		collection: string,
		doc: Record<string, unknown>,
	): Promise<DocumentId>;
	/** Find one document by id. */
	findById(collection: string, id: DocumentId): Promise<StoredDocument | null>;
	/** Find every document matching the predicate, in store order. */
	findMany(collection: string, filter: Predicate): Promise<StoredDocument[]>;
	/** Count documents matching the predicate (all documents when omitted). */
	count(collection: string, filter?: Predicate): Promise<number>;
	/** Names of the collections currently holding documents (optional). */
	listCollections?(): Promise<string[]>;
	/** Round-trip connectivity check (optional). */
	ping?(): Promise<void>;
}

/**
 * A document store that may not exist. The server builds one from the
 * environment; when that fails the handle carries the reason instead.
 */
export type StoreHandle =
	| { status: "available"; store: DocumentStoreAdapter }
	| { status: "unavailable"; reason: string };

/** Interface for sending usage data to analytics systems. */
export interface AnalyticsAdapter {
	/** Promise that resolves when the analytics system is ready. */
	readonly ready?: Promise<void>;
	/** Record an event with any additional data you want to track. */
	track(event: string, payload: Record<string, unknown>): Promise<void>;
}

/** Re-export query types from the query module. */
export type { Predicate, Scalar } from "./query";

/**
 * Main configuration options for setting up Adoptly.
 *
 * Only the store is essential; without it every store-backed operation
 * resolves to `STORE_NOT_CONFIGURED`.
 */
export interface AdoptlyConfig {
	/** The document store, or the reason it could not be opened. */
	store?: StoreHandle;
	adapters?: {
		analytics?: AnalyticsAdapter;
	};
	/** Starter pets inserted by `seedIfEmpty` (default: the bundled fixture). */
	seedPets?: readonly PetInput[];
	/** Presence of the store's environment settings, surfaced by diagnostics. */
	environment?: StoreEnvironmentFlags;
}
