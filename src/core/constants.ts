/**
 * Core constants for the Adoptly implementation
 */

// Collection names
export const PET_COLLECTION = "pet";
export const ADOPTION_REQUEST_COLLECTION = "adoptionrequest";

// Diagnostics
export const MAX_REPORTED_COLLECTIONS = 10;
export const MAX_DIAGNOSTIC_MESSAGE_LENGTH = 50;

export const STORE_NOT_CONFIGURED_MESSAGE = "Database not configured";
