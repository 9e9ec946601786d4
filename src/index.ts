export { MemoryAnalytics } from "./adapters/analytics/memory";
export type { TrackedEvent } from "./adapters/analytics/memory";
export { ConsoleAnalytics } from "./adapters/analytics/console";
export { MemoryDocumentStore } from "./adapters/document-store/memory";
export {
	compileMongoPredicate,
	MongoDocumentStore,
} from "./adapters/document-store/mongodb";
export {
	compilePostgresPredicate,
	PostgresDocumentStore,
} from "./adapters/document-store/postgres";
export {
	compileSqlitePredicate,
	SqliteDocumentStore,
} from "./adapters/document-store/sqlite";
export type { SqliteClause } from "./adapters/document-store/sqlite";
export { AdoptionWorkflow } from "./core/adoption";
export { Adoptly, adoptly } from "./core/adoptly";
export { buildPetPredicate, PetCatalog } from "./core/catalog";
export * from "./core/constants";
export { availableStore, unavailableStore } from "./core/core-helpers";
export { DiagnosticsReporter } from "./core/diagnostics";
export { ENTITY_REGISTRY, listModels } from "./core/registry";
export type { EntityDescriptor } from "./core/registry";
export { DEFAULT_SEED_PETS, SeedLoader } from "./core/seed";
export { AdoptionRequestSchema } from "./schemas/adoption-request";
export { PetDocumentSchema, PetInputSchema } from "./schemas/pet";
export type { PgLikeClient, SqliteLikeClient } from "./types/adapters";
export * from "./types/common";
export type * from "./types/query";
export { toError } from "./utils/error";
export { generateObjectId, isObjectIdHex } from "./utils/id";
export {
	and,
	containsIgnoreCase,
	eq,
	MATCH_ALL,
	matchesPredicate,
	or,
} from "./utils/predicate";
export { createApp, statusForError } from "./server/app";
export type { AppOptions } from "./server/app";
export { DEFAULT_PORT, readServerEnv } from "./server/env";
export type { ServerEnv } from "./server/env";
export { openDocumentStore, storeKindFor } from "./server/store";
export type { StoreKind } from "./server/store";
