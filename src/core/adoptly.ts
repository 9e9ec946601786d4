/*
 * Core Adoptly implementation.
 *
 * This module exposes the `Adoptly` class and a small factory `adoptly`.
 * The class wires one document store handle and one analytics adapter into
 * the four services (catalog, adoption intake, seeding, diagnostics). The
 * services share nothing but the store.
 */

import { ConsoleAnalytics } from "../adapters/analytics/console";
import type {
	AdoptlyConfig,
	AnalyticsAdapter,
	PetInput,
	StoreEnvironmentFlags,
	StoreHandle,
} from "../types/common";
import { AdoptionWorkflow } from "./adoption";
import { PetCatalog } from "./catalog";
import { unavailableStore } from "./core-helpers";
import { DiagnosticsReporter } from "./diagnostics";
import { DEFAULT_SEED_PETS, SeedLoader } from "./seed";

/**
 * Configuration is normalized to ensure sensible defaults:
 * - No store means an unavailable handle; store-backed calls then fail
 *   with `STORE_NOT_CONFIGURED`
 * - Analytics default to `ConsoleAnalytics`
 * - Seeding uses the bundled starter pets unless `seedPets` is given
 *
 * The instance exposes a `ready` promise that settles once the store and
 * analytics adapters report readiness.
 */
export class Adoptly {
	readonly config: Readonly<
		AdoptlyConfig & {
			store: StoreHandle;
			seedPets: readonly PetInput[];
			environment: StoreEnvironmentFlags;
		}
	>;

	readonly analytics: AnalyticsAdapter;
	readonly catalog: PetCatalog;
	readonly adoptions: AdoptionWorkflow;
	readonly seeder: SeedLoader;
	readonly diagnostics: DiagnosticsReporter;

	/**
	 * Settles after adapter readiness. A store whose readiness rejects is
	 * still wired in; its operations report the failure.
	 */
	readonly ready: Promise<void>;

	constructor(cfg: AdoptlyConfig = {}) {
		const store = cfg.store ?? unavailableStore();
		const seedPets = cfg.seedPets ?? DEFAULT_SEED_PETS;
		const environment = cfg.environment ?? {
			databaseUrlSet: false,
			databaseNameSet: false,
		};
		this.config = Object.freeze({ ...cfg, store, seedPets, environment });

		this.analytics = cfg.adapters?.analytics ?? new ConsoleAnalytics();
		this.catalog = new PetCatalog(store);
		this.adoptions = new AdoptionWorkflow(store, this.analytics);
		this.seeder = new SeedLoader(store, this.analytics, seedPets);
		this.diagnostics = new DiagnosticsReporter(store, environment);

		const readiness: Array<Promise<unknown>> = [];
		if (store.status === "available" && store.store.ready) {
			readiness.push(store.store.ready);
		}
		if (this.analytics.ready) readiness.push(this.analytics.ready);
		this.ready = Promise.allSettled(readiness).then(() => undefined);
	}
}

/** Construct an `Adoptly` instance. */
export function adoptly(config: AdoptlyConfig = {}): Adoptly {
	return new Adoptly(config);
}
