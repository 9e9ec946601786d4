import { describe, expect, it } from "vitest";
import {
	adoptly,
	availableStore,
	buildPetPredicate,
	ErrorCodes,
	MemoryAnalytics,
	MemoryDocumentStore,
	PetCatalog,
} from "../../../src";

async function seededCatalog() {
	const store = new MemoryDocumentStore();
	const service = adoptly({
		store: availableStore(store),
		adapters: { analytics: new MemoryAnalytics() },
	});
	await service.seeder.seedIfEmpty();
	return { store, service };
}

describe("buildPetPredicate", () => {
	it("always excludes adopted pets", () => {
		expect(buildPetPredicate()).toEqual({
			kind: "and",
			clauses: [{ kind: "eq", field: "is_adopted", value: false }],
		});
	});

	it("treats empty strings and null as absent", () => {
		expect(buildPetPredicate({ species: "", size: null, q: "" })).toEqual(
			buildPetPredicate(),
		);
	});

	it("adds exact matches and a free-text or-group", () => {
		expect(buildPetPredicate({ species: "Dog", size: "Small", q: "pup" })).toEqual({
			kind: "and",
			clauses: [
				{ kind: "eq", field: "is_adopted", value: false },
				{ kind: "eq", field: "species", value: "Dog" },
				{ kind: "eq", field: "size", value: "Small" },
				{
					kind: "or",
					clauses: [
						{ kind: "containsIgnoreCase", field: "name", value: "pup" },
						{ kind: "containsIgnoreCase", field: "description", value: "pup" },
						{ kind: "containsIgnoreCase", field: "location", value: "pup" },
					],
				},
			],
		});
	});
});

describe("PetCatalog.listPets", () => {
	it("returns an empty list for an empty store", async () => {
		const catalog = new PetCatalog(availableStore(new MemoryDocumentStore()));
		expect(await catalog.listPets()).toEqual({ result: [] });
		expect(await catalog.listPets({ species: "Dog", q: "pup" })).toEqual({
			result: [],
		});
	});

	it("lists every adoptable pet without filters", async () => {
		const { service } = await seededCatalog();
		const res = await service.catalog.listPets();
		expect(res.error).toBeUndefined();
		expect(res.result?.map((p) => p.name)).toEqual(["Mocha", "Miso", "Taro"]);
	});

	it("filters by species and maps to the public view", async () => {
		const { service } = await seededCatalog();
		const res = await service.catalog.listPets({ species: "Dog" });
		expect(res.result).toHaveLength(1);
		const mocha = res.result?.[0];
		expect(mocha).toEqual({
			id: mocha?.id,
			name: "Mocha",
			species: "Dog",
			age_years: 1.5,
			gender: "Female",
			size: "Small",
			description: "Sweet, snuggly pup who loves belly rubs.",
			photo_url:
				"https://images.unsplash.com/photo-1543466835-00a7907e9de1?w=900&q=80&auto=format&fit=crop",
			location: "Sunnyvale Shelter",
			is_adopted: false,
		});
		expect(mocha?.id).toMatch(/^[0-9a-f]{24}$/);
	});

	it("matches q case-insensitively against name, description and location", async () => {
		const { service } = await seededCatalog();
		const names = async (q: string) =>
			(await service.catalog.listPets({ q })).result?.map((p) => p.name);
		expect(await names("calm")).toEqual(["Miso"]);
		expect(await names("SUNNYVALE")).toEqual(["Mocha"]);
		expect(await names("tar")).toEqual(["Taro"]);
		expect(await names("loves")).toEqual(["Mocha", "Taro"]);
		expect(await names("giraffe")).toEqual([]);
	});

	it("matches regex metacharacters literally", async () => {
		const { service } = await seededCatalog();
		const res = await service.catalog.listPets({ q: ".*" });
		expect(res.result).toEqual([]);
	});

	it("combines filters with and", async () => {
		const { service } = await seededCatalog();
		const res = await service.catalog.listPets({ species: "Cat", q: "greens" });
		expect(res.result).toEqual([]);
		const small = await service.catalog.listPets({ size: "Small", q: "bun" });
		expect(small.result?.map((p) => p.name)).toEqual(["Taro"]);
	});

	it("excludes adopted pets", async () => {
		const { store, service } = await seededCatalog();
		await store.insertOne("pet", {
			name: "Biscuit",
			species: "Dog",
			age_years: 4,
			gender: "Male",
			size: "Large",
			is_adopted: true,
		});
		const res = await service.catalog.listPets({ species: "Dog" });
		expect(res.result?.map((p) => p.name)).toEqual(["Mocha"]);
	});

	it("defaults optional text fields to null", async () => {
		const store = new MemoryDocumentStore();
		const id = await store.insertOne("pet", {
			name: "Pip",
			species: "Bird",
			age_years: 1,
			gender: "Male",
			size: "Small",
			is_adopted: false,
		});
		const res = await new PetCatalog(availableStore(store)).listPets();
		expect(res.result).toEqual([
			{
				id,
				name: "Pip",
				species: "Bird",
				age_years: 1,
				gender: "Male",
				size: "Small",
				description: null,
				photo_url: null,
				location: null,
				is_adopted: false,
			},
		]);
	});

	it("fails with PET_RECORD_INVALID for a pet missing required fields", async () => {
		const store = new MemoryDocumentStore();
		const id = await store.insertOne("pet", { name: "Ghost", is_adopted: false });
		const res = await new PetCatalog(availableStore(store)).listPets();
		expect(res.result).toBeUndefined();
		expect(res.error?.code).toBe(ErrorCodes.PET_RECORD_INVALID);
		expect(res.error?.message).toBe(`Pet ${id} is not a valid pet record`);
		expect(res.error?.meta?.issues).toContain("species: Required");
	});

	it("reports STORE_READ_FAILED when the store throws", async () => {
		const store = new MemoryDocumentStore();
		store.findMany = async () => {
			throw new Error("socket closed");
		};
		const res = await new PetCatalog(availableStore(store)).listPets();
		expect(res.error).toMatchObject({
			code: ErrorCodes.STORE_READ_FAILED,
			message: "socket closed",
			meta: { op: "listPets" },
		});
	});

	it("reports STORE_NOT_CONFIGURED without a store", async () => {
		const res = await adoptly().catalog.listPets({ species: "Dog" });
		expect(res.error).toEqual({
			code: ErrorCodes.STORE_NOT_CONFIGURED,
			message: "Database not configured",
			meta: { op: "listPets", reason: "Database not configured" },
		});
	});
});
