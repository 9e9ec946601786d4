import Database from "better-sqlite3";
import { describe, expect, it } from "vitest";
import {
	and,
	buildPetPredicate,
	compileSqlitePredicate,
	eq,
	or,
	type SqliteLikeClient,
	SqliteDocumentStore,
} from "../../../../src";

type Call = { sql: string; method: "run" | "get" | "all"; args: unknown[] };

function makeDb(
	respond: (call: Call) => unknown = () => undefined,
	withExec = true,
) {
	const calls: Call[] = [];
	const execs: string[] = [];
	const db: SqliteLikeClient = {
		exec: withExec
			? (sql: string) => {
					execs.push(sql);
				}
			: undefined,
		prepare(sql: string) {
			const record = (method: Call["method"], args: unknown[]) => {
				const call = { sql, method, args };
				calls.push(call);
				return respond(call);
			};
			return {
				run: (...args: unknown[]) => record("run", args),
				get: (...args: unknown[]) => record("get", args),
				all: (...args: unknown[]) => {
					const rows = record("all", args);
					return Array.isArray(rows) ? rows : [];
				},
			};
		},
	};
	return { db, calls, execs };
}

describe("compileSqlitePredicate", () => {
	it("compiles equality with booleans bound as integers and null as IS NULL", () => {
		expect(compileSqlitePredicate(eq("is_adopted", false))).toEqual({
			sql: "json_extract(data, '$.is_adopted') = ?",
			params: [0],
		});
		expect(compileSqlitePredicate(eq("age_years", 3))).toEqual({
			sql: "json_extract(data, '$.age_years') = ?",
			params: [3],
		});
		expect(compileSqlitePredicate(eq("location", null))).toEqual({
			sql: "json_extract(data, '$.location') IS NULL",
			params: [],
		});
	});

	it("compiles a pet search with escaped, lowercased LIKE patterns", () => {
		const where = compileSqlitePredicate(
			buildPetPredicate({ species: "Dog", q: "50%_Off" }),
		);
		const like = "lower(json_extract(data, '$.%s')) LIKE ? ESCAPE '\\'";
		expect(where.sql).toBe(
			`(json_extract(data, '$.is_adopted') = ? AND json_extract(data, '$.species') = ? AND (${[
				"name",
				"description",
				"location",
			]
				.map((f) => like.replace("%s", f))
				.join(" OR ")}))`,
		);
		expect(where.params).toEqual([
			0,
			"Dog",
			"%50\\%\\_off%",
			"%50\\%\\_off%",
			"%50\\%\\_off%",
		]);
	});

	it("compiles empty groups to constant clauses", () => {
		expect(compileSqlitePredicate(and())).toEqual({ sql: "1 = 1", params: [] });
		expect(compileSqlitePredicate(or())).toEqual({ sql: "1 = 0", params: [] });
	});

	it("rejects unsafe field names", () => {
		expect(() => compileSqlitePredicate(eq("x') OR 1=1 --", 1))).toThrow(
			"Invalid document field name",
		);
	});
});

describe("SqliteDocumentStore (fake client)", () => {
	it("probes and creates the table with exec when available", async () => {
		const { db, calls, execs } = makeDb();
		const store = new SqliteDocumentStore(db);
		await store.ready;
		expect(calls[0]).toEqual({
			sql: "PRAGMA schema_version",
			method: "get",
			args: [],
		});
		expect(execs).toHaveLength(1);
		expect(execs[0]).toContain("CREATE TABLE IF NOT EXISTS adoptly_documents");
		expect(execs[0]).toContain(
			"CREATE INDEX IF NOT EXISTS idx_adoptly_documents_collection ON adoptly_documents(collection)",
		);
	});

	it("falls back to prepare().run() per statement without exec", async () => {
		const { db, calls } = makeDb(undefined, false);
		const store = new SqliteDocumentStore(db, { tableName: "docs" });
		await store.ready;
		const runs = calls.filter((c) => c.method === "run").map((c) => c.sql);
		expect(runs).toHaveLength(2);
		expect(runs[0]).toContain("CREATE TABLE IF NOT EXISTS docs");
		expect(runs[1]).toContain("CREATE INDEX IF NOT EXISTS idx_docs_collection");
	});

	it("insertOne writes the id, collection and JSON document", async () => {
		const { db, calls } = makeDb();
		const store = new SqliteDocumentStore(db);
		const id = await store.insertOne("pet", { name: "Mocha" });
		const insert = calls.find((c) => c.sql.startsWith("INSERT"));
		expect(insert?.sql).toBe(
			"INSERT INTO adoptly_documents (id, collection, data) VALUES (?, ?, ?)",
		);
		expect(insert?.args[0]).toBe(id);
		expect(insert?.args[1]).toBe("pet");
		const data = JSON.parse(String(insert?.args[2]));
		expect(data.name).toBe("Mocha");
		expect(typeof data.created_at).toBe("string");
	});

	it("findById lowercases the id and parses the row", async () => {
		const { db, calls } = makeDb((call) =>
			call.sql.startsWith("SELECT id, data")
				? { id: "0123456789abcdef01234567", data: '{"name":"Miso"}' }
				: undefined,
		);
		const store = new SqliteDocumentStore(db);
		const found = await store.findById("pet", "0123456789ABCDEF01234567");
		expect(found).toEqual({
			id: "0123456789abcdef01234567",
			data: { name: "Miso" },
		});
		const select = calls.find((c) => c.sql.startsWith("SELECT id, data"));
		expect(select?.sql).toBe(
			"SELECT id, data FROM adoptly_documents WHERE collection = ? AND id = ?",
		);
		expect(select?.args).toEqual(["pet", "0123456789abcdef01234567"]);
	});

	it("findById returns null when no row matches", async () => {
		const { db } = makeDb();
		const store = new SqliteDocumentStore(db);
		expect(await store.findById("pet", "0123456789abcdef01234567")).toBeNull();
	});

	it("findMany and count pass compiled clauses after the collection", async () => {
		const { db, calls } = makeDb((call) => {
			if (call.sql.startsWith("SELECT COUNT")) return { count: 2 };
			if (call.method === "all") {
				return [{ id: "aaaaaaaaaaaaaaaaaaaaaaaa", data: '{"name":"Taro"}' }];
			}
			return undefined;
		});
		const store = new SqliteDocumentStore(db);

		const docs = await store.findMany("pet", eq("species", "Rabbit"));
		expect(docs).toEqual([
			{ id: "aaaaaaaaaaaaaaaaaaaaaaaa", data: { name: "Taro" } },
		]);
		const select = calls.find((c) => c.method === "all");
		expect(select?.sql).toBe(
			"SELECT id, data FROM adoptly_documents WHERE collection = ? AND json_extract(data, '$.species') = ?",
		);
		expect(select?.args).toEqual(["pet", "Rabbit"]);

		expect(await store.count("pet")).toBe(2);
		const count = calls.find((c) => c.sql.startsWith("SELECT COUNT"));
		expect(count?.sql).toBe(
			"SELECT COUNT(*) AS count FROM adoptly_documents WHERE collection = ?",
		);
		expect(count?.args).toEqual(["pet"]);
	});

	it("propagates a failed probe through ready and operations", async () => {
		const db: SqliteLikeClient = {
			prepare() {
				throw new Error("database is locked");
			},
		};
		const store = new SqliteDocumentStore(db);
		await expect(store.ready).rejects.toThrow("database is locked");
		await expect(store.count("pet")).rejects.toThrow("database is locked");
	});
});

describe("SqliteDocumentStore (better-sqlite3 in memory)", () => {
	function openStore() {
		const db = new Database(":memory:");
		const client: SqliteLikeClient = {
			prepare: (sql) => db.prepare<unknown[]>(sql),
			exec: (sql) => db.exec(sql),
		};
		return new SqliteDocumentStore(client, { name: "shelter" });
	}

	it("round-trips documents and evaluates pet searches", async () => {
		const store = openStore();
		await store.ready;
		const mocha = await store.insertOne("pet", {
			name: "Mocha",
			species: "Dog",
			description: "Snuggly pup",
			location: "Sunnyvale Shelter",
			is_adopted: false,
		});
		await store.insertOne("pet", {
			name: "Miso",
			species: "Cat",
			description: "Calm lap cat",
			location: "Palo Alto Rescue",
			is_adopted: false,
		});
		await store.insertOne("pet", {
			name: "Biscuit",
			species: "Dog",
			description: "Adopted already",
			location: "Sunnyvale Shelter",
			is_adopted: true,
		});

		expect((await store.findById("pet", mocha))?.data.name).toBe("Mocha");
		expect(await store.count("pet")).toBe(3);

		const dogs = await store.findMany("pet", buildPetPredicate({ species: "Dog" }));
		expect(dogs.map((d) => d.data.name)).toEqual(["Mocha"]);

		const calm = await store.findMany("pet", buildPetPredicate({ q: "CALM" }));
		expect(calm.map((d) => d.data.name)).toEqual(["Miso"]);

		const literal = await store.findMany("pet", buildPetPredicate({ q: "%" }));
		expect(literal).toEqual([]);

		await store.insertOne("adoptionrequest", { pet_id: mocha });
		expect(await store.listCollections()).toEqual(["adoptionrequest", "pet"]);
		await expect(store.ping()).resolves.toBeUndefined();
	});
});
