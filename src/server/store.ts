/**
 * Opens the document store named by `DATABASE_URL`.
 *
 * Supported schemes:
 * - `memory:` - in-process store, lost on restart
 * - `sqlite:<path>` - better-sqlite3 database file (`sqlite::memory:` works)
 * - `postgres://` / `postgresql://` - pg connection pool
 * - `mongodb://` / `mongodb+srv://` - MongoDB, database from `DATABASE_NAME`
 *
 * Anything else, or a connection failure, yields an unavailable handle whose
 * reason ends up in diagnostics.
 */
import Database from "better-sqlite3";
import { MongoClient } from "mongodb";
import pg from "pg";
import { MemoryDocumentStore } from "../adapters/document-store/memory";
import { MongoDocumentStore } from "../adapters/document-store/mongodb";
import { PostgresDocumentStore } from "../adapters/document-store/postgres";
import { SqliteDocumentStore } from "../adapters/document-store/sqlite";
import { availableStore, unavailableStore } from "../core/core-helpers";
import type { PgLikeClient, SqliteLikeClient } from "../types/adapters";
import { ErrorCodes, type StoreHandle } from "../types/common";
import { toError } from "../utils/error";
import type { ServerEnv } from "./env";

export type StoreKind = "memory" | "sqlite" | "postgres" | "mongodb";

/** Adapter kind for a connection string, or null when unsupported. */
export function storeKindFor(url: string): StoreKind | null {
	if (url === "memory:" || url === "memory://") return "memory";
	if (url.startsWith("sqlite:")) return "sqlite";
	if (url.startsWith("postgres://") || url.startsWith("postgresql://")) {
		return "postgres";
	}
	if (url.startsWith("mongodb://") || url.startsWith("mongodb+srv://")) {
		return "mongodb";
	}
	return null;
}

export async function openDocumentStore(env: ServerEnv): Promise<StoreHandle> {
	const url = env.databaseUrl;
	if (!url) return unavailableStore("DATABASE_URL is not set");

	const kind = storeKindFor(url);
	// Set once a driver handle exists, so a failed probe can release it.
	let release: (() => unknown) | undefined;
	try {
		switch (kind) {
			case "memory":
				return availableStore(
					new MemoryDocumentStore({ name: env.databaseName }),
				);
			case "sqlite": {
				const file = url.slice("sqlite:".length) || ":memory:";
				const db = new Database(file);
				release = () => db.close();
				const client: SqliteLikeClient = {
					prepare: (sql) => db.prepare<unknown[]>(sql),
					exec: (sql) => db.exec(sql),
				};
				const store = new SqliteDocumentStore(client, {
					name: env.databaseName,
				});
				await store.ready;
				return availableStore(store);
			}
			case "postgres": {
				const pool = new pg.Pool({ connectionString: url });
				release = () => pool.end();
				const client: PgLikeClient = {
					query: (text, values) => pool.query(text, values),
				};
				const store = new PostgresDocumentStore(client, {
					name: env.databaseName,
				});
				await store.ready;
				return availableStore(store);
			}
			case "mongodb": {
				if (!env.databaseName) {
					return unavailableStore("DATABASE_NAME is not set");
				}
				const client = new MongoClient(url);
				release = () => client.close();
				await client.connect();
				return availableStore(
					new MongoDocumentStore(client.db(env.databaseName)),
				);
			}
			case null:
				return unavailableStore("Unsupported DATABASE_URL scheme");
		}
	} catch (err) {
		const error = toError(err, ErrorCodes.STORE_NOT_CONFIGURED, {
			op: "openDocumentStore",
			kind,
		});
		console.error("Error opening document store", error);
		if (release) await closeQuietly(release, kind);
		return unavailableStore(error.message);
	}
}

async function closeQuietly(
	release: () => unknown,
	kind: StoreKind | null,
): Promise<void> {
	try {
		await release();
	} catch (err) {
		console.error(
			"Error closing document store",
			toError(err, ErrorCodes.STORE_NOT_CONFIGURED, {
				op: "openDocumentStore",
				kind,
			}),
		);
	}
}
