/**
 * SQLite-backed document store adapter.
 *
 * Targets a `better-sqlite3`-like API and keeps every collection in a single
 * table, one JSON text document per row. Filters compile to `json_extract`
 * clauses.
 */
import type { SqliteLikeClient } from "../../types/adapters";
import type {
	DocumentId,
	DocumentStoreAdapter,
	StoredDocument,
} from "../../types/common";
import type { Predicate, Scalar } from "../../types/query";
import {
	assertCollectionName,
	isRecord,
	parseDocumentColumn,
	toRows,
	withTimestamps,
} from "../../utils/document";
import { generateObjectId, isObjectIdHex } from "../../utils/id";
import { assertFieldName, escapeLike } from "../../utils/predicate";

/** A compiled WHERE fragment with its positional parameters. */
export type SqliteClause = { sql: string; params: unknown[] };

/** SQLite cannot bind booleans; JSON booleans extract as 1/0. */
function bindable(value: Exclude<Scalar, null>): string | number {
	return typeof value === "boolean" ? (value ? 1 : 0) : value;
}

/** Compile a predicate to a `?`-parameterized clause over the `data` column. */
export function compileSqlitePredicate(predicate: Predicate): SqliteClause {
	switch (predicate.kind) {
		case "eq": {
			const path = `json_extract(data, '$.${assertFieldName(predicate.field)}')`;
			if (predicate.value === null) return { sql: `${path} IS NULL`, params: [] };
			return { sql: `${path} = ?`, params: [bindable(predicate.value)] };
		}
		case "containsIgnoreCase": {
			const path = `json_extract(data, '$.${assertFieldName(predicate.field)}')`;
			return {
				sql: `lower(${path}) LIKE ? ESCAPE '\\'`,
				params: [`%${escapeLike(predicate.value.toLowerCase())}%`],
			};
		}
		case "and":
		case "or": {
			if (predicate.clauses.length === 0) {
				return { sql: predicate.kind === "and" ? "1 = 1" : "1 = 0", params: [] };
			}
			const parts = predicate.clauses.map(compileSqlitePredicate);
			const joiner = predicate.kind === "and" ? " AND " : " OR ";
			return {
				sql: `(${parts.map((p) => p.sql).join(joiner)})`,
				params: parts.flatMap((p) => p.params),
			};
		}
	}
}

export class SqliteDocumentStore implements DocumentStoreAdapter {
	private readonly tableName: string;
	readonly name: string;
	readonly ready?: Promise<void>;

	constructor(
		private readonly db: SqliteLikeClient,
		options?: { tableName?: string; name?: string },
	) {
		this.tableName = options?.tableName ?? "adoptly_documents";
		this.name = options?.name ?? "sqlite";
		this.ready = Promise.resolve().then(() => {
			this.connectivityProbe();
			this.initialize();
		});
	}

	private initialize(): void {
		const statements = [
			`CREATE TABLE IF NOT EXISTS ${this.tableName} (
				id TEXT PRIMARY KEY,
				collection TEXT NOT NULL,
				data TEXT NOT NULL
			)`,
			`CREATE INDEX IF NOT EXISTS idx_${this.tableName}_collection ON ${this.tableName}(collection)`,
		];

		if (this.db.exec) {
			this.db.exec(statements.join("; "));
		} else {
			for (const stmt of statements) {
				this.db.prepare(stmt).run();
			}
		}
	}

	private connectivityProbe(): void {
		this.db.prepare("PRAGMA schema_version").get();
	}

	isValidId(raw: string): boolean {
		return isObjectIdHex(raw);
	}

	async insertOne(
		collection: string,
		doc: Record<string, unknown>,
	): Promise<DocumentId> {
		await this.ready;
		const id = generateObjectId();
		this.db
			.prepare(
				`INSERT INTO ${this.tableName} (id, collection, data) VALUES (?, ?, ?)`,
			)
			.run(id, assertCollectionName(collection), JSON.stringify(withTimestamps(doc)));
		return id;
	}

	async findById(
		collection: string,
		id: DocumentId,
	): Promise<StoredDocument | null> {
		await this.ready;
		const row = this.db
			.prepare(
				`SELECT id, data FROM ${this.tableName} WHERE collection = ? AND id = ?`,
			)
			.get(assertCollectionName(collection), id.toLowerCase());
		if (!isRecord(row)) return null;
		return this.rowToDocument(row);
	}

	async findMany(
		collection: string,
		filter: Predicate,
	): Promise<StoredDocument[]> {
		await this.ready;
		const where = compileSqlitePredicate(filter);
		const rows = toRows(
			this.db
				.prepare(
					`SELECT id, data FROM ${this.tableName} WHERE collection = ? AND ${where.sql}`,
				)
				.all(assertCollectionName(collection), ...where.params),
		);
		return rows.map((r) => this.rowToDocument(r));
	}

	async count(collection: string, filter?: Predicate): Promise<number> {
		await this.ready;
		const where = filter ? compileSqlitePredicate(filter) : null;
		const row = this.db
			.prepare(
				`SELECT COUNT(*) AS count FROM ${this.tableName} WHERE collection = ?${
					where ? ` AND ${where.sql}` : ""
				}`,
			)
			.get(assertCollectionName(collection), ...(where?.params ?? []));
		return isRecord(row) ? Number(row.count ?? 0) : 0;
	}

	async listCollections(): Promise<string[]> {
		await this.ready;
		const rows = toRows(
			this.db
				.prepare(
					`SELECT DISTINCT collection FROM ${this.tableName} ORDER BY collection`,
				)
				.all(),
		);
		return rows.map((r) => String(r.collection));
	}

	async ping(): Promise<void> {
		this.connectivityProbe();
	}

	private rowToDocument(row: Record<string, unknown>): StoredDocument {
		return { id: String(row.id), data: parseDocumentColumn(row.data) };
	}
}
