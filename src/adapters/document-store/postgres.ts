/**
 * Postgres-backed document store adapter.
 *
 * Stores every collection in a single table with a JSONB `data` column.
 * Creates the table and index if they do not exist.
 */
import type { PgLikeClient } from "../../types/adapters";
import type {
	DocumentId,
	DocumentStoreAdapter,
	StoredDocument,
} from "../../types/common";
import type { Predicate } from "../../types/query";
import {
	assertCollectionName,
	isRecord,
	parseDocumentColumn,
	toRows,
	withTimestamps,
} from "../../utils/document";
import { generateObjectId, isObjectIdHex } from "../../utils/id";
import { assertFieldName, escapeLike } from "../../utils/predicate";

/**
 * Compile a predicate to a clause using `$n` placeholders. Parameters are
 * appended to `params`, so numbering continues after any already present.
 */
export function compilePostgresPredicate(
	predicate: Predicate,
	params: unknown[],
): string {
	switch (predicate.kind) {
		case "eq": {
			params.push(JSON.stringify(predicate.value));
			return `data->'${assertFieldName(predicate.field)}' = $${params.length}::jsonb`;
		}
		case "containsIgnoreCase": {
			params.push(`%${escapeLike(predicate.value)}%`);
			return `data->>'${assertFieldName(predicate.field)}' ILIKE $${params.length} ESCAPE '\\'`;
		}
		case "and":
		case "or": {
			if (predicate.clauses.length === 0) {
				return predicate.kind === "and" ? "TRUE" : "FALSE";
			}
			const joiner = predicate.kind === "and" ? " AND " : " OR ";
			return `(${predicate.clauses
				.map((c) => compilePostgresPredicate(c, params))
				.join(joiner)})`;
		}
	}
}

export class PostgresDocumentStore implements DocumentStoreAdapter {
	private readonly tableName: string;
	readonly name: string;
	readonly ready?: Promise<void>;

	constructor(
		private readonly client: PgLikeClient,
		options?: { tableName?: string; name?: string },
	) {
		this.tableName = options?.tableName ?? "adoptly_documents";
		this.name = options?.name ?? "postgres";
		this.ready = this.initialize();
	}

	private async initialize(): Promise<void> {
		await this.client.query("SELECT 1");

		await this.client.query(
			`CREATE TABLE IF NOT EXISTS ${this.tableName} (
        id TEXT PRIMARY KEY,
        collection TEXT NOT NULL,
        data JSONB NOT NULL
      )`,
		);
		await this.client.query(
			`CREATE INDEX IF NOT EXISTS idx_${this.tableName}_collection ON ${this.tableName}(collection)`,
		);
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
		await this.client.query(
			`INSERT INTO ${this.tableName} (id, collection, data) VALUES ($1, $2, $3::jsonb)`,
			[id, assertCollectionName(collection), JSON.stringify(withTimestamps(doc))],
		);
		return id;
	}

	async findById(
		collection: string,
		id: DocumentId,
	): Promise<StoredDocument | null> {
		await this.ready;
		const rows = await this.select(
			`SELECT id, data FROM ${this.tableName} WHERE collection = $1 AND id = $2 LIMIT 1`,
			[assertCollectionName(collection), id.toLowerCase()],
		);
		const row = rows[0];
		if (!row) return null;
		return this.rowToDocument(row);
	}

	async findMany(
		collection: string,
		filter: Predicate,
	): Promise<StoredDocument[]> {
		await this.ready;
		const params: unknown[] = [assertCollectionName(collection)];
		const where = compilePostgresPredicate(filter, params);
		const rows = await this.select(
			`SELECT id, data FROM ${this.tableName} WHERE collection = $1 AND ${where}`,
			params,
		);
		return rows.map((r) => this.rowToDocument(r));
	}

	async count(collection: string, filter?: Predicate): Promise<number> {
		await this.ready;
		const params: unknown[] = [assertCollectionName(collection)];
		const where = filter ? ` AND ${compilePostgresPredicate(filter, params)}` : "";
		const rows = await this.select(
			`SELECT COUNT(*) AS count FROM ${this.tableName} WHERE collection = $1${where}`,
			params,
		);
		// COUNT(*) is a bigint, which pg returns as a string.
		return Number(rows[0]?.count ?? 0);
	}

	async listCollections(): Promise<string[]> {
		await this.ready;
		const rows = await this.select(
			`SELECT DISTINCT collection FROM ${this.tableName} ORDER BY collection`,
		);
		return rows.map((r) => String(r.collection));
	}

	async ping(): Promise<void> {
		await this.client.query("SELECT 1");
	}

	private async select(
		text: string,
		values?: unknown[],
	): Promise<Array<Record<string, unknown>>> {
		const res = await this.client.query(text, values);
		return isRecord(res) ? toRows(res.rows) : [];
	}

	private rowToDocument(row: Record<string, unknown>): StoredDocument {
		return { id: String(row.id), data: parseDocumentColumn(row.data) };
	}
}
