/**
 * MongoDB-backed document store adapter.
 *
 * Wraps a driver `Db`. Collections map one to one, `_id` is an `ObjectId`
 * exposed as its hex string, and predicates compile to filter documents
 * with escaped case-insensitive regexes.
 */
import { type Db, type Document, type Filter, ObjectId } from "mongodb";
import type {
	DocumentId,
	DocumentStoreAdapter,
	StoredDocument,
} from "../../types/common";
import type { Predicate } from "../../types/query";
import { assertCollectionName, withTimestamps } from "../../utils/document";
import { isObjectIdHex } from "../../utils/id";
import { escapeRegExp } from "../../utils/predicate";

/** Compile a predicate to a MongoDB filter document. */
export function compileMongoPredicate(predicate: Predicate): Filter<Document> {
	switch (predicate.kind) {
		case "eq":
			return { [predicate.field]: predicate.value };
		case "containsIgnoreCase":
			return {
				[predicate.field]: {
					$regex: escapeRegExp(predicate.value),
					$options: "i",
				},
			};
		case "and":
			if (predicate.clauses.length === 0) return {};
			if (predicate.clauses.length === 1) {
				return compileMongoPredicate(predicate.clauses[0]);
			}
			return { $and: predicate.clauses.map(compileMongoPredicate) };
		case "or":
			// $or rejects an empty array; match nothing instead.
			if (predicate.clauses.length === 0) return { _id: { $exists: false } };
			return { $or: predicate.clauses.map(compileMongoPredicate) };
	}
}

export class MongoDocumentStore implements DocumentStoreAdapter {
	readonly ready?: Promise<void>;

	constructor(private readonly db: Db) {}

	get name(): string {
		return this.db.databaseName;
	}

	isValidId(raw: string): boolean {
		return isObjectIdHex(raw);
	}

	async insertOne(
		collection: string,
		doc: Record<string, unknown>,
	): Promise<DocumentId> {
		const res = await this.db
			.collection(assertCollectionName(collection))
			.insertOne(withTimestamps(doc));
		return String(res.insertedId);
	}

	async findById(
		collection: string,
		id: DocumentId,
	): Promise<StoredDocument | null> {
		if (!isObjectIdHex(id)) return null;
		const doc = await this.db
			.collection(assertCollectionName(collection))
			.findOne({ _id: new ObjectId(id) });
		return doc ? this.toStoredDocument(doc) : null;
	}

	async findMany(
		collection: string,
		filter: Predicate,
	): Promise<StoredDocument[]> {
		const docs = await this.db
			.collection(assertCollectionName(collection))
			.find(compileMongoPredicate(filter))
			.toArray();
		return docs.map((d) => this.toStoredDocument(d));
	}

	async count(collection: string, filter?: Predicate): Promise<number> {
		return this.db
			.collection(assertCollectionName(collection))
			.countDocuments(filter ? compileMongoPredicate(filter) : {});
	}

	async listCollections(): Promise<string[]> {
		const infos = await this.db
			.listCollections({}, { nameOnly: true })
			.toArray();
		return infos.map((c) => c.name);
	}

	async ping(): Promise<void> {
		await this.db.command({ ping: 1 });
	}

	private toStoredDocument(doc: Document): StoredDocument {
		const { _id, ...data } = doc;
		return { id: String(_id), data };
	}
}
