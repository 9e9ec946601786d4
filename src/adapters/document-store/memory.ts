/**
 * In‑memory document store adapter.
 *
 * Intended for tests, examples, and ephemeral environments. Stores documents
 * in one `Map` per collection, keyed by id, preserving insertion order.
 */
import type {
	DocumentId,
	DocumentStoreAdapter,
	StoredDocument,
} from "../../types/common";
import type { Predicate } from "../../types/query";
import { withTimestamps } from "../../utils/document";
import { generateObjectId, isObjectIdHex } from "../../utils/id";
import { MATCH_ALL, matchesPredicate } from "../../utils/predicate";

export class MemoryDocumentStore implements DocumentStoreAdapter {
	readonly ready?: Promise<void>;
	readonly name: string;
	private readonly collections = new Map<
		string,
		Map<DocumentId, Record<string, unknown>>
	>();

	constructor(options?: { name?: string }) {
		this.name = options?.name ?? "memory";
	}

	isValidId(raw: string): boolean {
		return isObjectIdHex(raw);
	}

	async insertOne(
		collection: string,
		doc: Record<string, unknown>,
	): Promise<DocumentId> {
		const id = generateObjectId();
		this.collectionFor(collection).set(id, withTimestamps(doc));
		return id;
	}

	async findById(
		collection: string,
		id: DocumentId,
	): Promise<StoredDocument | null> {
		const data = this.collections.get(collection)?.get(id.toLowerCase());
		return data ? { id: id.toLowerCase(), data: { ...data } } : null;
	}

	async findMany(
		collection: string,
		filter: Predicate,
	): Promise<StoredDocument[]> {
		const out: StoredDocument[] = [];
		for (const [id, data] of this.collections.get(collection) ?? []) {
			if (matchesPredicate(data, filter)) out.push({ id, data: { ...data } });
		}
		return out;
	}

	async count(collection: string, filter?: Predicate): Promise<number> {
		return (await this.findMany(collection, filter ?? MATCH_ALL)).length;
	}

	/** Collections that hold at least one document, in creation order. */
	async listCollections(): Promise<string[]> {
		return Array.from(this.collections.entries())
			.filter(([, docs]) => docs.size > 0)
			.map(([name]) => name);
	}

	async ping(): Promise<void> {}

	private collectionFor(
		collection: string,
	): Map<DocumentId, Record<string, unknown>> {
		let docs = this.collections.get(collection);
		if (!docs) {
			docs = new Map();
			this.collections.set(collection, docs);
		}
		return docs;
	}
}
