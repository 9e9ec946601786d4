/**
 * Minimal SQLite client shape used by adapters. Any client that exposes a
 * compatible `prepare().run()/get()/all()` API can be used (e.g., `better-sqlite3`,
 * or custom wrappers).
 */
export interface SqliteLikeClient {
	prepare: (sql: string) => {
		run: (...args: unknown[]) => unknown;
		get: (...args: unknown[]) => unknown;
		all: (...args: unknown[]) => unknown[];
	};
	exec?: (sql: string) => unknown;
}

/**
 * Minimal Postgres client shape used by adapters. Any client that exposes a
 * compatible `query(text, values?)` API can be used (e.g., `pg`, `postgres.js`,
 * or custom wrappers).
 */
export type PgLikeClient = {
	query: (
		text: string,
		values?: unknown[],
	) => Promise<
		{ rows: Array<Record<string, unknown>>; rowCount?: number | null } | unknown
	>;
};
