/** Server settings read from the process environment. */

export const DEFAULT_PORT = 8000;

export interface ServerEnv {
	/** Store connection string; the scheme selects the adapter. */
	databaseUrl?: string;
	/** Database name used by stores that have one. */
	databaseName?: string;
	port: number;
}

function nonEmpty(value: string | undefined): string | undefined {
	const trimmed = value?.trim();
	return trimmed ? trimmed : undefined;
}

/**
 * Read `DATABASE_URL`, `DATABASE_NAME` and `PORT`. Blank values count as
 * unset; a `PORT` that is not a valid port number falls back to the default.
 */
export function readServerEnv(
	env: Record<string, string | undefined> = process.env,
): ServerEnv {
	const rawPort = nonEmpty(env.PORT);
	const port = rawPort ? Number(rawPort) : Number.NaN;
	return {
		databaseUrl: nonEmpty(env.DATABASE_URL),
		databaseName: nonEmpty(env.DATABASE_NAME),
		port:
			Number.isInteger(port) && port > 0 && port < 65536 ? port : DEFAULT_PORT,
	};
}
