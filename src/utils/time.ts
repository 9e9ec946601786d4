/** Time helpers used across the project. */

/** Current epoch milliseconds. */
export function now(): number {
	return Date.now();
}

/** Current time as an ISO-8601 string, used for document timestamps. */
export function isoNow(): string {
	return new Date(now()).toISOString();
}
