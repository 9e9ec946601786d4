/**
 * Random byte source used for identifier generation.
 *
 * Defaults to Web Crypto (`globalThis.crypto`, available in Node 20 and edge
 * runtimes) and can be swapped for a custom source, e.g. a seeded generator
 * in tests.
 */

/** Anything exposing Web Crypto's `getRandomValues`. */
export interface CryptoLike {
	getRandomValues(array: Uint8Array): Uint8Array;
}

const defaultProvider: CryptoLike = {
	getRandomValues: (array: Uint8Array) => {
		if (typeof globalThis.crypto?.getRandomValues === "function") {
			globalThis.crypto.getRandomValues(array);
			return array;
		}
		throw new Error(
			"Secure random number generation is not available. Configure a crypto provider or ensure Web Crypto is available.",
		);
	},
};

let provider: CryptoLike = defaultProvider;

/** Replace the random byte source (pass nothing to restore the default). */
export function configureCryptoProvider(custom?: CryptoLike): void {
	provider = custom ?? defaultProvider;
}

/** Fill a fresh array of `size` bytes from the configured provider. */
export function randomBytes(size: number): Uint8Array {
	if (size <= 0) return new Uint8Array(0);
	return provider.getRandomValues(new Uint8Array(size));
}

/** Lowercase hex encoding of a byte array. */
export function toHex(bytes: Uint8Array): string {
	return Array.from(bytes, (n) => n.toString(16).padStart(2, "0")).join("");
}
