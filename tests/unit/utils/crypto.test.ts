import { afterEach, describe, expect, it } from "vitest";
import {
	configureCryptoProvider,
	randomBytes,
	toHex,
} from "../../../src/utils/crypto";

describe("crypto utils", () => {
	afterEach(() => {
		configureCryptoProvider();
	});

	it("randomBytes uses Web Crypto by default", () => {
		const bytes = randomBytes(16);
		expect(bytes).toBeInstanceOf(Uint8Array);
		expect(bytes.length).toBe(16);
	});

	it("randomBytes returns an empty array for non-positive sizes", () => {
		expect(randomBytes(0).length).toBe(0);
		expect(randomBytes(-3).length).toBe(0);
	});

	it("uses a configured provider until reset", () => {
		configureCryptoProvider({
			getRandomValues: (array) => array.fill(0xab),
		});
		expect(Array.from(randomBytes(3))).toEqual([0xab, 0xab, 0xab]);

		configureCryptoProvider();
		const restored = randomBytes(64);
		expect(restored.every((b) => b === 0xab)).toBe(false);
	});

	it("toHex pads each byte to two lowercase characters", () => {
		expect(toHex(new Uint8Array([0, 15, 255, 16]))).toBe("000fff10");
		expect(toHex(new Uint8Array([]))).toBe("");
	});
});
