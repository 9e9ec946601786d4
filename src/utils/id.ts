/**
 * ObjectId-style document identifiers.
 *
 * Layout (12 bytes, 24 hex characters): a 4-byte big-endian creation time in
 * seconds, 5 bytes unique to this process, and a 3-byte counter that starts at
 * a random value. The format matches MongoDB ObjectIds so ids stay valid if a
 * deployment moves between store adapters.
 */
import type { DocumentId } from "../types/common";
import { randomBytes, toHex } from "./crypto";
import { now } from "./time";

const OBJECT_ID_PATTERN = /^[0-9a-f]{24}$/i;
const COUNTER_MODULO = 0x1000000;

let processUnique: Uint8Array | null = null;
let counter: number | null = null;

/** True when `value` is exactly 24 hexadecimal characters. */
export function isObjectIdHex(value: string): boolean {
	return OBJECT_ID_PATTERN.test(value);
}

/** Generate a new 24-hex identifier. */
export function generateObjectId(): DocumentId {
	if (!processUnique) processUnique = randomBytes(5);
	if (counter === null) {
		const seed = randomBytes(3);
		counter = (seed[0] << 16) | (seed[1] << 8) | seed[2];
	}
	counter = (counter + 1) % COUNTER_MODULO;

	const bytes = new Uint8Array(12);
	const seconds = Math.floor(now() / 1000);
	bytes[0] = (seconds >>> 24) & 0xff;
	bytes[1] = (seconds >>> 16) & 0xff;
	bytes[2] = (seconds >>> 8) & 0xff;
	bytes[3] = seconds & 0xff;
	bytes.set(processUnique, 4);
	bytes[9] = (counter >>> 16) & 0xff;
	bytes[10] = (counter >>> 8) & 0xff;
	bytes[11] = counter & 0xff;
	return toHex(bytes);
}

