import {
	type AdoptlyError,
	type AnalyticsAdapter,
	type DocumentStoreAdapter,
	ErrorCodes,
	type StoreHandle,
} from "../types/common";
import { failure, toError } from "../utils/error";
import { STORE_NOT_CONFIGURED_MESSAGE } from "./constants";

/**
 * Safely track analytics events with error handling
 */
export async function safeTrackAnalytics(
	analytics: AnalyticsAdapter,
	event: string,
	data: Record<string, unknown>,
): Promise<void> {
	try {
		await analytics.track(event, data);
	} catch (err) {
		console.error(
			`Error tracking ${event} event`,
			toError(err, ErrorCodes.ANALYTICS_TRACK_FAILED, { op: event }),
		);
	}
}

/** Wrap an adapter in an available store handle. */
export function availableStore(store: DocumentStoreAdapter): StoreHandle {
	return { status: "available", store };
}

/** A store handle recording why no store could be opened. */
export function unavailableStore(
	reason: string = STORE_NOT_CONFIGURED_MESSAGE,
): StoreHandle {
	return { status: "unavailable", reason };
}

/**
 * Resolve a handle to its adapter, or the `STORE_NOT_CONFIGURED` error the
 * caller should return for operation `op`.
 */
export function requireStore(
	handle: StoreHandle,
	op: string,
): { store: DocumentStoreAdapter } | { error: AdoptlyError } {
	if (handle.status === "available") return { store: handle.store };
	return {
		error: failure(
			ErrorCodes.STORE_NOT_CONFIGURED,
			STORE_NOT_CONFIGURED_MESSAGE,
			{ op, reason: handle.reason },
		),
	};
}
