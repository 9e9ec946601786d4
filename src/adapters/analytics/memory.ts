/**
 * In-memory analytics adapter.
 *
 * Keeps every tracked event in order. Handy in tests and for silencing the
 * console sink in scripts.
 */
import type { AnalyticsAdapter } from "../../types/common";

export type TrackedEvent = {
	event: string;
	payload: Record<string, unknown>;
};

export class MemoryAnalytics implements AnalyticsAdapter {
	readonly ready?: Promise<void>;
	readonly events: TrackedEvent[] = [];

	async track(event: string, payload: Record<string, unknown>): Promise<void> {
		this.events.push({ event, payload });
	}

	/** Names of the tracked events, oldest first. */
	names(): string[] {
		return this.events.map((e) => e.event);
	}
}
