/**
 * Console-based analytics adapter.
 *
 * The default sink. Prints one line per event to stdout, tagged so it can be
 * filtered out of request logs.
 */
import type { AnalyticsAdapter } from "../../types/common";

export class ConsoleAnalytics implements AnalyticsAdapter {
	readonly ready?: Promise<void>;
	private readonly tag: string;

	constructor(options?: { tag?: string }) {
		this.tag = options?.tag ?? "adoptly:analytics";
	}

	async track(event: string, payload: Record<string, unknown>): Promise<void> {
		console.log(`[${this.tag}] ${event}`, payload);
	}
}
