/*
 * Store diagnostics.
 *
 * `reportStatus` never rejects: every probe failure is folded into the
 * report's `database` field, shortened to a fixed length.
 */

import {
	ErrorCodes,
	type StatusReport,
	type StoreEnvironmentFlags,
	type StoreHandle,
} from "../types/common";
import { toError, truncateMessage } from "../utils/error";
import {
	MAX_DIAGNOSTIC_MESSAGE_LENGTH,
	MAX_REPORTED_COLLECTIONS,
} from "./constants";

function describeFailure(err: unknown): string {
	return truncateMessage(
		toError(err, ErrorCodes.DIAGNOSTIC_FAILED).message,
		MAX_DIAGNOSTIC_MESSAGE_LENGTH,
	);
}

export class DiagnosticsReporter {
	constructor(
		private readonly store: StoreHandle,
		private readonly environment: StoreEnvironmentFlags,
	) {}

	async reportStatus(): Promise<StatusReport> {
		const report: StatusReport = {
			backend: "Running",
			database: "Not Available",
			store_initialized: false,
			database_name: null,
			connection_status: "Not Connected",
			collections: [],
			database_url_set: this.environment.databaseUrlSet,
			database_name_set: this.environment.databaseNameSet,
		};

		if (this.store.status === "unavailable") {
			report.database = `Not Available: ${truncateMessage(
				this.store.reason,
				MAX_DIAGNOSTIC_MESSAGE_LENGTH,
			)}`;
			return report;
		}

		const store = this.store.store;
		try {
			report.store_initialized = true;
			report.database = "Available";
			report.database_name = store.name;
			report.connection_status = "Connected";
			try {
				await store.ready;
				await store.ping?.();
				const names = store.listCollections
					? await store.listCollections()
					: [];
				report.collections = names.slice(0, MAX_REPORTED_COLLECTIONS);
				report.database = "Connected & Working";
			} catch (err) {
				report.database = `Connected but Error: ${describeFailure(err)}`;
			}
		} catch (err) {
			report.database = `Error: ${describeFailure(err)}`;
		}
		return report;
	}
}
