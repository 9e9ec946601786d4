/**
 * Adoptly API server.
 *
 * Usage:
 * 1. Start server: DATABASE_URL=memory: npm start
 * 2. Seed starter pets: curl -X POST http://localhost:8000/seed
 * 3. Search: curl "http://localhost:8000/api/pets?species=Dog&q=snuggly"
 * 4. Request an adoption: curl -X POST http://localhost:8000/api/adopt \
 *      -H "Content-Type: application/json" \
 *      -d '{"pet_id": "PET_ID_HERE", "full_name": "Sam Doe", "email": "sam@example.com"}'
 * 5. Check the store: curl http://localhost:8000/test
 */
import { serve } from "@hono/node-server";
import { ConsoleAnalytics } from "../adapters/analytics/console";
import { adoptly } from "../core/adoptly";
import { createApp } from "./app";
import { readServerEnv } from "./env";
import { openDocumentStore } from "./store";

const env = readServerEnv();
const store = await openDocumentStore(env);
if (store.status === "unavailable") {
	console.warn(`[adoptly:server] document store unavailable: ${store.reason}`);
}

const service = adoptly({
	store,
	adapters: { analytics: new ConsoleAnalytics() },
	environment: {
		databaseUrlSet: env.databaseUrl !== undefined,
		databaseNameSet: env.databaseName !== undefined,
	},
});
await service.ready;

serve({ fetch: createApp(service).fetch, port: env.port });
console.log(`Adoptly API server running on http://localhost:${env.port}`);
