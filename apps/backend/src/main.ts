import { serve } from "@hono/node-server";

import { createApp } from "./app";
import { loadConfig } from "./config";
import { ensureSchema, getDB } from "./lib/db";
import { createOutboundTransport } from "./lib/mail";

const config = loadConfig(process.env);
const db = getDB(config);
await ensureSchema(db);

const app = createApp({ config, db, mailer: createOutboundTransport(config) });

const server = serve({ fetch: app.fetch, hostname: config.host, port: config.port }, (info) => {
	console.log(`Listening on http://${info.address}:${info.port}`);
});

const shutdown = () => {
	server.close(() => {
		db.$client.close();
		process.exit(0);
	});
};
process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
