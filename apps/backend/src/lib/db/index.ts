import { readFile } from "node:fs/promises";
import { drizzle } from "drizzle-orm/libsql";

import type { AppConfig } from "../../config";
import * as schema from "./schema";

const schemaFile = new URL("./schema.sql", import.meta.url);

export const getDB = (config: Pick<AppConfig, "databaseUrl" | "databaseAuthToken">) =>
	drizzle({
		schema,
		connection: {
			url: config.databaseUrl,
			authToken: config.databaseAuthToken,
		},
	});

export type DBInstance = ReturnType<typeof getDB>;

export type UserSelectModel = typeof schema.userTable.$inferSelect;
export type PostSelectModel = typeof schema.postTable.$inferSelect;
export type CommentSelectModel = typeof schema.commentTable.$inferSelect;

/** Creates the three tables if they are missing. Existing tables are left untouched. */
export async function ensureSchema(db: DBInstance) {
	const ddl = await readFile(schemaFile, "utf8");
	await db.$client.executeMultiple(ddl);
}
