import { rm } from "node:fs/promises";
import { randomUUID } from "node:crypto";
import { tmpdir } from "node:os";
import path from "node:path";

import { createApp, type App } from "./app";
import type { AppConfig } from "./config";
import { ensureSchema, getDB, type DBInstance } from "./lib/db";
import type { OutboundTransport } from "./lib/mail/transport";
import type { OutboundDeliveryResult, OutboundMessage } from "./lib/mail/types";

export class RecordingTransport implements OutboundTransport {
	readonly sent: OutboundMessage[] = [];
	result: OutboundDeliveryResult = { status: "accepted", providerMessageId: "test-message" };
	failure: Error | null = null;

	async send(message: OutboundMessage) {
		if (this.failure) throw this.failure;
		this.sent.push(message);
		return this.result;
	}
}

export type TestContext = {
	config: AppConfig;
	db: DBInstance;
	mailer: RecordingTransport;
	app: App;
	cleanup: () => Promise<void>;
};

/** A fresh file-backed database per test; libsql drops `:memory:` data across transactions. */
export async function createTestContext(): Promise<TestContext> {
	const file = path.join(tmpdir(), `inkwell-test-${randomUUID()}.db`);
	const config: AppConfig = {
		secretKey: "test-secret",
		databaseUrl: `file:${file}`,
		smtp: { host: "smtp.example.com", port: 587, user: "site@example.com", password: "test-app-key" },
		contactRecipient: "owner@example.com",
		host: "127.0.0.1",
		port: 0,
		secureCookies: false,
	};
	const db = getDB(config);
	await ensureSchema(db);
	const mailer = new RecordingTransport();
	const app = createApp({ config, db, mailer });

	return {
		config,
		db,
		mailer,
		app,
		cleanup: async () => {
			db.$client.close();
			await rm(file, { force: true });
		},
	};
}

/** Keeps cookies between requests the way a browser would, minus domain and expiry rules. */
export class CookieJar {
	private readonly cookies = new Map<string, string>();

	get(name: string) {
		return this.cookies.get(name);
	}

	store(response: Response) {
		for (const header of response.headers.getSetCookie()) {
			const [pair = "", ...attributes] = header.split(";");
			const separator = pair.indexOf("=");
			if (separator < 1) continue;
			const name = pair.slice(0, separator).trim();
			const value = pair.slice(separator + 1).trim();
			const expired = attributes.some((attribute) => /^\s*max-age=0\s*$/i.test(attribute));
			if (expired || value === "") this.cookies.delete(name);
			else this.cookies.set(name, value);
		}
	}

	header() {
		return [...this.cookies].map(([name, value]) => `${name}=${value}`).join("; ");
	}
}

export type Client = {
	jar: CookieJar;
	get: (path: string) => Promise<Response>;
	post: (path: string, form: Record<string, string>) => Promise<Response>;
};

export function createClient(app: App): Client {
	const jar = new CookieJar();
	const send = async (path: string, init: RequestInit) => {
		const headers = new Headers(init.headers);
		const cookie = jar.header();
		if (cookie) headers.set("Cookie", cookie);
		const response = await app.request(path, { ...init, headers });
		jar.store(response);
		return response;
	};

	return {
		jar,
		get: (path) => send(path, { method: "GET" }),
		post: (path, form) => send(path, { method: "POST", body: new URLSearchParams(form) }),
	};
}

export async function register(client: Client, email: string, password: string, name: string) {
	return client.post("/register", { email, password, name });
}

export async function login(client: Client, email: string, password: string) {
	return client.post("/login", { email, password });
}

export const samplePost = {
	title: "T",
	subtitle: "A first subtitle",
	imgUrl: "https://example.com/cover.png",
	body: "<p>Hello there</p>",
};
