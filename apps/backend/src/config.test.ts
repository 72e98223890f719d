import assert from "node:assert/strict";
import test from "node:test";

import { ConfigError, loadConfig } from "./config";

const baseEnv = {
	SECRET_KEY: "test-secret",
	EMAIL: "owner@example.com",
	APP_KEY: "test-app-key",
};

test("defaults fill in everything but the secrets", () => {
	const config = loadConfig(baseEnv);
	assert.deepEqual(config, {
		secretKey: "test-secret",
		databaseUrl: "file:blog.db",
		databaseAuthToken: undefined,
		smtp: {
			host: "smtp.gmail.com",
			port: 587,
			user: "owner@example.com",
			password: "test-app-key",
		},
		contactRecipient: "owner@example.com",
		host: "0.0.0.0",
		port: 5000,
		secureCookies: false,
	});
});

test("explicit values override the defaults", () => {
	const config = loadConfig({
		...baseEnv,
		DATABASE_URL: "file:/tmp/other.db",
		CONTACT_RECIPIENT: "inbox@example.com",
		PORT: "8080",
		NODE_ENV: "production",
	});
	assert.equal(config.databaseUrl, "file:/tmp/other.db");
	assert.equal(config.contactRecipient, "inbox@example.com");
	assert.equal(config.port, 8080);
	assert.equal(config.secureCookies, true);
});

test("missing and malformed keys are reported together", () => {
	assert.throws(
		() => loadConfig({ EMAIL: "not-an-email", APP_KEY: "test-app-key", PORT: "http" }),
		(error: unknown) => {
			assert.ok(error instanceof ConfigError);
			assert.deepEqual(error.keys, ["SECRET_KEY", "EMAIL", "PORT"]);
			return true;
		}
	);
});
