import assert from "node:assert/strict";
import test from "node:test";
import { Hono } from "hono";

import { createTestContext, type TestContext } from "../test-utils";
import { consumeFlashes, flash } from "./flash";
import type { AppEnv } from "./types";

function flashApp(ctx: TestContext) {
	const app = new Hono<AppEnv>();
	app.use(async (c, next) => {
		c.set("app", { config: ctx.config, db: ctx.db, mailer: ctx.mailer });
		await next();
	});
	app.get("/queue", async (c) => {
		await flash(c, "one");
		await flash(c, "two");
		return c.text("queued");
	});
	app.get("/show", async (c) => c.json(await consumeFlashes(c)));
	return app;
}

function cookieFrom(response: Response) {
	const [header = ""] = response.headers.getSetCookie().slice(-1);
	return header.split(";")[0] ?? "";
}

test("messages queued in one request are shown once on the next", async (t) => {
	const ctx = await createTestContext();
	t.after(ctx.cleanup);
	const app = flashApp(ctx);

	const queued = await app.request("/queue");
	const cookie = cookieFrom(queued);

	const shown = await app.request("/show", { headers: { Cookie: cookie } });
	assert.deepEqual(await shown.json(), ["one", "two"]);
	const cleared = shown.headers.get("Set-Cookie") ?? "";
	assert.match(cleared, /^flash=;/);
	assert.match(cleared, /Max-Age=0/);
});

test("a tampered flash cookie yields nothing", async (t) => {
	const ctx = await createTestContext();
	t.after(ctx.cleanup);
	const app = flashApp(ctx);

	const forged = `flash=${encodeURIComponent('["forged"].bogus-signature')}`;
	const shown = await app.request("/show", { headers: { Cookie: forged } });
	assert.deepEqual(await shown.json(), []);
});
