import assert from "node:assert/strict";
import test from "node:test";

import { createClient, createTestContext, login, register, samplePost } from "./test-utils";

test("register, log in, then write, edit and delete a post", async (t) => {
	const ctx = await createTestContext();
	t.after(ctx.cleanup);

	await register(createClient(ctx.app), "a@x.com", "pw1", "Alice");

	const admin = createClient(ctx.app);
	const loggedIn = await login(admin, "a@x.com", "pw1");
	assert.equal(loggedIn.headers.get("Location"), "/");

	await admin.post("/new-post", { ...samplePost, title: "T" });
	const shown = await (await admin.get("/post/1")).text();
	assert.ok(shown.includes("<h1>T</h1>"));

	await admin.post("/edit-post/1", { ...samplePost, title: "T2" });
	const edited = await (await admin.get("/post/1")).text();
	assert.ok(edited.includes("<h1>T2</h1>"));
	assert.ok(!edited.includes("<h1>T</h1>"));

	await admin.get("/delete/1");
	const home = await (await admin.get("/")).text();
	assert.ok(!home.includes('href="/post/1"'));
	assert.ok(home.includes("Nothing has been posted yet."));
});

test("posts are listed in the order they were written", async (t) => {
	const ctx = await createTestContext();
	t.after(ctx.cleanup);
	const admin = createClient(ctx.app);
	await register(admin, "a@x.com", "pw1", "Alice");

	for (const title of ["First", "Second", "Third"]) {
		await admin.post("/new-post", { ...samplePost, title });
	}

	const home = await (await createClient(ctx.app).get("/")).text();
	const positions = ["<h2>First</h2>", "<h2>Second</h2>", "<h2>Third</h2>"].map((heading) =>
		home.indexOf(heading)
	);
	assert.ok(positions.every((position) => position >= 0));
	assert.deepEqual([...positions].sort((a, b) => a - b), positions);
});

test("unknown routes render the not found page", async (t) => {
	const ctx = await createTestContext();
	t.after(ctx.cleanup);

	const res = await createClient(ctx.app).get("/nowhere");
	assert.equal(res.status, 404);
	assert.ok((await res.text()).includes("That page does not exist."));
});

test("a forged session cookie is treated as anonymous", async (t) => {
	const ctx = await createTestContext();
	t.after(ctx.cleanup);

	const res = await ctx.app.request("/new-post", { headers: { Cookie: "session=forged.token.value" } });
	assert.equal(res.status, 403);
});
