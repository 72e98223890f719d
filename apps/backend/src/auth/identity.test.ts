import assert from "node:assert/strict";
import test from "node:test";

import { userTable } from "../lib/db/schema";
import { createTestContext } from "../test-utils";
import { ANONYMOUS, isAdmin, resolveIdentity } from "./identity";
import { signSessionToken } from "./session";

test("no token, a bad token, or a token for a missing user is anonymous", async (t) => {
	const ctx = await createTestContext();
	t.after(ctx.cleanup);

	assert.deepEqual(await resolveIdentity(ctx.db, "test-secret"), ANONYMOUS);
	assert.deepEqual(await resolveIdentity(ctx.db, "test-secret", "junk"), ANONYMOUS);

	const orphan = await signSessionToken("test-secret", 42);
	assert.deepEqual(await resolveIdentity(ctx.db, "test-secret", orphan), ANONYMOUS);
});

test("a valid token resolves to the stored user", async (t) => {
	const ctx = await createTestContext();
	t.after(ctx.cleanup);
	const [user] = await ctx.db
		.insert(userTable)
		.values({ email: "a@x.com", password: "hash", name: "Alice" })
		.returning();
	assert.ok(user);

	const identity = await resolveIdentity(ctx.db, "test-secret", await signSessionToken("test-secret", user.id));
	assert.deepEqual(identity, { kind: "authenticated", user });
});

test("only user 1 is the admin", () => {
	const user = { id: 1, email: "a@x.com", password: "hash", name: "Alice" };
	assert.equal(isAdmin({ kind: "authenticated", user }), true);
	assert.equal(isAdmin({ kind: "authenticated", user: { ...user, id: 2 } }), false);
	assert.equal(isAdmin(ANONYMOUS), false);
});
