import assert from "node:assert/strict";
import test from "node:test";

import { nowSec, SESSION_TTL, signSessionToken, verifySessionToken } from "./session";

test("a signed token resolves to its user id", async () => {
	const token = await signSessionToken("test-secret", 7);
	assert.equal(await verifySessionToken("test-secret", token), 7);
});

test("a token signed with another secret is rejected", async () => {
	const token = await signSessionToken("other-secret", 7);
	assert.equal(await verifySessionToken("test-secret", token), null);
});

test("an expired token is rejected", async () => {
	const token = await signSessionToken("test-secret", 7, nowSec() - SESSION_TTL - 60);
	assert.equal(await verifySessionToken("test-secret", token), null);
});

test("garbage is rejected", async () => {
	assert.equal(await verifySessionToken("test-secret", "not.a.token"), null);
	assert.equal(await verifySessionToken("test-secret", ""), null);
});
