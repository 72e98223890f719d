import assert from "node:assert/strict";
import test from "node:test";

import { buildContactMessage, composeContactText } from "./contact";

const input = {
	name: "Ann",
	email: "ann@example.com",
	phone: "555-0100",
	message: "Loved the last post.",
};

test("contact text lists every field on its own line", () => {
	assert.equal(
		composeContactText(input),
		"New 'contact me' message\n\nFrom: Ann\nE-mail: ann@example.com\nPhone: 555-0100\nMessage: Loved the last post."
	);
});

test("contact messages go from the site account to the fixed recipient", () => {
	const message = buildContactMessage(
		{
			smtp: { host: "smtp.example.com", port: 587, user: "site@example.com", password: "test-app-key" },
			contactRecipient: "owner@example.com",
		},
		input
	);
	assert.deepEqual(message, {
		from: "site@example.com",
		to: ["owner@example.com"],
		replyTo: "ann@example.com",
		subject: "New 'contact me' message",
		text: composeContactText(input),
	});
});
