import assert from "node:assert/strict";
import test from "node:test";

import { createClient, createTestContext } from "../test-utils";

const contactForm = {
	name: "Ann",
	email: "ann@example.com",
	phone: "555-0100",
	message: "Loved the last post.",
};

test("the about page renders without any data", async (t) => {
	const ctx = await createTestContext();
	t.after(ctx.cleanup);

	const res = await createClient(ctx.app).get("/about");
	assert.equal(res.status, 200);
	assert.ok((await res.text()).includes("<h1>About Me</h1>"));
});

test("the contact page starts with an empty form", async (t) => {
	const ctx = await createTestContext();
	t.after(ctx.cleanup);

	const res = await createClient(ctx.app).get("/contact");
	assert.equal(res.status, 200);
	const page = await res.text();
	assert.ok(page.includes("<h1>Contact Me</h1>"));
	assert.ok(page.includes('action="/contact"'));
});

test("submitting the contact form emails the site owner once", async (t) => {
	const ctx = await createTestContext();
	t.after(ctx.cleanup);

	const res = await createClient(ctx.app).post("/contact", contactForm);
	assert.equal(res.status, 200);
	const page = await res.text();
	assert.ok(page.includes("<h1>Successfully sent your message</h1>"));
	assert.ok(!page.includes('action="/contact"'));

	assert.deepEqual(ctx.mailer.sent, [
		{
			from: "site@example.com",
			to: ["owner@example.com"],
			replyTo: "ann@example.com",
			subject: "New 'contact me' message",
			text: "New 'contact me' message\n\nFrom: Ann\nE-mail: ann@example.com\nPhone: 555-0100\nMessage: Loved the last post.",
		},
	]);
});

test("an incomplete contact form sends nothing", async (t) => {
	const ctx = await createTestContext();
	t.after(ctx.cleanup);

	const res = await createClient(ctx.app).post("/contact", { ...contactForm, message: "" });
	assert.equal(res.status, 400);
	assert.ok((await res.text()).includes('<div class="invalid-feedback">Message is required!</div>'));
	assert.deepEqual(ctx.mailer.sent, []);
});

test("a mail transport failure is answered with a server error", async (t) => {
	const ctx = await createTestContext();
	t.after(ctx.cleanup);
	ctx.mailer.failure = new Error("connect ECONNREFUSED");

	const res = await createClient(ctx.app).post("/contact", contactForm);
	assert.equal(res.status, 500);
	assert.ok((await res.text()).includes("Something went wrong. Please try again later."));
});

test("a rejected contact message is a server error too", async (t) => {
	const ctx = await createTestContext();
	t.after(ctx.cleanup);
	ctx.mailer.result = { status: "rejected", reason: "550 mailbox unavailable" };

	const res = await createClient(ctx.app).post("/contact", contactForm);
	assert.equal(res.status, 500);
});
