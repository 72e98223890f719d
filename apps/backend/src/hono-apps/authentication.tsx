import { v } from "@inkwell/validation";
import { loginSchema, registerSchema } from "@inkwell/validation/auth";
import { eq } from "drizzle-orm";
import { Hono, type Context } from "hono";

import { hashPassword, needsRehash, verifyPassword } from "../auth/password";
import { endSession, startSession } from "../auth/session";
import { userTable } from "../lib/db/schema";
import { flash } from "../lib/flash";
import type { AppEnv } from "../lib/types";
import { isUniqueConstraintError } from "../lib/utils/errors";
import { formValues, toFieldErrors } from "../lib/utils/forms";
import { LoginPage, RegisterPage } from "../views/auth";
import { renderPage } from "../views/render";

const authenticationApp = new Hono<AppEnv>();

authenticationApp.get("/register", (c) =>
	renderPage(c, "Register", <RegisterPage values={{}} errors={{}} />)
);

authenticationApp.post("/register", async (c) => {
	const body = await c.req.parseBody();
	const bodyValidation = v.safeParse(registerSchema, body);
	if (!bodyValidation.success) {
		return renderPage(
			c,
			"Register",
			<RegisterPage values={formValues(body)} errors={toFieldErrors(bodyValidation.issues)} />,
			400
		);
	}

	const { db } = c.var.app;
	const { email, password, name } = bodyValidation.output;

	// Best-effort pre-check; the unique index on users.email is the real guard.
	const existing = await db.query.userTable.findFirst({
		columns: { id: true },
		where: (t, { eq }) => eq(t.email, email),
	});
	if (existing) return alreadyRegistered(c);

	const passwordHash = await hashPassword(password);

	let inserted: { id: number }[];
	try {
		inserted = await db
			.insert(userTable)
			.values({ email, password: passwordHash, name })
			.returning({ id: userTable.id });
	} catch (error) {
		if (isUniqueConstraintError(error)) {
			console.warn("Concurrent registration lost the unique email race");
			return alreadyRegistered(c);
		}
		throw error;
	}

	const [user] = inserted;
	if (!user) throw new Error("USER_INSERT_FAILED");

	await startSession(c, user.id);
	return c.redirect("/");
});

authenticationApp.get("/login", (c) => renderPage(c, "Log In", <LoginPage values={{}} errors={{}} />));

authenticationApp.post("/login", async (c) => {
	const body = await c.req.parseBody();
	const bodyValidation = v.safeParse(loginSchema, body);
	if (!bodyValidation.success) {
		return renderPage(
			c,
			"Log In",
			<LoginPage values={formValues(body)} errors={toFieldErrors(bodyValidation.issues)} />,
			400
		);
	}

	const { db } = c.var.app;
	const { email, password } = bodyValidation.output;
	const user = await db.query.userTable.findFirst({
		where: (t, { eq }) => eq(t.email, email),
	});
	if (!user) {
		await flash(c, "That email does not exist, please try again");
		return c.redirect("/login");
	}

	const valid = await verifyPassword(user.password, password);
	if (!valid) {
		await flash(c, "Password incorrect, please try again");
		return c.redirect("/login");
	}

	if (needsRehash(user.password)) {
		await db
			.update(userTable)
			.set({ password: await hashPassword(password) })
			.where(eq(userTable.id, user.id));
	}

	await startSession(c, user.id);
	return c.redirect("/");
});

authenticationApp.get("/logout", (c) => {
	endSession(c);
	return c.redirect("/");
});

async function alreadyRegistered(c: Context<AppEnv>) {
	await flash(c, "You've already signed up with that email, log in instead!");
	return c.redirect("/login");
}

export { authenticationApp };
