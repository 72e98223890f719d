import { Hono } from "hono";
import { logger } from "hono/logger";

import { attachIdentity } from "./auth/guards";
import { ANONYMOUS } from "./auth/identity";
import { authenticationApp } from "./hono-apps/authentication";
import { pagesApp } from "./hono-apps/pages";
import { postsApp } from "./hono-apps/posts";
import type { AppContext, AppEnv } from "./lib/types";
import { Layout } from "./views/layout";
import { ErrorPage } from "./views/pages";
import { renderNotFound } from "./views/render";

export function createApp(context: AppContext) {
	const app = new Hono<AppEnv>();
	app.use(logger());
	app.use(async (c, next) => {
		c.set("app", context);
		await next();
	});
	app.use(attachIdentity);

	app.route("/", postsApp);
	app.route("/", authenticationApp);
	app.route("/", pagesApp);

	app.notFound((c) => renderNotFound(c));

	app.onError((err, c) => {
		console.error("Unhandled request error", err);
		// Rendered without touching the database or flash cookie, either may be the cause.
		return c.html(
			<Layout title="Error" identity={ANONYMOUS} flashes={[]}>
				<ErrorPage status={500} message="Something went wrong. Please try again later." />
			</Layout>,
			500
		);
	});

	return app;
}

export type App = ReturnType<typeof createApp>;
