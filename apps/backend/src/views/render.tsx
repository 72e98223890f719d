import type { Context } from "hono";
import type { Child } from "hono/jsx";
import type { ContentfulStatusCode } from "hono/utils/http-status";

import { consumeFlashes } from "../lib/flash";
import type { AppEnv } from "../lib/types";
import { Layout } from "./layout";
import { ErrorPage } from "./pages";

/** Renders a page inside the site layout, surfacing any queued flash messages. */
export async function renderPage(
	c: Context<AppEnv>,
	title: string,
	content: Child,
	status: ContentfulStatusCode = 200
) {
	const flashes = await consumeFlashes(c);
	return c.html(
		<Layout title={title} identity={c.var.identity} flashes={flashes}>
			{content}
		</Layout>,
		status
	);
}

export const renderNotFound = (c: Context<AppEnv>) =>
	renderPage(c, "Not Found", <ErrorPage status={404} message="That page does not exist." />, 404);

export const renderForbidden = (c: Context<AppEnv>) =>
	renderPage(c, "Forbidden", <ErrorPage status={403} message="Forbidden" />, 403);
