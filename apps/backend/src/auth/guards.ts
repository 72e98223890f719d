import type { Context, Handler, MiddlewareHandler } from "hono";

import type { UserSelectModel } from "../lib/db";
import type { AppEnv } from "../lib/types";
import { renderForbidden } from "../views/render";
import { isAdmin, resolveIdentity } from "./identity";
import { readSessionToken } from "./session";

export const attachIdentity: MiddlewareHandler<AppEnv> = async (c, next) => {
	const { db, config } = c.var.app;
	c.set("identity", await resolveIdentity(db, config.secretKey, readSessionToken(c)));
	await next();
};

type AdminHandler = (c: Context<AppEnv>, admin: UserSelectModel) => Response | Promise<Response>;

/**
 * Wraps a handler so it only runs for the admin. Everyone else, signed in or
 * not, gets a 403 and the wrapped handler is never called.
 */
export function adminOnly(handler: AdminHandler): Handler<AppEnv> {
	return async (c) => {
		const identity = c.var.identity;
		if (!isAdmin(identity)) return renderForbidden(c);
		return handler(c, identity.user);
	};
}
