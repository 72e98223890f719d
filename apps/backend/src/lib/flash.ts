import type { Context } from "hono";
import { deleteCookie, getSignedCookie, setSignedCookie } from "hono/cookie";

import type { AppEnv } from "./types";

export const FLASH_COOKIE = "flash";

// messages already queued during the current request
const outgoing = new WeakMap<Context<AppEnv>, string[]>();

/** Queues a message for the next rendered page. */
export async function flash(c: Context<AppEnv>, message: string) {
	const { secretKey, secureCookies } = c.var.app.config;
	const messages = outgoing.get(c) ?? (await readFlashes(c));
	messages.push(message);
	outgoing.set(c, messages);
	await setSignedCookie(c, FLASH_COOKIE, JSON.stringify(messages), secretKey, {
		path: "/",
		httpOnly: true,
		secure: secureCookies,
		sameSite: "Lax",
	});
}

/** Returns the queued messages and clears them. */
export async function consumeFlashes(c: Context<AppEnv>): Promise<string[]> {
	const messages = await readFlashes(c);
	if (messages.length) deleteCookie(c, FLASH_COOKIE, { path: "/" });
	return messages;
}

async function readFlashes(c: Context<AppEnv>): Promise<string[]> {
	const raw = await getSignedCookie(c, c.var.app.config.secretKey, FLASH_COOKIE);
	if (!raw) return [];

	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch {
		return [];
	}
	if (!Array.isArray(parsed)) return [];
	return parsed.filter((message): message is string => typeof message === "string");
}
