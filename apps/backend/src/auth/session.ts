import type { Context } from "hono";
import { deleteCookie, getCookie, setCookie } from "hono/cookie";
import { sign, verify } from "hono/jwt";

import type { AppEnv } from "../lib/types";

export const SESSION_COOKIE = "session";
export const SESSION_TTL = 60 * 60 * 24 * 30;

export const nowSec = () => Math.floor(Date.now() / 1000);

export async function signSessionToken(secret: string, userId: number, now = nowSec()) {
	return sign({ sub: String(userId), iat: now, exp: now + SESSION_TTL }, secret, "HS256");
}

/** Resolves a token to the user id it was issued for, or null when it is not valid. */
export async function verifySessionToken(secret: string, token: string): Promise<number | null> {
	let payload: Awaited<ReturnType<typeof verify>>;
	try {
		payload = await verify(token, secret, "HS256");
	} catch {
		return null;
	}
	if (typeof payload.sub !== "string" || !/^[0-9]+$/.test(payload.sub)) return null;
	return Number(payload.sub);
}

export async function startSession(c: Context<AppEnv>, userId: number) {
	const { secretKey, secureCookies } = c.var.app.config;
	const token = await signSessionToken(secretKey, userId);
	setCookie(c, SESSION_COOKIE, token, {
		path: "/",
		httpOnly: true,
		secure: secureCookies,
		sameSite: "Lax",
		maxAge: SESSION_TTL,
	});
}

export function endSession(c: Context<AppEnv>) {
	deleteCookie(c, SESSION_COOKIE, { path: "/" });
}

export function readSessionToken(c: Context<AppEnv>) {
	return getCookie(c, SESSION_COOKIE);
}
