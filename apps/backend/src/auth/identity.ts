import type { DBInstance, UserSelectModel } from "../lib/db";
import { verifySessionToken } from "./session";

export const ADMIN_USER_ID = 1;

export type Identity =
	| { kind: "authenticated"; user: UserSelectModel }
	| { kind: "anonymous" };

export type AuthenticatedIdentity = Extract<Identity, { kind: "authenticated" }>;

export const ANONYMOUS: Identity = { kind: "anonymous" };

export function isAdmin(identity: Identity): identity is AuthenticatedIdentity {
	return identity.kind === "authenticated" && identity.user.id === ADMIN_USER_ID;
}

export async function resolveIdentity(
	db: DBInstance,
	secret: string,
	token?: string | null
): Promise<Identity> {
	if (!token) return ANONYMOUS;

	const userId = await verifySessionToken(secret, token);
	if (userId === null) return ANONYMOUS;

	const user = await db.query.userTable.findFirst({
		where: (t, { eq }) => eq(t.id, userId),
	});
	if (!user) return ANONYMOUS;

	return { kind: "authenticated", user };
}
