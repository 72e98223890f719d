/**
 * True when the error, or anything in its `cause` chain, is a SQLite unique
 * constraint violation. drizzle wraps driver errors, so the message alone is
 * not enough.
 */
export function isUniqueConstraintError(error: unknown): boolean {
	let current: unknown = error;
	for (let depth = 0; current instanceof Error && depth < 5; depth++) {
		if (/unique constraint/i.test(current.message)) return true;
		if ("code" in current && current.code === "SQLITE_CONSTRAINT_UNIQUE") return true;
		current = current.cause;
	}
	return false;
}
