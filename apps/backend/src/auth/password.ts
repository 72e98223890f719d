import { pbkdf2, timingSafeEqual } from "node:crypto";
import { promisify } from "node:util";
import { hash, verify } from "@node-rs/argon2";

const pbkdf2Async = promisify(pbkdf2);

const argonParams = {
	// recommended minimum parameters
	memoryCost: 19456,
	timeCost: 2,
	outputLen: 32,
	parallelism: 1,
};

// Hash password -> PHC ($argon2id$...)
export async function hashPassword(password: string) {
	return hash(password, argonParams);
}

/**
 * Verifies a password against a stored digest. The digest's own prefix names
 * the algorithm: argon2 PHC strings, or `pbkdf2:<hash>:<iterations>$salt$hex`
 * digests carried over from the previous site.
 */
export async function verifyPassword(digest: string, password: string): Promise<boolean> {
	if (digest.startsWith("$argon2")) {
		try {
			return await verify(digest, password);
		} catch {
			return false;
		}
	}
	if (digest.startsWith("pbkdf2:")) return verifyPbkdf2(digest, password);
	return false;
}

export function needsRehash(digest: string) {
	return !digest.startsWith("$argon2id$");
}

async function verifyPbkdf2(digest: string, password: string) {
	const [method = "", salt, expectedHex] = digest.split("$");
	const [, hashName, iterationsText] = method.split(":");
	const iterations = Number(iterationsText);
	if (!hashName || !salt || !expectedHex || !Number.isInteger(iterations) || iterations < 1) {
		return false;
	}

	const expected = Buffer.from(expectedHex, "hex");
	if (expected.length === 0) return false;

	let actual: Buffer;
	try {
		actual = await pbkdf2Async(password, salt, iterations, expected.length, hashName);
	} catch {
		// unsupported digest name
		return false;
	}
	return timingSafeEqual(actual, expected);
}
