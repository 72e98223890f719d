import { createHash } from "node:crypto";

export function gravatarUrl(email: string, size = 100) {
	const hash = createHash("md5").update(email.trim().toLowerCase()).digest("hex");
	return `https://www.gravatar.com/avatar/${hash}?s=${size}&r=g&d=retro`;
}
