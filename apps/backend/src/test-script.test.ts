import assert from "node:assert/strict";
import { readdir, readFile } from "node:fs/promises";
import test from "node:test";
import { fileURLToPath } from "node:url";

const rootDir = fileURLToPath(new URL("../../../", import.meta.url));

async function findTestFiles(dir: string) {
	const entries = await readdir(`${rootDir}${dir}`, { recursive: true });
	return entries
		.filter((entry) => entry.endsWith(".test.ts") && !entry.includes("node_modules"))
		.map((entry) => `${dir}${entry}`);
}

test("the root test script runs every test file in the workspaces", async () => {
	const manifest: unknown = JSON.parse(await readFile(`${rootDir}package.json`, "utf8"));
	assert.ok(typeof manifest === "object" && manifest !== null && "scripts" in manifest);
	const { scripts } = manifest;
	assert.ok(typeof scripts === "object" && scripts !== null && "test" in scripts);
	assert.equal(typeof scripts.test, "string");
	const listed = String(scripts.test).split(/\s+/).filter((part) => part.endsWith(".test.ts"));

	const found = [
		...(await findTestFiles("apps/backend/src/")),
		...(await findTestFiles("packages/validation/")),
	];

	assert.deepEqual([...listed].sort(), found.sort());
});
