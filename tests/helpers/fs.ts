/**
 * Filesystem test helpers
 *
 * Temporary directories and JSON fixtures for CLI tests.
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"

/**
 * Creates a temporary directory, runs the callback, and cleans up afterward.
 * The directory is always removed, even if the callback throws.
 *
 * @example
 * await withTempDir(async (dir) => {
 *   await writeJson(dir, "descriptor.json", { kind: "any" })
 * })
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
	const dir = await mkdtemp(join(tmpdir(), "conform-test-"))
	try {
		return await fn(dir)
	} finally {
		await rm(dir, { force: true, recursive: true })
	}
}

/**
 * Writes `data` as JSON into `dir` and returns the file path.
 */
export async function writeJson(dir: string, name: string, data: unknown): Promise<string> {
	const filePath = join(dir, name)
	await writeFile(filePath, `${JSON.stringify(data, null, 2)}\n`, "utf8")
	return filePath
}

/**
 * Writes raw text into `dir` and returns the file path.
 */
export async function writeText(dir: string, name: string, contents: string): Promise<string> {
	const filePath = join(dir, name)
	await writeFile(filePath, contents, "utf8")
	return filePath
}
