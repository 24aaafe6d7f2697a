import { readFile } from "node:fs/promises"
import path from "node:path"
import type { Result } from "@conform/core"
import type { IoError, ParseError } from "./types/errors"

export async function readJsonFile(
	filePath: string,
): Promise<Result<unknown, IoError | ParseError>> {
	const absolutePath = path.resolve(filePath)
	let contents: string
	try {
		contents = await readFile(absolutePath, "utf8")
	} catch (error) {
		return {
			error: {
				message: `Unable to read ${absolutePath}.`,
				operation: "readFile",
				path: absolutePath,
				rawError: error instanceof Error ? error : undefined,
				type: "io",
			},
			ok: false,
		}
	}

	return parseJson(contents, absolutePath)
}

export function parseJson(
	contents: string,
	source: string,
): Result<unknown, ParseError> {
	try {
		const value: unknown = JSON.parse(contents)
		return { ok: true, value }
	} catch (error) {
		return {
			error: {
				message: `Invalid JSON in ${source}.`,
				path: source,
				rawError: error instanceof Error ? error : undefined,
				source: "json",
				type: "parse",
			},
			ok: false,
		}
	}
}
