import fs from "node:fs"
import path from "node:path"
import { type ContractOptions, optionsFromEnv, type Result } from "@conform/core"
import dotenv from "dotenv"
import { ZodError } from "zod"
import type { IoError, OptionsError } from "./types/errors"

/**
 * Reads contract options from `CONFORM_*` variables. A `.env` file fills in
 * variables the environment does not set.
 */
export function loadEnvOptions(
	envPath: string = path.resolve(process.cwd(), ".env"),
	env: Record<string, string | undefined> = process.env,
): Result<ContractOptions, OptionsError | IoError> {
	const fromFile: Record<string, string> = {}
	if (fs.existsSync(envPath)) {
		const loaded = dotenv.config({ path: envPath, processEnv: fromFile })
		if (loaded.error) {
			return {
				error: {
					message: `Unable to load ${envPath}.`,
					operation: "dotenv",
					path: envPath,
					rawError: loaded.error,
					type: "io",
				},
				ok: false,
			}
		}
	}

	try {
		return { ok: true, value: optionsFromEnv({ ...fromFile, ...env }) }
	} catch (error) {
		if (error instanceof ZodError) {
			return {
				error: {
					message: "Invalid CONFORM_* environment variables.",
					rawError: error,
					source: "zod",
					type: "options",
					zodError: error,
				},
				ok: false,
			}
		}
		throw error
	}
}
