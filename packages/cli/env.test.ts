import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { withTempDir, writeText } from "../../tests/helpers"
import { loadEnvOptions } from "./env"

describe("loadEnvOptions", () => {
	it("uses defaults without a .env file", async () => {
		await withTempDir(async (dir) => {
			const result = loadEnvOptions(join(dir, ".env"), {})

			expect(result).toBeOk()
			if (result.ok) {
				expect(result.value.maxDepth).toBe(32)
				expect(result.value.coerce).toBe(true)
			}
		})
	})

	it("reads the .env file and lets the environment win", async () => {
		await withTempDir(async (dir) => {
			const envPath = await writeText(
				dir,
				".env",
				"CONFORM_MAX_DEPTH=4\nCONFORM_COERCE_BOOLEANS=true\n",
			)

			const fromFile = loadEnvOptions(envPath, {})
			const overridden = loadEnvOptions(envPath, { CONFORM_MAX_DEPTH: "8" })

			expect(fromFile.ok && fromFile.value.maxDepth).toBe(4)
			expect(fromFile.ok && fromFile.value.coerceBooleans).toBe(true)
			expect(overridden.ok && overridden.value.maxDepth).toBe(8)
		})
	})

	it("reports malformed variables", async () => {
		await withTempDir(async (dir) => {
			const result = loadEnvOptions(join(dir, ".env"), { CONFORM_MAX_DEPTH: "-1" })

			expect(result).toBeErr()
			if (!result.ok) {
				expect(result.error.type).toBe("options")
			}
		})
	})
})
