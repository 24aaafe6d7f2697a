import { safeValidate, t } from "@conform/core"
import { describe, expect, it } from "vitest"
import { ZodError } from "zod"
import { formatCliError } from "./outcome"

describe("formatCliError", () => {
	it("renders validation errors through their diagnostic", () => {
		const result = safeValidate("x", t.integer)

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(formatCliError(result.error)).toBe(
				'[validation] Value does not conform:\n  $: cannot convert string "x" to integer (value: "x")',
			)
		}
	})

	it("names the failed operation for io errors", () => {
		expect(
			formatCliError({
				message: "Unable to read /data/value.json.",
				operation: "readFile",
				path: "/data/value.json",
				type: "io",
			}),
		).toBe("[io] Unable to read /data/value.json. (readFile /data/value.json)")
	})

	it("lists zod issues for option errors", () => {
		const zodError = new ZodError([
			{ code: "custom", message: "must be positive", path: ["maxDepth"] },
		])

		expect(
			formatCliError({
				message: "Invalid check options.",
				source: "zod",
				type: "options",
				zodError,
			}),
		).toBe("[options] Invalid check options.\n  - maxDepth: must be positive")
	})

	it("appends the cause chain", () => {
		expect(
			formatCliError({
				cause: { message: "Unable to read .env.", type: "io" },
				field: "value",
				message: "A value is required.",
				type: "usage",
			}),
		).toBe("[usage] A value is required.\n  Caused by: [io] Unable to read .env.")
	})
})
