import { describe, expect, it } from "vitest"
import { collectEntries, dedupeValues } from "@/coerce/equality"

describe("dedupeValues", () => {
	it("drops repeated primitives and structurally equal objects", () => {
		const result = dedupeValues([1, 1, Number.NaN, Number.NaN, { a: 1 }, { a: 1 }, { a: 2 }])

		expect(Array.from(result)).toEqual([1, Number.NaN, { a: 1 }, { a: 2 }])
	})
})

describe("collectEntries", () => {
	it("lets later values win for equal object keys", () => {
		const first = { k: 1 }
		const result = collectEntries([
			[first, "a"],
			[{ k: 1 }, "b"],
		])

		expect(result.size).toBe(1)
		expect(result.get(first)).toBe("b")
	})

	it("keeps the first position of a repeated key", () => {
		const result = collectEntries([
			["x", 1],
			["y", 2],
			["x", 3],
		])

		expect(Array.from(result.keys())).toEqual(["x", "y"])
		expect(result.get("x")).toBe(3)
	})
})
