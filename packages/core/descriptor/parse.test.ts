import { describe, expect, it } from "vitest"
import { t } from "@/descriptor/build"
import { formatDescriptor } from "@/descriptor/format"
import { parseDescriptor } from "@/descriptor/parse"
import "../../../tests/helpers/assertions"

function nestedSequenceJson(levels: number): unknown {
	let json: unknown = { kind: "scalar", scalar: "integer" }
	for (let level = 0; level < levels; level++) {
		json = { element: json, kind: "sequence" }
	}
	return json
}

describe("parseDescriptor", () => {
	it("decodes nested descriptors", () => {
		const result = parseDescriptor({
			key: { kind: "scalar", scalar: "string" },
			kind: "mapping",
			value: {
				alternatives: [
					{ kind: "scalar", scalar: "integer" },
					{ elements: [{ kind: "any" }, { kind: "scalar", scalar: "null" }], kind: "tuple" },
				],
				kind: "union",
			},
		})

		expect(result).toBeOk()
		if (result.ok) {
			expect(result.value).toEqual(
				t.mapping(t.string, t.union(t.integer, t.tuple(t.any, t.null))),
			)
			expect(formatDescriptor(result.value)).toBe("Map<string, integer | [any, null]>")
			expect(Object.isFrozen(result.value)).toBe(true)
		}
	})

	it("rejects unknown kinds", () => {
		const result = parseDescriptor({ kind: "tree" })

		expect(result).toBeErr()
		if (!result.ok) {
			expect(result.error.type).toBe("descriptor")
			expect(result.error.source).toBe("zod")
		}
	})

	it("rejects unknown scalar kinds and extra keys", () => {
		expect(parseDescriptor({ kind: "scalar", scalar: "decimal" })).toBeErr()
		expect(parseDescriptor({ extra: true, kind: "any" })).toBeErr()
	})

	it("rejects descriptors deeper than maxDepth", () => {
		const result = parseDescriptor(nestedSequenceJson(40), { maxDepth: 32 })

		expect(result).toBeErrContaining("nesting exceeds 32 levels")
		if (!result.ok) {
			expect(result.error.source).toBe("manual")
		}
	})

	it("rejects deeply nested input before schema validation", () => {
		let json: unknown = []
		for (let level = 0; level < 3000; level++) {
			json = [json]
		}

		expect(parseDescriptor(json)).toBeErrContaining("nesting exceeds 1024 levels")
	})
})
