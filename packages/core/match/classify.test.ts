import { describe, expect, it } from "vitest"
import { t } from "@/descriptor/build"
import { formatPath } from "@/diagnostic/path"
import type { TypeDescriptor } from "@/types/descriptor"
import { classify } from "@/validate"
import "../../../tests/helpers/assertions"

function nestedSequence(levels: number): TypeDescriptor {
	let descriptor: TypeDescriptor = t.integer
	for (let level = 0; level < levels; level++) {
		descriptor = t.sequence(descriptor)
	}
	return descriptor
}

describe("classify - scalars", () => {
	it("accepts values of the exact kind", () => {
		expect(classify(1, t.integer)).toEqual({ status: "exact" })
		expect(classify("a", t.string)).toEqual({ status: "exact" })
		expect(classify(null, t.null)).toEqual({ status: "exact" })
	})

	it("plans a conversion after a successful trial", () => {
		const verdict = classify("12", t.integer)

		expect(verdict.status).toBe("coercible")
		if (verdict.status === "coercible" && verdict.plan.kind === "scalar") {
			expect(verdict.plan.rule).toBe("string_to_integer")
			expect(verdict.plan.input).toBe("12")
			expect(verdict.plan.path).toEqual([])
		}
	})

	it("reports parse failures", () => {
		const verdict = classify("abc", t.integer)

		expect(verdict).toBeRejectedWith("parse_failure")
		if (verdict.status === "rejected") {
			expect(verdict.diagnostic.message).toBe('cannot convert string "abc" to integer')
			expect(verdict.diagnostic.received).toBe("string")
			expect(verdict.diagnostic.expectedText).toBe("integer")
		}
	})

	it("keeps the rendered value bounded for records with huge keys", () => {
		const verdict = classify({ ["k".repeat(100_000)]: 1 }, t.integer)

		expect(verdict).toBeRejectedWith("type_mismatch")
		if (verdict.status === "rejected") {
			expect(verdict.diagnostic.value).toBe(`{${"k".repeat(80)}…: 1}`)
		}
	})

	it("reports values without a conversion as type mismatches", () => {
		const verdict = classify({}, t.integer)

		expect(verdict).toBeRejectedWith("type_mismatch")
		if (verdict.status === "rejected") {
			expect(verdict.diagnostic.message).toBe("expected integer, received object")
		}
	})

	it("rejects every conversion in strict mode", () => {
		expect(classify("12", t.integer, { coerce: false })).toBeRejectedWith("type_mismatch")
		expect(classify(12, t.integer, { coerce: false })).toEqual({ status: "exact" })
	})

	it("keeps boolean coercion off by default", () => {
		expect(classify("yes", t.boolean)).toBeRejectedWith("type_mismatch")
		expect(classify("yes", t.boolean, { coerceBooleans: true }).status).toBe("coercible")
	})
})

describe("classify - sequences and sets", () => {
	it("accepts arrays of exact elements", () => {
		expect(classify([1, 2], t.sequence(t.integer))).toEqual({ status: "exact" })
	})

	it("treats other iterables and lone values as coercion sources", () => {
		expect(classify(new Set([1]), t.sequence(t.integer)).status).toBe("coercible")
		expect(classify(5, t.sequence(t.integer)).status).toBe("coercible")
		expect(classify("abc", t.sequence(t.string)).status).toBe("coercible")
	})

	it("points at the first failing index", () => {
		const verdict = classify([1, "x", "y"], t.sequence(t.integer))

		expect(verdict).toBeRejectedWith("parse_failure")
		if (verdict.status === "rejected") {
			expect(verdict.diagnostic.path).toEqual([{ index: 1, type: "index" }])
			expect(formatPath(verdict.diagnostic.path)).toBe("$[1]")
		}
	})

	it("rejects non-array sources in strict mode", () => {
		const verdict = classify(new Set([1]), t.sequence(t.integer), { coerce: false })
		expect(verdict).toBeRejectedWith("type_mismatch")
	})

	it("accepts sets of exact elements", () => {
		expect(classify(new Set([1, 2]), t.set(t.integer))).toEqual({ status: "exact" })
		expect(classify([1, 1], t.set(t.integer)).status).toBe("coercible")
	})
})

describe("classify - tuples", () => {
	it("requires the declared arity", () => {
		const verdict = classify([1, 2], t.tuple(t.integer, t.integer, t.integer))

		expect(verdict).toBeRejectedWith("arity_mismatch")
		if (verdict.status === "rejected") {
			expect(verdict.diagnostic.path).toEqual([])
			expect(verdict.diagnostic.message).toBe("expected 3 element(s), received 2")
		}
	})

	it("classifies each position against its own descriptor", () => {
		expect(classify([1, "a"], t.tuple(t.integer, t.string))).toEqual({ status: "exact" })

		const verdict = classify([1, {}], t.tuple(t.integer, t.integer))
		expect(verdict).toBeRejectedWith("type_mismatch")
		if (verdict.status === "rejected") {
			expect(formatPath(verdict.diagnostic.path)).toBe("$[1]")
		}
	})
})

describe("classify - mappings", () => {
	const StringToInt = t.mapping(t.string, t.integer)

	it("accepts maps of exact entries", () => {
		expect(classify(new Map([["a", 1]]), StringToInt)).toEqual({ status: "exact" })
	})

	it("reads plain records as mappings", () => {
		const verdict = classify({ a: 1 }, StringToInt)

		expect(verdict.status).toBe("coercible")
		if (verdict.status === "coercible" && verdict.plan.kind === "mapping") {
			expect(verdict.plan.shape).toBe("mapping")
		}
	})

	it("prefers pairs over a flat reading", () => {
		const verdict = classify(
			[
				["a", 1],
				["b", 2],
			],
			StringToInt,
		)

		expect(verdict.status).toBe("coercible")
		if (verdict.status === "coercible" && verdict.plan.kind === "mapping") {
			expect(verdict.plan.shape).toBe("pairs")
		}
	})

	it("falls back to a flat reading when pairs do not classify", () => {
		const verdict = classify(
			[
				["a", "b"],
				[1, 2],
			],
			t.mapping(t.sequence(t.string), t.sequence(t.integer)),
		)

		expect(verdict.status).toBe("coercible")
		if (verdict.status === "coercible" && verdict.plan.kind === "mapping") {
			expect(verdict.plan.shape).toBe("flat")
		}
	})

	it("reports the failure of the first shape tried", () => {
		const verdict = classify([["a", "x"]], StringToInt)

		expect(verdict).toBeRejectedWith("parse_failure")
		if (verdict.status === "rejected") {
			expect(verdict.diagnostic.path).toEqual([{ key: '"a"', type: "entry" }])
			expect(formatPath(verdict.diagnostic.path)).toBe('$["a"]')
		}
	})

	it("marks key failures with a key segment", () => {
		const verdict = classify(new Map([[{}, 1]]), t.mapping(t.integer, t.integer))

		expect(verdict).toBeRejectedWith("type_mismatch")
		if (verdict.status === "rejected") {
			expect(formatPath(verdict.diagnostic.path)).toBe("$<key {}>")
		}
	})

	it("rejects values no mapping can be built from", () => {
		const verdict = classify(5, StringToInt)

		expect(verdict).toBeRejectedWith("type_mismatch")
		if (verdict.status === "rejected") {
			expect(verdict.diagnostic.message).toBe("cannot build a mapping from integer")
		}
	})

	it("builds an empty mapping from an empty iterable", () => {
		expect(classify([], StringToInt).status).toBe("coercible")
	})
})

describe("classify - unions", () => {
	it("prefers an exact alternative over an earlier coercible one", () => {
		expect(classify("5", t.union(t.integer, t.string))).toEqual({ status: "exact" })
	})

	it("selects the first coercible alternative", () => {
		const verdict = classify(7.9, t.union(t.integer, t.string))

		expect(verdict.status).toBe("coercible")
		if (verdict.status === "coercible" && verdict.plan.kind === "union") {
			expect(verdict.plan.alternative).toBe(0)
		}
	})

	it("skips rejected alternatives", () => {
		const verdict = classify("2.5", t.union(t.integer, t.float))

		expect(verdict.status).toBe("coercible")
		if (verdict.status === "coercible" && verdict.plan.kind === "union") {
			expect(verdict.plan.alternative).toBe(1)
		}
	})

	it("lists every alternative when none matches", () => {
		const verdict = classify({}, t.union(t.integer, t.boolean))

		expect(verdict).toBeRejectedWith("type_mismatch")
		if (verdict.status === "rejected") {
			expect(verdict.diagnostic.message).toBe("no alternative of 2 matched")
			expect(verdict.diagnostic.alternatives.map((d) => formatPath(d.path))).toEqual([
				"$<alt 0>",
				"$<alt 1>",
			])
		}
	})

	it("rejects everything against an empty union", () => {
		const verdict = classify(1, t.union())

		expect(verdict).toBeRejectedWith("type_mismatch")
		if (verdict.status === "rejected") {
			expect(verdict.diagnostic.expectedText).toBe("never")
		}
	})
})

describe("classify - depth limit", () => {
	it("rejects descriptors nested past maxDepth regardless of the value", () => {
		const deep = nestedSequence(40)

		for (const value of [undefined, 1, [], "text"]) {
			const verdict = classify(value, deep)
			expect(verdict).toBeRejectedWith("depth_limit")
			if (verdict.status === "rejected") {
				expect(verdict.diagnostic.path).toEqual([])
			}
		}
	})

	it("honors a raised maxDepth", () => {
		expect(classify(undefined, nestedSequence(40), { maxDepth: 64 })).toBeRejectedWith(
			"type_mismatch",
		)
	})

	it("accepts anything for any", () => {
		expect(classify(Symbol("s"), t.any)).toEqual({ status: "exact" })
	})
})
