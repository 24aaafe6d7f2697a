import { FALSE_WORDS, TRUE_WORDS } from "@/constants"
import { renderValue } from "@/diagnostic/render"
import type { ScalarKind } from "@/types/descriptor"
import type { RenderLimits } from "@/types/diagnostic"
import { isRecord } from "@/types/guards"
import type { ScalarRule } from "@/types/verdict"

export type ScalarOutcome = { ok: true; value: unknown } | { ok: false }

const INTEGER_PATTERN = /^[+-]?\d+$/
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/
const SPECIAL_FLOAT_PATTERN = /^([+-]?)(inf|infinity|nan)$/i

export function isExactScalar(value: unknown, kind: ScalarKind): boolean {
	switch (kind) {
		case "integer":
			return typeof value === "number" && Number.isInteger(value)
		case "float":
			return typeof value === "number"
		case "string":
			return typeof value === "string"
		case "boolean":
			return typeof value === "boolean"
		case "object":
			return (typeof value === "object" && value !== null) || typeof value === "function"
		case "null":
			return value === null || value === undefined
	}
}

/**
 * Picks the conversion for a (value, target kind) pair, or null when the
 * table has none. Boolean targets only get a rule when `coerceBooleans` is on.
 */
export function resolveScalarRule(
	value: unknown,
	kind: ScalarKind,
	coerceBooleans: boolean,
): ScalarRule | null {
	switch (kind) {
		case "integer":
			if (typeof value === "number") return Number.isFinite(value) ? "float_to_integer" : null
			if (typeof value === "bigint") {
				return Number.isSafeInteger(Number(value)) ? "bigint_to_integer" : null
			}
			return typeof value === "string" ? "string_to_integer" : null
		case "float":
			if (typeof value === "bigint") return "bigint_to_float"
			return typeof value === "string" ? "string_to_float" : null
		case "string":
			return value === undefined ? null : "to_string"
		case "boolean":
			if (!coerceBooleans) return null
			if (typeof value === "number") return Number.isNaN(value) ? null : "number_to_boolean"
			return typeof value === "string" ? "string_to_boolean" : null
		case "object":
		case "null":
			return null
	}
}

/**
 * Runs a conversion. The matcher calls this as a trial and the coercer calls
 * it again to produce the value, so both always agree.
 */
export function applyScalarRule(rule: ScalarRule, value: unknown): ScalarOutcome {
	switch (rule) {
		case "float_to_integer":
			return typeof value === "number" && Number.isFinite(value)
				? { ok: true, value: Math.trunc(value) }
				: { ok: false }
		case "bigint_to_integer":
		case "bigint_to_float":
			return typeof value === "bigint" ? { ok: true, value: Number(value) } : { ok: false }
		case "string_to_integer":
			return typeof value === "string" ? parseInteger(value) : { ok: false }
		case "string_to_float":
			return typeof value === "string" ? parseFloatText(value) : { ok: false }
		case "to_string": {
			const text = toText(value)
			return text === null ? { ok: false } : { ok: true, value: text }
		}
		case "number_to_boolean":
			return typeof value === "number" && !Number.isNaN(value)
				? { ok: true, value: value !== 0 }
				: { ok: false }
		case "string_to_boolean":
			return typeof value === "string" ? parseBoolean(value) : { ok: false }
	}
}

function parseInteger(text: string): ScalarOutcome {
	const trimmed = text.trim()
	if (!INTEGER_PATTERN.test(trimmed)) return { ok: false }
	const parsed = Number(trimmed)
	// -0 from "-0" is still zero
	return Number.isSafeInteger(parsed) ? { ok: true, value: parsed + 0 } : { ok: false }
}

function parseFloatText(text: string): ScalarOutcome {
	const trimmed = text.trim()
	if (FLOAT_PATTERN.test(trimmed)) return { ok: true, value: Number(trimmed) }

	const special = SPECIAL_FLOAT_PATTERN.exec(trimmed)
	if (!special) return { ok: false }
	const [, sign, word] = special
	if (word?.toLowerCase() === "nan") return { ok: true, value: Number.NaN }
	return {
		ok: true,
		value: sign === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY,
	}
}

function parseBoolean(text: string): ScalarOutcome {
	const word = text.trim().toLowerCase()
	if (TRUE_WORDS.has(word)) return { ok: true, value: true }
	if (FALSE_WORDS.has(word)) return { ok: true, value: false }
	return { ok: false }
}

const UNBOUNDED: RenderLimits = {
	maxDepth: Number.POSITIVE_INFINITY,
	maxItems: Number.POSITIVE_INFINITY,
	maxStringLength: Number.POSITIVE_INFINITY,
}

/**
 * Text form of a non-string value. Arrays and plain records use JSON when they
 * have one; everything else, including cyclic structures, maps, sets, symbols,
 * functions and class instances, uses the full diagnostic rendering. Only
 * `undefined` has no text form: it stands for an absent value.
 */
function toText(value: unknown): string | null {
	if (value === undefined) return null
	if (typeof value === "string") return value
	if (typeof value === "number" || typeof value === "bigint" || typeof value === "boolean") {
		return String(value)
	}
	if (value === null) return "null"
	if (Array.isArray(value) || isRecord(value)) {
		const json = toJson(value)
		if (json !== null) return json
	}
	return renderValue(value, UNBOUNDED)
}

function toJson(value: object): string | null {
	try {
		return JSON.stringify(value)
	} catch (error) {
		// cyclic structures and bigint members have no JSON form
		if (error instanceof TypeError) return null
		throw error
	}
}
