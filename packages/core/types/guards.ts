export function isRecord(value: unknown): value is Record<string, unknown> {
	if (typeof value !== "object" || value === null) return false
	const proto: unknown = Object.getPrototypeOf(value)
	return proto === Object.prototype || proto === null
}

/**
 * Iterable objects. Strings are primitives, so they never count: a string is
 * treated as a single value, not as a sequence of characters.
 */
export function isCollection(value: unknown): value is Iterable<unknown> {
	return (
		typeof value === "object" &&
		value !== null &&
		Symbol.iterator in value &&
		typeof value[Symbol.iterator] === "function"
	)
}

export function isPair(value: unknown): value is readonly [unknown, unknown] {
	return Array.isArray(value) && value.length === 2
}

export function isObjectLike(value: unknown): value is object {
	return (typeof value === "object" && value !== null) || typeof value === "function"
}

export function runtimeTypeName(value: unknown): string {
	if (value === null) return "null"
	if (typeof value === "number") return Number.isInteger(value) ? "integer" : "float"
	if (typeof value !== "object") return typeof value

	if (Array.isArray(value)) return "array"
	if (isRecord(value)) return "object"
	const name: unknown = value.constructor?.name
	return typeof name === "string" && name.length > 0 ? name : "object"
}
