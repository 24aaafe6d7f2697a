import { isRecord } from "@conform/core"

/**
 * Converts a validated value into plain JSON data. Maps whose keys are all
 * strings become objects, other maps become lists of [key, value] pairs, and
 * sets become lists.
 */
export function toJsonValue(value: unknown): unknown {
	if (value === undefined) return null
	if (typeof value === "bigint") return value.toString()
	if (value instanceof Map) {
		const entries: Array<[unknown, unknown]> = Array.from(value.entries())
		const named: Array<[string, unknown]> = []
		for (const [key, item] of entries) {
			if (typeof key !== "string") {
				return entries.map(([entryKey, entryItem]) => [
					toJsonValue(entryKey),
					toJsonValue(entryItem),
				])
			}
			named.push([key, toJsonValue(item)])
		}
		return Object.fromEntries(named)
	}
	if (value instanceof Set) return Array.from(value, toJsonValue)
	if (Array.isArray(value)) return value.map(toJsonValue)
	if (isRecord(value)) {
		return Object.fromEntries(
			Object.entries(value).map(([key, item]) => [key, toJsonValue(item)]),
		)
	}
	return value
}

export function formatJson(value: unknown): string {
	return JSON.stringify(toJsonValue(value), null, 2)
}
