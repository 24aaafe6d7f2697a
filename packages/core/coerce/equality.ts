import { isDeepStrictEqual } from "node:util"
import { isObjectLike } from "@/types/guards"

/**
 * Drops values equal to an earlier one. Primitives compare the way `Set`
 * compares them; objects compare structurally.
 */
export function dedupeValues(values: ReadonlyArray<unknown>): Set<unknown> {
	const result = new Set<unknown>()
	const objects: unknown[] = []
	for (const value of values) {
		if (!isObjectLike(value)) {
			result.add(value)
			continue
		}
		if (objects.some((kept) => isDeepStrictEqual(kept, value))) continue
		objects.push(value)
		result.add(value)
	}
	return result
}

/**
 * Builds a Map from coerced entries. Keys that end up equal collapse: the
 * later value wins and the key keeps its first position.
 */
export function collectEntries(
	entries: ReadonlyArray<readonly [unknown, unknown]>,
): Map<unknown, unknown> {
	const result = new Map<unknown, unknown>()
	const objectKeys: unknown[] = []
	for (const [key, value] of entries) {
		if (!isObjectLike(key)) {
			result.set(key, value)
			continue
		}
		const existing = objectKeys.find((kept) => isDeepStrictEqual(kept, key))
		if (existing === undefined) {
			objectKeys.push(key)
			result.set(key, value)
		} else {
			result.set(existing, value)
		}
	}
	return result
}
