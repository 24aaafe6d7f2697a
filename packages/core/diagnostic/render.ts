import { isRecord } from "@/types/guards"
import type { RenderLimits } from "@/types/diagnostic"

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/

/**
 * Human-readable, size-bounded rendering of any value for diagnostics and
 * logs. Strings are cut at `maxStringLength`, containers show their first
 * `maxItems` entries and nesting stops at `maxDepth`.
 */
export function renderValue(value: unknown, limits: RenderLimits): string {
	return renderAt(value, limits, 0, new Set())
}

export function truncate(text: string, maxLength: number): string {
	return text.length <= maxLength ? text : `${text.slice(0, maxLength)}…`
}

function renderAt(
	value: unknown,
	limits: RenderLimits,
	depth: number,
	seen: Set<object>,
): string {
	if (typeof value === "string") {
		return JSON.stringify(truncate(value, limits.maxStringLength))
	}
	if (typeof value === "bigint") return `${value}n`
	if (typeof value === "symbol") {
		return `Symbol(${truncate(value.description ?? "", limits.maxStringLength)})`
	}
	if (typeof value === "function") {
		return `[Function ${truncate(value.name, limits.maxStringLength) || "anonymous"}]`
	}
	if (typeof value !== "object" || value === null) return String(value)

	if (value instanceof Date) {
		return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString()
	}
	if (seen.has(value)) return "[Circular]"
	if (depth >= limits.maxDepth) return Array.isArray(value) ? "[…]" : "{…}"

	seen.add(value)
	const rendered = renderContainer(value, limits, depth, seen)
	seen.delete(value)
	return rendered
}

function renderContainer(
	value: object,
	limits: RenderLimits,
	depth: number,
	seen: Set<object>,
): string {
	const child = (item: unknown) => renderAt(item, limits, depth + 1, seen)

	if (Array.isArray(value)) {
		return `[${preview(value, limits.maxItems, child)}]`
	}
	if (value instanceof Map) {
		const body = preview(
			Array.from(value),
			limits.maxItems,
			([key, item]) => `${child(key)} => ${child(item)}`,
		)
		return `Map(${value.size}) {${body}}`
	}
	if (value instanceof Set) {
		return `Set(${value.size}) {${preview(Array.from(value), limits.maxItems, child)}}`
	}

	const keys = Object.keys(value)
	const body =
		keys.length === 0
			? "{}"
			: `{${preview(
					keys,
					limits.maxItems,
					(key) => `${renderKey(key, limits)}: ${child(Reflect.get(value, key))}`,
				)}}`
	if (isRecord(value)) return body

	const name: unknown = value.constructor?.name
	return typeof name === "string" && name.length > 0
		? `${truncate(name, limits.maxStringLength)} ${body}`
		: body
}

function renderKey(key: string, limits: RenderLimits): string {
	const shown = truncate(key, limits.maxStringLength)
	return IDENTIFIER.test(key) ? shown : JSON.stringify(shown)
}

function preview<T>(
	items: ReadonlyArray<T>,
	maxItems: number,
	render: (item: T) => string = String,
): string {
	const shown = items.slice(0, maxItems).map((item) => render(item))
	const hidden = items.length - shown.length
	if (hidden > 0) {
		shown.push(`… ${hidden} more`)
	}
	return shown.join(", ")
}
