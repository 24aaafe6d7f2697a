import type { TypeDescriptor } from "@/types/descriptor"

export function formatDescriptor(descriptor: TypeDescriptor): string {
	switch (descriptor.kind) {
		case "any":
			return "any"
		case "scalar":
			return descriptor.scalar
		case "sequence":
			return `${formatOperand(descriptor.element)}[]`
		case "tuple":
			return `[${descriptor.elements.map(formatDescriptor).join(", ")}]`
		case "mapping":
			return `Map<${formatDescriptor(descriptor.key)}, ${formatDescriptor(descriptor.value)}>`
		case "set":
			return `Set<${formatDescriptor(descriptor.element)}>`
		case "union":
			if (descriptor.alternatives.length === 0) return "never"
			return descriptor.alternatives.map(formatDescriptor).join(" | ")
	}
}

// `(integer | string)[]`, not `integer | string[]`
function formatOperand(descriptor: TypeDescriptor): string {
	const text = formatDescriptor(descriptor)
	return descriptor.kind === "union" && descriptor.alternatives.length > 1
		? `(${text})`
		: text
}
