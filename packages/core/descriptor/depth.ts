import type { TypeDescriptor } from "@/types/descriptor"

export function childDescriptors(descriptor: TypeDescriptor): ReadonlyArray<TypeDescriptor> {
	switch (descriptor.kind) {
		case "any":
		case "scalar":
			return []
		case "sequence":
		case "set":
			return [descriptor.element]
		case "tuple":
			return descriptor.elements
		case "mapping":
			return [descriptor.key, descriptor.value]
		case "union":
			return descriptor.alternatives
	}
}

/**
 * Nesting depth of a descriptor; a scalar has depth 1. Iterative, and returns
 * as soon as `limit` is passed. Shared subtrees are revisited only when they
 * are reached at a greater depth than before.
 */
export function descriptorDepth(
	descriptor: TypeDescriptor,
	limit = Number.POSITIVE_INFINITY,
): number {
	let deepest = 0
	const reached = new Map<TypeDescriptor, number>()
	const stack: Array<{ descriptor: TypeDescriptor; depth: number }> = [
		{ depth: 1, descriptor },
	]

	for (let frame = stack.pop(); frame; frame = stack.pop()) {
		if (frame.depth > deepest) {
			deepest = frame.depth
			if (deepest > limit) return deepest
		}
		for (const child of childDescriptors(frame.descriptor)) {
			const depth = frame.depth + 1
			if ((reached.get(child) ?? 0) >= depth) continue
			reached.set(child, depth)
			stack.push({ depth, descriptor: child })
		}
	}

	return deepest
}

export function exceedsDepth(descriptor: TypeDescriptor, limit: number): boolean {
	return descriptorDepth(descriptor, limit) > limit
}
