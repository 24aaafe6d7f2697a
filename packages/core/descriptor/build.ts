import type {
	AnyDescriptor,
	MappingDescriptor,
	ScalarDescriptor,
	ScalarKind,
	SequenceDescriptor,
	SetDescriptor,
	TupleDescriptor,
	TypeDescriptor,
	UnionDescriptor,
} from "@/types/descriptor"

function scalar<K extends ScalarKind>(kind: K): ScalarDescriptor<K> {
	const descriptor: ScalarDescriptor<K> = { kind: "scalar", scalar: kind }
	return Object.freeze(descriptor)
}

function sequence<E extends TypeDescriptor>(element: E): SequenceDescriptor<E> {
	const descriptor: SequenceDescriptor<E> = { element, kind: "sequence" }
	return Object.freeze(descriptor)
}

function tuple<E extends ReadonlyArray<TypeDescriptor>>(...elements: E): TupleDescriptor<E> {
	Object.freeze(elements)
	const descriptor: TupleDescriptor<E> = { elements, kind: "tuple" }
	return Object.freeze(descriptor)
}

function mapping<K extends TypeDescriptor, V extends TypeDescriptor>(
	key: K,
	value: V,
): MappingDescriptor<K, V> {
	const descriptor: MappingDescriptor<K, V> = { key, kind: "mapping", value }
	return Object.freeze(descriptor)
}

function set<E extends TypeDescriptor>(element: E): SetDescriptor<E> {
	const descriptor: SetDescriptor<E> = { element, kind: "set" }
	return Object.freeze(descriptor)
}

function union<A extends ReadonlyArray<TypeDescriptor>>(...alternatives: A): UnionDescriptor<A> {
	Object.freeze(alternatives)
	const descriptor: UnionDescriptor<A> = { alternatives, kind: "union" }
	return Object.freeze(descriptor)
}

const NULL = scalar("null")

function optional<D extends TypeDescriptor>(
	descriptor: D,
): UnionDescriptor<readonly [D, ScalarDescriptor<"null">]> {
	return union(descriptor, NULL)
}

const ANY_DESCRIPTOR: AnyDescriptor = { kind: "any" }
const ANY = Object.freeze(ANY_DESCRIPTOR)

/**
 * Descriptor builders. Every descriptor they return is frozen, so it can be
 * shared between fields and used as a cache key.
 *
 * @example
 * const Tags = t.mapping(t.string, t.sequence(t.union(t.integer, t.string)))
 */
export const t = {
	any: ANY,
	boolean: scalar("boolean"),
	float: scalar("float"),
	integer: scalar("integer"),
	mapping,
	null: NULL,
	object: scalar("object"),
	optional,
	scalar,
	sequence,
	set,
	string: scalar("string"),
	tuple,
	union,
} as const

/**
 * Rebuilds a structurally valid descriptor (for instance one decoded from
 * JSON) into a frozen tree.
 */
export function freezeDescriptor(descriptor: TypeDescriptor): TypeDescriptor {
	switch (descriptor.kind) {
		case "any":
			return ANY
		case "scalar":
			return scalar(descriptor.scalar)
		case "sequence":
			return sequence(freezeDescriptor(descriptor.element))
		case "set":
			return set(freezeDescriptor(descriptor.element))
		case "tuple":
			return tuple(...descriptor.elements.map(freezeDescriptor))
		case "mapping":
			return mapping(freezeDescriptor(descriptor.key), freezeDescriptor(descriptor.value))
		case "union":
			return union(...descriptor.alternatives.map(freezeDescriptor))
	}
}
