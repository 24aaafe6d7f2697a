/**
 * Type descriptors: the closed set of shapes a value can be checked against.
 */

export type ScalarKind = "integer" | "float" | "string" | "boolean" | "object" | "null"

export interface ScalarDescriptor<K extends ScalarKind = ScalarKind> {
	readonly kind: "scalar"
	readonly scalar: K
}

export interface SequenceDescriptor<E extends TypeDescriptor = TypeDescriptor> {
	readonly kind: "sequence"
	readonly element: E
}

export interface TupleDescriptor<
	E extends ReadonlyArray<TypeDescriptor> = ReadonlyArray<TypeDescriptor>,
> {
	readonly kind: "tuple"
	readonly elements: E
}

export interface MappingDescriptor<
	K extends TypeDescriptor = TypeDescriptor,
	V extends TypeDescriptor = TypeDescriptor,
> {
	readonly kind: "mapping"
	readonly key: K
	readonly value: V
}

export interface SetDescriptor<E extends TypeDescriptor = TypeDescriptor> {
	readonly kind: "set"
	readonly element: E
}

export interface UnionDescriptor<
	A extends ReadonlyArray<TypeDescriptor> = ReadonlyArray<TypeDescriptor>,
> {
	readonly kind: "union"
	readonly alternatives: A
}

export interface AnyDescriptor {
	readonly kind: "any"
}

export type TypeDescriptor =
	| ScalarDescriptor<ScalarKind>
	| SequenceDescriptor<TypeDescriptor>
	| TupleDescriptor<ReadonlyArray<TypeDescriptor>>
	| MappingDescriptor<TypeDescriptor, TypeDescriptor>
	| SetDescriptor<TypeDescriptor>
	| UnionDescriptor<ReadonlyArray<TypeDescriptor>>
	| AnyDescriptor

export type DescriptorKind = TypeDescriptor["kind"]

interface ScalarValues {
	integer: number
	float: number
	string: string
	boolean: boolean
	object: object
	null: null | undefined
}

/**
 * The TypeScript type of a value that conforms to `D`.
 */
export type Infer<D extends TypeDescriptor> =
	D extends ScalarDescriptor<infer K extends ScalarKind>
		? ScalarValues[K]
		: D extends SequenceDescriptor<infer E extends TypeDescriptor>
			? Array<Infer<E>>
			: D extends TupleDescriptor<infer E extends ReadonlyArray<TypeDescriptor>>
				? { -readonly [I in keyof E]: E[I] extends TypeDescriptor ? Infer<E[I]> : never }
				: D extends MappingDescriptor<
							infer K extends TypeDescriptor,
							infer V extends TypeDescriptor
						>
					? Map<Infer<K>, Infer<V>>
					: D extends SetDescriptor<infer E extends TypeDescriptor>
						? Set<Infer<E>>
						: D extends UnionDescriptor<infer A extends ReadonlyArray<TypeDescriptor>>
							? Infer<A[number]>
							: unknown
