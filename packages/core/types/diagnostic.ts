import type { TypeDescriptor } from "@/types/descriptor"

export type RejectionReason =
	| "type_mismatch"
	| "arity_mismatch"
	| "parse_failure"
	| "depth_limit"

/**
 * One step from the root of a validation request towards the failing element.
 * Mapping keys are stored as their bounded rendering, never as the key itself.
 */
export type PathSegment =
	| { type: "field"; name: string }
	| { type: "index"; index: number }
	| { type: "key"; key: string }
	| { type: "entry"; key: string }
	| { type: "alternative"; index: number }

export type DiagnosticPath = ReadonlyArray<Readonly<PathSegment>>

export interface Diagnostic {
	readonly reason: RejectionReason
	readonly path: DiagnosticPath
	readonly expected: TypeDescriptor
	readonly expectedText: string
	readonly received: string
	readonly value: string
	readonly message: string
	readonly alternatives: ReadonlyArray<Diagnostic>
}

export interface RenderLimits {
	maxStringLength: number
	maxItems: number
	maxDepth: number
}
