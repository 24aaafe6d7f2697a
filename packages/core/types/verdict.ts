import type { ScalarDescriptor } from "@/types/descriptor"
import type { Diagnostic, DiagnosticPath } from "@/types/diagnostic"

export type ScalarRule =
	| "float_to_integer"
	| "bigint_to_integer"
	| "string_to_integer"
	| "bigint_to_float"
	| "string_to_float"
	| "to_string"
	| "number_to_boolean"
	| "string_to_boolean"

export type MappingShape = "mapping" | "pairs" | "flat"

export type PlanStep =
	| { status: "exact"; value: unknown }
	| { status: "coercible"; plan: CoercionPlan }

export interface PlanEntry {
	key: PlanStep
	value: PlanStep
}

/**
 * Everything the matcher decided while classifying a coercible value. The
 * coercer only replays these decisions.
 */
export type CoercionPlan =
	| {
			kind: "scalar"
			rule: ScalarRule
			input: unknown
			expected: ScalarDescriptor
			path: DiagnosticPath
	  }
	| {
			kind: "sequence" | "tuple" | "set"
			items: ReadonlyArray<PlanStep>
			path: DiagnosticPath
	  }
	| {
			kind: "mapping"
			shape: MappingShape
			entries: ReadonlyArray<PlanEntry>
			path: DiagnosticPath
	  }
	| {
			kind: "union"
			alternative: number
			plan: CoercionPlan
			path: DiagnosticPath
	  }

export type ExactVerdict = { status: "exact" }
export type CoercibleVerdict = { status: "coercible"; plan: CoercionPlan }
export type RejectedVerdict = { status: "rejected"; diagnostic: Diagnostic }

export type Verdict = ExactVerdict | CoercibleVerdict | RejectedVerdict
