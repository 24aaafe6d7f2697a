/**
 * @conform/core
 *
 * Runtime contract checking: classify a value against a type descriptor,
 * convert it when a deterministic conversion exists, and report precise
 * diagnostics otherwise.
 */

export {
	type ContractOptions,
	type ContractOptionsInput,
	ContractOptionsSchema,
	DEFAULT_OPTIONS,
	optionsFromEnv,
	resolveOptions,
} from "@/config"
export {
	DEFAULT_MAX_DEPTH,
	DEFAULT_RENDER_MAX_DEPTH,
	DEFAULT_RENDER_MAX_ITEMS,
	DEFAULT_RENDER_MAX_STRING,
	MAX_DEPTH_CEILING,
} from "@/constants"
export { freezeDescriptor, t } from "@/descriptor/build"
export { childDescriptors, descriptorDepth, exceedsDepth } from "@/descriptor/depth"
export { formatDescriptor } from "@/descriptor/format"
export { type ParseDescriptorOptions, parseDescriptor } from "@/descriptor/parse"
export { buildDiagnostic, formatDiagnostic, prependPath } from "@/diagnostic/build"
export { appendPath, formatPath } from "@/diagnostic/path"
export { renderValue, truncate } from "@/diagnostic/render"
export { CoercionFailure, ContractFailure, ValidationFailure } from "@/errors/failure"
export { logger } from "@/log"
export type {
	AnyDescriptor,
	DescriptorKind,
	Infer,
	MappingDescriptor,
	ScalarDescriptor,
	ScalarKind,
	SequenceDescriptor,
	SetDescriptor,
	TupleDescriptor,
	TypeDescriptor,
	UnionDescriptor,
} from "@/types/descriptor"
export type {
	Diagnostic,
	DiagnosticPath,
	PathSegment,
	RejectionReason,
	RenderLimits,
} from "@/types/diagnostic"
export type {
	BaseError,
	CoreError,
	DescriptorError,
	Result,
	ValidationError,
} from "@/types/error"
export { isCollection, isRecord, runtimeTypeName } from "@/types/guards"
export type {
	CoercionPlan,
	MappingShape,
	PlanStep,
	ScalarRule,
	Verdict,
} from "@/types/verdict"
export {
	type Contract,
	classify,
	coerce,
	createContract,
	type Inspection,
	inspect,
	safeValidate,
	toListOf,
	toMapOf,
	toSetOf,
	validate,
} from "@/validate"
