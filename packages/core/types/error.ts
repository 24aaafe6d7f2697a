import type { ZodError } from "zod"
import type { Diagnostic } from "@/types/diagnostic"

export interface BaseError {
	type: string
	message: string
	cause?: BaseError
	rawError?: Error
}

export type ValidationError = BaseError & {
	type: "validation"
	diagnostic: Diagnostic
	fatal: boolean
}

export type DescriptorError =
	| (BaseError & {
			type: "descriptor"
			source: "zod"
			zodError: ZodError
	  })
	| (BaseError & {
			type: "descriptor"
			source: "manual"
	  })

export type CoreError = ValidationError | DescriptorError

export type Result<T, E extends BaseError = CoreError> =
	| { ok: true; value: T }
	| { ok: false; error: E }
