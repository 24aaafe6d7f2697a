import type { BaseError, DescriptorError, ValidationError } from "@conform/core"
import type { ZodError } from "zod"

export interface ParseError extends BaseError {
	type: "parse"
	source: string
	path?: string
}

export interface IoError extends BaseError {
	type: "io"
	path: string
	operation: string
}

export interface UsageError extends BaseError {
	type: "usage"
	field: string
}

export type OptionsError = BaseError & {
	type: "options"
	source: "zod"
	zodError: ZodError
}

export type CliError =
	| ParseError
	| IoError
	| UsageError
	| OptionsError
	| DescriptorError
	| ValidationError
