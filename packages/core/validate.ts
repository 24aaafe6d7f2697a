import { executePlan } from "@/coerce/execute"
import { type ContractOptions, type ContractOptionsInput, resolveOptions } from "@/config"
import { t } from "@/descriptor/build"
import { exceedsDepth } from "@/descriptor/depth"
import { buildDiagnostic } from "@/diagnostic/build"
import { CoercionFailure, ContractFailure, ValidationFailure } from "@/errors/failure"
import { logger } from "@/log"
import { classifyValue } from "@/match/classify"
import type {
	Infer,
	MappingDescriptor,
	SequenceDescriptor,
	SetDescriptor,
	TypeDescriptor,
} from "@/types/descriptor"
import type { Result, ValidationError } from "@/types/error"
import type { RejectedVerdict, Verdict } from "@/types/verdict"

function depthVerdict(
	value: unknown,
	descriptor: TypeDescriptor,
	options: ContractOptions,
): RejectedVerdict | null {
	if (!exceedsDepth(descriptor, options.maxDepth)) return null

	logger.warn(`descriptor rejected: nesting exceeds maxDepth ${options.maxDepth}`)
	return {
		diagnostic: buildDiagnostic([], descriptor, value, {
			limits: options.render,
			message: `descriptor nests deeper than ${options.maxDepth} levels`,
			reason: "depth_limit",
		}),
		status: "rejected",
	}
}

function classifyWith(
	value: unknown,
	descriptor: TypeDescriptor,
	options: ContractOptions,
): Verdict {
	return (
		depthVerdict(value, descriptor, options) ??
		classifyValue(value, descriptor, { options, path: [] })
	)
}

function settle(value: unknown, verdict: Verdict, options: ContractOptions): unknown {
	switch (verdict.status) {
		case "exact":
			return value
		case "coercible":
			return executePlan(verdict.plan, options)
		case "rejected":
			throw new CoercionFailure(verdict.diagnostic)
	}
}

function coerceWith<D extends TypeDescriptor>(
	value: unknown,
	descriptor: D,
	options: ContractOptions,
): Infer<D> {
	// The verdict was reached against `descriptor`.
	return settle(value, classifyWith(value, descriptor, options), options) as Infer<D>
}

function validateWith<D extends TypeDescriptor>(
	value: unknown,
	descriptor: D,
	options: ContractOptions,
): Infer<D> {
	try {
		return coerceWith(value, descriptor, options)
	} catch (error) {
		if (error instanceof ContractFailure) {
			throw new ValidationFailure(error.diagnostic, { cause: error })
		}
		throw error
	}
}

function toValidationError(error: ContractFailure): ValidationError {
	return {
		diagnostic: error.diagnostic,
		fatal: error.fatal,
		message: error.message,
		rawError: error,
		type: "validation",
	}
}

function safeValidateWith<D extends TypeDescriptor>(
	value: unknown,
	descriptor: D,
	options: ContractOptions,
): Result<Infer<D>, ValidationError> {
	try {
		return { ok: true, value: coerceWith(value, descriptor, options) }
	} catch (error) {
		if (error instanceof ContractFailure) {
			return { error: toValidationError(error), ok: false }
		}
		throw error
	}
}

function inspectWith<D extends TypeDescriptor>(
	value: unknown,
	descriptor: D,
	options: ContractOptions,
): Result<Inspection<Infer<D>>, ValidationError> {
	const verdict = classifyWith(value, descriptor, options)
	if (verdict.status === "rejected") {
		return { error: toValidationError(new ValidationFailure(verdict.diagnostic)), ok: false }
	}
	try {
		// The verdict was reached against `descriptor`.
		const settled = settle(value, verdict, options) as Infer<D>
		return { ok: true, value: { status: verdict.status, value: settled } }
	} catch (error) {
		if (error instanceof ContractFailure) {
			return { error: toValidationError(error), ok: false }
		}
		throw error
	}
}

/**
 * The outcome of one classification: how the value conformed, and the value
 * to use from here on.
 */
export interface Inspection<T> {
	status: "exact" | "coercible"
	value: T
}

/**
 * Decides whether `value` conforms to `descriptor` (`exact`), can be converted
 * (`coercible`, with the plan the coercer will follow) or neither
 * (`rejected`, with a diagnostic). Never throws for any value.
 */
export function classify(
	value: unknown,
	descriptor: TypeDescriptor,
	options?: ContractOptionsInput,
): Verdict {
	return classifyWith(value, descriptor, resolveOptions(options))
}

/**
 * Returns `value` itself when it already conforms, otherwise a converted copy.
 * Throws a CoercionFailure when no conversion exists.
 */
export function coerce<D extends TypeDescriptor>(
	value: unknown,
	descriptor: D,
	options?: ContractOptionsInput,
): Infer<D> {
	return coerceWith(value, descriptor, resolveOptions(options))
}

/**
 * Same as `coerce`, but failures surface as ValidationFailure.
 */
export function validate<D extends TypeDescriptor>(
	value: unknown,
	descriptor: D,
	options?: ContractOptionsInput,
): Infer<D> {
	return validateWith(value, descriptor, resolveOptions(options))
}

export function safeValidate<D extends TypeDescriptor>(
	value: unknown,
	descriptor: D,
	options?: ContractOptionsInput,
): Result<Infer<D>, ValidationError> {
	return safeValidateWith(value, descriptor, resolveOptions(options))
}

/**
 * Classifies once and settles the value from that verdict: the value itself
 * when exact, the converted value when coercible.
 */
export function inspect<D extends TypeDescriptor>(
	value: unknown,
	descriptor: D,
	options?: ContractOptionsInput,
): Result<Inspection<Infer<D>>, ValidationError> {
	return inspectWith(value, descriptor, resolveOptions(options))
}

export interface Contract {
	readonly options: ContractOptions
	classify(value: unknown, descriptor: TypeDescriptor): Verdict
	coerce<D extends TypeDescriptor>(value: unknown, descriptor: D): Infer<D>
	inspect<D extends TypeDescriptor>(
		value: unknown,
		descriptor: D,
	): Result<Inspection<Infer<D>>, ValidationError>
	validate<D extends TypeDescriptor>(value: unknown, descriptor: D): Infer<D>
	safeValidate<D extends TypeDescriptor>(
		value: unknown,
		descriptor: D,
	): Result<Infer<D>, ValidationError>
}

/**
 * Binds the entry points to one set of options, resolved once.
 */
export function createContract(input?: ContractOptionsInput): Contract {
	const options = resolveOptions(input)
	return Object.freeze({
		classify: (value: unknown, descriptor: TypeDescriptor) =>
			classifyWith(value, descriptor, options),
		coerce: <D extends TypeDescriptor>(value: unknown, descriptor: D) =>
			coerceWith(value, descriptor, options),
		inspect: <D extends TypeDescriptor>(value: unknown, descriptor: D) =>
			inspectWith(value, descriptor, options),
		options,
		safeValidate: <D extends TypeDescriptor>(value: unknown, descriptor: D) =>
			safeValidateWith(value, descriptor, options),
		validate: <D extends TypeDescriptor>(value: unknown, descriptor: D) =>
			validateWith(value, descriptor, options),
	})
}

export function toListOf<E extends TypeDescriptor>(
	value: unknown,
	element: E,
	options?: ContractOptionsInput,
): Infer<SequenceDescriptor<E>> {
	return validate(value, t.sequence(element), options)
}

export function toMapOf<K extends TypeDescriptor, V extends TypeDescriptor>(
	value: unknown,
	key: K,
	item: V,
	options?: ContractOptionsInput,
): Infer<MappingDescriptor<K, V>> {
	return validate(value, t.mapping(key, item), options)
}

export function toSetOf<E extends TypeDescriptor>(
	value: unknown,
	element: E,
	options?: ContractOptionsInput,
): Infer<SetDescriptor<E>> {
	return validate(value, t.set(element), options)
}
